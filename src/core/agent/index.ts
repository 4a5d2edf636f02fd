/**
 * Agent Module
 */

export { FAILURE_ANSWERS, GeneGraphAgent, toFailedAnswer } from './agent';
export { describeGene, formatFacts, render } from './answer';
export { classify, parseCategoryLabel } from './classifier';
export { callWithDeadline, type UpstreamService } from './deadline';
export { InteractionEnricher, interactionSearchText } from './enricher';
export { executeWithRetry, type ExecutorContext, toQueryExecutionError } from './executor';
export { checkResultShape, parseInteractionPaths } from './facts';
export { CATEGORY_PROMPTS, NOT_FOUND_ANSWER, type PromptBundle } from './prompts';
export { createAgentSettings } from './settings';
export { type AnnotationMatch, EmbeddingSimilaritySearch, type SimilaritySearch } from './similarity-search';
export { correctQuery, sanitizeQuery, synthesizeQuery } from './synthesizer';
export * from './types';
