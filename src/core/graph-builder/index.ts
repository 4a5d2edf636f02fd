/**
 * Graph Builder Module
 */

export { GraphBuilder, isImportRunning } from './builder';
export { annotationEmbeddingText, embedAnnotations } from './embed-annotations';
export { identifierSet, normalizeIdentifier, resolveGeneKey } from './identity';
export * from './parsers';
export { readAnnotationSource, readPathwaySources, readSource } from './sources';
export type {
  AspectMap,
  BuildOptions,
  ImportReport,
  SkipCounts,
  SkippedRecord,
  SkipReason,
  SourceDocument
} from './types';
export { SKIP_REASONS } from './types';
