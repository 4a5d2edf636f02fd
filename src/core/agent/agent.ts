/**
 * Gene Graph Agent
 *
 * Answers one question end to end:
 * classify → synthesize query → execute with retry → enrich (downstream only) → answer.
 *
 * Every failure becomes a `failed` answer with user-visible text; nothing
 * is shared between questions.
 */

import type { QueryRow } from '@/providers/graph/types';
import { logAskResult, logAskStart, logCategory } from '@/utils/logger';
import { GeneGraphError } from '../errors';
import { render } from './answer';
import { classify } from './classifier';
import { InteractionEnricher } from './enricher';
import { type ExecutorContext, executeWithRetry } from './executor';
import { checkResultShape, parseInteractionPaths } from './facts';
import { NOT_FOUND_ANSWER } from './prompts';
import { EmbeddingSimilaritySearch, type SimilaritySearch } from './similarity-search';
import { synthesizeQuery } from './synthesizer';
import type {
  AgentAnswer,
  AgentDependencies,
  AgentSettings,
  Category,
  Facts,
  FailureType
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Failures
// ═══════════════════════════════════════════════════════════════════════════════

export const FAILURE_ANSWERS: Record<FailureType, string> = {
  ClassificationAmbiguous:
    'I could not tell whether this question is about a disease association or about downstream interactions. Please rephrase it.',
  RetryBudgetExhausted:
    'I could not build a working database query for this question. Please try rephrasing it.',
  UpstreamServiceTimeout: 'A required service did not respond in time. Please try again later.',
  QuerySynthesis: 'I could not build a database query for this question. Please try rephrasing it.',
  Unexpected: 'Something went wrong while answering the question. Please try again.'
};

function failureType(error: unknown): FailureType {
  if (!(error instanceof GeneGraphError)) return 'Unexpected';
  switch (error.type) {
    case 'ClassificationAmbiguous':
    case 'RetryBudgetExhausted':
    case 'UpstreamServiceTimeout':
    case 'QuerySynthesis':
      return error.type;
    default:
      return 'Unexpected';
  }
}

export function toFailedAnswer(error: unknown): AgentAnswer {
  const type = failureType(error);
  return {
    status: 'failed',
    error: { type, message: error instanceof Error ? error.message : String(error) },
    answer: FAILURE_ANSWERS[type]
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Agent
// ═══════════════════════════════════════════════════════════════════════════════

export class GeneGraphAgent {
  private readonly enricher: InteractionEnricher;
  private readonly executorContext: ExecutorContext;

  constructor(
    private readonly deps: AgentDependencies,
    private readonly settings: AgentSettings,
    search?: SimilaritySearch
  ) {
    this.enricher = new InteractionEnricher(
      deps.graphClient,
      search ?? new EmbeddingSimilaritySearch(deps.embeddingClient, settings.searchTimeoutMs),
      { concurrency: settings.enrichmentConcurrency, graphTimeoutMs: settings.graphTimeoutMs }
    );
    this.executorContext = {
      graphClient: deps.graphClient,
      llm: deps.llm.query,
      retryBudget: settings.retryBudget,
      schema: settings.schema,
      graphTimeoutMs: settings.graphTimeoutMs,
      query: settings.query
    };
  }

  /**
   * Route a question without answering it.
   *
   * @throws ClassificationAmbiguousError when the model's label names no single category
   */
  selectCategory(question: string): Promise<Category> {
    return classify(question, this.deps.llm.classification, this.settings.classification);
  }

  async ask(question: string): Promise<AgentAnswer> {
    logAskStart(question);

    let result: AgentAnswer;
    try {
      result = await this.answer(question);
    } catch (error) {
      result = toFailedAnswer(error);
    }

    logAskResult(result);
    return result;
  }

  private async answer(question: string): Promise<AgentAnswer> {
    const category = await this.selectCategory(question);
    logCategory(category);

    const initialQuery = await synthesizeQuery(
      question,
      category,
      this.settings.schema,
      this.deps.llm.query,
      this.settings.query
    );

    const outcome = await executeWithRetry(initialQuery, category, this.executorContext);
    const facts = await this.collectFacts(category, outcome.rows);

    if (facts.kind === 'empty') {
      return {
        status: 'not_found',
        category,
        answer: NOT_FOUND_ANSWER,
        query: outcome.query,
        attempts: outcome.attempts
      };
    }

    const answer = await render(question, facts, category, this.deps.llm.answer, this.settings.answer);
    return {
      status: 'answered',
      category,
      answer,
      query: outcome.query,
      attempts: outcome.attempts,
      facts
    };
  }

  private async collectFacts(category: Category, rows: QueryRow[]): Promise<Facts> {
    const shape = checkResultShape(category, rows);
    if (!shape.ok || shape.empty) return { kind: 'empty' };

    switch (category) {
      case 'disease_association':
        return { kind: 'disease_association', rows };
      case 'downstream_interaction': {
        const paths = (parseInteractionPaths(rows) ?? []).filter((path) => path.length > 0);
        return { kind: 'downstream_interaction', paths: await this.enricher.enrich(paths) };
      }
    }
  }
}
