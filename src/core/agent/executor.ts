/**
 * Bounded-Retry Executor
 *
 * Runs a generated query and, when the attempt fails in a way a rewrite
 * could fix, asks the synthesizer for a corrected query.
 *
 * States:
 *   Ready → Executing → Succeeded
 *                     → Retrying → Executing → ...
 *                     → Failed
 *
 * A query is submitted at most `retryBudget + 1` times. Connection
 * failures end the run at once; a new query cannot fix them.
 */

import type { GraphClient, QueryRow } from '@/providers/graph/types';
import { GraphClientError } from '@/providers/graph/types';
import type { LLMClient } from '@/providers/llm/types';
import { DeadlineExceededError, withDeadline } from '@/utils/async';
import { logAttempt } from '@/utils/logger';
import { QueryExecutionError, RetryBudgetExhaustedError } from '../errors';
import { checkResultShape } from './facts';
import { correctQuery } from './synthesizer';
import type {
  AttemptRecord,
  Category,
  ExecutionOutcome,
  ExecutorState,
  LLMCallSettings
} from './types';

export interface ExecutorContext {
  graphClient: GraphClient;
  /** Writes the corrected queries */
  llm: LLMClient;
  retryBudget: number;
  schema: string;
  graphTimeoutMs: number;
  query: LLMCallSettings;
}

/**
 * Classify a failed attempt. Failures a rewrite can fix come back as
 * QueryExecutionError; anything else is rethrown.
 */
export function toQueryExecutionError(error: unknown, query: string): QueryExecutionError {
  if (error instanceof QueryExecutionError) return error;
  if (error instanceof GraphClientError) {
    if (error.type === 'QUERY_ERROR') {
      return new QueryExecutionError(error.message, 'query_error', query, { cause: error });
    }
    if (error.type === 'TIMEOUT') {
      return new QueryExecutionError(error.message, 'timeout', query, { cause: error });
    }
  }
  if (error instanceof DeadlineExceededError) {
    return new QueryExecutionError(error.message, 'timeout', query, { cause: error });
  }
  throw error;
}

async function runAttempt(query: string, category: Category, context: ExecutorContext): Promise<QueryRow[]> {
  const rows = await withDeadline(
    () => context.graphClient.runReadQuery(query, { timeoutMs: context.graphTimeoutMs }),
    context.graphTimeoutMs,
    'graph query'
  );

  const shape = checkResultShape(category, rows);
  if (!shape.ok) {
    throw new QueryExecutionError(shape.reason, 'result_shape', query);
  }
  return rows;
}

/**
 * Execute `initialQuery`, correcting it after each recoverable failure
 * until it succeeds or the budget is spent. An empty result is a success.
 *
 * @throws RetryBudgetExhaustedError carrying the last attempt's error
 */
export async function executeWithRetry(
  initialQuery: string,
  category: Category,
  context: ExecutorContext
): Promise<ExecutionOutcome> {
  const maxAttempts = Math.max(0, context.retryBudget) + 1;
  const attempts: AttemptRecord[] = [];
  const trace: ExecutorState[] = ['Ready'];
  const transition = (state: ExecutorState): void => {
    trace.push(state);
  };

  let query = initialQuery;

  for (let attempt = 1; ; attempt++) {
    transition('Executing');

    let result: QueryRow[] | QueryExecutionError;
    try {
      result = await runAttempt(query, category, context);
    } catch (error) {
      try {
        result = toQueryExecutionError(error, query);
      } catch (fatal) {
        transition('Failed');
        throw fatal;
      }
    }

    if (!(result instanceof QueryExecutionError)) {
      const record: AttemptRecord = { attempt, query, error: null };
      attempts.push(record);
      logAttempt(record);
      transition('Succeeded');
      return { rows: result, query, attempts, trace };
    }

    const failure = result;
    const record: AttemptRecord = {
      attempt,
      query,
      error: { kind: failure.kind, message: failure.message }
    };
    attempts.push(record);
    logAttempt(record);

    if (attempt >= maxAttempts) {
      transition('Failed');
      throw new RetryBudgetExhaustedError(attempt, failure);
    }

    transition('Retrying');
    query = await correctQuery(
      query,
      failure.message,
      category,
      context.schema,
      context.llm,
      context.query
    );
  }
}
