/**
 * Service Deadlines
 *
 * Deadlines for the model, the embedder and the store's fixed lookups.
 * Passing one is fatal to the question. Generated queries are timed by
 * the executor, where a timeout consumes a retry instead.
 */

import { DeadlineExceededError, withDeadline } from '@/utils/async';
import { UpstreamServiceTimeoutError } from '../errors';

export type UpstreamService = 'llm' | 'embedding' | 'graph';

/**
 * Run an external call with a deadline.
 *
 * @throws UpstreamServiceTimeoutError when the deadline passes first
 */
export async function callWithDeadline<T>(
  service: UpstreamService,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  try {
    return await withDeadline(operation, timeoutMs, service);
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      throw new UpstreamServiceTimeoutError(service, timeoutMs);
    }
    throw error;
  }
}
