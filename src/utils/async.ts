/**
 * Async Helpers
 *
 * Deadlines for external calls and bounded fan-out.
 */

/**
 * Thrown by withDeadline when the deadline passes first.
 */
export class DeadlineExceededError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} exceeded its ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run an operation against a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline
 * passes; clients that accept a signal stop their request. The returned
 * promise rejects with DeadlineExceededError either way.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map items through an async function, at most `batchSize` at a time.
 * Results keep the input order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(batchSize));
  const results: R[] = [];
  for (let start = 0; start < items.length; start += size) {
    const batch = items.slice(start, start + size);
    const settled = await Promise.all(batch.map((item, offset) => fn(item, start + offset)));
    results.push(...settled);
  }
  return results;
}
