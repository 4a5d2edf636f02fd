/**
 * Core Errors
 *
 * Every failure the builder or the agent reports carries a `type` tag,
 * so callers can switch on it without instanceof chains.
 */

export type GeneGraphErrorType =
  | 'MissingIdentifier'
  | 'ImportMalformedRecord'
  | 'ImportInProgress'
  | 'QueryExecution'
  | 'RetryBudgetExhausted'
  | 'ClassificationAmbiguous'
  | 'UpstreamServiceTimeout'
  | 'QuerySynthesis';

export abstract class GeneGraphError extends Error {
  abstract readonly type: GeneGraphErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Graph construction
// ═══════════════════════════════════════════════════════════════════════════════

/** A gene record with no usable symbol, name or synonym */
export class MissingIdentifierError extends GeneGraphError {
  readonly type = 'MissingIdentifier';
}

export class ImportMalformedRecordError extends GeneGraphError {
  readonly type = 'ImportMalformedRecord';

  constructor(
    message: string,
    readonly source: string
  ) {
    super(`${source}: ${message}`);
  }
}

export class ImportInProgressError extends GeneGraphError {
  readonly type = 'ImportInProgress';

  constructor() {
    super('An import is already running');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Question answering
// ═══════════════════════════════════════════════════════════════════════════════

export type QueryFailureKind = 'query_error' | 'timeout' | 'result_shape';

/** One failed attempt at running a generated query. Consumes a retry. */
export class QueryExecutionError extends GeneGraphError {
  readonly type = 'QueryExecution';

  constructor(
    message: string,
    readonly kind: QueryFailureKind,
    readonly query: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RetryBudgetExhaustedError extends GeneGraphError {
  readonly type = 'RetryBudgetExhausted';

  constructor(
    readonly attempts: number,
    readonly lastError: QueryExecutionError
  ) {
    super(`Query failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
  }
}

export class ClassificationAmbiguousError extends GeneGraphError {
  readonly type = 'ClassificationAmbiguous';

  constructor(readonly rawLabel: string) {
    super(`Could not map classifier output to a category: "${rawLabel}"`);
  }
}

export class UpstreamServiceTimeoutError extends GeneGraphError {
  readonly type = 'UpstreamServiceTimeout';

  constructor(
    readonly service: string,
    readonly timeoutMs: number
  ) {
    super(`${service} did not respond within ${timeoutMs}ms`);
  }
}

export class QuerySynthesisError extends GeneGraphError {
  readonly type = 'QuerySynthesis';
}
