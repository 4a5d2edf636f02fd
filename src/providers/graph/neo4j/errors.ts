/**
 * Neo4j Error Handling & Session Management
 *
 * Provides error classification, retry logic, and the runCommand
 * orchestrator that keeps session boilerplate out of operations.
 */

import type { Driver, Session } from 'neo4j-driver';
import type { GraphErrorType } from '../types';
import { GraphClientError } from '../types';
import { RETRY } from './constants';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

function errorCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code.toLowerCase();
  }
  return '';
}

/**
 * Map Neo4j-specific errors to standard GraphErrorType.
 *
 * Categories:
 * - QUERY_ERROR: Syntax, semantic or type errors in the statement
 * - CONNECTION_ERROR: Network/availability issues
 * - TIMEOUT: Transaction exceeded its deadline
 * - CONSTRAINT_VIOLATION: Unique constraint failures (not retryable)
 * - TRANSIENT_ERROR: Deadlocks and cluster hiccups (retryable)
 *
 * Statement errors are matched on the code first: their messages echo
 * the offending query, which may contain words like "unique".
 */
export function classifyNeo4jError(error: unknown): GraphErrorType {
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (code.startsWith('neo.clienterror.statement')) {
    return 'QUERY_ERROR';
  }

  // Connection errors
  if (
    code === 'serviceunavailable' ||
    code === 'sessionexpired' ||
    message.includes('connection') ||
    message.includes('unavailable') ||
    message.includes('failed to connect')
  ) {
    return 'CONNECTION_ERROR';
  }

  if (
    code.includes('timedout') ||
    code.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('timeout')
  ) {
    return 'TIMEOUT';
  }

  // Constraint violations - not retryable
  if (message.includes('constraint') || message.includes('unique') || code.includes('constraint')) {
    return 'CONSTRAINT_VIOLATION';
  }

  // Transient errors - retryable
  if (
    message.includes('deadlock') ||
    message.includes('transient') ||
    code.includes('transient') ||
    code.includes('deadlock')
  ) {
    return 'TRANSIENT_ERROR';
  }

  return 'QUERY_ERROR';
}

/**
 * Check if an error indicates a schema element already exists.
 */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('equivalent') ||
      message.includes('already exists') ||
      message.includes('constraintalreadyexists') ||
      message.includes('indexalreadyexists')
    );
  }
  return false;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================
// RETRY LOGIC
// ============================================================

/**
 * Execute an operation with exponential backoff retry for transient errors.
 *
 * Retry behavior:
 * - TRANSIENT_ERROR: Retry with exponential backoff
 * - Anything else: rethrown as a GraphClientError of its own type
 */
export async function withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < RETRY.MAX_ATTEMPTS; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const type = error instanceof GraphClientError ? error.type : classifyNeo4jError(error);

      if (type !== 'TRANSIENT_ERROR') {
        if (error instanceof GraphClientError) throw error;
        throw new GraphClientError(
          `${operationName} failed: ${toError(error).message}`,
          type,
          toError(error)
        );
      }

      lastError = toError(error);
      if (attempt < RETRY.MAX_ATTEMPTS - 1) {
        const delay = RETRY.BASE_DELAY_MS * 2 ** attempt;
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw new GraphClientError(
    `Operation ${operationName} failed after ${RETRY.MAX_ATTEMPTS} attempts: ${lastError?.message}`,
    'TRANSIENT_ERROR',
    lastError
  );
}

// ============================================================
// SESSION LIFECYCLE MANAGEMENT
// ============================================================

export type CommandMode = 'read' | 'write';

/**
 * Unified session lifecycle orchestrator.
 *
 * Opens a session in the requested access mode, runs the operation,
 * classifies any failure and always closes the session.
 */
export async function runCommand<T>(
  driver: Driver,
  database: string,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  const session = driver.session({ database, defaultAccessMode: mode === 'read' ? 'READ' : 'WRITE' });
  try {
    return await operation(session);
  } catch (error) {
    if (error instanceof GraphClientError) throw error;
    throw new GraphClientError(
      `${operationName} failed: ${toError(error).message}`,
      classifyNeo4jError(error),
      toError(error)
    );
  } finally {
    await session.close();
  }
}

/**
 * Run a command with automatic retry for transient errors.
 * Combines runCommand lifecycle management with withRetry resilience.
 */
export async function runCommandWithRetry<T>(
  driver: Driver,
  database: string,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  return withRetry(
    () => runCommand(driver, database, mode, operation, operationName),
    operationName
  );
}
