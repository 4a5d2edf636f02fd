/**
 * Neo4j Error Classification Tests
 *
 * Tests for error classification, schema error detection and retry.
 */

import { describe, expect, test, vi } from 'vitest';
import {
  classifyNeo4jError,
  isSchemaAlreadyExistsError,
  withRetry
} from '@/providers/graph/neo4j/errors';
import { GraphClientError } from '@/providers/graph/types';

function neo4jError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyNeo4jError', () => {
  describe('QUERY_ERROR classification', () => {
    test('statement errors win over words echoed from the query', () => {
      const error = neo4jError(
        "Invalid input 'MATCH': expected a unique pattern (line 1)",
        'Neo.ClientError.Statement.SyntaxError'
      );
      expect(classifyNeo4jError(error)).toBe('QUERY_ERROR');
    });

    test('classifies write attempts in a read transaction', () => {
      const error = neo4jError(
        'Writing in read access mode not allowed',
        'Neo.ClientError.Statement.AccessMode'
      );
      expect(classifyNeo4jError(error)).toBe('QUERY_ERROR');
    });

    test('returns QUERY_ERROR for unknown errors', () => {
      expect(classifyNeo4jError(new Error('Something went wrong'))).toBe('QUERY_ERROR');
    });

    test('returns QUERY_ERROR for non-Error objects', () => {
      expect(classifyNeo4jError('string error')).toBe('QUERY_ERROR');
      expect(classifyNeo4jError(null)).toBe('QUERY_ERROR');
      expect(classifyNeo4jError(undefined)).toBe('QUERY_ERROR');
      expect(classifyNeo4jError(42)).toBe('QUERY_ERROR');
    });
  });

  describe('CONNECTION_ERROR classification', () => {
    test('classifies connection errors', () => {
      expect(classifyNeo4jError(new Error('Failed to connect to database'))).toBe(
        'CONNECTION_ERROR'
      );
    });

    test('classifies driver service unavailable code', () => {
      expect(classifyNeo4jError(neo4jError('No routing servers', 'ServiceUnavailable'))).toBe(
        'CONNECTION_ERROR'
      );
    });

    test('is case insensitive', () => {
      expect(classifyNeo4jError(new Error('CONNECTION failed'))).toBe('CONNECTION_ERROR');
    });
  });

  describe('TIMEOUT classification', () => {
    test('classifies transaction timeouts by code', () => {
      const error = neo4jError(
        'The transaction has been terminated.',
        'Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration'
      );
      expect(classifyNeo4jError(error)).toBe('TIMEOUT');
    });

    test('classifies timeouts by message', () => {
      expect(classifyNeo4jError(new Error('Query timeout exceeded'))).toBe('TIMEOUT');
    });
  });

  describe('CONSTRAINT_VIOLATION classification', () => {
    test('classifies unique constraint violations', () => {
      expect(classifyNeo4jError(new Error('Unique constraint violated'))).toBe(
        'CONSTRAINT_VIOLATION'
      );
    });

    test('classifies constraint violations by error code', () => {
      const error = neo4jError('Some error', 'Neo.ClientError.Schema.ConstraintValidationFailed');
      expect(classifyNeo4jError(error)).toBe('CONSTRAINT_VIOLATION');
    });
  });

  describe('TRANSIENT_ERROR classification', () => {
    test('classifies deadlock errors', () => {
      expect(classifyNeo4jError(new Error('Deadlock detected'))).toBe('TRANSIENT_ERROR');
    });

    test('classifies transient errors by code', () => {
      const error = neo4jError('Some error', 'Neo.TransientError.Transaction.LockClientStopped');
      expect(classifyNeo4jError(error)).toBe('TRANSIENT_ERROR');
    });
  });
});

describe('isSchemaAlreadyExistsError', () => {
  test('detects "equivalent" schema errors', () => {
    expect(isSchemaAlreadyExistsError(new Error('An equivalent constraint already exists'))).toBe(
      true
    );
  });

  test('detects constraint already exists errors', () => {
    const error = new Error('ConstraintAlreadyExists: Cannot create constraint');
    expect(isSchemaAlreadyExistsError(error)).toBe(true);
  });

  test('returns false for other errors', () => {
    expect(isSchemaAlreadyExistsError(new Error('Some other error'))).toBe(false);
  });

  test('returns false for non-Error objects', () => {
    expect(isSchemaAlreadyExistsError('string')).toBe(false);
    expect(isSchemaAlreadyExistsError(null)).toBe(false);
  });
});

describe('withRetry', () => {
  test('retries transient errors and returns the first success', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('Deadlock detected'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, 'upsertGenes')).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  test('does not retry query errors', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValue(neo4jError('bad', 'Neo.ClientError.Statement.SyntaxError'));

    const error = await withRetry(operation, 'upsertGenes').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GraphClientError);
    expect(error instanceof GraphClientError && error.type).toBe('QUERY_ERROR');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('gives up after three transient failures', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('Deadlock detected'));

    const error = await withRetry(operation, 'upsertGenes').catch((e: unknown) => e);
    expect(error instanceof GraphClientError && error.type).toBe('TRANSIENT_ERROR');
    expect(operation).toHaveBeenCalledTimes(3);
  });
});
