/**
 * Configuration System Tests
 *
 * Tests for the config loader and schema validation.
 * Focuses on {env:VAR} resolution, operation defaults and provider-specific validation.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, expect, test } from 'vitest';
import { VALID_MINIMAL_CONFIG } from '@tests/helpers/fixtures';
import { ConfigError, parseConfig, resolveEnvVars } from '@/config/config';
import { configSchema, DEFAULT_ASPECT_MAP } from '@/config/schema';
import { createAgentSettings } from '@/core/agent/settings';

function parse(overrides: Record<string, unknown> = {}) {
  return configSchema.safeParse({ ...VALID_MINIMAL_CONFIG, ...overrides });
}

describe('configSchema', () => {
  describe('defaults', () => {
    test('accepts a minimal config', () => {
      expect(parse().success).toBe(true);
    });

    test('fills server, agent and import defaults', () => {
      const result = parse();
      if (!result.success) throw result.error;

      expect(result.data.server).toEqual({ port: 6370 });
      expect(result.data.agent).toEqual({
        retryBudget: 1,
        enrichmentConcurrency: 8,
        timeouts: { graphMs: 30_000, llmMs: 60_000, searchMs: 30_000 }
      });
      expect(result.data.import).toEqual({
        pathwayFiles: [],
        annotationFile: null,
        aspectMap: DEFAULT_ASPECT_MAP,
        embeddingBatchSize: 64
      });
      expect(result.data.neo4j.database).toBe('neo4j');
    });

    test('runs classification and answers at temperature 0 by default', () => {
      const result = parse();
      if (!result.success) throw result.error;

      expect(result.data.llm.classification).toEqual({ model: 'gpt-4o-mini', temperature: 0 });
      expect(result.data.llm.query).toEqual({ model: 'gpt-4o-mini' });
      expect(result.data.llm.answer).toEqual({ model: 'gpt-4o-mini', temperature: 0 });
    });

    test('merges operation overrides over the defaults', () => {
      const result = parse({
        llm: {
          ...VALID_MINIMAL_CONFIG.llm,
          query: { temperature: 0.2 },
          answer: { model: 'gpt-4o', maxTokens: 512 }
        }
      });
      if (!result.success) throw result.error;

      expect(result.data.llm.query).toEqual({ model: 'gpt-4o-mini', temperature: 0.2 });
      expect(result.data.llm.answer).toEqual({ model: 'gpt-4o', temperature: 0, maxTokens: 512 });
    });
  });

  describe('agent and import validation', () => {
    test('rejects a negative retry budget', () => {
      expect(parse({ agent: { retryBudget: -1 } }).success).toBe(false);
    });

    test('accepts a retry budget of zero', () => {
      const result = parse({ agent: { retryBudget: 0 } });
      if (!result.success) throw result.error;
      expect(result.data.agent.retryBudget).toBe(0);
    });

    test('rejects an aspect map naming an unknown aspect', () => {
      expect(parse({ import: { aspectMap: { P: 'Biological Function' } } }).success).toBe(false);
    });

    test('rejects aspect codes longer than one letter', () => {
      expect(parse({ import: { aspectMap: { BP: 'Biological Process' } } }).success).toBe(false);
    });
  });

  describe('provider validation', () => {
    test('requires an apiKey for cloud providers', () => {
      const result = parse({ llm: { provider: 'anthropic', defaults: { model: 'claude' } } });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues[0]?.message).toBe("apiKey required for provider 'anthropic'");
    });

    test('rejects a baseUrl for cloud providers', () => {
      const result = parse({ llm: { ...VALID_MINIMAL_CONFIG.llm, baseUrl: 'https://example.com' } });
      expect(result.success).toBe(false);
    });

    test('requires a baseUrl for openai-compatible', () => {
      const result = parse({
        embedding: { provider: 'openai-compatible', model: 'nomic-embed-text', dimensions: 768 }
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.issues[0]?.path).toEqual(['embedding', 'baseUrl']);
    });

    test('allows providerName only for openai-compatible', () => {
      const result = parse({ llm: { ...VALID_MINIMAL_CONFIG.llm, providerName: 'custom' } });
      expect(result.success).toBe(false);
    });

    test('accepts a local openai-compatible embedder', () => {
      const result = parse({
        embedding: {
          provider: 'openai-compatible',
          providerName: 'lmstudio',
          baseUrl: 'http://localhost:1234/v1',
          model: 'nomic-embed-text',
          dimensions: 768
        }
      });
      expect(result.success).toBe(true);
    });
  });

  test('accepts the example config once its variables are resolved', () => {
    const path = fileURLToPath(new URL('../../../config/genegraph.example.json', import.meta.url));
    const config = parseConfig(readFileSync(path, 'utf-8'), path, {
      NEO4J_PASSWORD: 'test-secret',
      OPENAI_API_KEY: 'test-secret'
    });

    expect(config.neo4j.password).toBe('test-secret');
  });
});

describe('parseConfig', () => {
  function configError(text: string): ConfigError {
    try {
      parseConfig(text, 'test.json', {});
    } catch (err) {
      if (err instanceof ConfigError) return err;
      throw err;
    }
    throw new Error('expected a ConfigError');
  }

  test('rejects text that is not JSON', () => {
    const error = configError('{ neo4j: ');

    expect(error.message).toBe('Invalid JSON in config file: test.json');
    expect(error.issues).toEqual([]);
  });

  test('reports each validation issue with its path', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      llm: { provider: 'anthropic', defaults: { model: 'claude-test' } }
    });

    const error = configError(text);

    expect(error.message).toBe('Invalid config: test.json');
    expect(error.issues).toEqual(["llm.apiKey: apiKey required for provider 'anthropic'"]);
  });

  test('substitutes variables before validating', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      neo4j: { ...VALID_MINIMAL_CONFIG.neo4j, password: '{env:NEO4J_PASSWORD}' }
    });

    const config = parseConfig(text, 'test.json', { NEO4J_PASSWORD: 'test-secret' });

    expect(config.neo4j.password).toBe('test-secret');
  });
});

describe('resolveEnvVars', () => {
  test('replaces {env:VAR} with the variable', () => {
    expect(resolveEnvVars('"password": "{env:NEO4J_PASSWORD}"', { NEO4J_PASSWORD: 'test-secret' })).toBe(
      '"password": "test-secret"'
    );
  });

  test('replaces an unset variable with an empty string', () => {
    expect(resolveEnvVars('key={env:MISSING_KEY};', {})).toBe('key=;');
  });

  test('leaves lower-case names alone', () => {
    expect(resolveEnvVars('{env:lower}', { lower: 'x' })).toBe('{env:lower}');
  });
});

describe('createAgentSettings', () => {
  test('derives per-operation settings and deadlines', () => {
    const result = parse({ agent: { retryBudget: 2, timeouts: { llmMs: 5_000 } } });
    if (!result.success) throw result.error;

    const settings = createAgentSettings(result.data, 'schema text');

    expect(settings).toEqual({
      retryBudget: 2,
      enrichmentConcurrency: 8,
      schema: 'schema text',
      graphTimeoutMs: 30_000,
      searchTimeoutMs: 30_000,
      classification: {
        temperature: 0,
        maxTokens: undefined,
        maxRetries: undefined,
        options: undefined,
        timeoutMs: 5_000
      },
      query: {
        temperature: undefined,
        maxTokens: undefined,
        maxRetries: undefined,
        options: undefined,
        timeoutMs: 5_000
      },
      answer: {
        temperature: 0,
        maxTokens: undefined,
        maxRetries: undefined,
        options: undefined,
        timeoutMs: 5_000
      }
    });
  });
});
