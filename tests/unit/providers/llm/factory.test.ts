/**
 * LLM Factory Tests
 *
 * Provider construction makes no requests, so these run offline.
 */

import { describe, expect, test } from 'vitest';
import { configSchema } from '@/config/schema';
import { createLLMClients } from '@/providers/llm/factory';
import { VALID_MINIMAL_CONFIG } from '@tests/helpers/fixtures';

function llmConfig(overrides: Record<string, unknown>) {
  return configSchema.parse({
    ...VALID_MINIMAL_CONFIG,
    llm: { ...VALID_MINIMAL_CONFIG.llm, ...overrides }
  }).llm;
}

describe('createLLMClients', () => {
  test('operations on the same model share one client', () => {
    const clients = createLLMClients(llmConfig({}));

    expect(clients.classification).toBe(clients.query);
    expect(clients.query).toBe(clients.answer);
    expect(clients.answer.modelId).toBe('gpt-4o-mini');
  });

  test('an operation with its own model gets its own client', () => {
    const clients = createLLMClients(llmConfig({ query: { model: 'gpt-4o' } }));

    expect(clients.query.modelId).toBe('gpt-4o');
    expect(clients.classification).toBe(clients.answer);
    expect(clients.query).not.toBe(clients.answer);
  });

  test('ollama needs no api key', () => {
    const clients = createLLMClients(
      llmConfig({ provider: 'ollama', apiKey: undefined, defaults: { model: 'llama3.1' } })
    );

    expect(clients.answer.modelId).toBe('llama3.1');
  });
});
