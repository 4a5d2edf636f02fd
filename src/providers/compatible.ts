/**
 * OpenAI-Compatible Endpoints
 *
 * Ollama and self-hosted servers speak the OpenAI wire format; both the
 * language and the embedding factories reach them through one provider.
 */

import { createOpenAICompatible, type OpenAICompatibleProvider } from '@ai-sdk/openai-compatible';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface ProviderAccess {
  apiKey?: string;
  baseUrl?: string;
  /** Provider name for openai-compatible endpoints */
  providerName?: string;
}

export function createCompatibleProvider(
  kind: 'ollama' | 'openai-compatible',
  access: ProviderAccess
): OpenAICompatibleProvider {
  if (kind === 'ollama') {
    return createOpenAICompatible({
      name: 'ollama',
      baseURL: access.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
      apiKey: 'ollama' // Required by SDK but not used by Ollama
    });
  }

  if (!access.baseUrl) {
    throw new Error('baseUrl required for openai-compatible provider');
  }
  return createOpenAICompatible({
    name: access.providerName ?? 'openai-compatible',
    baseURL: access.baseUrl,
    apiKey: access.apiKey ?? ''
  });
}
