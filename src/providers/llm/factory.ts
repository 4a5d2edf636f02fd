/**
 * LLM Client Factory
 *
 * Builds the three per-operation clients (classification, query, answer)
 * from the llm config section. Operations naming the same model share
 * one client.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { Config } from '@/config/schema';
import { createCompatibleProvider } from '../compatible';
import { VercelLLMClient } from './client';
import type { LLMClient } from './types';

type LLMConfig = Config['llm'];

export interface OperationClients {
  classification: LLMClient;
  query: LLMClient;
  answer: LLMClient;
}

/** Model id -> language model, for the configured provider */
function modelResolver(config: LLMConfig): (model: string) => LanguageModelV3 {
  switch (config.provider) {
    case 'openai':
      return createOpenAI({ apiKey: config.apiKey });
    case 'anthropic':
      return createAnthropic({ apiKey: config.apiKey });
    case 'google':
      return createGoogleGenerativeAI({ apiKey: config.apiKey });
    case 'ollama':
    case 'openai-compatible': {
      const provider = createCompatibleProvider(config.provider, config);
      return (model) => provider.languageModel(model);
    }
    default: {
      const _exhaustive: never = config.provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}

export function createLLMClients(config: LLMConfig): OperationClients {
  const resolve = modelResolver(config);
  // Provider options are sent under this key
  const providerKey =
    config.provider === 'openai-compatible' ? (config.providerName ?? config.provider) : config.provider;

  const byModel = new Map<string, LLMClient>();
  const clientFor = (model: string): LLMClient => {
    let client = byModel.get(model);
    if (!client) {
      client = new VercelLLMClient(resolve(model), providerKey);
      byModel.set(model, client);
    }
    return client;
  };

  return {
    classification: clientFor(config.classification.model),
    query: clientFor(config.query.model),
    answer: clientFor(config.answer.model)
  };
}
