/**
 * Embedding Client Factory
 *
 * Builds the embedding client from the embedding config section. The
 * configured dimensions are requested from providers that can shorten
 * their vectors; the others must already produce that many.
 */

import { createCohere } from '@ai-sdk/cohere';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createOpenAI } from '@ai-sdk/openai';
import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { Config } from '@/config/schema';
import { createCompatibleProvider } from '../compatible';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

type EmbeddingConfig = Config['embedding'];

export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  return new VercelEmbeddingClient(embeddingModel(config), config.dimensions);
}

function embeddingModel(config: EmbeddingConfig): EmbeddingModelV3 {
  const { model, dimensions } = config;

  switch (config.provider) {
    case 'openai':
      return withProviderOptions(createOpenAI({ apiKey: config.apiKey }).embedding(model), 'openai', {
        dimensions
      });
    case 'google':
      return withProviderOptions(
        createGoogleGenerativeAI({ apiKey: config.apiKey }).embedding(model),
        'google',
        { outputDimensionality: dimensions }
      );
    case 'cohere':
      return createCohere({ apiKey: config.apiKey }).embedding(model);
    case 'mistral':
      return createMistral({ apiKey: config.apiKey }).embedding(model);
    case 'ollama':
    case 'openai-compatible':
      // Not every compatible server accepts a dimensions parameter
      return createCompatibleProvider(config.provider, config).embeddingModel(model);
    default: {
      const _exhaustive: never = config.provider;
      throw new Error(`Unknown provider: ${_exhaustive}`);
    }
  }
}

/**
 * Attach provider options once at model creation, not on every call.
 */
function withProviderOptions(
  model: EmbeddingModelV3,
  providerKey: string,
  providerOptions: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: { providerOptions: { [providerKey]: providerOptions } }
    })
  });
}
