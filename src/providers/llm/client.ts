/**
 * Vercel AI SDK v6 LLM Client
 *
 * Wraps the AI SDK generateText function for internal Core use.
 * No streaming - classification, query synthesis and answers all need
 * the complete response.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { CompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  /**
   * @param providerKey - Key under which provider-specific options are sent
   */
  constructor(
    private model: LanguageModelV3,
    private readonly providerKey: string
  ) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      messages,
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      maxRetries: options?.maxRetries,
      abortSignal: options?.abortSignal,
      providerOptions: options?.options ? { [this.providerKey]: options.options } : undefined
    });

    return text;
  }
}
