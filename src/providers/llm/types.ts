import type { JSONValue } from '@ai-sdk/provider';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Options for LLM completion requests.
 * Core passes these to control model behavior.
 * If not provided, provider uses the API's defaults.
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature (0-2 for most providers) */
  temperature?: number;
  /** SDK-level retries on rate limits and 5xx responses */
  maxRetries?: number;
  /** Provider-specific options (e.g., reasoning_effort) */
  options?: Record<string, JSONValue>;
  /** Aborts the request when the caller's deadline passes */
  abortSignal?: AbortSignal;
}

export interface LLMClient {
  /**
   * Generate a completion from the LLM.
   * @returns The assistant's response content as a string
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /**
   * The model identifier being used.
   */
  readonly modelId: string;
}
