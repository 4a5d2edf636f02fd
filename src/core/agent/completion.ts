import type { LLMClient, Message } from '@/providers/llm/types';
import { callWithDeadline } from './deadline';
import type { LLMCallSettings } from './types';

/**
 * One completion with the operation's settings, under the LLM deadline.
 */
export function completeWithSettings(
  llm: LLMClient,
  messages: Message[],
  settings: LLMCallSettings
): Promise<string> {
  const { timeoutMs, ...options } = settings;
  return callWithDeadline('llm', timeoutMs, (abortSignal) =>
    llm.complete(messages, { ...options, abortSignal })
  );
}
