/**
 * Agent Settings
 *
 * Derives the agent's settings from the loaded config file.
 */

import type { Config, LLMOperationConfig } from '@/config/schema';
import { GRAPH_SCHEMA_DESCRIPTION } from '@/providers/graph';
import type { AgentSettings, LLMCallSettings } from './types';

function callSettings(operation: LLMOperationConfig, timeoutMs: number): LLMCallSettings {
  return {
    temperature: operation.temperature,
    maxTokens: operation.maxTokens,
    maxRetries: operation.maxRetries,
    options: operation.options,
    timeoutMs
  };
}

/**
 * @example
 * const settings = createAgentSettings(getConfig());
 */
export function createAgentSettings(
  config: Config,
  schema: string = GRAPH_SCHEMA_DESCRIPTION
): AgentSettings {
  const { agent, llm } = config;
  return {
    retryBudget: agent.retryBudget,
    enrichmentConcurrency: agent.enrichmentConcurrency,
    schema,
    graphTimeoutMs: agent.timeouts.graphMs,
    searchTimeoutMs: agent.timeouts.searchMs,
    classification: callSettings(llm.classification, agent.timeouts.llmMs),
    query: callSettings(llm.query, agent.timeouts.llmMs),
    answer: callSettings(llm.answer, agent.timeouts.llmMs)
  };
}
