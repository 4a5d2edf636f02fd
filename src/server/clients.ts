/**
 * Shared Client Initialization
 *
 * Lazy initialization of clients shared across endpoints.
 * Graph, embedding, and LLM clients are created on first request.
 */

import { getConfig } from '@/config/config';
import type { Config } from '@/config/schema';
import { createAgentSettings, GeneGraphAgent } from '@/core';
import { createEmbeddingClient } from '@/providers/embedding/factory';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { createGraphClient } from '@/providers/graph';
import type { GraphClient } from '@/providers/graph/types';
import { createLLMClients, type OperationClients } from '@/providers/llm/factory';

/**
 * Shared clients used by the HTTP and MCP endpoints.
 */
export interface Clients {
  graphClient: GraphClient;
  embeddingClient: EmbeddingClient;
  llm: OperationClients;
}

/** Cached clients instance */
let clients: Clients | null = null;
let initPromise: Promise<Clients> | null = null;

let agent: GeneGraphAgent | null = null;

/**
 * Get initialized clients.
 * Lazy initialization ensures clients are only created when needed.
 */
export async function getClients(): Promise<Clients> {
  if (clients) return clients;

  if (!initPromise) {
    initPromise = initializeClients(getConfig());
  }

  clients = await initPromise;
  return clients;
}

/**
 * The agent over the shared clients. Holds no per-question state,
 * so one instance serves every request.
 */
export async function getAgent(): Promise<GeneGraphAgent> {
  if (agent) return agent;
  const { graphClient, embeddingClient, llm } = await getClients();
  agent = new GeneGraphAgent({ graphClient, embeddingClient, llm }, createAgentSettings(getConfig()));
  return agent;
}

/**
 * Close the graph connection. Used on shutdown.
 */
export async function closeClients(): Promise<void> {
  if (!clients) return;
  await clients.graphClient.disconnect();
  clients = null;
  initPromise = null;
  agent = null;
}

/**
 * Initialize all shared clients.
 */
async function initializeClients(config: Config): Promise<Clients> {
  const graphClient = createGraphClient(config.neo4j);
  await graphClient.connect();
  await graphClient.initializeSchema();

  const embeddingClient = createEmbeddingClient(config.embedding);
  const llm = createLLMClients(config.llm);

  return { graphClient, embeddingClient, llm };
}
