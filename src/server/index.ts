/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires together all endpoints.
 */

import { type Context, Hono } from 'hono';
import { getAgent, getClients } from './clients';
import { runConfiguredImport } from './import';
import { handleMcp } from './mcp';
import { createRoutes, type RouteDependencies } from './routes';

export interface AppDependencies extends RouteDependencies {
  handleMcp: (c: Context) => Promise<Response>;
}

export function createApp(deps: AppDependencies): Hono {
  const app = new Hono();

  // Mount HTTP routes (ask, import, health)
  app.route('/', createRoutes(deps));

  // Mount MCP endpoint (graph questions via Model Context Protocol)
  app.all('/mcp', deps.handleMcp);

  return app;
}

const app = createApp({
  ask: async (question) => (await getAgent()).ask(question),
  runImport: runConfiguredImport,
  healthCheck: async () => (await getClients()).graphClient.healthCheck(),
  handleMcp
});

export { app };
