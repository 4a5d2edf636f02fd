/**
 * HTTP Routes
 *
 * - POST /ask     answer one question
 * - POST /import  merge the configured source files into the graph
 * - GET  /health  store reachability
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { type AgentAnswer, type ImportReport, ImportInProgressError } from '@/core';

/**
 * What the routes need. Injected so the app can be exercised with fakes.
 */
export interface RouteDependencies {
  ask: (question: string) => Promise<AgentAnswer>;
  runImport: () => Promise<ImportReport>;
  healthCheck: () => Promise<boolean>;
}

export const AskRequestSchema = z.object({
  question: z.string().trim().min(1)
});

export function createRoutes(deps: RouteDependencies): Hono {
  const app = new Hono();

  app.get('/health', async (c) => {
    const graph = await deps.healthCheck().catch(() => false);
    return c.json({ status: graph ? 'ok' : 'degraded', graph }, graph ? 200 : 503);
  });

  app.post('/ask', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = AskRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new HTTPException(400, { message: 'Request body must be {"question": "<non-empty text>"}' });
    }

    const result = await deps.ask(parsed.data.question);
    return c.json(result);
  });

  app.post('/import', async (c) => {
    try {
      const report = await deps.runImport();
      return c.json(report);
    } catch (error) {
      if (error instanceof ImportInProgressError) {
        throw new HTTPException(409, { message: error.message });
      }
      throw error;
    }
  });

  return app;
}
