/**
 * Server Entry Point
 *
 * Loads the config, connects the clients, then serves the app on Node.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { app } from '@/server';
import { closeClients, getClients } from '@/server/clients';
import { buildStartupInfo, displayStartup } from '@/utils/startup';

async function main(): Promise<void> {
  const config = getConfig();

  // Connect eagerly so a bad connection fails at startup, not on the first request
  const { graphClient } = await getClients();
  const counts = await graphClient.countEntities().catch((error: unknown) => {
    console.error('Could not count graph entities:', error);
    return null;
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, () => {
    displayStartup(config, buildStartupInfo(config, counts));
  });

  const shutdown = (): void => {
    server.close();
    closeClients().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error);
  process.exit(1);
});
