import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createServices } from '@cognisync/core/src/infrastructure/services.js';
import { loadConfig } from '@cognisync/schemas/src/config-loader.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const config = loadConfig();
  const { jobService } = await createServices(config);

  const app = createApp({
    jobService,
    agentIdentifier: config.payment.agentIdentifier,
    version: VERSION,
  });

  log.info({ port: config.port }, 'Starting CogniSync API server');

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'CogniSync API server running');
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down, waiting for running jobs');
    server.close();
    jobService
      .whenIdle()
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
