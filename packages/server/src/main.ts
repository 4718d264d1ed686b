import { pino } from 'pino';

import { loadServerConfig } from './config.js';
import { createLogger, startServer } from './server.js';

async function main(): Promise<void> {
  const config = loadServerConfig();
  const logger = createLogger(config.logLevel);
  const server = await startServer(config, logger);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'error while closing server');
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  pino().fatal({ err: error }, 'server failed to start');
  process.exit(1);
});
