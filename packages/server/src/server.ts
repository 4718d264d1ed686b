import { type ServerType, serve } from '@hono/node-server';
import { type Logger, pino } from 'pino';

import { createServerApp } from './app.js';
import type { ServerConfig } from './config.js';

/**
 * Root logger. Authorization headers never reach the output.
 */
export function createLogger(level: ServerConfig['logLevel']): Logger {
  return pino({
    level,
    redact: ['req.headers.authorization', 'headers.authorization'],
  });
}

/**
 * Starts the HTTP server. Signing keys are fetched up front; when that fails
 * the server still starts and retries on the first request.
 */
export async function startServer(config: ServerConfig, logger: Logger): Promise<ServerType> {
  const { app, verifier } = createServerApp(config, logger);

  logger.info(
    { audience: verifier.expectedAudience, jwksUri: verifier.jwksUri },
    'verifier configured',
  );

  try {
    await verifier.refreshKeySet();
  } catch (error) {
    logger.warn({ err: error }, 'could not prefetch signing keys');
  }

  return serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, 'listening');
  });
}
