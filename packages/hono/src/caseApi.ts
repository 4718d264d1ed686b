import type { TokenVerifier } from '@entra-bearer/core';
import { Hono } from 'hono';
import { timing } from 'hono/timing';
import type { Logger } from 'pino';

import { type BearerContextVariables, secureBearerToken } from './bearerProtection/index.js';
import {
  healthRouteHandler,
  processDetailsRouteHandler,
  processNumberRouteHandler,
} from './caseRoutes/index.js';
import type { CaseRecords } from './interfaces/caseRecords.js';

export interface CaseApiOptions {
  /** Verifier guarding the case endpoints */
  verifier: TokenVerifier;
  /** Case data source */
  records: CaseRecords;
  /** Optional pino logger */
  logger?: Logger;
}

/**
 * Builds the case lookup API: `/getprocessnumber` and `/getprocessdetails`
 * behind bearer protection, plus an open `/health`.
 *
 * @example
 * ```typescript
 * const app = createCaseApi({ verifier, records: new FileCaseRecords('./data') });
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 */
export function createCaseApi(options: CaseApiOptions): Hono<{
  Variables: BearerContextVariables;
}> {
  const { verifier, records, logger } = options;
  const app = new Hono<{ Variables: BearerContextVariables }>();
  const requireBearerToken = secureBearerToken(verifier, { logger });

  app.use(timing());

  app.get('/health', healthRouteHandler());
  app.get(
    '/getprocessnumber',
    requireBearerToken,
    processNumberRouteHandler(records, logger),
  );
  app.get(
    '/getprocessdetails',
    requireBearerToken,
    processDetailsRouteHandler(records, logger),
  );

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));
  app.onError((error, c) => {
    logger?.error({ err: error, path: c.req.path }, 'Unhandled request error');
    return c.json({ detail: 'Internal server error' }, 500);
  });

  return app;
}
