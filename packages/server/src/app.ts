import { BearerTokenVerifier } from '@entra-bearer/core';
import { createCaseApi } from '@entra-bearer/hono';
import { MemoryKeySetStore } from '@entra-bearer/memory';
import type { Logger } from 'pino';

import type { ServerConfig } from './config.js';
import { FileCaseRecords } from './fileCaseRecords.js';

/**
 * Wires the verifier, an in-memory key set store and file-backed case records
 * into the case API.
 */
export function createServerApp(config: ServerConfig, logger: Logger) {
  const verifier = new BearerTokenVerifier({
    settings: config.verifier,
    keySetStore: new MemoryKeySetStore({ logger: logger.child({ component: 'keySetStore' }) }),
    logger: logger.child({ component: 'verifier' }),
  });
  const records = new FileCaseRecords(config.caseDataDir, logger.child({ component: 'records' }));
  const app = createCaseApi({ verifier, records, logger });

  return { app, verifier };
}
