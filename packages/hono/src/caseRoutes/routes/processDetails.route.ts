import type { Handler } from 'hono';
import type { Logger } from 'pino';

import type { BearerContextVariables } from '../../bearerProtection/index.js';
import type { CaseRecords } from '../../interfaces/caseRecords.js';

/**
 * Creates a route handler returning the full text of the process document.
 * @param records - Case data source
 * @param logger - Optional pino logger
 * @returns Route handler for the process details endpoint
 */
export function processDetailsRouteHandler(
  records: CaseRecords,
  logger?: Logger,
): Handler<{ Variables: BearerContextVariables }> {
  return async (c) => {
    try {
      const text = await records.getProcessText();
      return c.json({ text });
    } catch (error) {
      logger?.error({ err: error, path: c.req.path }, 'Process document read error');
      return c.json({ detail: 'Error reading the process document' }, 500);
    }
  };
}
