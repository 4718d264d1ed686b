import type { Handler } from 'hono';
import type { Logger } from 'pino';

import type { BearerContextVariables } from '../../bearerProtection/index.js';
import type { CaseRecords } from '../../interfaces/caseRecords.js';
import { ProcessNumberQuerySchema } from '../../schemas/processNumberQuery.schema.js';
import { formatValidationErrors } from '../../utils/validationErrors.js';

/**
 * Creates a route handler returning the process number for a protocol,
 * together with the authenticated caller's username.
 * @param records - Case data source
 * @param logger - Optional pino logger
 * @returns Route handler for the process number endpoint
 */
export function processNumberRouteHandler(
  records: CaseRecords,
  logger?: Logger,
): Handler<{ Variables: BearerContextVariables }> {
  return async (c) => {
    const query = c.req.query();
    const result = ProcessNumberQuerySchema.safeParse(query);
    if (!result.success) {
      return c.json(formatValidationErrors(result.error, query, 'query'), 422);
    }

    try {
      const processNumber = await records.findProcessNumber(result.data.protocol);
      if (!processNumber) {
        return c.json({ detail: 'Process not found' }, 404);
      }

      const identity = c.get('identity');
      return c.json({ message: processNumber, user_email: identity.username });
    } catch (error) {
      logger?.error({ err: error, path: c.req.path }, 'Process number lookup error');
      return c.json({ detail: 'Internal server error' }, 500);
    }
  };
}
