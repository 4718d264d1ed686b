import { z } from 'zod';

/**
 * Zod schema for validating process number lookups.
 */
export const ProcessNumberQuerySchema = z.object({
  protocol: z.string(),
});

/**
 * Type representing a validated process number query.
 */
export type ProcessNumberQuery = z.infer<typeof ProcessNumberQuerySchema>;
