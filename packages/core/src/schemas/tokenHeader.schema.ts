import * as z from 'zod';

/**
 * Fields read from an unverified JOSE header. Nothing here is trusted until
 * the signature checks out.
 */
export const TokenHeaderSchema = z.object({
  alg: z.string().min(1),
  kid: z.string().min(1),
  typ: z.string().optional(),
});

export type TokenHeader = z.infer<typeof TokenHeaderSchema>;
