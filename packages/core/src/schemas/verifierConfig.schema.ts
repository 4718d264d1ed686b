import * as z from 'zod';

export const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';

/**
 * Asymmetric JWS algorithms a published key set can verify.
 * `none` and the HMAC family are never accepted.
 */
export const SigningAlgorithmSchema = z.enum([
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
  'EdDSA',
]);

export type SigningAlgorithm = z.infer<typeof SigningAlgorithmSchema>;

/**
 * Zod schema for the verifier settings. Parsing fills defaults, derives the
 * expected audience and the key set URL, and freezes the result.
 *
 * @property tenantId - Azure AD tenant (directory) identifier
 * @property clientId - Application (client) ID of the protected API registration
 * @property audience - Expected `aud` claim (defaults to `api://<clientId>`)
 * @property authorityHost - Login host (defaults to https://login.microsoftonline.com)
 * @property jwksUri - Key set URL (defaults to `<authorityHost>/<tenantId>/discovery/v2.0/keys`)
 * @property issuer - Expected `iss` claim; not checked when omitted
 * @property algorithms - Allowed signing algorithms (defaults to RS256)
 * @property keySetCacheTtlSeconds - How long a fetched key set is reused
 * @property keySetFetchTimeoutMs - Timeout for a single key set request
 * @property clockToleranceSeconds - Leeway applied to `exp` and `nbf`
 */
export const VerifierConfigSchema = z
  .object({
    tenantId: z.string().min(1, 'tenantId is required'),
    clientId: z.string().min(1, 'clientId is required'),
    audience: z.string().min(1).optional(),
    authorityHost: z.url().default(DEFAULT_AUTHORITY_HOST),
    jwksUri: z.url().optional(),
    issuer: z.string().min(1).optional(),
    algorithms: z.array(SigningAlgorithmSchema).min(1).default(['RS256']),
    keySetCacheTtlSeconds: z.number().int().positive().default(3600),
    keySetFetchTimeoutMs: z.number().int().positive().default(5000),
    clockToleranceSeconds: z.number().int().nonnegative().default(0),
  })
  .transform((config) => {
    const authorityHost = config.authorityHost.replace(/\/+$/, '');
    return Object.freeze({
      ...config,
      authorityHost,
      audience: config.audience ?? `api://${config.clientId}`,
      jwksUri:
        config.jwksUri ?? `${authorityHost}/${config.tenantId}/discovery/v2.0/keys`,
      algorithms: Object.freeze([...config.algorithms]),
    });
  });

export type VerifierConfigInput = z.input<typeof VerifierConfigSchema>;
export type ResolvedVerifierConfig = z.output<typeof VerifierConfigSchema>;
