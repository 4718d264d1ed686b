import { SigningAlgorithmSchema, type VerifierConfigInput } from '@entra-bearer/core';
import * as z from 'zod';

const optionalSetting = () =>
  z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined);

const commaList = (value: string | undefined) =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

/**
 * Environment variables read by the server. Unset Azure settings fall back to
 * the verifier defaults.
 */
export const ServerEnvSchema = z.object({
  AZURE_TENANT_ID: z.string().trim().min(1, 'AZURE_TENANT_ID is required'),
  AZURE_CLIENT_ID: z.string().trim().min(1, 'AZURE_CLIENT_ID is required'),
  AZURE_AUDIENCE: optionalSetting(),
  AZURE_AUTHORITY_HOST: optionalSetting(),
  AZURE_JWKS_URI: optionalSetting(),
  AZURE_ISSUER: optionalSetting(),
  AZURE_ALLOWED_ALGORITHMS: z
    .string()
    .optional()
    .transform(commaList)
    .pipe(z.array(SigningAlgorithmSchema).min(1).optional()),
  JWKS_CACHE_TTL_SECONDS: z.coerce.number().int().positive().optional(),
  JWKS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().optional(),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  CASE_DATA_DIR: z.string().min(1).default('./data'),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export interface ServerConfig {
  port: number;
  logLevel: ServerEnv['LOG_LEVEL'];
  caseDataDir: string;
  verifier: VerifierConfigInput;
}

/**
 * Reads the server configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default
 * @throws {Error} Listing every invalid or missing variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ServerEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid server configuration:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    });
  }
  const settings = result.data;

  return {
    port: settings.PORT,
    logLevel: settings.LOG_LEVEL,
    caseDataDir: settings.CASE_DATA_DIR,
    verifier: {
      tenantId: settings.AZURE_TENANT_ID,
      clientId: settings.AZURE_CLIENT_ID,
      audience: settings.AZURE_AUDIENCE,
      authorityHost: settings.AZURE_AUTHORITY_HOST,
      jwksUri: settings.AZURE_JWKS_URI,
      issuer: settings.AZURE_ISSUER,
      algorithms: settings.AZURE_ALLOWED_ALGORITHMS,
      keySetCacheTtlSeconds: settings.JWKS_CACHE_TTL_SECONDS,
      keySetFetchTimeoutMs: settings.JWKS_FETCH_TIMEOUT_MS,
      clockToleranceSeconds: settings.CLOCK_TOLERANCE_SECONDS,
    },
  };
}
