import { z } from 'zod';
import type { ClientCertProvider } from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';

export const USE_CLIENT_CERT_ENV_VAR = 'GOOGLE_API_USE_CLIENT_CERTIFICATE';
export const USE_MTLS_ENDPOINT_ENV_VAR = 'GOOGLE_API_USE_MTLS_ENDPOINT';

const useClientCertSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['true', 'false']));

const mtlsEndpointSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['never', 'always', 'auto']));

export type MTLSEndpointMode = z.infer<typeof mtlsEndpointSchema>;

export interface TransportConfigInput {
  endpoint?: string;
  defaultEndpoint?: string;
  defaultMTLSEndpoint?: string;
  clientCertProvider?: ClientCertProvider;
}

export interface TransportConfig {
  /** Endpoint requests are sent to. Empty when nothing configured one. */
  endpoint: string;
  /** Provider in effect after the environment has been consulted */
  clientCertProvider?: ClientCertProvider;
}

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, key: string, value: string, allowed: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`httptransport: ${key} must be one of ${allowed}, got "${value}"`, {
      configKey: key,
    });
  }
  return parsed.data;
}

/**
 * Whether client certificates may be used at all
 */
export function useClientCertificate(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[USE_CLIENT_CERT_ENV_VAR];
  if (!value) return false;
  return parseEnv(useClientCertSchema, USE_CLIENT_CERT_ENV_VAR, value, 'true, false') === 'true';
}

export function mtlsEndpointMode(env: NodeJS.ProcessEnv = process.env): MTLSEndpointMode {
  const value = env[USE_MTLS_ENDPOINT_ENV_VAR];
  if (!value) return 'auto';
  return parseEnv(mtlsEndpointSchema, USE_MTLS_ENDPOINT_ENV_VAR, value, 'never, always, auto');
}

/**
 * Picks the endpoint and the client certificate provider from the options
 * and the environment
 */
export function resolveTransportConfig(
  input: TransportConfigInput,
  env: NodeJS.ProcessEnv = process.env
): TransportConfig {
  const clientCertProvider = useClientCertificate(env) ? input.clientCertProvider : undefined;
  const mode = mtlsEndpointMode(env);

  if (input.endpoint) {
    return { endpoint: input.endpoint, clientCertProvider };
  }

  const useMTLS = mode === 'always' || (mode === 'auto' && clientCertProvider !== undefined);
  const endpoint = useMTLS
    ? input.defaultMTLSEndpoint || input.defaultEndpoint || ''
    : input.defaultEndpoint || '';

  return { endpoint, clientCertProvider };
}
