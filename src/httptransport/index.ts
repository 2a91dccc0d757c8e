/**
 * Authenticated HTTP clients
 *
 * @example
 * ```typescript
 * import { newClient } from 'cloudauth-http';
 *
 * const client = await newClient({
 *   detectOpts: { scopes: ['https://www.googleapis.com/auth/cloud-platform'] },
 *   internalOptions: { defaultEndpoint: 'https://storage.googleapis.com/' },
 * });
 * const res = await client.get('storage/v1/b', { params: { project: 'my-project' } });
 * const buckets = await res.json();
 * ```
 */

import type { Transport } from '../types/index.js';
import type { TokenProvider } from '../auth/token.js';
import { Client } from '../core/client.js';
import { ConfigurationError } from '../core/errors.js';
import { defaultBaseTransport } from '../transport/undici.js';
import { validateOptions, type Options } from './options.js';
import { resolveTransportConfig } from './endpoint.js';
import { AuthTransport, newTransport } from './transport.js';

export * from './options.js';
export * from './endpoint.js';
export * from './transport.js';

/**
 * Creates a client whose every request carries the configured
 * authentication, headers and telemetry
 */
export async function newClient(opts: Options | null | undefined): Promise<Client> {
  validateOptions(opts);

  const config = resolveTransportConfig({
    endpoint: opts.endpoint,
    defaultEndpoint: opts.internalOptions?.defaultEndpoint,
    defaultMTLSEndpoint: opts.internalOptions?.defaultMTLSEndpoint,
    clientCertProvider: opts.clientCertProvider,
  });

  const base: Transport = opts.transport ?? defaultBaseTransport(config.clientCertProvider);
  const transport = await newTransport(base, opts);

  return new Client({ baseUrl: config.endpoint || undefined, transport });
}

/**
 * Authorizes every request of an existing client with tokens from `tp`.
 * The client's transport, or a fresh default one, becomes the base.
 */
export function addAuthorizationMiddleware(
  client: Client | null | undefined,
  tp: TokenProvider | null | undefined
): void {
  if (!client || !tp) {
    throw new ConfigurationError('httptransport: client and tp must not be nil');
  }
  client.transport = new AuthTransport(tp, client.transport ?? defaultBaseTransport());
}
