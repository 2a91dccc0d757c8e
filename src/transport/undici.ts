import { request as undiciRequest, errors as undiciErrors, Agent, buildConnector } from 'undici';
import type { Dispatcher } from 'undici';
import type { ConnectionOptions } from 'node:tls';
import { performance } from 'node:perf_hooks';
import { ClientCertProvider, CloudRequest, CloudResponse, TLSOptions, Transport } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { AbortError, NetworkError, TimeoutError } from '../core/errors.js';

export interface UndiciTransportOptions {
  /**
   * Max TCP connections per origin
   * @default 10
   */
  connections?: number;

  /**
   * Keep-alive timeout in ms
   * @default 4000
   */
  keepAliveTimeout?: number;

  /**
   * Connection (TCP + TLS) timeout in ms
   * @default 10000
   */
  connectTimeout?: number;

  /**
   * Time to wait for response headers in ms
   */
  headersTimeout?: number;

  /**
   * Max idle time between response body chunks in ms
   */
  bodyTimeout?: number;

  /**
   * Server verification settings
   */
  tls?: TLSOptions;

  /**
   * Called for every new TLS connection to obtain a client certificate
   */
  clientCertProvider?: ClientCertProvider;
}

type ConnectOptions = ConnectionOptions & { timeout?: number };

// Bodies of these responses are always empty
const NULL_BODY_STATUS = new Set([101, 204, 205, 304]);

/**
 * Default request sender, backed by an undici Agent.
 */
export class UndiciTransport implements Transport {
  private readonly options: UndiciTransportOptions;
  private readonly agent: Agent;

  constructor(options: UndiciTransportOptions = {}) {
    this.options = { ...options };

    const connectOptions: ConnectOptions = {
      ...mapTlsOptions(options.tls),
      timeout: options.connectTimeout ?? 10 * 1000,
    };

    this.agent = new Agent({
      connections: options.connections ?? 10,
      keepAliveTimeout: options.keepAliveTimeout ?? 4 * 1000,
      connect: options.clientCertProvider
        ? createClientCertConnector(options.clientCertProvider, connectOptions)
        : connectOptions,
    });
  }

  /**
   * Returns an independent transport (own connection pool) with the same
   * settings, optionally overriding some of them
   */
  clone(overrides: Partial<UndiciTransportOptions> = {}): UndiciTransport {
    return new UndiciTransport({ ...this.options, ...overrides });
  }

  get hasClientCertProvider(): boolean {
    return this.options.clientCertProvider !== undefined;
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  async dispatch(req: CloudRequest): Promise<CloudResponse> {
    const headers: Record<string, string> = {};
    req.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const startTime = performance.now();

    try {
      const undiciResponse = await undiciRequest(req.url, {
        method: req.method,
        headers,
        body: req.body,
        signal: req.signal,
        dispatcher: this.agent,
        headersTimeout: this.options.headersTimeout,
        bodyTimeout: this.options.bodyTimeout,
      });
      const firstByte = performance.now() - startTime;

      let body: Uint8Array | null = null;
      if (NULL_BODY_STATUS.has(undiciResponse.statusCode) || req.method === 'HEAD') {
        await undiciResponse.body.dump();
      } else {
        body = new Uint8Array(await undiciResponse.body.arrayBuffer());
      }

      return new HttpResponse(body, {
        status: undiciResponse.statusCode,
        headers: toHeaders(undiciResponse.headers),
        url: req.url,
        timings: {
          firstByte,
          total: performance.now() - startTime,
        },
      });
    } catch (error) {
      throw mapUndiciError(error, req, this.options);
    }
  }
}

/**
 * Default transport with the pool sized for API traffic.
 * Every call returns a fresh clone, so callers never share connection state.
 */
export function defaultBaseTransport(clientCertProvider?: ClientCertProvider): UndiciTransport {
  return defaultTransport().clone(clientCertProvider ? { clientCertProvider } : {});
}

let sharedDefault: UndiciTransport | null = null;

/**
 * Process-wide transport used by clients created without one
 */
export function defaultTransport(): UndiciTransport {
  if (!sharedDefault) {
    sharedDefault = new UndiciTransport({ connections: 100, keepAliveTimeout: 90 * 1000 });
  }
  return sharedDefault;
}

function mapTlsOptions(options?: TLSOptions): ConnectionOptions {
  const tls: ConnectionOptions = {};
  if (!options) return tls;

  if (options.ca) tls.ca = options.ca;
  if (options.rejectUnauthorized !== undefined) tls.rejectUnauthorized = options.rejectUnauthorized;
  if (options.servername) tls.servername = options.servername;
  if (options.minVersion) tls.minVersion = options.minVersion;

  return tls;
}

/**
 * Builds a connector that asks the provider for a certificate on every
 * new TLS connection, then connects with it.
 */
function createClientCertConnector(
  provider: ClientCertProvider,
  baseOptions: ConnectOptions
): buildConnector.connector {
  const plainConnect = buildConnector(baseOptions);

  return (options, callback) => {
    if (options.protocol !== 'https:') {
      plainConnect(options, callback);
      return;
    }

    Promise.resolve()
      .then(() => provider({ hostname: options.hostname, servername: options.servername ?? undefined }))
      .then((certificate) => {
        const connect = certificate
          ? buildConnector({
              ...baseOptions,
              cert: certificate.cert,
              key: certificate.key,
              passphrase: certificate.passphrase,
            })
          : plainConnect;
        connect(options, callback);
      })
      .catch((error: unknown) => {
        callback(error instanceof Error ? error : new Error(String(error)), null);
      });
  };
}

function toHeaders(raw: Dispatcher.ResponseData['headers']): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach((v) => headers.append(key, v));
    } else {
      headers.set(key, value);
    }
  }
  return headers;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

function mapUndiciError(error: unknown, req: CloudRequest, options: UndiciTransportOptions): Error {
  const code = errorCode(error);

  if (req.signal?.aborted) {
    const reason: unknown = req.signal.reason;
    return new AbortError(reason instanceof Error ? reason.message : undefined, req);
  }

  if (error instanceof undiciErrors.ConnectTimeoutError || code === 'UND_ERR_CONNECT_TIMEOUT') {
    return new TimeoutError(req, { phase: 'connect', timeout: options.connectTimeout ?? 10 * 1000 });
  }

  if (error instanceof undiciErrors.HeadersTimeoutError || code === 'UND_ERR_HEADERS_TIMEOUT') {
    return new TimeoutError(req, { phase: 'response', timeout: options.headersTimeout });
  }

  if (error instanceof undiciErrors.BodyTimeoutError || code === 'UND_ERR_BODY_TIMEOUT') {
    return new TimeoutError(req, { phase: 'body', timeout: options.bodyTimeout });
  }

  if (error instanceof undiciErrors.RequestAbortedError) {
    return new AbortError(undefined, req);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, code, req);
}
