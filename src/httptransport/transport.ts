import { performance } from 'node:perf_hooks';
import type { CloudRequest, CloudResponse, Transport } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import { authorizationValue, type Token, type TokenProvider } from '../auth/token.js';
import { newCachedTokenProvider, type CachedTokenProvider } from '../auth/cached-token-provider.js';
import { QUOTA_PROJECT_ENV_VAR, defaultCredentials } from '../detect/index.js';
import { getLogger } from '../utils/logger.js';
import { resolveDetectOptions, type Options } from './options.js';

export const QUOTA_PROJECT_HEADER = 'X-Goog-User-Project';
const API_KEY_PARAM = 'key';

/**
 * Sets the Authorization header from the token. An empty token type
 * is sent as Bearer.
 */
export function setAuthHeader(token: Token, req: CloudRequest): CloudRequest {
  return req.withHeader('Authorization', authorizationValue(token));
}

/**
 * Authorizes every request with a token from a cached provider, then
 * hands it to the base transport. Failures of either are not caught.
 */
export class AuthTransport implements Transport {
  readonly provider: CachedTokenProvider;
  readonly base: Transport;

  constructor(provider: TokenProvider, base: Transport) {
    this.provider = newCachedTokenProvider(provider);
    this.base = base;
  }

  async dispatch(req: CloudRequest): Promise<CloudResponse> {
    const token = await this.provider.token();
    return this.base.dispatch(setAuthHeader(token, req));
  }
}

/**
 * Adds a fixed set of headers to every request
 */
export class HeadersTransport implements Transport {
  constructor(
    readonly base: Transport,
    private readonly headers: Headers
  ) {}

  async dispatch(req: CloudRequest): Promise<CloudResponse> {
    let next = req;
    this.headers.forEach((value, key) => {
      next = next.withHeader(key, value);
    });
    return this.base.dispatch(next);
  }
}

/**
 * Authenticates with an API key sent as the `key` query parameter
 */
export class ApiKeyTransport implements Transport {
  constructor(
    readonly base: Transport,
    private readonly apiKey: string
  ) {}

  async dispatch(req: CloudRequest): Promise<CloudResponse> {
    const url = new URL(req.url);
    url.searchParams.set(API_KEY_PARAM, this.apiKey);
    return this.base.dispatch(req.withUrl(url.toString()));
  }
}

/**
 * Structured debug logs of every request, response and failure
 */
export class TelemetryTransport implements Transport {
  constructor(
    readonly base: Transport,
    private readonly logger: Logger
  ) {}

  async dispatch(req: CloudRequest): Promise<CloudResponse> {
    const start = performance.now();
    const headers: Record<string, string> = {};
    req.headers.forEach((v, k) => {
      // Mask sensitive headers
      headers[k] = k.toLowerCase() === 'authorization' ? '[REDACTED]' : v;
    });

    this.logger.debug({ type: 'request', method: req.method, url: redactUrl(req.url), headers }, `→ ${req.method} ${redactUrl(req.url)}`);

    try {
      const res = await this.base.dispatch(req);
      const duration = Math.round(performance.now() - start);
      this.logger.debug(
        {
          type: 'response',
          method: req.method,
          url: redactUrl(req.url),
          status: res.status,
          duration,
        },
        `← ${res.status} ${req.method} ${redactUrl(req.url)} (${duration}ms)`
      );
      return res;
    } catch (error) {
      const duration = Math.round(performance.now() - start);
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.debug(
        {
          type: 'error',
          method: req.method,
          url: redactUrl(req.url),
          error: err.message,
          errorName: err.name,
          duration,
        },
        `✖ ${req.method} ${redactUrl(req.url)} - ${err.message}`
      );
      throw error;
    }
  }
}

function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.searchParams.has(API_KEY_PARAM)) {
      url.searchParams.set(API_KEY_PARAM, '[REDACTED]');
    }
    return url.toString();
  } catch {
    return raw;
  }
}

/**
 * Stacks the configured layers on top of the base transport:
 * headers, then telemetry, then authentication outermost.
 */
export async function newTransport(base: Transport, opts: Options): Promise<Transport> {
  const headers = new Headers(opts.headers);

  let authenticate: ((trans: Transport) => Transport) | null = null;

  if (opts.disableAuthentication) {
    authenticate = null;
  } else if (opts.apiKey) {
    const apiKey = opts.apiKey;
    const quotaProject = process.env[QUOTA_PROJECT_ENV_VAR];
    if (quotaProject && !headers.has(QUOTA_PROJECT_HEADER)) {
      headers.set(QUOTA_PROJECT_HEADER, quotaProject);
    }
    authenticate = (trans) => new ApiKeyTransport(trans, apiKey);
  } else {
    let provider: TokenProvider;
    if (opts.tokenProvider) {
      provider = opts.tokenProvider;
    } else {
      const creds = await defaultCredentials(resolveDetectOptions(opts));
      if (creds.quotaProjectId && !headers.has(QUOTA_PROJECT_HEADER)) {
        headers.set(QUOTA_PROJECT_HEADER, creds.quotaProjectId);
      }
      provider = creds;
    }
    authenticate = (trans) => new AuthTransport(provider, trans);
  }

  let trans: Transport = new HeadersTransport(base, headers);
  if (!opts.disableTelemetry) {
    trans = new TelemetryTransport(trans, opts.logger ?? getLogger());
  }
  if (authenticate) {
    trans = authenticate(trans);
  }
  return trans;
}
