import type { ClientCertProvider, Transport } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { TokenProvider } from '../auth/token.js';
import type { DetectOptions } from '../detect/index.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Options used to configure a client from newClient
 */
export interface Options {
  /**
   * Disables the request/response debug logging layer
   */
  disableTelemetry?: boolean;

  /**
   * No authentication at all. Only for tests and public resources.
   */
  disableAuthentication?: boolean;

  /**
   * Extra headers added to every outgoing request
   */
  headers?: Record<string, string>;

  /**
   * Overrides the default endpoint of the service
   */
  endpoint?: string;

  /**
   * API key used as the basis for authentication. When set, detectOpts are ignored.
   */
  apiKey?: string;

  /**
   * Provider used to set the Authorization header on every request.
   * When set, detectOpts are ignored.
   */
  tokenProvider?: TokenProvider;

  /**
   * Returns the TLS client certificate used when opening connections
   */
  clientCertProvider?: ClientCertProvider;

  /**
   * Settings for credential detection
   */
  detectOpts?: DetectOptions;

  /**
   * Base request sender. A clone of the default transport when absent.
   */
  transport?: Transport;

  /**
   * Where the telemetry layer writes. Defaults to the global logger.
   */
  logger?: Logger;

  /**
   * Set by generated client code only, not by end users
   */
  internalOptions?: InternalOptions;
}

/**
 * Defaults supplied by generated client code. Not meant to be set by
 * consumers; may change without notice.
 */
export interface InternalOptions {
  /**
   * Scopes may be used with self-signed JWTs
   */
  enableJWTWithScope?: boolean;

  /**
   * Default "aud" of self-signed JWTs
   */
  defaultAudience?: string;

  defaultEndpoint?: string;

  defaultMTLSEndpoint?: string;

  /**
   * Default OAuth2 scopes of the service
   */
  defaultScopes?: string[];
}

/**
 * Throws a ConfigurationError when options are missing or contradict each other
 */
export function validateOptions(opts: Options | null | undefined): asserts opts is Options {
  if (opts === null || opts === undefined) {
    throw new ConfigurationError('httptransport: opts required to be non-nil');
  }

  const detect = opts.detectOpts;
  const hasCreds = Boolean(opts.apiKey) ||
    opts.tokenProvider !== undefined ||
    Boolean(detect?.credentialsJSON) ||
    Boolean(detect?.credentialsFile);

  if (opts.disableAuthentication && hasCreds) {
    throw new ConfigurationError(
      'httptransport: disableAuthentication is incompatible with options that set or detect credentials',
      { configKey: 'disableAuthentication' }
    );
  }
}

/**
 * Copy of the detect options that shares nothing mutable with the caller's
 */
export function cloneDetectOptions(opts?: DetectOptions): DetectOptions {
  if (!opts) return {};
  return {
    ...opts,
    scopes: opts.scopes ? [...opts.scopes] : undefined,
  };
}

/**
 * Detect options with the defaults of generated client code applied.
 * Only one of scopes and audience is ever filled in by defaulting.
 */
export function resolveDetectOptions(opts: Options): DetectOptions {
  const io = opts.internalOptions;
  const resolved = cloneDetectOptions(opts.detectOpts);

  // Scoped JWTs enabled or an audience given: allow self-signed JWTs
  if (io?.enableJWTWithScope || resolved.audience) {
    resolved.useSelfSignedJWT = true;
  }

  // Only default scopes if the user did not also set an audience
  if (!resolved.scopes?.length && !resolved.audience && io?.defaultScopes?.length) {
    resolved.scopes = [...io.defaultScopes];
  }

  if (!resolved.scopes?.length && !resolved.audience && io) {
    resolved.audience = io.defaultAudience;
  }

  return resolved;
}
