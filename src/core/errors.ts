import { CloudRequest, CloudResponse } from '../types/index.js';

// Statuses a caller may safely retry
const RETRIABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Base class of every error this package raises. `suggestions` are
 * human-readable next steps; `retriable` says whether sending the same
 * request again can succeed.
 */
export class CloudAuthError extends Error {
  request?: CloudRequest;
  response?: CloudResponse;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    request?: CloudRequest,
    response?: CloudResponse,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'CloudAuthError';
    this.request = request;
    this.response = response;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * The API answered with a non-2xx status
 */
export class HttpError extends CloudAuthError {
  status: number;
  statusText: string;

  constructor(response: CloudResponse, request?: CloudRequest) {
    const hints = ['Check the response body for the API error details.'];
    if (response.status === 401 || response.status === 403) {
      hints.push('Verify the credentials carry the scopes or audience the API expects.');
    }
    super(
      `Request failed with status code ${response.status} ${response.statusText}`,
      request,
      response,
      hints,
      RETRIABLE_STATUS.has(response.status)
    );
    this.name = 'HttpError';
    this.status = response.status;
    this.statusText = response.statusText;
  }
}

/**
 * Where in the exchange a timeout fired: opening the connection,
 * waiting for response headers, or between body chunks
 */
export type TimeoutPhase = 'connect' | 'response' | 'body';

const TIMEOUT_MESSAGES: Record<TimeoutPhase, string> = {
  connect: 'Connection timed out',
  response: 'Timed out waiting for response headers',
  body: 'Timed out reading the response body',
};

export class TimeoutError extends CloudAuthError {
  phase: TimeoutPhase;
  timeout?: number;

  constructor(request: CloudRequest | undefined, options: { phase: TimeoutPhase; timeout?: number }) {
    const suffix = options.timeout !== undefined ? ` after ${options.timeout}ms` : '';
    super(
      `${TIMEOUT_MESSAGES[options.phase]}${suffix}`,
      request,
      undefined,
      [`Raise the ${options.phase} timeout of the transport if the service is slow.`],
      true
    );
    this.name = 'TimeoutError';
    this.phase = options.phase;
    this.timeout = options.timeout;
  }
}

/**
 * The connection could not be opened or broke mid-request. `code` is the
 * socket or undici error code, e.g. ECONNREFUSED.
 */
export class NetworkError extends CloudAuthError {
  code?: string;

  constructor(message: string, code?: string, request?: CloudRequest) {
    super(
      message,
      request,
      undefined,
      [
        'Confirm the endpoint is reachable from this host.',
        'If a client certificate is configured, check that the server accepts it.',
      ],
      true
    );
    this.name = 'NetworkError';
    this.code = code;
  }
}

/**
 * The request's signal fired, either from the caller or the client timeout
 */
export class AbortError extends CloudAuthError {
  reason?: string;

  constructor(reason?: string, request?: CloudRequest) {
    super(reason || 'Request was aborted', request, undefined, [], false);
    this.name = 'AbortError';
    this.reason = reason;
  }
}

/**
 * A token endpoint refused the credentials
 */
export class AuthenticationError extends CloudAuthError {
  authType?: string;

  constructor(
    message: string,
    options: { authType?: string; request?: CloudRequest; response?: CloudResponse } = {}
  ) {
    super(
      message,
      options.request,
      options.response,
      [
        'Verify the credentials file is current and has not been revoked.',
        'Ensure the requested scopes or audience are allowed for this account.',
      ],
      false
    );
    this.name = 'AuthenticationError';
    this.authType = options.authType;
  }
}

/**
 * Credentials or other input data failed validation
 */
export class ValidationError extends CloudAuthError {
  field?: string;
  value?: unknown;

  constructor(message: string, options: { field?: string; value?: unknown } = {}) {
    super(message, undefined, undefined, ['Compare the input with the expected credentials file format.'], false);
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
  }
}

/**
 * Options or environment variables are missing or contradict each other
 */
export class ConfigurationError extends CloudAuthError {
  configKey?: string;

  constructor(message: string, options: { configKey?: string } = {}) {
    const hints = options.configKey
      ? [`Check the value of ${options.configKey}.`]
      : ['Check the client options and environment variables.'];
    super(message, undefined, undefined, hints, false);
    this.name = 'ConfigurationError';
    this.configKey = options.configKey;
  }
}
