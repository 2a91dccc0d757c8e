export type Method =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'HEAD'
  | 'OPTIONS';

export type RequestBody = string | Uint8Array | null;

export interface RequestOptions {
  method?: Method;
  headers?: Record<string, string> | Headers;
  body?: RequestBody;
  params?: Record<string, string | number>;
  signal?: AbortSignal;
  throwHttpErrors?: boolean; // Default true
  timeout?: number; // Timeout in milliseconds
}

export interface CloudRequest {
  url: string;
  method: Method;
  headers: Headers;
  body: RequestBody;
  signal?: AbortSignal;
  throwHttpErrors?: boolean;

  // Helpers for immutability
  withHeader(name: string, value: string): CloudRequest;
  withUrl(url: string): CloudRequest;
}

export interface Timings {
  firstByte?: number; // TTFB
  total?: number;
}

export interface CloudResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly ok: boolean;
  readonly url: string;
  readonly timings?: Timings;

  json<T = unknown>(): Promise<T>;
  text(): Promise<string>;
  bytes(): Promise<Uint8Array>;
  clone(): CloudResponse;
}

export type NextFunction = (req: CloudRequest) => Promise<CloudResponse>;
export type Middleware = (req: CloudRequest, next: NextFunction) => Promise<CloudResponse>;

/**
 * Anything that can send a request and produce a response.
 * The base sender and every decorator around it implement this.
 */
export interface Transport {
  dispatch(req: CloudRequest): Promise<CloudResponse>;
}

export interface TLSOptions {
  /**
   * CA certificate(s) for server verification
   */
  ca?: string | Buffer | Array<string | Buffer>;

  /**
   * Verify the server certificate. Set false only for testing.
   * @default true
   */
  rejectUnauthorized?: boolean;

  /**
   * Server name for SNI (Server Name Indication)
   */
  servername?: string;

  /**
   * Minimum TLS version
   */
  minVersion?: 'TLSv1.2' | 'TLSv1.3';
}

/**
 * The connection a client certificate is requested for.
 * `servername` is absent when the host is an IP address.
 */
export interface CertificateRequestInfo {
  hostname: string;
  servername?: string;
}

export interface ClientCertificate {
  /** Client certificate chain in PEM format */
  cert: string | Buffer;
  /** Private key in PEM format */
  key: string | Buffer;
  /** Passphrase for an encrypted private key */
  passphrase?: string;
}

/**
 * Returns the TLS client certificate used when opening a connection,
 * or null to connect without one. Called once per new TLS connection.
 */
export type ClientCertProvider = (
  info: CertificateRequestInfo
) => ClientCertificate | null | Promise<ClientCertificate | null>;
