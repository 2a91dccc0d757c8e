import { CloudRequest, CloudResponse, Middleware, RequestOptions, Transport } from '../types/index.js';
import { HttpRequest } from './request.js';
import { HttpError } from './errors.js';
import { defaultTransport } from '../transport/undici.js';

export interface ClientOptions {
  /**
   * Base URL relative paths are resolved against, usually the service endpoint
   */
  baseUrl?: string;

  /**
   * Request sender. When absent, the process-wide default transport is used.
   */
  transport?: Transport;

  middlewares?: Middleware[];

  /**
   * Headers sent with every request
   */
  headers?: Record<string, string>;
}

type JsonBody = string | Uint8Array | URLSearchParams | object | null | undefined;

export class Client {
  public readonly baseUrl: string;
  private middlewares: Middleware[];
  private defaultHeaders: Record<string, string>;
  private currentTransport?: Transport;
  private handler: (req: CloudRequest) => Promise<CloudResponse>;

  constructor(options: ClientOptions = {}) {
    this.baseUrl = options.baseUrl || '';
    this.middlewares = [...(options.middlewares || [])];
    this.defaultHeaders = { ...(options.headers || {}) };
    this.currentTransport = options.transport;
    this.handler = this.composeMiddlewares();
  }

  /**
   * The request sender behind the middleware chain. Assigning it
   * re-composes the chain, so decorators can be layered on at any time.
   */
  get transport(): Transport | undefined {
    return this.currentTransport;
  }

  set transport(transport: Transport | undefined) {
    this.currentTransport = transport;
    this.handler = this.composeMiddlewares();
  }

  private composeMiddlewares(): (req: CloudRequest) => Promise<CloudResponse> {
    const chain = [...this.middlewares, this.httpErrorMiddleware];
    const transport = this.currentTransport ?? defaultTransport();
    const transportDispatch = (req: CloudRequest) => transport.dispatch(req);

    // Last middleware calls transport, previous middleware calls last middleware, etc.
    return chain.reduceRight<(req: CloudRequest) => Promise<CloudResponse>>((next, middleware) => {
      return (req) => middleware(req, next);
    }, transportDispatch);
  }

  private httpErrorMiddleware: Middleware = async (req, next) => {
    const response = await next(req);
    if (req.throwHttpErrors !== false && !response.ok) {
      throw new HttpError(response, req);
    }
    return response;
  };

  public use(middleware: Middleware) {
    this.middlewares.push(middleware);
    this.handler = this.composeMiddlewares();
    return this;
  }

  private buildUrl(path: string, params?: Record<string, string | number>): string {
    let finalUrl = path;
    if (!path.startsWith('http://') && !path.startsWith('https://')) {
      if (!this.baseUrl) {
        throw new Error(`Relative path "${path}" provided without a baseUrl.`);
      }
      finalUrl = new URL(path, this.baseUrl).toString();
    }

    if (params && Object.keys(params).length > 0) {
      const urlObj = new URL(finalUrl);
      for (const [key, value] of Object.entries(params)) {
        urlObj.searchParams.append(key, String(value));
      }
      return urlObj.toString();
    }

    return finalUrl;
  }

  async request(path: string, options: RequestOptions = {}): Promise<CloudResponse> {
    const url = this.buildUrl(path, options.params);

    const headers = new Headers(this.defaultHeaders);
    new Headers(options.headers).forEach((value, key) => headers.set(key, value));

    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    let externalAbortCleanup: (() => void) | undefined;

    if (options.signal) {
      const externalSignal = options.signal;
      const abortHandler = () => controller.abort(externalSignal.reason);
      if (externalSignal.aborted) {
        abortHandler();
      } else {
        externalSignal.addEventListener('abort', abortHandler, { once: true });
        externalAbortCleanup = () => externalSignal.removeEventListener('abort', abortHandler);
      }
    }

    if (options.timeout) {
      timeoutId = setTimeout(() => controller.abort(new Error('Request timed out')), options.timeout);
    }

    const req = new HttpRequest(url, {
      ...options,
      headers,
      signal: controller.signal,
    });

    try {
      return await this.handler(req);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      externalAbortCleanup?.();
    }
  }

  /**
   * Handle requests with body (POST, PUT, PATCH): objects are sent as JSON,
   * URLSearchParams as a form
   */
  private requestWithBody(
    method: 'POST' | 'PUT' | 'PATCH',
    path: string,
    body?: JsonBody,
    options: Omit<RequestOptions, 'method' | 'body'> = {}
  ) {
    const headers = new Headers(options.headers);
    let processedBody: string | Uint8Array | null = null;

    if (body === undefined || body === null) {
      processedBody = null;
    } else if (typeof body === 'string' || body instanceof Uint8Array) {
      processedBody = body;
    } else if (body instanceof URLSearchParams) {
      processedBody = body.toString();
      if (!headers.has('Content-Type')) headers.set('Content-Type', 'application/x-www-form-urlencoded');
    } else {
      processedBody = JSON.stringify(body);
      if (!headers.has('Content-Type')) headers.set('Content-Type', 'application/json');
    }

    return this.request(path, { ...options, method, body: processedBody, headers });
  }

  get(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request(path, { ...options, method: 'GET' });
  }

  post(path: string, body?: JsonBody, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    return this.requestWithBody('POST', path, body, options);
  }

  put(path: string, body?: JsonBody, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    return this.requestWithBody('PUT', path, body, options);
  }

  patch(path: string, body?: JsonBody, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    return this.requestWithBody('PATCH', path, body, options);
  }

  delete(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request(path, { ...options, method: 'DELETE' });
  }

  head(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request(path, { ...options, method: 'HEAD' });
  }
}
