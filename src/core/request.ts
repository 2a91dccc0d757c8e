import { Method, CloudRequest, RequestOptions, RequestBody } from '../types/index.js';

export class HttpRequest implements CloudRequest {
  public readonly url: string;
  public readonly method: Method;
  public readonly headers: Headers;
  public readonly body: RequestBody;
  public readonly signal?: AbortSignal;
  public readonly throwHttpErrors?: boolean;

  constructor(url: string, options: RequestOptions = {}) {
    this.url = url;
    this.method = options.method || 'GET';
    this.headers = new Headers(options.headers);
    this.body = options.body || null;
    this.signal = options.signal;
    this.throwHttpErrors = options.throwHttpErrors !== undefined ? options.throwHttpErrors : true;
  }

  withHeader(name: string, value: string): CloudRequest {
    const newHeaders = new Headers(this.headers);
    newHeaders.set(name, value);
    return new HttpRequest(this.url, {
      method: this.method,
      headers: newHeaders,
      body: this.body,
      signal: this.signal,
      throwHttpErrors: this.throwHttpErrors,
    });
  }

  withUrl(url: string): CloudRequest {
    return new HttpRequest(url, {
      method: this.method,
      headers: this.headers,
      body: this.body,
      signal: this.signal,
      throwHttpErrors: this.throwHttpErrors,
    });
  }
}
