import { CloudResponse, Timings } from '../types/index.js';

const STATUS_TEXTS: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  304: 'Not Modified',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

export interface HttpResponseInit {
  status: number;
  statusText?: string;
  headers?: Headers | Record<string, string>;
  url?: string;
  timings?: Timings;
}

/**
 * Fully buffered response. The body is read once by the transport,
 * so json()/text() can be called any number of times.
 */
export class HttpResponse implements CloudResponse {
  public readonly status: number;
  public readonly statusText: string;
  public readonly headers: Headers;
  public readonly url: string;
  public readonly timings?: Timings;
  private readonly body: Uint8Array;

  constructor(body: Uint8Array | string | null, init: HttpResponseInit) {
    this.status = init.status;
    this.statusText = init.statusText ?? STATUS_TEXTS[init.status] ?? '';
    this.headers = new Headers(init.headers);
    this.url = init.url ?? '';
    this.timings = init.timings;

    if (body === null) {
      this.body = new Uint8Array(0);
    } else if (typeof body === 'string') {
      this.body = new TextEncoder().encode(body);
    } else {
      this.body = body;
    }
  }

  get ok() {
    return this.status >= 200 && this.status < 300;
  }

  async json<T = unknown>(): Promise<T> {
    return JSON.parse(await this.text()) as T;
  }

  async text(): Promise<string> {
    return new TextDecoder().decode(this.body);
  }

  async bytes(): Promise<Uint8Array> {
    return this.body.slice();
  }

  clone(): CloudResponse {
    return new HttpResponse(this.body.slice(), {
      status: this.status,
      statusText: this.statusText,
      headers: this.headers,
      url: this.url,
      timings: this.timings,
    });
  }
}
