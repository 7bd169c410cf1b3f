/**
 * In-process stand-in for the HTTP transport.
 *
 * Responses are queued in the order the code under test will ask for them;
 * every request is recorded so tests can assert the exact call sequence.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../../src/api/transport.js';

export const BASE_URL = 'https://drive.example.com';

type Responder = HttpResponse | ((request: HttpRequest) => HttpResponse);

export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly queue: Responder[] = [];

  enqueue(...responses: Responder[]): this {
    this.queue.push(...responses);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    return typeof next === 'function' ? next(request) : next;
  }

  /** Queued responses nobody asked for */
  pending(): number {
    return this.queue.length;
  }

  reset(): void {
    this.requests.length = 0;
    this.queue.length = 0;
  }

  /** `METHOD /path` of every request, query string left out */
  calls(): string[] {
    return this.requests.map((request) => `${request.method} ${new URL(request.url).pathname}`);
  }

  /** Decoded query parameters of one request */
  query(index: number): Record<string, string> {
    return Object.fromEntries(new URL(this.request(index).url).searchParams);
  }

  /** Parsed JSON body of one request */
  body(index: number): unknown {
    const { body } = this.request(index);
    if (typeof body !== 'string') {
      throw new Error(`Request ${index} has no JSON body`);
    }
    const parsed: unknown = JSON.parse(body);
    return parsed;
  }

  request(index: number): HttpRequest {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request at index ${index} (got ${this.requests.length})`);
    }
    return request;
  }
}

/** Transport shared with code that builds its own (the CLI commands) */
export const sharedTransport = new FakeTransport();

export function response(status: number, body: string, setCookies: string[] = []): HttpResponse {
  return { status, headers: { 'content-type': 'application/json' }, setCookies, body };
}

/** Success envelope carrying `data` */
export function envelope(data: unknown, setCookies: string[] = []): HttpResponse {
  return response(200, JSON.stringify({ code: 0, msg: '', data }), setCookies);
}

/** Success envelope without data */
export function done(): HttpResponse {
  return response(200, JSON.stringify({ code: 0, msg: '' }));
}

/** Error envelope as the servers send it (HTTP 200, non-zero code) */
export function failure(code: number, msg: string, status: number = 200): HttpResponse {
  return response(status, JSON.stringify({ code, msg }));
}
