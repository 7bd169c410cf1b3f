/**
 * HTTP transport used by both endpoint clients.
 *
 * The endpoint clients only ever see `HttpTransport`; the default implementation
 * sends requests through the global `fetch`. Tests and embedders can pass their
 * own transport (a fake, a proxy-aware client) without touching the clients.
 */

import { NetworkError, TimeoutError } from '../errors/index.js';
import { logger } from '../logger.js';

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Every `Set-Cookie` header, unfolded */
  setCookies: string[];
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Value of the User-Agent header */
  userAgent?: string;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_USER_AGENT = 'cloudreve-cli';

// ============================================================================
// Fetch Transport
// ============================================================================

/**
 * Transport backed by the global `fetch`.
 *
 * Connection failures are raised as NetworkError, an elapsed timeout as TimeoutError.
 * Responses of any status are returned; status handling belongs to the envelope codec.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: { 'User-Agent': this.userAgent, ...request.headers },
      signal: AbortSignal.timeout(this.timeoutMs),
      redirect: 'follow',
    };
    if (request.body !== undefined) {
      init.body = request.body;
    }

    let response: Response;
    try {
      response = await fetch(request.url, init);
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TimeoutError(
          `${request.method} ${request.url} timed out after ${this.timeoutMs}ms`,
          error
        );
      }
      throw new NetworkError(`${request.method} ${request.url} failed`, error);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new NetworkError(`Reading response of ${request.method} ${request.url} failed`, error);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    logger.debug(`${request.method} ${request.url} -> ${response.status}`);

    return {
      status: response.status,
      headers,
      setCookies: response.headers.getSetCookie(),
      body,
    };
  }
}
