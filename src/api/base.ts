/**
 * Shared request plumbing for the V3 and V4 endpoint clients.
 */

import { logger } from '../logger.js';
import { safeStringify } from '../utils/error.js';
import { decodeData, decodeEnvelope, type Envelope } from './envelope.js';
import type { HttpMethod, HttpResponse, HttpTransport } from './transport.js';

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  /** JSON-encoded unless it is already a string or bytes */
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Build a query string, skipping undefined values. Keys keep their order.
 *
 * @example
 * buildQuery({ uri: 'cloudreve://my/a b', page: 2, next_page_token: undefined });
 * // '?uri=cloudreve%3A%2F%2Fmy%2Fa%20b&page=2'
 */
export function buildQuery(query: Record<string, QueryValue> | undefined): string {
  if (!query) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`);
  }
  return parts.length > 0 ? `?${parts.join('&')}` : '';
}

export abstract class EndpointClient {
  /** Base URL without trailing slash, e.g. https://drive.example.com */
  readonly baseUrl: string;

  /**
   * @param baseUrl - Server root (trailing slashes are stripped)
   * @param apiPrefix - Path prefix of the protocol, e.g. `/api/v4`
   * @param transport - Transport every request goes through
   */
  protected constructor(
    baseUrl: string,
    private readonly apiPrefix: string,
    protected readonly transport: HttpTransport
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /** Authentication headers for the next request */
  protected abstract authHeaders(): Record<string, string>;

  /**
   * Absolute URL of an endpoint path (path starts with `/`).
   */
  protected endpointUrl(path: string, query?: Record<string, QueryValue>): string {
    return `${this.baseUrl}${this.apiPrefix}${path}${buildQuery(query)}`;
  }

  /**
   * Send a request and return the raw response without decoding it.
   */
  protected async send(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.authHeaders(),
      ...options.headers,
    };

    let body: string | Uint8Array | undefined;
    if (typeof options.body === 'string' || options.body instanceof Uint8Array) {
      body = options.body;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
    }

    const url = this.endpointUrl(path, options.query);
    if (body !== undefined && typeof body === 'string') {
      logger.debug(`${method} ${url} body=${safeStringify(options.body)}`);
    } else {
      logger.debug(`${method} ${url}`);
    }

    return this.transport.send({ method, url, headers, body });
  }

  /**
   * Send a request whose envelope must carry data.
   */
  protected async request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<T> {
    const response = await this.send(method, path, options);
    return decodeData<T>(response, `${method} ${path}`);
  }

  /**
   * Send a request whose envelope may or may not carry data.
   */
  protected async requestEnvelope<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<Envelope<T>> {
    const response = await this.send(method, path, options);
    return decodeEnvelope<T>(response);
  }

  /**
   * Send a request where only success matters.
   */
  protected async execute(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<void> {
    await this.requestEnvelope<unknown>(method, path, options);
  }
}
