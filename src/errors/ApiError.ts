/**
 * Remote call errors - transport failures, undecodable bodies and server-reported errors.
 *
 * Every request the endpoint clients send ends in exactly one of these when it fails:
 * the transport could not deliver it (NetworkError / TimeoutError), the body could not be
 * decoded (DecodeError / EmptyResponseError), or the server answered with a non-zero
 * envelope code or a non-2xx status (ApiError).
 *
 * @example
 * try {
 *   await client.listFiles('/');
 * } catch (error) {
 *   if (error instanceof ApiError && error.apiCode === 401) {
 *     // session expired
 *   }
 * }
 */
import { AppError } from './AppError.js';

/**
 * Error reported by the server: a non-zero envelope `code`, or a non-2xx HTTP status
 * without a usable envelope (then `apiCode` is the HTTP status).
 */
export class ApiError extends AppError {
  /**
   * @param message - Message from the envelope (`msg`) or the trimmed raw body
   * @param apiCode - Envelope code, or the HTTP status when no envelope was returned
   * @param httpStatus - HTTP status of the response (optional)
   * @param apiResponse - Decoded envelope, when there was one (optional)
   */
  constructor(
    message: string,
    readonly apiCode: number,
    readonly httpStatus?: number,
    readonly apiResponse?: unknown
  ) {
    super(message, 'API_ERROR', 502, true);
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      apiCode: this.apiCode,
      httpStatus: this.httpStatus,
    };
  }
}

/**
 * Error thrown when the request never produced a response (503).
 *
 * DNS failure, connection refused, TLS failure, reset sockets. Never retried.
 *
 * @example
 * try {
 *   await fetch(url);
 * } catch (error) {
 *   throw new NetworkError(`GET ${url} failed`, error);
 * }
 */
export class NetworkError extends AppError {
  /**
   * @param message - Description of the failed request
   * @param originalError - The underlying transport error
   * @param statusCode - 503 for unreachable servers, 504 for timeouts
   */
  constructor(message: string, originalError?: unknown, statusCode: number = 503) {
    super(`Network error: ${message}`, 'NETWORK_ERROR', statusCode, true, originalError);
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Error thrown when the server did not answer within the transport timeout (504).
 */
export class TimeoutError extends NetworkError {
  override readonly code = 'TIMEOUT' as const;

  constructor(message: string = 'Request timeout', originalError?: unknown) {
    super(message, originalError, 504);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when a response body is not a valid envelope (malformed JSON,
 * missing `code`, or a payload of the wrong shape).
 */
export class DecodeError extends AppError {
  /**
   * @param message - What could not be decoded
   * @param body - The raw response body, kept for debugging (optional)
   */
  constructor(
    message: string,
    readonly body?: string
  ) {
    super(message, 'DECODE_ERROR', 502, true);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Error thrown when the envelope reported success but carried no `data`
 * for a call that expects a payload.
 */
export class EmptyResponseError extends DecodeError {
  override readonly code = 'EMPTY_RESPONSE' as const;

  constructor(endpoint?: string) {
    super(endpoint ? `Empty response from ${endpoint}` : 'Empty response');
    Object.setPrototypeOf(this, EmptyResponseError.prototype);
  }
}
