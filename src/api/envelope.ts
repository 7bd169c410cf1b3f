/**
 * Response envelope codec shared by both protocol versions.
 *
 * Every endpoint answers `{ code, msg, data }`; `code === 0` is success. The codec
 * classifies a raw response into a payload or one typed error and never retries.
 */

import { ApiError, DecodeError, EmptyResponseError } from '../errors/index.js';
import type { HttpResponse } from './transport.js';

export interface Envelope<T> {
  code: number;
  msg: string;
  data?: T | null;
}

/** Envelope code both servers use when a password login needs a one-time code */
export const TWO_FACTOR_REQUIRED_CODE = 203;

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Parse a body as an envelope. Returns undefined when the body is not JSON or
 * not an object with a numeric `code`.
 */
export function parseEnvelope<T>(body: string): Envelope<T> | undefined {
  let parsed: Envelope<T> | null;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  if (parsed === null || typeof parsed !== 'object' || typeof parsed.code !== 'number') {
    return undefined;
  }

  return {
    code: parsed.code,
    msg: typeof parsed.msg === 'string' ? parsed.msg : '',
    data: parsed.data,
  };
}

/**
 * Decode a response into its envelope, raising for every failure.
 *
 * - non-2xx with an error envelope: ApiError(envelope code, msg)
 * - non-2xx otherwise: ApiError(HTTP status, trimmed body)
 * - 2xx that is not an envelope: DecodeError
 * - 2xx with `code !== 0`: ApiError(code, msg)
 */
export function decodeEnvelope<T>(response: HttpResponse): Envelope<T> {
  const envelope = parseEnvelope<T>(response.body);

  if (!isSuccessStatus(response.status)) {
    if (envelope && envelope.code !== 0) {
      throw new ApiError(envelope.msg, envelope.code, response.status, envelope);
    }
    throw new ApiError(response.body.trim(), response.status, response.status);
  }

  if (!envelope) {
    throw new DecodeError('Response is not a valid JSON envelope', response.body);
  }

  if (envelope.code !== 0) {
    throw new ApiError(envelope.msg, envelope.code, response.status, envelope);
  }

  return envelope;
}

/**
 * Decode a response whose envelope must carry `data`.
 *
 * @param endpoint - Endpoint name for the empty-response message
 * @throws EmptyResponseError when `data` is null or absent
 */
export function decodeData<T>(response: HttpResponse, endpoint?: string): T {
  const envelope = decodeEnvelope<T>(response);
  if (envelope.data === undefined || envelope.data === null) {
    throw new EmptyResponseError(endpoint);
  }
  return envelope.data;
}
