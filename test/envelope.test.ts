/**
 * Unit Tests - Response envelope codec and query building
 */
import { describe, test, expect } from 'vitest';
import { decodeData, decodeEnvelope, parseEnvelope } from '../src/api/envelope.js';
import { buildQuery } from '../src/api/base.js';
import { ApiError, DecodeError, EmptyResponseError } from '../src/errors/index.js';
import { done, envelope, failure, response } from './helpers/fakeTransport.js';

describe('Envelope - Parsing', () => {
  test('parses a full envelope', () => {
    expect(parseEnvelope('{"code":0,"msg":"","data":{"a":1}}')).toEqual({
      code: 0,
      msg: '',
      data: { a: 1 },
    });
  });

  test('defaults a missing msg to an empty string', () => {
    expect(parseEnvelope('{"code":40001}')).toEqual({ code: 40001, msg: '', data: undefined });
  });

  test('returns undefined for non-envelopes', () => {
    expect(parseEnvelope('<html></html>')).toBeUndefined();
    expect(parseEnvelope('null')).toBeUndefined();
    expect(parseEnvelope('{"msg":"no code"}')).toBeUndefined();
    expect(parseEnvelope('{"code":"0"}')).toBeUndefined();
  });
});

describe('Envelope - Decoding', () => {
  test('returns the envelope of a successful response', () => {
    expect(decodeEnvelope(envelope('3.8.3'))).toEqual({ code: 0, msg: '', data: '3.8.3' });
  });

  test('raises ApiError for a non-zero code on HTTP 200', () => {
    try {
      decodeEnvelope(failure(40004, 'Object existed'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.apiCode).toBe(40004);
        expect(error.httpStatus).toBe(200);
        expect(error.message).toBe('Object existed');
      }
    }
  });

  test('uses the envelope of a non-2xx response when it has one', () => {
    try {
      decodeEnvelope(failure(401, 'Login required', 401));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.apiCode).toBe(401);
        expect(error.message).toBe('Login required');
      }
    }
  });

  test('falls back to HTTP status and trimmed body', () => {
    try {
      decodeEnvelope(response(502, '  Bad Gateway\n'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.apiCode).toBe(502);
        expect(error.httpStatus).toBe(502);
        expect(error.message).toBe('Bad Gateway');
      }
    }
  });

  test('raises DecodeError for a 2xx body that is not an envelope', () => {
    expect(() => decodeEnvelope(response(200, 'OK'))).toThrow(DecodeError);
  });

  test('decodeData requires data', () => {
    expect(decodeData(envelope({ used: 1 }))).toEqual({ used: 1 });
    expect(() => decodeData(done(), 'GET /user/storage')).toThrow(
      new EmptyResponseError('GET /user/storage')
    );
    expect(() => decodeData(envelope(null))).toThrow(EmptyResponseError);
  });
});

describe('Query - Building', () => {
  test('encodes values and skips undefined ones', () => {
    expect(
      buildQuery({ uri: 'cloudreve://my/a b', page: 2, next_page_token: undefined })
    ).toBe('?uri=cloudreve%3A%2F%2Fmy%2Fa%20b&page=2');
  });

  test('returns an empty string when nothing is left', () => {
    expect(buildQuery(undefined)).toBe('');
    expect(buildQuery({ a: undefined })).toBe('');
  });
});
