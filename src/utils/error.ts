/**
 * Error utilities and helpers.
 *
 * Message extraction, conversion of anything thrown into an AppError, and safe
 * serialization of request bodies and errors for the debug log.
 */
import { AppError, ApiError } from '../errors/index.js';

/**
 * Extract an error message from an unknown thrown value.
 *
 * @example
 * getErrorMessage(new Error('Something failed')); // 'Something failed'
 * getErrorMessage('Simple string error'); // 'Simple string error'
 * getErrorMessage({ message: 'Object error' }); // 'Object error'
 * getErrorMessage(404); // '404'
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Convert any thrown value to an AppError.
 *
 * AppErrors pass through unchanged. Objects carrying a numeric `code` become an
 * ApiError (the shape of a decoded envelope); everything else is wrapped in a
 * generic AppError with code 'UNKNOWN_ERROR'.
 *
 * @example
 * try {
 *   await client.rename('/docs/a.txt', 'b.txt');
 * } catch (error) {
 *   const appError = toAppError(error);
 *   logger.error(`${appError.code}: ${appError.message}`);
 * }
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  const message = getErrorMessage(error);

  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return new ApiError(message, error.code, undefined, error);
  }

  return new AppError(message, 'UNKNOWN_ERROR', 500, false, error);
}

/**
 * JSON stringify that survives circular references and truncates long strings.
 *
 * Used for debug logging of request bodies and decoded envelopes.
 *
 * @param obj - Value to stringify
 * @param maxLength - Strings longer than this are truncated (default: 200)
 *
 * @example
 * safeStringify({ password: 'x'.repeat(500) });
 * // '{"password":"xxx...(197 chars)..."}'
 */
export function safeStringify(obj: unknown, maxLength: number = 200): string {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    if (typeof value === 'string' && value.length > maxLength) {
      return `${value.slice(0, maxLength - 3)}...`;
    }

    if (value instanceof Uint8Array) {
      return `[${value.byteLength} bytes]`;
    }

    return value;
  };

  try {
    return JSON.stringify(obj, replacer) ?? String(obj);
  } catch {
    return String(obj);
  }
}
