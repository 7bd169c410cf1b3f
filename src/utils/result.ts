/**
 * Result type for operations that report failure as a value.
 *
 * Validators, `uriToPath` and the per-item steps of batch operations return a
 * Result instead of throwing, so a failure can be collected next to successes.
 *
 * @example
 * const result = uriToPath('cloudreve://my/docs/a.txt');
 * if (result.ok) {
 *   console.log(result.value); // '/docs/a.txt'
 * } else {
 *   console.error(result.error.message);
 * }
 */

/**
 * Success result wrapping a value.
 */
export interface Ok<T> {
  ok: true;
  value: T;
}

/**
 * Failure result wrapping an error.
 */
export interface Err<E> {
  ok: false;
  error: E;
}

/**
 * Either Ok<T> or Err<E>.
 *
 * @example
 * function parsePageSize(raw: string): Result<number, string> {
 *   const n = Number(raw);
 *   return Number.isInteger(n) && n > 0 ? ok(n) : err(`not a page size: ${raw}`);
 * }
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Transform the value of a successful result; errors pass through.
 *
 * @example
 * mapOk(validatePathSafety('docs/a.txt'), getFilename); // ok('a.txt')
 */
export const mapOk = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  result.ok ? ok(fn(result.value)) : result;

/**
 * Chain a second fallible step onto a successful result.
 *
 * @example
 * andThen(validateBaseUrl(raw), (url) => validateReachableScheme(url));
 */
export const andThen = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Extract the value, throwing the error if the result failed.
 *
 * @throws The wrapped error
 */
export const unwrap = <T, E extends Error>(result: Result<T, E>): T => {
  if (result.ok) return result.value;
  throw result.error;
};

export const unwrapOr = <T, E>(result: Result<T, E>, fallback: T): T =>
  result.ok ? result.value : fallback;

/**
 * Run a promise-returning operation and capture its rejection as an Err.
 *
 * @param fn - Operation to run
 * @param errorTransform - Converts whatever was thrown into the error type
 *
 * @example
 * const outcome = await fromPromise(() => api.deleteFiles([uri]), toAppError);
 */
export const fromPromise = async <T, E>(
  fn: () => Promise<T>,
  errorTransform: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (error) {
    return err(errorTransform(error));
  }
};
