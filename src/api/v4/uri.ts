/**
 * Resource URI normalization for the current (V4) protocol.
 *
 * The V4 server addresses everything in the user's own space as
 * `cloudreve://my/<path>`. Callers may pass either plain paths or URIs;
 * both normalize to exactly one URI.
 */

import { InvalidUriError } from '../../errors/index.js';
import { err, ok, type Result } from '../../utils/result.js';

export const URI_SCHEME = 'cloudreve://';
export const MY_SPACE_PREFIX = `${URI_SCHEME}my/`;

/**
 * Convert a path to a resource URI. Idempotent: URIs are returned unchanged.
 *
 * @example
 * pathToUri('/docs/a.txt'); // 'cloudreve://my/docs/a.txt'
 * pathToUri('docs/a.txt'); // 'cloudreve://my/docs/a.txt'
 * pathToUri('/'); // 'cloudreve://my/'
 * pathToUri('cloudreve://my/docs'); // 'cloudreve://my/docs'
 */
export function pathToUri(input: string): string {
  if (input.startsWith(URI_SCHEME)) {
    return input;
  }
  const relative = input.startsWith('/') ? input.slice(1) : input;
  return `${MY_SPACE_PREFIX}${relative}`;
}

/**
 * Convert a my-space URI back to a path with a single leading `/`.
 *
 * @example
 * uriToPath('cloudreve://my/docs/a.txt'); // ok('/docs/a.txt')
 * uriToPath('cloudreve://my/'); // ok('/')
 * uriToPath('/docs/a.txt'); // err(InvalidUriError)
 */
export function uriToPath(uri: string): Result<string, InvalidUriError> {
  if (!uri.startsWith(MY_SPACE_PREFIX)) {
    return err(new InvalidUriError(uri, MY_SPACE_PREFIX));
  }
  return ok(uri.slice(MY_SPACE_PREFIX.length - 1));
}

export function isValidUri(value: string): boolean {
  return value.startsWith(URI_SCHEME);
}
