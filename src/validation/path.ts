/**
 * Remote path handling.
 *
 * Every path the client accepts is normalized to one canonical form before it is
 * split, resolved, or turned into a resource URI: a leading `/`, no duplicate
 * separators, no trailing separator except for the root itself.
 *
 * @example
 * const result = validatePathSafety(userInput);
 * if (result.ok) {
 *   const { parent, name } = splitPath(result.value);
 * } else {
 *   throw result.error; // InvalidPathError
 * }
 *
 * @see normalizePath for path normalization
 * @see validatePathSafety for safety checks
 * @see validateFilename for single-segment names
 * @see splitPath for parent/leaf decomposition
 */
import { InvalidPathError } from '../errors/index.js';
import { Result, err, ok } from '../utils/result.js';

export const ROOT_PATH = '/';

/**
 * Normalize a remote path to canonical form.
 *
 * - Ensures path starts with `/`
 * - Collapses duplicate slashes
 * - Drops a trailing slash (except for the root)
 * - Does NOT perform safety checks (use validatePathSafety for that)
 *
 * @example
 * normalizePath('foo/bar'); // '/foo/bar'
 * normalizePath('/foo//bar/'); // '/foo/bar'
 * normalizePath(''); // '/'
 */
export function normalizePath(path: string): string {
  if (!path) return ROOT_PATH;

  const prefixed = path.startsWith('/') ? path : `/${path}`;
  const collapsed = prefixed.replace(/\/+/g, '/');

  if (collapsed.length > 1 && collapsed.endsWith('/')) {
    return collapsed.slice(0, -1);
  }
  return collapsed;
}

export function isRootPath(path: string): boolean {
  return normalizePath(path) === ROOT_PATH;
}

/**
 * Check whether a path has `.` or `..` segments.
 *
 * @example
 * containsPathTraversal('/docs/../etc'); // true
 * containsPathTraversal('/docs/v1..2.txt'); // false
 */
export function containsPathTraversal(path: string): boolean {
  return path.split('/').some((segment) => segment === '..' || segment === '.');
}

/**
 * Validate a remote path and return its normalized form.
 *
 * Rejects empty input, `.`/`..` segments and control characters.
 *
 * @example
 * validatePathSafety('docs//a.txt'); // ok('/docs/a.txt')
 * validatePathSafety('/docs/../a.txt'); // err(InvalidPathError)
 */
export function validatePathSafety(path: string): Result<string, InvalidPathError> {
  if (!path) {
    return err(new InvalidPathError('', 'Path is required'));
  }

  const normalized = normalizePath(path);

  if (containsPathTraversal(normalized)) {
    return err(new InvalidPathError(path, 'Path traversal not allowed'));
  }

  // eslint-disable-next-line no-control-regex
  if (/[\x00-\x1F\x7F]/.test(normalized)) {
    return err(new InvalidPathError(path, 'Path contains invalid control characters'));
  }

  return ok(normalized);
}

/**
 * Validate a single name (the new name of a rename, a WebDAV account name).
 *
 * Rejects empty or whitespace-only names, separators, control characters and `.`/`..`.
 *
 * @example
 * validateFilename('report.pdf'); // ok('report.pdf')
 * validateFilename('a/b.txt'); // err: contains a path separator
 */
export function validateFilename(filename: string): Result<string, InvalidPathError> {
  if (!filename || !filename.trim()) {
    return err(new InvalidPathError(filename, 'Filename cannot be empty'));
  }

  if (filename.includes('/') || filename.includes('\\')) {
    return err(new InvalidPathError(filename, 'Filename cannot contain path separators'));
  }

  // eslint-disable-next-line no-control-regex
  if (/[\x00-\x1F\x7F]/.test(filename)) {
    return err(new InvalidPathError(filename, 'Filename contains invalid control characters'));
  }

  if (filename === '..' || filename === '.') {
    return err(new InvalidPathError(filename, 'Filename cannot be a relative reference'));
  }

  return ok(filename);
}

/**
 * Join a directory path and a child name.
 *
 * @example
 * joinPath('/', 'a.txt'); // '/a.txt'
 * joinPath('/docs/', 'a.txt'); // '/docs/a.txt'
 */
export function joinPath(directory: string, name: string): string {
  const base = normalizePath(directory);
  return base === ROOT_PATH ? `/${name}` : `${base}/${name}`;
}

/**
 * Extract parent path from a path
 */
export function getParentPath(path: string): string {
  const normalized = normalizePath(path);
  if (normalized === ROOT_PATH) return ROOT_PATH;

  const lastSlash = normalized.lastIndexOf('/');
  if (lastSlash <= 0) return ROOT_PATH;
  return normalized.slice(0, lastSlash);
}

/**
 * Extract the last segment of a path (`/` for the root)
 */
export function getFilename(path: string): string {
  const normalized = normalizePath(path);
  if (normalized === ROOT_PATH) return ROOT_PATH;
  return normalized.slice(normalized.lastIndexOf('/') + 1);
}

/**
 * Split a path into its parent directory and leaf name.
 *
 * @example
 * splitPath('/docs/a.txt'); // { parent: '/docs', name: 'a.txt' }
 * splitPath('a.txt'); // { parent: '/', name: 'a.txt' }
 */
export function splitPath(path: string): { parent: string; name: string } {
  return { parent: getParentPath(path), name: getFilename(path) };
}
