/**
 * Operation errors - the target does not exist, or the active protocol cannot do it.
 *
 * @example
 * const entry = listing.objects.find((o) => o.name === name);
 * if (!entry) {
 *   throw new NotFoundError(path);
 * }
 */
import { AppError } from './AppError.js';

/**
 * Error thrown when a path does not resolve to an entry (404).
 *
 * `available` carries a sample of the names that were found in the parent
 * directory, when the caller collected one.
 */
export class NotFoundError extends AppError {
  /**
   * @param path - Path that did not resolve
   * @param available - Sample of names present in the parent directory (optional)
   */
  constructor(
    readonly path: string,
    readonly available?: string[]
  ) {
    super(NotFoundError.describe(path, available), 'NOT_FOUND', 404, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  private static describe(path: string, available?: string[]): string {
    if (!available) return `File not found: ${path}`;
    if (available.length === 0) return `File not found: ${path} (directory is empty)`;
    return `File not found: ${path} (available: ${available.join(', ')})`;
  }
}

/**
 * Error thrown when the active protocol version has no equivalent for an operation (501).
 *
 * @example
 * throw new UnsupportedOperationError('delete share', 'v3');
 */
export class UnsupportedOperationError extends AppError {
  /**
   * @param operation - Human-readable operation name
   * @param version - Protocol version that lacks it
   */
  constructor(
    readonly operation: string,
    readonly version: string
  ) {
    super(
      `Operation "${operation}" is not supported by the ${version} API`,
      'UNSUPPORTED_OPERATION',
      501,
      true
    );
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}
