/**
 * Validation errors - rejected before any request is sent.
 *
 * Bad arguments (mutating the root, empty names), unsafe paths, resource URIs
 * without the canonical prefix, and invalid configuration values. All of them
 * are public: the message tells the user what to fix.
 *
 * @example
 * throw new InvalidArgumentError('Cannot delete the root directory');
 *
 * @see InvalidPathError for path-specific validation
 * @see InvalidUriError for resource URIs
 * @see InvalidConfigError for configuration validation
 */
import { AppError } from './AppError.js';

/**
 * Base class for validation errors (400, public).
 */
export class ValidationError extends AppError {
  /**
   * @param message - Description of what validation failed
   * @param details - Optional key-value pairs with detailed validation errors
   *
   * @example
   * new ValidationError('Share options invalid', {
   *   expires: 'Must be a positive number of seconds',
   * })
   */
  constructor(
    message: string,
    readonly details?: Record<string, string>
  ) {
    super(message, 'VALIDATION_ERROR', 400, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    };
  }
}

/**
 * Error for arguments the server cannot act on, such as mutating the root path.
 *
 * @example
 * throw new InvalidArgumentError('Cannot rename the root directory', { path: '/' });
 */
export class InvalidArgumentError extends ValidationError {
  override readonly code = 'INVALID_ARGUMENT' as const;

  constructor(message: string, details?: Record<string, string>) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error for invalid remote paths (traversal segments, control characters, empty names).
 *
 * @example
 * throw new InvalidPathError('/docs/../etc', 'Path traversal not allowed');
 */
export class InvalidPathError extends ValidationError {
  override readonly code = 'INVALID_PATH' as const;

  /**
   * @param path - The invalid path
   * @param reason - Why the path is invalid (default: 'Invalid path')
   */
  constructor(path: string, reason: string = 'Invalid path') {
    super(`${reason}: ${path}`, { path, reason });
    Object.setPrototypeOf(this, InvalidPathError.prototype);
  }
}

/**
 * Error for strings that are not resource URIs of the expected scheme.
 *
 * @example
 * throw new InvalidUriError('/docs/a.txt', 'cloudreve://my/');
 */
export class InvalidUriError extends ValidationError {
  override readonly code = 'INVALID_URI' as const;

  /**
   * @param uri - The rejected value
   * @param expectedPrefix - Prefix a valid URI starts with
   */
  constructor(uri: string, expectedPrefix: string) {
    super(`Invalid URI format: ${uri} (expected prefix ${expectedPrefix})`, {
      uri,
      expectedPrefix,
    });
    Object.setPrototypeOf(this, InvalidUriError.prototype);
  }
}

/**
 * Error for invalid configuration values.
 *
 * @example
 * throw new InvalidConfigError('server.baseUrl', 'Must be an http(s) URL');
 */
export class InvalidConfigError extends ValidationError {
  override readonly code = 'INVALID_CONFIG' as const;

  /**
   * @param field - Name of the configuration field that failed validation
   * @param reason - Why the value is invalid
   */
  constructor(field: string, reason: string) {
    super(`Invalid configuration for "${field}": ${reason}`, { field, reason });
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}
