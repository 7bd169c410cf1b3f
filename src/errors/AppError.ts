/**
 * Base application error class.
 *
 * Every error raised by the client library and the CLI inherits from this class, so
 * callers can branch on a stable `code` and log a consistent JSON shape regardless of
 * which protocol version produced the failure.
 *
 * @example
 * // Basic usage
 * throw new AppError('Operation failed', 'OP_FAILED', 500, false);
 *
 * @example
 * // Wrapping an original error
 * try {
 *   await client.listFiles('/docs');
 * } catch (error) {
 *   throw new AppError('Failed to list /docs', 'LIST_FAILED', 500, false, error);
 * }
 *
 * @see ValidationError for bad arguments, paths and configuration
 * @see AuthenticationError for login and session failures
 * @see ApiError for errors reported by the server
 * @see NetworkError for transport failures
 */
export class AppError extends Error {
  /**
   * @param message - Human-readable description (shown to users when isPublic=true)
   * @param code - Unique error code for programmatic handling
   * @param statusCode - HTTP-like status classifying the failure (default: 500)
   * @param isPublic - Whether the message is safe to print as-is (default: false)
   * @param originalError - Error being wrapped, if any
   */
  constructor(
    message: string,
    /** Unique error code for programmatic handling (e.g., 'API_ERROR', 'NOT_FOUND') */
    readonly code: string,
    /** HTTP-like status code (e.g., 400, 401, 404, 502) */
    readonly statusCode: number = 500,
    /** Whether the message is safe to show to end users */
    readonly isPublic: boolean = false,
    /** Original error object if this error wraps another error */
    readonly originalError?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, AppError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to a JSON-serializable shape for logs and `--json` output.
   * Stack traces and wrapped errors are left out.
   *
   * @example
   * new AppError('Op failed', 'OP_FAILED', 500).toJSON();
   * // { name: 'AppError', message: 'Op failed', code: 'OP_FAILED', statusCode: 500, isPublic: false }
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isPublic: this.isPublic,
    };
  }

  /**
   * Message suitable for end users: the real message when isPublic=true,
   * a generic one otherwise.
   *
   * @example
   * new AppError('Path is required', 'BAD_ARGUMENT', 400, true).getPublicMessage(); // 'Path is required'
   * new AppError('socket hang up', 'NETWORK_ERROR', 503).getPublicMessage(); // 'Internal Server Error'
   */
  getPublicMessage(): string {
    return this.isPublic ? this.message : 'Internal Server Error';
  }
}
