/**
 * Authentication errors - missing sessions, pending second factors, undetectable servers.
 *
 * @example
 * if (!this.token) {
 *   throw new NotAuthenticatedError();
 * }
 *
 * @see NotAuthenticatedError when no session or token is held
 * @see TwoFactorRequiredError when the password login needs a one-time code
 * @see VersionDetectionError when neither protocol answers the liveness probe
 */
import { AppError } from './AppError.js';

/**
 * Base class for authentication errors (401, public).
 */
export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION_ERROR', 401, true);
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when an operation needs a session the client does not hold.
 */
export class NotAuthenticatedError extends AuthenticationError {
  override readonly code = 'NOT_AUTHENTICATED' as const;

  constructor(message: string = 'Not authenticated. Please login first.') {
    super(message);
    Object.setPrototypeOf(this, NotAuthenticatedError.prototype);
  }
}

/**
 * Error thrown when the server accepted the password but wants a one-time code.
 * Complete the login with `loginTwoFactor(code)`.
 */
export class TwoFactorRequiredError extends AuthenticationError {
  override readonly code = 'TWO_FACTOR_REQUIRED' as const;

  /**
   * @param account - Account the pending login belongs to
   */
  constructor(readonly account: string) {
    super(`Two-factor authentication required for ${account}.`);
    Object.setPrototypeOf(this, TwoFactorRequiredError.prototype);
  }
}

/**
 * Error thrown when version detection finds no live endpoint.
 */
export class VersionDetectionError extends AppError {
  constructor(
    readonly baseUrl: string,
    originalError?: unknown
  ) {
    super(
      'Could not detect API version. Neither V3 nor V4 endpoints responded.',
      'VERSION_DETECTION_FAILED',
      503,
      true,
      originalError
    );
    Object.setPrototypeOf(this, VersionDetectionError.prototype);
  }
}
