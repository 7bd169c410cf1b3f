/**
 * Login input validation.
 *
 * The legacy server accepts any user name, the current one an email address; both
 * reject empty passwords and expect 6-digit one-time codes.
 *
 * @see validateEmail for account names under the current protocol
 * @see validatePassword for password presence
 * @see validateTotpCode for one-time codes
 */
import { InvalidArgumentError } from '../errors/index.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

/**
 * Validate email address format (basic, not RFC 5322 complete). Trims whitespace.
 *
 * @example
 * validateEmail(' user@example.com '); // ok('user@example.com')
 * validateEmail('invalid.email'); // err
 */
export function validateEmail(email: string): Result<string, InvalidArgumentError> {
  if (!email) {
    return err(new InvalidArgumentError('Email is required'));
  }

  const trimmed = email.trim();

  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  if (!emailRegex.test(trimmed)) {
    return err(new InvalidArgumentError(`Invalid email format: ${email}`, { email }));
  }

  return ok(trimmed);
}

/**
 * Validate that a password is present.
 *
 * @param minLength - Minimum required length (default: 1)
 */
export function validatePassword(
  password: string,
  minLength: number = 1
): Result<string, InvalidArgumentError> {
  if (!password) {
    return err(new InvalidArgumentError('Password is required'));
  }

  if (password.length < minLength) {
    return err(new InvalidArgumentError(`Password must be at least ${minLength} characters long`));
  }

  return ok(password);
}

/**
 * Validate a one-time code: 6-8 digits after trimming.
 *
 * @example
 * validateTotpCode(' 123456 '); // ok('123456')
 * validateTotpCode('12a456'); // err
 */
export function validateTotpCode(code: string): Result<string, InvalidArgumentError> {
  if (!code) {
    return err(new InvalidArgumentError('One-time code is required'));
  }

  const trimmed = code.trim();

  if (!/^\d{6,8}$/.test(trimmed)) {
    return err(new InvalidArgumentError('One-time code must be 6-8 digits'));
  }

  return ok(trimmed);
}
