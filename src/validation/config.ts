/**
 * Configuration validation utilities.
 *
 * Used when loading the config file and by `config set`, so a bad value is
 * reported with the field name before any request is made.
 *
 * @example
 * const urlResult = validateBaseUrl(options.server);
 * if (!urlResult.ok) {
 *   throw urlResult.error; // InvalidConfigError
 * }
 *
 * @see validateBaseUrl for the server address
 * @see validateApiVersion for the protocol selector
 * @see validatePositiveInt for page sizes and timeouts
 * @see validateBoolean for flags
 */
import { InvalidConfigError } from '../errors/index.js';
import type { Result } from '../utils/result.js';
import { err, ok } from '../utils/result.js';

export type ApiVersionSetting = 'auto' | 'v3' | 'v4';

/**
 * Validate a server base URL and strip trailing slashes.
 *
 * @example
 * validateBaseUrl('https://drive.example.com/'); // ok('https://drive.example.com')
 * validateBaseUrl('ftp://drive.example.com'); // err: must use http or https
 */
export function validateBaseUrl(value: unknown): Result<string, InvalidConfigError> {
  if (typeof value !== 'string' || !value.trim()) {
    return err(new InvalidConfigError('server.baseUrl', 'Must not be empty'));
  }

  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    return err(new InvalidConfigError('server.baseUrl', `Not a valid URL: ${value}`));
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return err(new InvalidConfigError('server.baseUrl', 'Must use http or https'));
  }

  return ok(value.trim().replace(/\/+$/, ''));
}

/**
 * Validate the protocol selector. Case-insensitive.
 *
 * @example
 * validateApiVersion('V4'); // ok('v4')
 * validateApiVersion('v5'); // err
 */
export function validateApiVersion(value: unknown): Result<ApiVersionSetting, InvalidConfigError> {
  if (typeof value !== 'string') {
    return err(new InvalidConfigError('server.apiVersion', 'Must be a string'));
  }

  const lower = value.trim().toLowerCase();
  if (lower === 'auto' || lower === 'v3' || lower === 'v4') {
    return ok(lower);
  }

  return err(new InvalidConfigError('server.apiVersion', 'Must be "auto", "v3" or "v4"'));
}

/**
 * Validate a positive integer. Accepts numbers and numeric strings.
 *
 * @param field - Field name used in the error message
 *
 * @example
 * validatePositiveInt('50', 'pageSize'); // ok(50)
 * validatePositiveInt(0, 'pageSize'); // err
 */
export function validatePositiveInt(
  value: unknown,
  field: string
): Result<number, InvalidConfigError> {
  if (typeof value !== 'number' && typeof value !== 'string') {
    return err(new InvalidConfigError(field, 'Must be a number or string'));
  }

  const num = typeof value === 'string' ? Number(value.trim()) : value;

  if (!Number.isInteger(num) || num < 1) {
    return err(new InvalidConfigError(field, 'Must be a positive integer'));
  }

  return ok(num);
}

/**
 * Validate and parse a boolean value.
 *
 * Accepts booleans and "true"/"false", "yes"/"no", "1"/"0" (case-insensitive).
 */
export function validateBoolean(
  value: unknown,
  field: string = 'boolean'
): Result<boolean, InvalidConfigError> {
  if (typeof value === 'boolean') {
    return ok(value);
  }

  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (lower === 'true' || lower === 'yes' || lower === '1') return ok(true);
    if (lower === 'false' || lower === 'no' || lower === '0') return ok(false);
    return err(new InvalidConfigError(field, 'Must be "true" or "false"'));
  }

  return err(new InvalidConfigError(field, 'Must be a boolean or string'));
}
