/**
 * Central export for all error types
 */
export { AppError } from './AppError.js';

export {
  ValidationError,
  InvalidArgumentError,
  InvalidPathError,
  InvalidUriError,
  InvalidConfigError,
} from './ValidationError.js';

export {
  AuthenticationError,
  NotAuthenticatedError,
  TwoFactorRequiredError,
  VersionDetectionError,
} from './AuthenticationError.js';

export { NotFoundError, UnsupportedOperationError } from './OperationError.js';

export {
  ApiError,
  NetworkError,
  TimeoutError,
  DecodeError,
  EmptyResponseError,
} from './ApiError.js';
