/**
 * Platform Errors Module
 *
 * Categorized, HTTP-mappable errors with a cause chain.
 *
 * @example
 * ```typescript
 * import { conflict, isConflict } from './errors/index.js';
 *
 * try {
 *   throw conflict('resource was modified concurrently');
 * } catch (error) {
 *   if (isConflict(error)) {
 *     // return 409
 *   }
 * }
 * ```
 */

export {
  ErrorCategory,
  ErrorCode,
  ERROR_CATALOG,
  categoryOf,
  httpStatusOf,
  isRetryableCategory,
  isClientCategory,
  type ErrorMetadata
} from './codes.js';

export { PlatformError, type PlatformErrorJSON } from './platform-error.js';

export {
  newError,
  wrap,
  validation,
  notFound,
  unauthorized,
  forbidden,
  conflict,
  internal,
  unavailable,
  timeout,
  fromError
} from './constructors.js';

export {
  asPlatformError,
  errorChainIncludes,
  getCode,
  hasCode,
  isValidation,
  isAuthentication,
  isAuthorization,
  isNotFound,
  isConflict,
  isInternal,
  isUnavailable,
  isTimeout,
  isRetryable,
  isClientError,
  isServerError
} from './checks.js';
