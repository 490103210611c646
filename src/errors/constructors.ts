/**
 * Error constructors
 *
 * Shorthands for the codes that SDK code raises most often. Use {@link newError}
 * or {@link wrap} with an explicit {@link ErrorCode} for anything more specific.
 */

import { ErrorCode } from './codes.js';
import { PlatformError } from './platform-error.js';
import { asPlatformError } from './checks.js';

export function newError(code: ErrorCode, message: string): PlatformError {
  return new PlatformError(code, message);
}

/**
 * Wrap an underlying error (or thrown value) with a platform code and message.
 * The original value is kept as `cause`.
 */
export function wrap(cause: unknown, code: ErrorCode, message: string): PlatformError {
  return new PlatformError(code, message, { cause });
}

export function validation(message: string): PlatformError {
  return newError(ErrorCode.Validation, message);
}

export function notFound(message: string): PlatformError {
  return newError(ErrorCode.NotFound, message);
}

export function unauthorized(message: string): PlatformError {
  return newError(ErrorCode.Authentication, message);
}

export function forbidden(message: string): PlatformError {
  return newError(ErrorCode.Authorization, message);
}

export function conflict(message: string): PlatformError {
  return newError(ErrorCode.Conflict, message);
}

export function internal(message: string): PlatformError {
  return newError(ErrorCode.Internal, message);
}

export function unavailable(message: string): PlatformError {
  return newError(ErrorCode.Unavailable, message);
}

export function timeout(message: string): PlatformError {
  return newError(ErrorCode.Timeout, message);
}

/**
 * Convert any thrown value into a PlatformError.
 *
 * Returns the first PlatformError found in the cause chain unchanged; anything
 * else is wrapped as an internal error.
 */
export function fromError(err: unknown): PlatformError {
  const existing = asPlatformError(err);
  if (existing) {
    return existing;
  }
  return wrap(err, ErrorCode.Internal, 'an unexpected error occurred');
}
