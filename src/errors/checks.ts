/**
 * Error classification checks
 *
 * All checks accept any thrown value and search its cause chain, so a platform
 * error wrapped by another error still classifies by its own code.
 */

import { ErrorCategory, ErrorCode, isClientCategory, isRetryableCategory } from './codes.js';
import { PlatformError } from './platform-error.js';

/**
 * Visit `err` and every error reachable through `cause` (and AggregateError
 * members), depth-first. Stops when `visit` returns true.
 */
function walkChain(err: unknown, visit: (value: unknown) => boolean): boolean {
  const seen = new Set<unknown>();
  const stack: unknown[] = [err];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || current === null || seen.has(current)) {
      continue;
    }
    seen.add(current);

    if (visit(current)) {
      return true;
    }

    if (current instanceof AggregateError) {
      // reversed so members are visited in order
      for (let i = current.errors.length - 1; i >= 0; i--) {
        stack.push(current.errors[i]);
      }
    }
    if (current instanceof Error && current.cause !== undefined) {
      stack.push(current.cause);
    }
  }

  return false;
}

/**
 * Find the first PlatformError in the chain of `err`.
 */
export function asPlatformError(err: unknown): PlatformError | undefined {
  let found: PlatformError | undefined;
  walkChain(err, (value) => {
    if (value instanceof PlatformError) {
      found = value;
      return true;
    }
    return false;
  });
  return found;
}

/**
 * True if `target` is `err` itself or appears anywhere in its cause chain.
 */
export function errorChainIncludes(err: unknown, target: unknown): boolean {
  if (target === undefined || target === null) {
    return false;
  }
  return walkChain(err, (value) => value === target);
}

/**
 * Error code of the first PlatformError in the chain, or undefined.
 */
export function getCode(err: unknown): ErrorCode | undefined {
  return asPlatformError(err)?.code;
}

export function hasCode(err: unknown, code: ErrorCode): boolean {
  return getCode(err) === code;
}

function hasCategory(err: unknown, category: ErrorCategory): boolean {
  return asPlatformError(err)?.category === category;
}

/** 400 Bad Request */
export function isValidation(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.VALIDATION);
}

/** 401 Unauthorized */
export function isAuthentication(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.AUTHENTICATION);
}

/** 403 Forbidden */
export function isAuthorization(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.AUTHORIZATION);
}

/** 404 Not Found */
export function isNotFound(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.NOT_FOUND);
}

/** 409 Conflict */
export function isConflict(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.CONFLICT);
}

/** 500 Internal Server Error */
export function isInternal(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.INTERNAL);
}

/** 503 Service Unavailable */
export function isUnavailable(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.UNAVAILABLE);
}

/** 504 Gateway Timeout */
export function isTimeout(err: unknown): boolean {
  return hasCategory(err, ErrorCategory.TIMEOUT);
}

/**
 * Timeout and unavailable errors may succeed when retried.
 */
export function isRetryable(err: unknown): boolean {
  const platformError = asPlatformError(err);
  return platformError !== undefined && isRetryableCategory(platformError.category);
}

export function isClientError(err: unknown): boolean {
  const platformError = asPlatformError(err);
  return platformError !== undefined && isClientCategory(platformError.category);
}

export function isServerError(err: unknown): boolean {
  const platformError = asPlatformError(err);
  return platformError !== undefined && !isClientCategory(platformError.category);
}
