/**
 * PlatformError - the error value every SDK module returns.
 *
 * Carries an {@link ErrorCode}, a human-readable message, an optional cause
 * (reachable through the standard `cause` property and {@link PlatformError.unwrap})
 * and immutable key/value details.
 */

import { ErrorCategory, ErrorCode, categoryOf, httpStatusOf } from './codes.js';

/**
 * JSON representation of a platform error
 */
export interface PlatformErrorJSON {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: string;
}

export class PlatformError extends Error {
  readonly code: ErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PlatformError';
    this.code = code;
    this.details = Object.freeze({ ...options.details });
  }

  get category(): ErrorCategory {
    return categoryOf(this.code);
  }

  /**
   * HTTP status for this error's category; unknown categories map to 500.
   */
  get httpStatus(): number {
    return httpStatusOf(this.code);
  }

  /**
   * The wrapped cause, or undefined when this error is the root.
   */
  unwrap(): unknown {
    return this.cause;
  }

  /**
   * Returns a copy with `details` merged in. The receiver is not modified.
   */
  withDetails(details: Record<string, unknown>): PlatformError {
    return new PlatformError(this.code, this.message, {
      cause: this.cause,
      details: { ...this.details, ...details }
    });
  }

  withDetail(key: string, value: unknown): PlatformError {
    return this.withDetails({ [key]: value });
  }

  override toString(): string {
    if (this.cause !== undefined) {
      return `${this.code}: ${this.message}: ${describeCause(this.cause)}`;
    }
    return `${this.code}: ${this.message}`;
  }

  toJSON(): PlatformErrorJSON {
    const json: PlatformErrorJSON = { code: this.code, message: this.message };
    if (Object.keys(this.details).length > 0) {
      json.details = { ...this.details };
    }
    if (this.cause !== undefined) {
      json.cause = describeCause(this.cause);
    }
    return json;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof PlatformError) {
    return cause.toString();
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
