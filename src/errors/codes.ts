/**
 * Platform Error Codes
 *
 * Every error code has the form `<CATEGORY>_<NNN>`. The category prefix decides
 * how the error is classified, which HTTP status it maps to and whether a caller
 * may retry it.
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Error code categories
 */
export enum ErrorCategory {
  VALIDATION = 'VAL',
  AUTHENTICATION = 'AUTH',
  AUTHORIZATION = 'AUTHZ',
  NOT_FOUND = 'NF',
  CONFLICT = 'CONF',
  INTERNAL = 'INT',
  UNAVAILABLE = 'UNAVAIL',
  TIMEOUT = 'TIMEOUT'
}

/**
 * All platform error codes
 */
export enum ErrorCode {
  /** Generic validation failure */
  Validation = 'VAL_001',
  /** Required field is missing or empty */
  ValidationRequired = 'VAL_002',
  /** Field has an invalid format */
  ValidationFormat = 'VAL_003',
  /** Field value is out of range */
  ValidationRange = 'VAL_004',

  Authentication = 'AUTH_001',
  AuthenticationExpired = 'AUTH_002',
  AuthenticationInvalid = 'AUTH_003',

  Authorization = 'AUTHZ_001',
  AuthorizationDenied = 'AUTHZ_002',
  AuthorizationInsufficientScope = 'AUTHZ_003',

  NotFound = 'NF_001',
  NotFoundUser = 'NF_002',
  NotFoundResource = 'NF_003',

  /** Request conflicts with current state (e.g. illegal state transition) */
  Conflict = 'CONF_001',
  ConflictAlreadyExists = 'CONF_002',
  ConflictVersionMismatch = 'CONF_003',

  Internal = 'INT_001',
  InternalDatabase = 'INT_002',
  /** Configuration could not be read or applied */
  InternalConfiguration = 'INT_003',

  Unavailable = 'UNAVAIL_001',
  UnavailableDependency = 'UNAVAIL_002',
  UnavailableOverloaded = 'UNAVAIL_003',

  Timeout = 'TIMEOUT_001',
  TimeoutDatabase = 'TIMEOUT_002',
  TimeoutDependency = 'TIMEOUT_003'
}

// ============================================================================
// Error Metadata
// ============================================================================

/**
 * Error metadata for each error code
 */
export interface ErrorMetadata {
  /** Category */
  category: ErrorCategory;
  /** Human-readable description */
  description: string;
  /** HTTP status the error maps to */
  httpStatus: number;
  /** Whether retrying the same request may succeed */
  retryable: boolean;
}

const CATEGORY_HTTP_STATUS: Record<ErrorCategory, number> = {
  [ErrorCategory.VALIDATION]: 400,
  [ErrorCategory.AUTHENTICATION]: 401,
  [ErrorCategory.AUTHORIZATION]: 403,
  [ErrorCategory.NOT_FOUND]: 404,
  [ErrorCategory.CONFLICT]: 409,
  [ErrorCategory.INTERNAL]: 500,
  [ErrorCategory.UNAVAILABLE]: 503,
  [ErrorCategory.TIMEOUT]: 504
};

const RETRYABLE_CATEGORIES: ReadonlySet<ErrorCategory> = new Set([
  ErrorCategory.UNAVAILABLE,
  ErrorCategory.TIMEOUT
]);

const CLIENT_CATEGORIES: ReadonlySet<ErrorCategory> = new Set([
  ErrorCategory.VALIDATION,
  ErrorCategory.AUTHENTICATION,
  ErrorCategory.AUTHORIZATION,
  ErrorCategory.NOT_FOUND,
  ErrorCategory.CONFLICT
]);

const CATEGORY_VALUES: ReadonlySet<string> = new Set(Object.values(ErrorCategory));

function isErrorCategory(value: string): value is ErrorCategory {
  return CATEGORY_VALUES.has(value);
}

/**
 * Get the category of an error code (the prefix before the first underscore).
 * Unknown prefixes fall back to INTERNAL.
 */
export function categoryOf(code: ErrorCode): ErrorCategory {
  const separator = code.indexOf('_');
  const prefix = separator === -1 ? code : code.slice(0, separator);
  return isErrorCategory(prefix) ? prefix : ErrorCategory.INTERNAL;
}

function entry(code: ErrorCode, description: string): ErrorMetadata {
  const category = categoryOf(code);
  return {
    category,
    description,
    httpStatus: CATEGORY_HTTP_STATUS[category],
    retryable: RETRYABLE_CATEGORIES.has(category)
  };
}

/**
 * Error code catalog
 */
export const ERROR_CATALOG: Readonly<Record<ErrorCode, ErrorMetadata>> = {
  [ErrorCode.Validation]: entry(ErrorCode.Validation, 'Input validation failed'),
  [ErrorCode.ValidationRequired]: entry(ErrorCode.ValidationRequired, 'Required field is missing'),
  [ErrorCode.ValidationFormat]: entry(ErrorCode.ValidationFormat, 'Field has an invalid format'),
  [ErrorCode.ValidationRange]: entry(ErrorCode.ValidationRange, 'Field value is out of range'),

  [ErrorCode.Authentication]: entry(ErrorCode.Authentication, 'Authentication required'),
  [ErrorCode.AuthenticationExpired]: entry(ErrorCode.AuthenticationExpired, 'Credentials have expired'),
  [ErrorCode.AuthenticationInvalid]: entry(ErrorCode.AuthenticationInvalid, 'Credentials are invalid'),

  [ErrorCode.Authorization]: entry(ErrorCode.Authorization, 'Access is not permitted'),
  [ErrorCode.AuthorizationDenied]: entry(ErrorCode.AuthorizationDenied, 'Access was explicitly denied'),
  [ErrorCode.AuthorizationInsufficientScope]: entry(
    ErrorCode.AuthorizationInsufficientScope,
    'Credentials lack the required scope'
  ),

  [ErrorCode.NotFound]: entry(ErrorCode.NotFound, 'Resource not found'),
  [ErrorCode.NotFoundUser]: entry(ErrorCode.NotFoundUser, 'User not found'),
  [ErrorCode.NotFoundResource]: entry(ErrorCode.NotFoundResource, 'Requested resource not found'),

  [ErrorCode.Conflict]: entry(ErrorCode.Conflict, 'Request conflicts with current state'),
  [ErrorCode.ConflictAlreadyExists]: entry(ErrorCode.ConflictAlreadyExists, 'Resource already exists'),
  [ErrorCode.ConflictVersionMismatch]: entry(ErrorCode.ConflictVersionMismatch, 'Resource version mismatch'),

  [ErrorCode.Internal]: entry(ErrorCode.Internal, 'Internal error'),
  [ErrorCode.InternalDatabase]: entry(ErrorCode.InternalDatabase, 'Database operation failed'),
  [ErrorCode.InternalConfiguration]: entry(ErrorCode.InternalConfiguration, 'Configuration error'),

  [ErrorCode.Unavailable]: entry(ErrorCode.Unavailable, 'Service unavailable'),
  [ErrorCode.UnavailableDependency]: entry(ErrorCode.UnavailableDependency, 'A dependency is unavailable'),
  [ErrorCode.UnavailableOverloaded]: entry(ErrorCode.UnavailableOverloaded, 'Service is overloaded'),

  [ErrorCode.Timeout]: entry(ErrorCode.Timeout, 'Operation timed out or was canceled'),
  [ErrorCode.TimeoutDatabase]: entry(ErrorCode.TimeoutDatabase, 'Database operation timed out'),
  [ErrorCode.TimeoutDependency]: entry(ErrorCode.TimeoutDependency, 'Dependency call timed out')
};

/**
 * Get HTTP status for an error code
 */
export function httpStatusOf(code: ErrorCode): number {
  return ERROR_CATALOG[code].httpStatus;
}

/**
 * Check if a category is retryable
 */
export function isRetryableCategory(category: ErrorCategory): boolean {
  return RETRYABLE_CATEGORIES.has(category);
}

/**
 * Check if a category maps to a 4xx status
 */
export function isClientCategory(category: ErrorCategory): boolean {
  return CLIENT_CATEGORIES.has(category);
}
