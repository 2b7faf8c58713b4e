/**
 * Error taxonomy and classification for the addons feed.
 *
 * Every error the pipeline raises is fatal to the run. The classes exist so the
 * CLI can report what went wrong and pick an exit code, not so callers can
 * recover from them.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Invocation options are invalid
  | 'external' // Search API transport or HTTP failure
  | 'timeout' // Search API request exceeded its timeout
  | 'data' // API payload is malformed or missing fields
  | 'internal' // Logic bugs and anything unclassified

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  FETCH_FAILED: 'FETCH_FAILED',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',
  MALFORMED_ENVELOPE: 'MALFORMED_ENVELOPE',
  MALFORMED_RECORD: 'MALFORMED_RECORD',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  MISSING_LOCALE_VALUE: 'MISSING_LOCALE_VALUE',
  MALFORMED_HASH: 'MALFORMED_HASH',
  PAGINATION_BOUND_VIOLATION: 'PAGINATION_BOUND_VIOLATION',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

interface AddonsFeedErrorOptions {
  cause?: unknown
  details?: Record<string, unknown>
}

export abstract class AddonsFeedError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly category: ErrorCategory
  readonly isOperational: boolean = true
  readonly details: Record<string, unknown>

  constructor(message: string, options: AddonsFeedErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.details = options.details ?? {}
  }
}

export class ConfigurationError extends AddonsFeedError {
  readonly code = ERROR_CODES.CONFIGURATION_ERROR
  readonly category = 'validation'

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details })
  }
}

/** Transport failure, timeout, cancellation, or unexpected HTTP status for one page. */
export class FetchError extends AddonsFeedError {
  readonly code: ErrorCode
  readonly category: ErrorCategory
  readonly page: number
  readonly statusCode?: number

  constructor(
    message: string,
    init: { page: number; statusCode?: number; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, {
      cause: init.cause,
      details: { page: init.page, ...(init.statusCode !== undefined && { statusCode: init.statusCode }) },
    })
    this.page = init.page
    this.statusCode = init.statusCode
    this.code = init.timedOut ? ERROR_CODES.FETCH_TIMEOUT : ERROR_CODES.FETCH_FAILED
    this.category = init.timedOut ? 'timeout' : 'external'
  }
}

/** A page body that is not JSON or does not have the search envelope shape. */
export class MalformedEnvelopeError extends AddonsFeedError {
  readonly code = ERROR_CODES.MALFORMED_ENVELOPE
  readonly category = 'data'
  readonly page: number

  constructor(message: string, init: { page: number; cause?: unknown }) {
    super(message, { cause: init.cause, details: { page: init.page, ...issueDetails(init.cause) } })
    this.page = init.page
  }
}

/** An eligible record with a field of the wrong type. */
export class MalformedRecordError extends AddonsFeedError {
  readonly code = ERROR_CODES.MALFORMED_RECORD
  readonly category = 'data'

  constructor(addon: string | undefined, cause: unknown) {
    super(
      addon ? `Addon ${addon} does not match the add-on record shape` : 'Record does not match the add-on record shape',
      { cause, details: { ...(addon !== undefined && { addon }), ...issueDetails(cause) } }
    )
  }
}

export class MissingRequiredFieldError extends AddonsFeedError {
  readonly code = ERROR_CODES.MISSING_REQUIRED_FIELD
  readonly category = 'data'
  readonly field: string

  constructor(field: string, addon?: string) {
    super(
      addon ? `Addon ${addon} is missing required field '${field}'` : `Missing required field '${field}'`,
      { details: { field, ...(addon !== undefined && { addon }) } }
    )
    this.field = field
  }
}

export class MissingLocaleValueError extends AddonsFeedError {
  readonly code = ERROR_CODES.MISSING_LOCALE_VALUE
  readonly category = 'data'
  readonly field: string
  readonly locale: string

  constructor(field: string, locale: string) {
    super(`Field '${field}' has no value for default locale '${locale}'`, {
      details: { field, locale },
    })
    this.field = field
    this.locale = locale
  }
}

export class MalformedHashError extends AddonsFeedError {
  readonly code = ERROR_CODES.MALFORMED_HASH
  readonly category = 'data'
  readonly digest: string

  constructor(digest: string, reason: string) {
    super(`Malformed file hash '${digest}': ${reason}`, { details: { digest, reason } })
    this.digest = digest
  }
}

/** Raised when pagination would leave the range reported by page 1. Always a bug. */
export class PaginationBoundError extends AddonsFeedError {
  readonly code = ERROR_CODES.PAGINATION_BOUND_VIOLATION
  readonly category = 'internal'
  override readonly isOperational = false

  constructor(page: number, pageCount: number) {
    super(`Page ${page} is outside the discovered range 1..${pageCount}`, {
      details: { page, pageCount },
    })
  }
}

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  exitCode: number
  isOperational: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof AddonsFeedError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      exitCode: error.category === 'validation' ? EXIT_CODES.USAGE : EXIT_CODES.FAILURE,
      isOperational: error.isOperational,
      details: Object.keys(error.details).length > 0 ? error.details : undefined,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      exitCode: EXIT_CODES.USAGE,
      isOperational: true,
      details: issueDetails(error),
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      exitCode: EXIT_CODES.FAILURE,
      isOperational: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    exitCode: EXIT_CODES.FAILURE,
    isOperational: false,
  }
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_operational: classified.isOperational,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && { error_name: classified.originalError.name }),
  }
}

function issueDetails(cause: unknown): Record<string, unknown> {
  if (!(cause instanceof ZodError)) {
    return {}
  }
  return {
    issues: cause.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    })),
  }
}
