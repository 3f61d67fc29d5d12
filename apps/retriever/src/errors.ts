/**
 * Error taxonomy and classification
 *
 * Every failure the retrieval pipeline raises on purpose is a RetrievalError
 * subclass with a stable code. classifyError() maps anything else that gets
 * thrown (zod failures, network errors, plain values) onto the same shape
 * so workers can log one structured record per failure.
 */

import { ZodError } from 'zod'

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  INVALID_STATE: 'INVALID_STATE',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export type ErrorCategory =
  | 'config'
  | 'rate_limit'
  | 'external'
  | 'timeout'
  | 'state'
  | 'validation'
  | 'internal'

export abstract class RetrievalError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly category: ErrorCategory
  abstract readonly isRetryable: boolean
  readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.details = details
  }
}

/** Missing or rejected credentials, or an unusable provider setup. */
export class ConfigError extends RetrievalError {
  readonly code = ERROR_CODES.CONFIGURATION_ERROR
  readonly category = 'config'
  readonly isRetryable = false
}

/** Upstream quota/429, or the local token bucket refused the request. */
export class RateLimitError extends RetrievalError {
  readonly code = ERROR_CODES.RATE_LIMIT_EXCEEDED
  readonly category = 'rate_limit'
  readonly isRetryable = true
}

export class ApiError extends RetrievalError {
  readonly code = ERROR_CODES.EXTERNAL_SERVICE_ERROR
  readonly category = 'external'
  readonly isRetryable = false
  readonly statusCode?: number

  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, details)
    this.statusCode = statusCode
  }
}

export class TimeoutError extends RetrievalError {
  readonly code = ERROR_CODES.EXTERNAL_TIMEOUT
  readonly category = 'timeout'
  readonly isRetryable = true
}

/** A lifecycle transition that the job's current status does not allow. */
export class InvalidStateError extends RetrievalError {
  readonly code = ERROR_CODES.INVALID_STATE
  readonly category = 'state'
  readonly isRetryable = false
}

/** Caller input rejected before any work starts. */
export class ValidationError extends RetrievalError {
  readonly code = ERROR_CODES.VALIDATION_FAILED
  readonly category = 'validation'
  readonly isRetryable = false
}

export interface ClassifiedError {
  category: ErrorCategory
  code: ErrorCode
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
}

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Classify any thrown value for logging and retry decisions.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof RetrievalError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: error.isRetryable,
      details: error.details,
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
    }
  }

  if (error instanceof Error) {
    const code = errorCodeOf(error)
    if (code && NETWORK_ERROR_CODES.includes(code)) {
      const isTimeout = code === 'ETIMEDOUT'
      return {
        category: isTimeout ? 'timeout' : 'external',
        code: isTimeout ? ERROR_CODES.EXTERNAL_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${code}`,
        isRetryable: true,
        details: { errorCode: code },
      }
    }

    if (isAbortError(error)) {
      return {
        category: 'timeout',
        code: ERROR_CODES.EXTERNAL_TIMEOUT,
        message: error.message,
        isRetryable: true,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * True for the errors fetch raises when its AbortSignal fires.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}
