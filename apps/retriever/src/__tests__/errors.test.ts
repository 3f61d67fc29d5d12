import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  ApiError,
  ConfigError,
  ERROR_CODES,
  RateLimitError,
  classifyError,
  errorMessage,
  isAbortError,
} from '../errors.js'

describe('classifyError', () => {
  it('passes through retrieval errors', () => {
    expect(classifyError(new RateLimitError('serper: rate limit exceeded'))).toEqual({
      category: 'rate_limit',
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
      message: 'serper: rate limit exceeded',
      isRetryable: true,
      details: undefined,
    })
    expect(classifyError(new ConfigError('missing key', { provider: 'serpapi' }))).toMatchObject({
      category: 'config',
      isRetryable: false,
      details: { provider: 'serpapi' },
    })
  })

  it('keeps the status code on api errors', () => {
    const error = new ApiError('serpapi: HTTP 502', 502)
    expect(error.statusCode).toBe(502)
    expect(error.name).toBe('ApiError')
  })

  it('maps zod failures to validation errors', () => {
    const result = z.object({ maxDepth: z.number() }).safeParse({ maxDepth: 'deep' })
    expect(result.success).toBe(false)
    if (result.success) return

    expect(classifyError(result.error)).toMatchObject({
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      details: { issues: [expect.objectContaining({ path: 'maxDepth', code: 'invalid_type' })] },
    })
  })

  it('recognizes network and abort errors', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' })
    expect(classifyError(refused)).toMatchObject({
      category: 'external',
      code: ERROR_CODES.NETWORK_ERROR,
      message: 'Network error: ECONNREFUSED',
      isRetryable: true,
    })

    const timedOut = Object.assign(new Error('connect ETIMEDOUT'), { code: 'ETIMEDOUT' })
    expect(classifyError(timedOut)).toMatchObject({ category: 'timeout', code: ERROR_CODES.EXTERNAL_TIMEOUT })

    const aborted = Object.assign(new Error('aborted'), { name: 'AbortError' })
    expect(isAbortError(aborted)).toBe(true)
    expect(classifyError(aborted)).toMatchObject({ category: 'timeout', isRetryable: true })
  })

  it('treats anything else as unexpected', () => {
    expect(classifyError(new Error('boom'))).toMatchObject({ category: 'internal', message: 'boom' })
    expect(classifyError('plain string')).toEqual({
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: 'plain string',
      isRetryable: false,
    })
  })
})

describe('errorMessage', () => {
  it('reads messages from errors and stringifies the rest', () => {
    expect(errorMessage(new Error('x'))).toBe('x')
    expect(errorMessage(42)).toBe('42')
  })
})
