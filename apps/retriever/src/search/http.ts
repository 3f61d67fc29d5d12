/**
 * JSON-over-HTTP helper for the search providers.
 *
 * Native fetch with an AbortController timeout. Maps transport and status
 * failures onto the retrieval error taxonomy so every provider reports them
 * the same way.
 */

import { ApiError, ConfigError, RateLimitError, TimeoutError, errorMessage, isAbortError } from '../errors.js'
import type { ProviderName } from './types.js'

export interface JsonRequest {
  url: string
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: unknown
  timeoutSeconds: number
}

const MAX_ERROR_BODY_CHARS = 300

/**
 * Throw the matching error for a non-2xx response.
 *
 * 401 → ConfigError, 403 → RateLimitError when the body mentions a quota
 * and ConfigError otherwise, 429 → RateLimitError, anything else → ApiError.
 */
export function raiseForStatus(provider: ProviderName, status: number, body: string): void {
  if (status >= 200 && status < 300) return

  const snippet = body.slice(0, MAX_ERROR_BODY_CHARS)
  const details = { provider, status }

  if (status === 401) {
    throw new ConfigError(`${provider}: credentials rejected (HTTP 401)`, details)
  }
  if (status === 403) {
    if (/quota|limit exceeded/i.test(body)) {
      throw new RateLimitError(`${provider}: quota exceeded (HTTP 403)`, details)
    }
    throw new ConfigError(`${provider}: access forbidden (HTTP 403): ${snippet}`, details)
  }
  if (status === 429) {
    throw new RateLimitError(`${provider}: upstream rate limit (HTTP 429)`, details)
  }
  throw new ApiError(`${provider}: HTTP ${status}: ${snippet}`, status, details)
}

/**
 * Perform one request and return the parsed JSON body.
 */
export async function requestJson(provider: ProviderName, request: JsonRequest): Promise<unknown> {
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutSeconds * 1000)

  let response: Response
  let text: string
  try {
    response = await fetch(request.url, {
      method: request.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: controller.signal,
    })
    text = await response.text()
  } catch (error) {
    if (isAbortError(error)) {
      throw new TimeoutError(`${provider}: request timed out after ${request.timeoutSeconds}s`, {
        provider,
        timeoutSeconds: request.timeoutSeconds,
      })
    }
    throw new ApiError(`${provider}: network failure: ${errorMessage(error)}`, undefined, { provider })
  } finally {
    clearTimeout(timeoutId)
  }

  raiseForStatus(provider, response.status, text)

  try {
    return JSON.parse(text)
  } catch {
    throw new ApiError(`${provider}: malformed JSON response`, response.status, { provider })
  }
}
