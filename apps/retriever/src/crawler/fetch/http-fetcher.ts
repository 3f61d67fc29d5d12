/**
 * HTTP Fetcher Implementation
 *
 * Native fetch with timeout, size limit, robots.txt pre-check and retries
 * with exponential backoff for timeouts, network errors and retryable
 * status codes.
 */

import { createHash } from 'node:crypto'
import type { Fetcher, FetchOptions, FetchResult, RetryPolicy, RobotsPolicy } from '../types.js'
import {
  DEFAULT_FETCH_HEADERS,
  DEFAULT_FETCH_OPTIONS,
  DEFAULT_RETRY_POLICY,
  DEFAULT_USER_AGENT,
} from '../types.js'
import { errorMessage, isAbortError } from '../../errors.js'

export interface HttpFetcherOptions {
  /** Backoff policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Robots.txt policy checker (optional) */
  robotsPolicy?: RobotsPolicy

  userAgent?: string

  /** Retry backoff sleep (injectable for tests) */
  sleep?: (ms: number) => Promise<void>
}

type AttemptResult = Omit<FetchResult, 'attempts' | 'durationMs'>

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml']

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly robotsPolicy?: RobotsPolicy
  private readonly userAgent: string
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.robotsPolicy = options.robotsPolicy
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const opts = { ...DEFAULT_FETCH_OPTIONS, ...options }

    if (this.robotsPolicy && opts.respectRobots) {
      const allowed = await this.robotsPolicy.isAllowed(url)
      if (!allowed) {
        return {
          status: 'robots_blocked',
          finalUrl: url,
          durationMs: Date.now() - startTime,
          attempts: 0,
          error: 'Blocked by robots.txt',
        }
      }
    }

    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      'User-Agent': this.userAgent,
      ...(opts.headers ?? {}),
    }

    const maxAttempts = Math.max(0, opts.maxRetries) + 1
    let result: AttemptResult = { status: 'error', finalUrl: url, error: 'No attempt made' }
    let attempt = 0

    while (attempt < maxAttempts) {
      if (attempt > 0) {
        if (opts.isCancelled && (await opts.isCancelled())) {
          return {
            status: 'cancelled',
            finalUrl: url,
            durationMs: Date.now() - startTime,
            attempts: attempt,
            error: 'Cancelled before retry',
          }
        }
        await this.sleep(this.backoffDelay(attempt))
      }

      attempt += 1
      try {
        result = await this.fetchOnce(url, headers, opts.timeoutMs, opts.maxSizeBytes)
      } catch (error) {
        result = { status: 'error', finalUrl: url, error: errorMessage(error) }
        continue
      }

      if (!this.isRetryable(result)) break
    }

    return { ...result, durationMs: Date.now() - startTime, attempts: attempt }
  }

  private isRetryable(result: AttemptResult): boolean {
    if (result.status === 'timeout') return true
    return (
      result.status === 'error' &&
      result.statusCode !== undefined &&
      this.retryPolicy.retryableStatusCodes.includes(result.statusCode)
    )
  }

  private backoffDelay(retry: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, retry - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single fetch attempt (no retries). Throws on network errors.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    maxSizeBytes: number
  ): Promise<AttemptResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })
      const finalUrl = response.url || url

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            finalUrl,
            statusCode: response.status,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          finalUrl,
          statusCode: response.status,
          error: `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
        }
      }

      const contentType = response.headers.get('content-type')
      if (contentType && !HTML_CONTENT_TYPES.some((type) => contentType.toLowerCase().includes(type))) {
        return {
          status: 'not_html',
          finalUrl,
          statusCode: response.status,
          error: `Unsupported content type: ${contentType}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          finalUrl,
          statusCode: response.status,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          finalUrl,
          statusCode: response.status,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        finalUrl,
        statusCode: response.status,
        html,
        contentHash: createHash('sha256').update(html).digest('hex').slice(0, 32),
      }
    } catch (error) {
      if (isAbortError(error)) {
        return {
          status: 'timeout',
          finalUrl: url,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  /**
   * Heuristic check for blocked/captcha pages.
   */
  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    const blockIndicators = [
      'captcha',
      'recaptcha',
      'hcaptcha',
      'challenge-form',
      'cf-browser-verification',
      'please verify you are a human',
      'access denied',
      'bot detection',
    ]

    return blockIndicators.some((indicator) => lowerHtml.includes(indicator))
  }
}
