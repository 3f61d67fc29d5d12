/**
 * Shared pagination loop for search providers.
 *
 * Subclasses describe how one page is requested and parsed; the base class
 * owns clamping, rank assignment, the stop conditions and the token bucket
 * (one token per upstream request).
 */

import type { z } from 'zod'
import type { ILogger } from '@observatory/logger'
import { loggers } from '../../config/logger.js'
import { RateLimitError, ValidationError } from '../../errors.js'
import { recordResultsClamped } from '../../metrics.js'
import { requestJson, type JsonRequest } from '../http.js'
import { TokenBucket, type RateLimiterState } from '../rate-limiter.js'
import type { ProviderName, SearchHit, SearchOptions, SearchProvider } from '../types.js'
import type { RateLimitSettings } from '../../config/settings.js'

export interface RawHit {
  url: string
  title: string
  description: string
}

export interface PageRequest {
  query: string
  /** Upstream entries already consumed (offset-based paging) */
  offset: number
  /** Zero-based page number (page-based paging) */
  pageIndex: number
  /** Entries to ask for in this request */
  count: number
  options: SearchOptions
}

export interface ProviderPage {
  items: RawHit[]
  /** Entries the upstream returned, including ones skipped as malformed */
  rawCount: number
  /** Total the upstream claims to have, when it says */
  totalAvailable?: number
}

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface BaseProviderOptions {
  timeoutSeconds?: number
  rateLimit?: RateLimitSettings
  /** Supply a bucket directly (tests, shared clocks) */
  limiter?: TokenBucket
  logger?: ILogger
}

export const DEFAULT_TIMEOUT_SECONDS = 30

/**
 * Host (with port, if any) of a result URL. Never throws.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host.toLowerCase()
  } catch {
    return ''
  }
}

export function createSearchHit(item: RawHit, rank: number): SearchHit {
  return Object.freeze({
    url: item.url,
    title: item.title,
    description: item.description,
    rank,
    domain: extractDomain(item.url),
  })
}

export abstract class BaseSearchProvider implements SearchProvider {
  abstract readonly name: ProviderName

  protected readonly timeoutSeconds: number
  protected readonly log: ILogger
  private readonly limiter: TokenBucket

  protected constructor(options: BaseProviderOptions, defaultRateLimit: RateLimitSettings) {
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS
    this.log = options.logger ?? loggers.search
    this.limiter = options.limiter ?? new TokenBucket(options.rateLimit ?? defaultRateLimit)
  }

  /** Most results this provider will return for one query */
  abstract resultCap(options: SearchOptions): number

  /** Entries to request next, given what is still wanted and still allowed */
  protected abstract requestSize(remaining: number, capRemaining: number): number

  protected abstract fetchPage(request: PageRequest): Promise<ProviderPage>

  async search(query: string, maxResults: number, options: SearchOptions = {}): Promise<SearchHit[]> {
    const trimmed = query.trim()
    if (!trimmed) {
      throw new ValidationError('Search query must not be empty', { provider: this.name })
    }
    if (!Number.isFinite(maxResults) || maxResults < 1) {
      return []
    }

    const log = this.log.child({ provider: this.name })
    const cap = this.resultCap(options)
    const target = Math.min(Math.floor(maxResults), cap)
    if (maxResults > cap) {
      recordResultsClamped({ provider: this.name, requested: maxResults, cap })
    }

    const hits: SearchHit[] = []
    let consumed = 0
    let pageIndex = 0

    while (hits.length < target && consumed < cap) {
      const count = this.requestSize(target - hits.length, cap - consumed)
      const page = await this.fetchPage({ query: trimmed, offset: consumed, pageIndex, count, options })

      for (const item of page.items) {
        if (hits.length >= target) break
        hits.push(createSearchHit(item, hits.length + 1))
      }

      consumed += page.rawCount
      pageIndex += 1

      if (page.rawCount === 0) break
      if (page.totalAvailable !== undefined && consumed >= page.totalAvailable) break
    }

    log.debug('Search finished', { query: trimmed, requested: maxResults, returned: hits.length, pages: pageIndex })
    return hits
  }

  getRateLimiterState(): RateLimiterState {
    return this.limiter.getState()
  }

  /**
   * Consume one token, then perform the request.
   */
  protected async send(request: JsonRequest): Promise<unknown> {
    if (!this.limiter.tryConsume()) {
      throw new RateLimitError(`${this.name}: local rate limit reached`, {
        provider: this.name,
        ...this.limiter.getState(),
      })
    }
    return requestJson(this.name, request)
  }

  /**
   * Validate each raw entry, skipping the malformed ones.
   */
  protected collectItems<T>(
    entries: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    toHit: (entry: T) => RawHit
  ): RawHit[] {
    const items: RawHit[] = []
    let skipped = 0
    for (const entry of entries) {
      const parsed = schema.safeParse(entry)
      if (parsed.success) {
        items.push(toHit(parsed.data))
      } else {
        skipped += 1
      }
    }
    if (skipped > 0) {
      this.log.debug('Skipped malformed results', { provider: this.name, skipped })
    }
    return items
  }
}
