/**
 * Serper (google.serper.dev) client.
 *
 * Page-number paging with a fixed page size of 10; the last page is
 * truncated to the requested count. Timeouts are retried with exponential
 * backoff (2s, 4s, 8s, ...) up to maxRetries before giving up with an
 * ApiError. Other failures are not retried.
 */

import { z } from 'zod'
import { ApiError, ConfigError, TimeoutError, errorMessage } from '../../errors.js'
import { recordProviderRetry } from '../../metrics.js'
import type { RateLimitSettings } from '../../config/settings.js'
import type { ProviderName } from '../types.js'
import {
  BaseSearchProvider,
  defaultSleep,
  type BaseProviderOptions,
  type PageRequest,
  type ProviderPage,
  type Sleep,
} from './base.js'
import type { JsonRequest } from '../http.js'

export const SERPER_ENDPOINT = 'https://google.serper.dev/search'

const PAGE_SIZE = 10
const MAX_RESULTS = 100
const INITIAL_BACKOFF_MS = 2000

export const SERPER_RATE_LIMIT: RateLimitSettings = { capacity: 60, periodSeconds: 60 }
export const DEFAULT_SERPER_MAX_RETRIES = 3

const organicSchema = z.object({
  link: z.string().min(1),
  title: z.string().min(1),
  snippet: z.string().optional(),
})

const responseSchema = z.object({
  organic: z.array(z.unknown()).optional(),
  relatedSearches: z.array(z.object({ query: z.string() })).optional(),
  peopleAlsoAsk: z.array(z.object({ question: z.string() })).optional(),
  knowledgeGraph: z
    .object({
      title: z.string().optional(),
      type: z.string().optional(),
      description: z.string().optional(),
    })
    .optional(),
})

export interface SerperSearchMetadata {
  relatedSearches: string[]
  peopleAlsoAsk: string[]
  knowledgeGraph?: { title?: string; type?: string; description?: string }
}

export interface SerperSearchOptions extends BaseProviderOptions {
  apiKey?: string
  maxRetries?: number
  /** Backoff sleep (injectable for tests) */
  sleep?: Sleep
}

export class SerperSearchProvider extends BaseSearchProvider {
  readonly name: ProviderName = 'serper'

  private readonly apiKey: string
  private readonly maxRetries: number
  private readonly sleep: Sleep

  constructor(options: SerperSearchOptions) {
    super(options, SERPER_RATE_LIMIT)
    if (!options.apiKey) {
      throw new ConfigError('serper requires an API key')
    }
    this.apiKey = options.apiKey
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_SERPER_MAX_RETRIES)
    this.sleep = options.sleep ?? defaultSleep
  }

  resultCap(): number {
    return MAX_RESULTS
  }

  protected requestSize(): number {
    return PAGE_SIZE
  }

  protected async fetchPage(request: PageRequest): Promise<ProviderPage> {
    const { options } = request
    const data = await this.sendWithRetry({
      url: SERPER_ENDPOINT,
      method: 'POST',
      headers: { 'X-API-KEY': this.apiKey },
      body: {
        q: request.query,
        num: PAGE_SIZE,
        page: request.pageIndex + 1,
        ...(options.country ? { gl: options.country } : {}),
        ...(options.locale ? { hl: options.locale } : {}),
        ...(options.location ? { location: options.location } : {}),
      },
      timeoutSeconds: this.timeoutSeconds,
    })

    const parsed = responseSchema.safeParse(data)
    if (!parsed.success) {
      throw new ApiError('serper: unexpected response shape', undefined, { provider: this.name })
    }

    const entries = parsed.data.organic ?? []
    return {
      items: this.collectItems(entries, organicSchema, (item) => ({
        url: item.link,
        title: item.title,
        description: item.snippet ?? '',
      })),
      rawCount: entries.length,
    }
  }

  /**
   * Related searches, "people also ask" questions and the knowledge graph
   * card for a query. Empty on failure.
   */
  async getSearchMetadata(query: string): Promise<SerperSearchMetadata> {
    try {
      const data = await this.sendWithRetry({
        url: SERPER_ENDPOINT,
        method: 'POST',
        headers: { 'X-API-KEY': this.apiKey },
        body: { q: query },
        timeoutSeconds: this.timeoutSeconds,
      })
      const parsed = responseSchema.safeParse(data)
      if (!parsed.success) {
        return { relatedSearches: [], peopleAlsoAsk: [] }
      }
      return {
        relatedSearches: (parsed.data.relatedSearches ?? []).map((r) => r.query),
        peopleAlsoAsk: (parsed.data.peopleAlsoAsk ?? []).map((p) => p.question),
        knowledgeGraph: parsed.data.knowledgeGraph,
      }
    } catch (error) {
      this.log.warn('Failed to fetch search metadata', { provider: this.name, error: errorMessage(error) })
      return { relatedSearches: [], peopleAlsoAsk: [] }
    }
  }

  private async sendWithRetry(request: JsonRequest): Promise<unknown> {
    const attempts = this.maxRetries + 1

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.send(request)
      } catch (error) {
        if (!(error instanceof TimeoutError)) throw error

        if (attempt >= attempts) {
          throw new ApiError(
            `serper: request timed out after ${attempts} attempts (timeout ${this.timeoutSeconds}s)`,
            undefined,
            { provider: this.name, attempts, timeoutSeconds: this.timeoutSeconds }
          )
        }

        const delayMs = INITIAL_BACKOFF_MS * Math.pow(2, attempt - 1)
        recordProviderRetry({ provider: this.name, attempt, delayMs, reason: 'timeout' })
        await this.sleep(delayMs)
      }
    }
  }
}
