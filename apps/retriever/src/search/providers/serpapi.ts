/**
 * SerpApi client (Google, Bing and DuckDuckGo engines).
 *
 * Offset paging via the 0-based `start` parameter. The per-query cap
 * depends on the engine. Also exposes autocomplete suggestions and
 * related searches, which degrade to an empty list on any failure.
 */

import { z } from 'zod'
import { ApiError, ConfigError, errorMessage } from '../../errors.js'
import type { RateLimitSettings } from '../../config/settings.js'
import type { ProviderName, SearchOptions, SerpApiEngine } from '../types.js'
import { BaseSearchProvider, type BaseProviderOptions, type PageRequest, type ProviderPage } from './base.js'

export const SERPAPI_ENDPOINT = 'https://serpapi.com/search.json'

const RESULTS_PER_REQUEST = 10

export const SERPAPI_RESULT_CAPS: Record<SerpApiEngine, number> = {
  google: 100,
  bing: 50,
  duckduckgo: 30,
}

export const SERPAPI_RATE_LIMIT: RateLimitSettings = { capacity: 100, periodSeconds: 3600 }

const organicSchema = z
  .object({
    link: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
    title: z.string().min(1),
    snippet: z.string().optional(),
    description: z.string().optional(),
  })
  .transform((entry, ctx) => {
    const url = entry.link ?? entry.url
    if (!url) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing link' })
      return z.NEVER
    }
    return { url, title: entry.title, description: entry.snippet ?? entry.description ?? '' }
  })

const responseSchema = z.object({
  organic_results: z.array(z.unknown()).optional(),
  search_information: z
    .object({
      total_results: z.number().optional(),
    })
    .optional(),
  error: z.string().optional(),
})

const suggestionsSchema = z.object({
  suggestions: z.array(z.object({ value: z.string() })).default([]),
})

const relatedSchema = z.object({
  related_searches: z.array(z.object({ query: z.string() })).default([]),
})

export interface SerpApiSearchOptions extends BaseProviderOptions {
  apiKey?: string
  engine?: SerpApiEngine
}

/**
 * MM/DD/YYYY, as the Google `tbs=cdr` filter expects.
 */
export function formatTbsDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  const day = String(date.getUTCDate()).padStart(2, '0')
  return `${month}/${day}/${date.getUTCFullYear()}`
}

export class SerpApiSearchProvider extends BaseSearchProvider {
  readonly name: ProviderName = 'serpapi'

  private readonly apiKey: string
  private readonly engine: SerpApiEngine

  constructor(options: SerpApiSearchOptions) {
    super(options, SERPAPI_RATE_LIMIT)
    if (!options.apiKey) {
      throw new ConfigError('serpapi requires an API key')
    }
    this.apiKey = options.apiKey
    this.engine = options.engine ?? 'google'
  }

  resultCap(options: SearchOptions): number {
    return SERPAPI_RESULT_CAPS[options.engine ?? this.engine]
  }

  protected requestSize(remaining: number, capRemaining: number): number {
    return Math.min(remaining, capRemaining, RESULTS_PER_REQUEST)
  }

  protected async fetchPage(request: PageRequest): Promise<ProviderPage> {
    const params = this.buildParams(request)
    const data = await this.send({ url: `${SERPAPI_ENDPOINT}?${params.toString()}`, timeoutSeconds: this.timeoutSeconds })

    const parsed = responseSchema.safeParse(data)
    if (!parsed.success) {
      throw new ApiError('serpapi: unexpected response shape', undefined, { provider: this.name })
    }
    // SerpApi reports "no results" as an error string with HTTP 200
    if (parsed.data.error && !parsed.data.organic_results) {
      if (/hasn't returned any results/i.test(parsed.data.error)) {
        return { items: [], rawCount: 0 }
      }
      throw new ApiError(`serpapi: ${parsed.data.error}`, undefined, { provider: this.name })
    }

    const entries = parsed.data.organic_results ?? []
    return {
      items: this.collectItems(entries, organicSchema, (item) => item),
      rawCount: entries.length,
      totalAvailable: parsed.data.search_information?.total_results,
    }
  }

  /**
   * Autocomplete suggestions for a partial query.
   */
  async getSuggestions(query: string): Promise<string[]> {
    const engine = this.engine
    const params = new URLSearchParams({
      api_key: this.apiKey,
      engine: `${engine}_autocomplete`,
      q: query,
    })

    try {
      const data = await this.send({ url: `${SERPAPI_ENDPOINT}?${params.toString()}`, timeoutSeconds: this.timeoutSeconds })
      const parsed = suggestionsSchema.safeParse(data)
      return parsed.success ? parsed.data.suggestions.map((s) => s.value) : []
    } catch (error) {
      this.log.warn('Failed to fetch suggestions', { provider: this.name, engine, error: errorMessage(error) })
      return []
    }
  }

  async getRelatedSearches(query: string): Promise<string[]> {
    const params = new URLSearchParams({
      api_key: this.apiKey,
      engine: this.engine,
      q: query,
    })

    try {
      const data = await this.send({ url: `${SERPAPI_ENDPOINT}?${params.toString()}`, timeoutSeconds: this.timeoutSeconds })
      const parsed = relatedSchema.safeParse(data)
      return parsed.success ? parsed.data.related_searches.map((r) => r.query) : []
    } catch (error) {
      this.log.warn('Failed to fetch related searches', { provider: this.name, error: errorMessage(error) })
      return []
    }
  }

  private buildParams(request: PageRequest): URLSearchParams {
    const { options } = request
    const engine = options.engine ?? this.engine
    const params = new URLSearchParams({
      api_key: this.apiKey,
      engine,
      q: request.query,
      num: String(request.count),
      start: String(request.offset),
    })

    if (options.location) params.set('location', options.location)
    if (options.locale) params.set('hl', options.locale)
    if (options.country) params.set('gl', options.country)
    if (options.device === 'mobile') params.set('device', 'mobile')
    if (options.safeSearch) params.set('safe', 'active')
    if (engine === 'google' && options.dateFrom && options.dateTo) {
      params.set('tbs', `cdr:1,cd_min:${formatTbsDate(options.dateFrom)},cd_max:${formatTbsDate(options.dateTo)}`)
    }

    return params
  }
}
