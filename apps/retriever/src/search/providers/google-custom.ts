/**
 * Google Programmable Search (Custom Search JSON API) client.
 *
 * Offset paging via the 1-based `start` parameter, at most 10 results per
 * request and 100 per query.
 */

import { z } from 'zod'
import { ApiError, ConfigError } from '../../errors.js'
import type { RateLimitSettings } from '../../config/settings.js'
import type { ProviderName, SearchOptions } from '../types.js'
import { BaseSearchProvider, type BaseProviderOptions, type PageRequest, type ProviderPage } from './base.js'

export const GOOGLE_CUSTOM_ENDPOINT = 'https://www.googleapis.com/customsearch/v1'

const RESULTS_PER_REQUEST = 10
const MAX_RESULTS = 100

export const GOOGLE_CUSTOM_RATE_LIMIT: RateLimitSettings = { capacity: 100, periodSeconds: 60 }

const itemSchema = z.object({
  link: z.string().min(1),
  title: z.string().min(1),
  snippet: z.string().optional(),
})

const responseSchema = z.object({
  items: z.array(z.unknown()).optional(),
  searchInformation: z
    .object({
      totalResults: z.string().optional(),
    })
    .optional(),
})

export interface GoogleCustomSearchOptions extends BaseProviderOptions {
  apiKey?: string
  searchEngineId?: string
}

export class GoogleCustomSearchProvider extends BaseSearchProvider {
  readonly name: ProviderName = 'google_custom'

  private readonly apiKey: string
  private readonly searchEngineId: string

  constructor(options: GoogleCustomSearchOptions) {
    super(options, GOOGLE_CUSTOM_RATE_LIMIT)
    if (!options.apiKey || !options.searchEngineId) {
      throw new ConfigError('google_custom requires an API key and a search engine id')
    }
    this.apiKey = options.apiKey
    this.searchEngineId = options.searchEngineId
  }

  resultCap(): number {
    return MAX_RESULTS
  }

  protected requestSize(remaining: number, capRemaining: number): number {
    return Math.min(remaining, capRemaining, RESULTS_PER_REQUEST)
  }

  protected async fetchPage(request: PageRequest): Promise<ProviderPage> {
    const data = await this.send({
      url: `${GOOGLE_CUSTOM_ENDPOINT}?${this.buildParams(request).toString()}`,
      timeoutSeconds: this.timeoutSeconds,
    })

    const parsed = responseSchema.safeParse(data)
    if (!parsed.success) {
      throw new ApiError('google_custom: unexpected response shape', undefined, { provider: this.name })
    }

    const entries = parsed.data.items ?? []
    const total = Number.parseInt(parsed.data.searchInformation?.totalResults ?? '', 10)

    return {
      items: this.collectItems(entries, itemSchema, (item) => ({
        url: item.link,
        title: item.title,
        description: item.snippet ?? '',
      })),
      rawCount: entries.length,
      totalAvailable: Number.isNaN(total) ? undefined : total,
    }
  }

  private buildParams(request: PageRequest): URLSearchParams {
    const params = new URLSearchParams({
      key: this.apiKey,
      cx: this.searchEngineId,
      q: request.query,
      num: String(request.count),
      start: String(request.offset + 1),
    })
    applySearchOptions(params, request.options)
    return params
  }
}

function applySearchOptions(params: URLSearchParams, options: SearchOptions): void {
  if (options.language) params.set('lr', options.language)
  if (options.country) params.set('gl', options.country)
  if (options.locale) params.set('hl', options.locale)
  if (options.safeSearch) params.set('safe', 'active')
}
