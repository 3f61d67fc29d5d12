/**
 * Search orchestration
 *
 * Runs queries one after another against a single provider and merges the
 * hits into a result set. Duplicate URLs (by canonical form) across queries
 * keep their first occurrence only. Any provider error aborts the whole run.
 */

import type { ILogger } from '@observatory/logger'
import { loggers } from '../config/logger.js'
import { canonicalizeUrl } from '../crawler/utils/url.js'
import type { QueryResult, SearchHit, SearchOptions, SearchProvider, SearchResultSet } from './types.js'

export interface SearchRunRequest {
  queries: string[]
  maxResults: number
  options?: SearchOptions
}

export class SearchOrchestrator {
  private readonly log: ILogger

  constructor(
    private readonly provider: SearchProvider,
    logger: ILogger = loggers.search
  ) {
    this.log = logger.child({ provider: provider.name })
  }

  async run(request: SearchRunRequest): Promise<SearchResultSet> {
    const seen = new Set<string>()
    const uniqueUrls: string[] = []
    const results: QueryResult[] = []

    for (const query of request.queries) {
      const hits = await this.provider.search(query, request.maxResults, request.options)
      const kept: SearchHit[] = []

      for (const hit of hits) {
        const key = canonicalizeUrl(hit.url) ?? hit.url
        if (seen.has(key)) continue
        seen.add(key)
        uniqueUrls.push(key)
        kept.push(hit)
      }

      this.log.info('Query completed', {
        query,
        returned: hits.length,
        kept: kept.length,
        duplicates: hits.length - kept.length,
      })
      results.push({ query, hits: kept })
    }

    return { results, uniqueUrls }
  }
}
