/**
 * Breadth-first crawler
 *
 * Walks a FIFO frontier of (url, depth) starting from the job's seeds at
 * depth 1. Fetches are strictly sequential with a politeness delay between
 * them. Each fetched URL produces exactly one FetchedPage, written together
 * with a counter snapshot. Cancellation is polled before every pop, before
 * every fetch retry and once more before completing; recorded pages are kept.
 */

import type { ILogger } from '@observatory/logger'
import { loggers } from '../config/logger.js'
import { createWorkflowLogger, sanitizeUrl } from '../config/structured-log.js'
import type { CrawlJob, CrawlProgress, FetchedPage, JobStore, TerminalStatus } from '../jobs/types.js'
import { EMPTY_PROGRESS } from '../jobs/types.js'
import { extractContent } from './extract/content.js'
import { LinkFilter } from './link-filter.js'
import type { Fetcher, FetchResult, RobotsPolicy } from './types.js'
import { DEFAULT_FETCH_OPTIONS } from './types.js'
import { canonicalizeUrl } from './utils/url.js'

export interface CrawlerDependencies {
  store: JobStore
  fetcher: Fetcher
  /** Source of Crawl-delay values when robots.txt is respected */
  robotsPolicy?: RobotsPolicy
  logger?: ILogger
  sleep?: (ms: number) => Promise<void>
  /** Uniform [0, 1) source for the politeness delay */
  random?: () => number
  now?: () => Date
  maxPageBytes?: number
}

export interface CrawlOutcome {
  status: TerminalStatus
  progress: CrawlProgress
  errorMessage?: string
}

interface FrontierEntry {
  url: string
  key: string
  depth: number
  parentUrl: string | null
  /** Seed this path started from; anchors same_domain */
  anchorUrl: string
}

export const NO_VALID_SEEDS_MESSAGE = 'No valid seed URLs'

export class Crawler {
  private readonly store: JobStore
  private readonly fetcher: Fetcher
  private readonly robotsPolicy?: RobotsPolicy
  private readonly logger: ILogger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly now: () => Date
  private readonly maxPageBytes: number

  constructor(deps: CrawlerDependencies) {
    this.store = deps.store
    this.fetcher = deps.fetcher
    this.robotsPolicy = deps.robotsPolicy
    this.logger = deps.logger ?? loggers.crawler
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
    this.random = deps.random ?? Math.random
    this.now = deps.now ?? (() => new Date())
    this.maxPageBytes = deps.maxPageBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
  }

  /**
   * Crawl a running job to completion, cancellation or seed failure.
   * Store errors propagate to the caller.
   */
  async crawl(job: CrawlJob): Promise<CrawlOutcome> {
    const { config } = job
    const log = createWorkflowLogger(this.logger, { workflow: 'crawl', stage: 'frontier', jobId: job.id })
    const filter = new LinkFilter(config)
    const progress: CrawlProgress = { ...EMPTY_PROGRESS }

    const frontier: FrontierEntry[] = []
    const visited = new Set<string>()
    const discovered = new Set<string>()
    const rejected = new Set<string>()

    for (const rawSeed of config.seedUrls) {
      const seed = rawSeed.trim()
      const key = canonicalizeUrl(seed)
      if (!key || discovered.has(key)) continue
      discovered.add(key)
      frontier.push({ url: seed, key, depth: 1, parentUrl: null, anchorUrl: seed })
      progress.totalUrls += 1
    }

    if (frontier.length === 0) {
      log.warn('CRAWL_NO_VALID_SEEDS', { seedCount: config.seedUrls.length })
      return { status: 'failed', progress, errorMessage: NO_VALID_SEEDS_MESSAGE }
    }

    await this.store.updateProgress(job.id, { ...progress })
    log.info('CRAWL_STARTED', { seeds: frontier.length, maxDepth: config.maxDepth })

    let head = 0
    let fetches = 0

    while (head < frontier.length) {
      if (await this.store.isCancelled(job.id)) {
        log.info('CRAWL_CANCELLED', { pagesRecorded: fetches })
        return { status: 'cancelled', progress }
      }

      const entry = frontier[head]
      head += 1
      if (visited.has(entry.key) || entry.depth > config.maxDepth) continue
      visited.add(entry.key)

      if (fetches > 0) {
        await this.politenessDelay(job, entry.url)
      }
      fetches += 1
      progress.currentDepth = entry.depth

      const result = await this.fetcher.fetch(entry.url, {
        timeoutMs: config.timeoutSeconds * 1000,
        maxSizeBytes: this.maxPageBytes,
        maxRetries: config.maxRetries,
        respectRobots: config.respectRobots,
        isCancelled: () => this.store.isCancelled(job.id),
      })

      if (result.status === 'cancelled') {
        log.info('CRAWL_CANCELLED', { pagesRecorded: fetches - 1 })
        return { status: 'cancelled', progress }
      }

      const finalKey = canonicalizeUrl(result.finalUrl)
      if (finalKey) {
        visited.add(finalKey)
        discovered.add(finalKey)
      }

      const page =
        result.status === 'ok' && result.html !== undefined
          ? this.successPage(entry, result, result.html)
          : this.failedPage(entry, result)

      if (page.status === 'success') {
        progress.urlsScraped += 1

        if (entry.depth < config.maxDepth) {
          for (const link of page.outboundLinks) {
            const key = canonicalizeUrl(link)
            if (!key || discovered.has(key)) continue

            const verdict = filter.evaluate(link, entry.anchorUrl)
            if (!verdict.admissible) {
              const rejectionKey = `${entry.anchorUrl} ${key}`
              if (!rejected.has(rejectionKey)) {
                rejected.add(rejectionKey)
                progress.urlsSkipped += 1
              }
              continue
            }

            discovered.add(key)
            frontier.push({
              url: link,
              key,
              depth: entry.depth + 1,
              parentUrl: page.finalUrl,
              anchorUrl: entry.anchorUrl,
            })
            progress.totalUrls += 1
          }
        }
      } else {
        progress.urlsFailed += 1
        progress.errorCount += 1
        log.debug('CRAWL_PAGE_FAILED', {
          ...sanitizeUrl(entry.url),
          fetchStatus: result.status,
          statusCode: result.statusCode,
          error: result.error,
        })
      }

      await this.store.appendPage(job.id, page, { ...progress })
    }

    if (await this.store.isCancelled(job.id)) {
      log.info('CRAWL_CANCELLED', { pagesRecorded: fetches })
      return { status: 'cancelled', progress }
    }

    log.info('CRAWL_FRONTIER_EXHAUSTED', { ...progress })
    return { status: 'completed', progress }
  }

  private successPage(entry: FrontierEntry, result: FetchResult, html: string): FetchedPage {
    const content = extractContent(html, result.finalUrl)
    return {
      url: entry.url,
      finalUrl: result.finalUrl,
      httpStatus: result.statusCode ?? null,
      title: content.title,
      metaDescription: content.metaDescription,
      language: content.language,
      extractedText: content.text,
      wordCount: content.wordCount,
      outboundLinks: content.links,
      depthLevel: entry.depth,
      parentUrl: entry.parentUrl,
      status: 'success',
      errorMessage: null,
      contentHash: result.contentHash ?? null,
      fetchDurationMs: result.durationMs,
      fetchedAt: this.now(),
    }
  }

  private failedPage(entry: FrontierEntry, result: FetchResult): FetchedPage {
    return {
      url: entry.url,
      finalUrl: result.finalUrl,
      httpStatus: result.statusCode ?? null,
      title: null,
      metaDescription: null,
      language: null,
      extractedText: '',
      wordCount: 0,
      outboundLinks: [],
      depthLevel: entry.depth,
      parentUrl: entry.parentUrl,
      status: 'failed',
      errorMessage: result.error ?? `Fetch failed (${result.status})`,
      contentHash: null,
      fetchDurationMs: result.durationMs,
      fetchedAt: this.now(),
    }
  }

  /**
   * Uniform delay in [delayMin, delayMax] seconds. A robots.txt
   * Crawl-delay raises the floor when robots are respected.
   */
  private async politenessDelay(job: CrawlJob, nextUrl: string): Promise<void> {
    const { delayMin, delayMax, respectRobots } = job.config
    let seconds = delayMin + this.random() * (delayMax - delayMin)

    if (respectRobots && this.robotsPolicy) {
      const crawlDelay = await this.robotsPolicy.getCrawlDelay(nextUrl)
      if (crawlDelay !== null) {
        seconds = Math.max(seconds, crawlDelay)
      }
    }

    if (seconds > 0) {
      await this.sleep(seconds * 1000)
    }
  }
}
