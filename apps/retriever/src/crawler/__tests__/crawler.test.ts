import { describe, it, expect, vi } from 'vitest'
import { Crawler, NO_VALID_SEEDS_MESSAGE } from '../crawler.js'
import type { Fetcher, FetchOptions, FetchResult, RobotsPolicy } from '../types.js'
import { CrawlExecutor } from '../../jobs/executor.js'
import { InMemoryJobStore } from '../../jobs/store/memory.js'
import { DEFAULT_CRAWL_CONFIG, type CrawlConfig, type CrawlJob } from '../../jobs/types.js'

function page(...hrefs: string[]): string {
  const links = hrefs.map((href) => `<a href="${href}"></a>`).join('')
  return `<html lang="en"><head><title>Page</title></head><body><p>Some words here</p>${links}</body></html>`
}

/**
 * Serves a fixed set of pages; anything else is a 404.
 */
class SiteFetcher implements Fetcher {
  readonly requested: string[] = []
  readonly options: Array<FetchOptions | undefined> = []

  constructor(
    private readonly pages: Record<string, string>,
    private readonly onFetch?: (url: string) => Promise<void>
  ) {}

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    this.requested.push(url)
    this.options.push(options)
    await this.onFetch?.(url)
    const html = this.pages[url]
    if (html === undefined) {
      return { status: 'error', finalUrl: url, statusCode: 404, error: 'HTTP 404', durationMs: 1, attempts: 1 }
    }
    return { status: 'ok', finalUrl: url, statusCode: 200, html, contentHash: 'hash', durationMs: 1, attempts: 1 }
  }
}

function config(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  return { ...DEFAULT_CRAWL_CONFIG, seedUrls: ['https://ex.com/'], delayMin: 0, delayMax: 0, ...overrides }
}

async function runningJob(store: InMemoryJobStore, crawlConfig: CrawlConfig): Promise<CrawlJob> {
  const job = await store.createJob(crawlConfig)
  await store.markRunning(job.id, new Date())
  return { ...job, status: 'running' }
}

describe('Crawler', () => {
  it('crawls breadth-first within the seed domain up to maxDepth', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({
      'https://ex.com/': page('/a', '/b', 'https://other.example/x'),
      'https://ex.com/a': page('/c'),
      'https://ex.com/b': page(),
      'https://ex.com/c': page(),
    })
    const job = await runningJob(store, config({ maxDepth: 2 }))

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(outcome).toEqual({
      status: 'completed',
      progress: { totalUrls: 3, urlsScraped: 3, urlsFailed: 0, urlsSkipped: 1, currentDepth: 2, errorCount: 0 },
    })
    expect(fetcher.requested).toEqual(['https://ex.com/', 'https://ex.com/a', 'https://ex.com/b'])

    const pages = await store.listPages(job.id)
    expect(pages.map((p) => [p.url, p.depthLevel, p.parentUrl])).toEqual([
      ['https://ex.com/', 1, null],
      ['https://ex.com/a', 2, 'https://ex.com/'],
      ['https://ex.com/b', 2, 'https://ex.com/'],
    ])
    expect(pages[0]).toMatchObject({
      status: 'success',
      title: 'Page',
      language: 'en',
      wordCount: 3,
      httpStatus: 200,
      contentHash: 'hash',
    })

    const stored = await store.getJob(job.id)
    expect(stored).toMatchObject({ totalUrls: 3, urlsScraped: 3, urlsSkipped: 1 })
  })

  it('fetches each canonical URL at most once', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({
      'https://ex.com/': page('/a', '/b'),
      'https://ex.com/a': page('/', '/b', '/a#top'),
      'https://ex.com/b': page('/a?utm_source=feed'),
    })
    const job = await runningJob(store, config({ maxDepth: 3 }))

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(fetcher.requested).toEqual(['https://ex.com/', 'https://ex.com/a', 'https://ex.com/b'])
    expect(outcome.progress.totalUrls).toBe(3)
    expect(outcome.progress.urlsSkipped).toBe(0)
  })

  it('records failed fetches as failed pages', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({ 'https://ex.com/': page('/missing') })
    const job = await runningJob(store, config({ maxDepth: 2 }))

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(outcome.status).toBe('completed')
    expect(outcome.progress).toMatchObject({ urlsScraped: 1, urlsFailed: 1, errorCount: 1 })
    const pages = await store.listPages(job.id)
    expect(pages[1]).toMatchObject({
      url: 'https://ex.com/missing',
      status: 'failed',
      httpStatus: 404,
      errorMessage: 'HTTP 404',
      outboundLinks: [],
    })
  })

  it('deduplicates seeds and ignores invalid ones', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({ 'https://ex.com/': page() })
    const job = await runningJob(
      store,
      config({ seedUrls: ['https://ex.com/', 'not a url', ' https://ex.com/#dup '] })
    )

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(fetcher.requested).toEqual(['https://ex.com/'])
    expect(outcome.progress.totalUrls).toBe(1)
  })

  it('fails without fetching when no seed is valid', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({})
    const job = await runningJob(store, config({ seedUrls: ['ftp://ex.com/', 'nothing'] }))

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(outcome).toEqual({
      status: 'failed',
      errorMessage: NO_VALID_SEEDS_MESSAGE,
      progress: { totalUrls: 0, urlsScraped: 0, urlsFailed: 0, urlsSkipped: 0, currentDepth: 0, errorCount: 0 },
    })
    expect(fetcher.requested).toEqual([])
  })

  it('stops at the next pop once cancellation is requested and keeps recorded pages', async () => {
    const store = new InMemoryJobStore()
    let jobId = ''
    const fetcher = new SiteFetcher(
      {
        'https://ex.com/': page('/a', '/b'),
        'https://ex.com/a': page(),
        'https://ex.com/b': page(),
      },
      async () => {
        await store.requestCancellation(jobId)
      }
    )
    const job = await runningJob(store, config({ maxDepth: 2 }))
    jobId = job.id

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(outcome.status).toBe('cancelled')
    expect(fetcher.requested).toEqual(['https://ex.com/'])
    expect(await store.listPages(job.id)).toHaveLength(1)
  })

  it('ends cancelled when cancellation arrives during the last fetch', async () => {
    const store = new InMemoryJobStore()
    let jobId = ''
    const fetcher = new SiteFetcher({ 'https://ex.com/': page() }, async () => {
      await store.requestCancellation(jobId)
    })
    const job = await store.createJob(config())
    jobId = job.id
    await store.markRunning(job.id, new Date())

    const executor = new CrawlExecutor({ store, crawler: new Crawler({ store, fetcher }) })

    await expect(executor.execute(job.id)).resolves.toBe('cancelled')
    expect(fetcher.requested).toEqual(['https://ex.com/'])
    expect(await store.getJob(job.id)).toMatchObject({ status: 'cancelled', urlsScraped: 1 })
    expect(await store.listPages(job.id)).toHaveLength(1)
  })

  it('follows www. links from a bare-host seed', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({
      'https://a.com/x': page('https://www.a.com/z'),
      'https://www.a.com/z': page(),
    })
    const job = await runningJob(store, config({ seedUrls: ['https://a.com/x'], maxDepth: 2 }))

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(fetcher.requested).toEqual(['https://a.com/x', 'https://www.a.com/z'])
    expect(outcome).toMatchObject({
      status: 'completed',
      progress: { totalUrls: 2, urlsScraped: 2, urlsSkipped: 0, currentDepth: 2 },
    })
  })

  it('records no page when the fetch itself is cancelled', async () => {
    const store = new InMemoryJobStore()
    const fetcher: Fetcher = {
      fetch: vi.fn(
        async (url: string): Promise<FetchResult> => ({ status: 'cancelled', finalUrl: url, durationMs: 0, attempts: 1 })
      ),
    }
    const job = await runningJob(store, config())

    const outcome = await new Crawler({ store, fetcher }).crawl(job)

    expect(outcome.status).toBe('cancelled')
    expect(await store.listPages(job.id)).toEqual([])
  })

  it('passes job limits to the fetcher', async () => {
    const store = new InMemoryJobStore()
    const fetcher = new SiteFetcher({ 'https://ex.com/': page() })
    const job = await runningJob(store, config({ timeoutSeconds: 12, maxRetries: 1, respectRobots: false }))

    await new Crawler({ store, fetcher, maxPageBytes: 2048 }).crawl(job)

    expect(fetcher.options[0]).toMatchObject({
      timeoutMs: 12000,
      maxSizeBytes: 2048,
      maxRetries: 1,
      respectRobots: false,
    })
  })

  describe('politeness delay', () => {
    const seeds = ['https://ex.com/', 'https://ex.com/b']
    const site = { 'https://ex.com/': page(), 'https://ex.com/b': page() }

    function robots(crawlDelay: number | null): RobotsPolicy {
      return { isAllowed: async () => true, getCrawlDelay: async () => crawlDelay }
    }

    it('sleeps a uniform delay between fetches but not before the first', async () => {
      const store = new InMemoryJobStore()
      const sleep = vi.fn().mockResolvedValue(undefined)
      const job = await runningJob(store, config({ seedUrls: seeds, delayMin: 1, delayMax: 3 }))

      await new Crawler({ store, fetcher: new SiteFetcher(site), sleep, random: () => 0.5 }).crawl(job)

      expect(sleep.mock.calls).toEqual([[2000]])
    })

    it('raises the delay to the robots.txt crawl-delay', async () => {
      const store = new InMemoryJobStore()
      const sleep = vi.fn().mockResolvedValue(undefined)
      const job = await runningJob(store, config({ seedUrls: seeds, delayMin: 1, delayMax: 3 }))

      await new Crawler({
        store,
        fetcher: new SiteFetcher(site),
        robotsPolicy: robots(5),
        sleep,
        random: () => 0.5,
      }).crawl(job)

      expect(sleep.mock.calls).toEqual([[5000]])
    })

    it('ignores crawl-delay when robots.txt is not respected', async () => {
      const store = new InMemoryJobStore()
      const sleep = vi.fn().mockResolvedValue(undefined)
      const job = await runningJob(
        store,
        config({ seedUrls: seeds, delayMin: 1, delayMax: 3, respectRobots: false })
      )

      await new Crawler({
        store,
        fetcher: new SiteFetcher(site),
        robotsPolicy: robots(5),
        sleep,
        random: () => 0,
      }).crawl(job)

      expect(sleep.mock.calls).toEqual([[1000]])
    })
  })
})
