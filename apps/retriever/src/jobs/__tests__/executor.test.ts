import { describe, it, expect, vi } from 'vitest'
import { CrawlExecutor } from '../executor.js'
import { InMemoryJobStore } from '../store/memory.js'
import { DEFAULT_CRAWL_CONFIG, EMPTY_PROGRESS, type CrawlConfig } from '../types.js'
import type { CrawlOutcome } from '../../crawler/crawler.js'

const CONFIG: CrawlConfig = { ...DEFAULT_CRAWL_CONFIG, seedUrls: ['https://a.example/'] }
const STARTED_AT = new Date('2024-03-01T10:00:00Z')
const COMPLETED_AT = new Date('2024-03-01T10:02:00Z')

function setup(crawl: () => Promise<CrawlOutcome>) {
  const store = new InMemoryJobStore()
  const crawler = { crawl: vi.fn(crawl) }
  const executor = new CrawlExecutor({ store, crawler, now: () => COMPLETED_AT })
  return { store, crawler, executor }
}

describe('CrawlExecutor', () => {
  it('records the crawl outcome as the terminal state', async () => {
    const { store, crawler, executor } = setup(async () => ({
      status: 'completed',
      progress: { ...EMPTY_PROGRESS, totalUrls: 1, urlsScraped: 1, currentDepth: 1 },
    }))
    const job = await store.createJob(CONFIG)
    await store.markRunning(job.id, STARTED_AT)

    await expect(executor.execute(job.id)).resolves.toBe('completed')

    expect(crawler.crawl).toHaveBeenCalledWith(expect.objectContaining({ id: job.id, status: 'running' }))
    expect(await store.getJob(job.id)).toMatchObject({
      status: 'completed',
      startedAt: STARTED_AT,
      completedAt: COMPLETED_AT,
      errorMessage: null,
    })
  })

  it('keeps the failure message of a failed crawl', async () => {
    const { store, executor } = setup(async () => ({
      status: 'failed',
      progress: { ...EMPTY_PROGRESS },
      errorMessage: 'No valid seed URLs',
    }))
    const job = await store.createJob(CONFIG)
    await store.markRunning(job.id, STARTED_AT)

    await expect(executor.execute(job.id)).resolves.toBe('failed')
    expect(await store.getJob(job.id)).toMatchObject({ status: 'failed', errorMessage: 'No valid seed URLs' })
  })

  it('marks the job failed when the crawl throws', async () => {
    const { store, executor } = setup(async () => {
      throw new Error('store unavailable')
    })
    const job = await store.createJob(CONFIG)
    await store.markRunning(job.id, STARTED_AT)

    await expect(executor.execute(job.id)).resolves.toBe('failed')
    expect(await store.getJob(job.id)).toMatchObject({
      status: 'failed',
      completedAt: COMPLETED_AT,
      errorMessage: 'store unavailable',
    })
  })

  it('ignores unknown jobs and jobs that are not running', async () => {
    const { store, crawler, executor } = setup(async () => ({ status: 'completed', progress: { ...EMPTY_PROGRESS } }))
    const job = await store.createJob(CONFIG)

    await expect(executor.execute('missing')).resolves.toBeNull()
    await expect(executor.execute(job.id)).resolves.toBeNull()
    expect(crawler.crawl).not.toHaveBeenCalled()
    expect((await store.getJob(job.id))?.status).toBe('pending')
  })
})
