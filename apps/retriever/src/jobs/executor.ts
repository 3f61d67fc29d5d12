/**
 * Crawl job executor
 *
 * Runs one already-started job through the crawler and records its
 * terminal state. Shared by the inline and queue runners.
 */

import type { ILogger } from '@observatory/logger'
import { loggers } from '../config/logger.js'
import { createWorkflowLogger } from '../config/structured-log.js'
import type { Crawler, CrawlOutcome } from '../crawler/crawler.js'
import { classifyError } from '../errors.js'
import { recordCrawlCompleted } from '../metrics.js'
import type { CrawlJob, JobStore, TerminalStatus } from './types.js'

export interface CrawlExecutorDependencies {
  store: JobStore
  crawler: Pick<Crawler, 'crawl'>
  logger?: ILogger
  now?: () => Date
}

function progressOf(job: CrawlJob): CrawlOutcome['progress'] {
  return {
    totalUrls: job.totalUrls,
    urlsScraped: job.urlsScraped,
    urlsFailed: job.urlsFailed,
    urlsSkipped: job.urlsSkipped,
    currentDepth: job.currentDepth,
    errorCount: job.errorCount,
  }
}

export class CrawlExecutor {
  private readonly store: JobStore
  private readonly crawler: Pick<Crawler, 'crawl'>
  private readonly logger: ILogger
  private readonly now: () => Date

  constructor(deps: CrawlExecutorDependencies) {
    this.store = deps.store
    this.crawler = deps.crawler
    this.logger = deps.logger ?? loggers.jobs
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Execute a running job. Returns the terminal status it reached, or null
   * when the job is unknown or not in the running state.
   */
  async execute(jobId: string): Promise<TerminalStatus | null> {
    const log = createWorkflowLogger(this.logger, { workflow: 'crawl', stage: 'execute', jobId })

    const job = await this.store.getJob(jobId)
    if (!job) {
      log.warn('CRAWL_JOB_NOT_FOUND')
      return null
    }
    if (job.status !== 'running') {
      log.info('CRAWL_JOB_NOT_RUNNING', { status: job.status })
      return null
    }

    const startedAt = job.startedAt ?? this.now()
    let outcome: CrawlOutcome
    try {
      outcome = await this.crawler.crawl(job)
    } catch (error) {
      const classified = classifyError(error)
      log.error('CRAWL_JOB_ERROR', { code: classified.code, category: classified.category }, error)
      outcome = { status: 'failed', progress: progressOf(job), errorMessage: classified.message }
    }

    const completedAt = this.now()
    await this.store.markTerminal(jobId, outcome.status, {
      completedAt,
      errorMessage: outcome.errorMessage,
    })

    recordCrawlCompleted({
      jobId,
      status: outcome.status,
      totalUrls: outcome.progress.totalUrls,
      urlsScraped: outcome.progress.urlsScraped,
      urlsFailed: outcome.progress.urlsFailed,
      urlsSkipped: outcome.progress.urlsSkipped,
      maxDepthReached: outcome.progress.currentDepth,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    })

    return outcome.status
  }
}
