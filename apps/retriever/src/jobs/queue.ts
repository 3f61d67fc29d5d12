/**
 * BullMQ crawl queue
 *
 * QueueJobRunner enqueues { jobId }; the crawl worker picks it up and runs
 * the executor under a per-job Redis lock so one job record never has two
 * active runs.
 */

import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq'
import type { ILogger } from '@observatory/logger'
import {
  acquireRedisLock,
  extendRedisLock,
  releaseRedisLock,
  type LockCommands,
} from '@observatory/redis/lock'
import { loggers } from '../config/logger.js'
import { createWorkflowLogger } from '../config/structured-log.js'
import type { CrawlExecutor } from './executor.js'
import type { CrawlJobRunner } from './runner.js'

export const QUEUE_NAMES = {
  CRAWL: 'crawl',
} as const

export interface CrawlJobData {
  jobId: string
}

export const CRAWL_LOCK_TTL_MS = 5 * 60 * 1000

export const crawlLockKey = (jobId: string): string => `crawl:lock:${jobId}`

export function createCrawlQueue(connection: ConnectionOptions): Queue<CrawlJobData> {
  return new Queue<CrawlJobData>(QUEUE_NAMES.CRAWL, {
    connection,
    defaultJobOptions: {
      // The executor records failures on the job itself
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500,
    },
  })
}

export class QueueJobRunner implements CrawlJobRunner {
  private readonly logger: ILogger

  constructor(
    private readonly queue: Pick<Queue<CrawlJobData>, 'add'>,
    logger?: ILogger
  ) {
    this.logger = logger ?? loggers.queue
  }

  async dispatch(jobId: string): Promise<void> {
    await this.queue.add('CRAWL_JOB', { jobId }, { jobId: `crawl-${jobId}` })
    this.logger.info('Enqueued crawl job', { jobId, queue: QUEUE_NAMES.CRAWL })
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Worker
// ═══════════════════════════════════════════════════════════════════════════════

export interface CrawlWorkerOptions {
  connection: ConnectionOptions
  lockClient: LockCommands
  executor: Pick<CrawlExecutor, 'execute'>
  concurrency?: number
  lockTtlMs?: number
  logger?: ILogger
}

/**
 * Run one queued crawl while holding its job lock. The lock is extended
 * in the background until the run ends.
 */
export async function processCrawlJob(
  job: Pick<Job<CrawlJobData>, 'id' | 'data'>,
  options: Omit<CrawlWorkerOptions, 'connection' | 'concurrency'>
): Promise<void> {
  const { jobId } = job.data
  const ttlMs = options.lockTtlMs ?? CRAWL_LOCK_TTL_MS
  const log = createWorkflowLogger(options.logger ?? loggers.queue, {
    workflow: 'crawl',
    stage: 'worker',
    jobId,
    queueJobId: job.id,
  })

  const lock = await acquireRedisLock(options.lockClient, crawlLockKey(jobId), ttlMs)
  if (!lock) {
    log.warn('CRAWL_LOCK_HELD', { reason: 'another run holds the job lock' })
    return
  }

  const keepAlive = setInterval(() => {
    extendRedisLock(options.lockClient, lock, ttlMs).then(
      (extended) => {
        if (!extended) log.warn('CRAWL_LOCK_LOST')
      },
      (error: unknown) => log.error('CRAWL_LOCK_EXTEND_FAILED', {}, error)
    )
  }, Math.floor(ttlMs / 3))

  try {
    const status = await options.executor.execute(jobId)
    log.info('CRAWL_WORKER_RUN_FINISHED', { status: status ?? 'skipped' })
  } finally {
    clearInterval(keepAlive)
    await releaseRedisLock(options.lockClient, lock)
  }
}

export function startCrawlWorker(options: CrawlWorkerOptions): Worker<CrawlJobData> {
  const log = options.logger ?? loggers.queue
  const concurrency = options.concurrency ?? 1

  log.info('Starting crawl worker', { concurrency })

  const worker = new Worker<CrawlJobData>(
    QUEUE_NAMES.CRAWL,
    async (job) => {
      await processCrawlJob(job, options)
    },
    {
      connection: options.connection,
      concurrency,
    }
  )

  worker.on('completed', (job) => {
    log.debug('Job completed', { queueJobId: job.id, jobId: job.data.jobId })
  })

  worker.on('failed', (job, error) => {
    log.error('Job failed', {
      queueJobId: job?.id,
      jobId: job?.data.jobId,
      error: error.message,
    })
  })

  worker.on('error', (error) => {
    log.error('Worker error', { error: error.message })
  })

  return worker
}
