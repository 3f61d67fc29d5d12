/**
 * Composition root
 *
 * Builds stores, crawler, runner and service from Settings. Redis is only
 * connected when the store backend or the runner needs it.
 */

import { createRedisClient, describeRedisConnection, type Redis } from '@observatory/redis'
import type { Queue } from 'bullmq'
import { loggers } from './config/logger.js'
import type { Settings } from './config/settings.js'
import { Crawler } from './crawler/crawler.js'
import { HttpFetcher } from './crawler/fetch/http-fetcher.js'
import { RobotsPolicyImpl } from './crawler/fetch/robots.js'
import type { Fetcher } from './crawler/types.js'
import { CrawlExecutor } from './jobs/executor.js'
import { createCrawlQueue, QueueJobRunner, type CrawlJobData } from './jobs/queue.js'
import { InlineJobRunner, type CrawlJobRunner } from './jobs/runner.js'
import { InMemoryJobStore, InMemorySearchSessionStore } from './jobs/store/memory.js'
import { RedisJobStore, RedisSearchSessionStore } from './jobs/store/redis.js'
import type { JobStore } from './jobs/types.js'
import { EnvCredentialProvider } from './search/credentials.js'
import type { CredentialProvider, SearchSessionStore } from './search/types.js'
import { RetrievalService } from './service.js'

const log = loggers.redis

export interface RetrievalContext {
  settings: Settings
  service: RetrievalService
  jobStore: JobStore
  sessionStore: SearchSessionStore
  executor: CrawlExecutor
  runner: CrawlJobRunner
  /** Set when the store backend or runner uses Redis */
  redis: Redis | null
  close(): Promise<void>
}

export interface RetrievalContextOverrides {
  redis?: Redis
  fetcher?: Fetcher
  credentials?: CredentialProvider
}

export function createRetrievalContext(
  settings: Settings,
  overrides: RetrievalContextOverrides = {}
): RetrievalContext {
  const needsRedis = settings.storeBackend === 'redis' || settings.jobRunner === 'queue'
  const ownsRedis = needsRedis && !overrides.redis
  let redis: Redis | null = null
  if (needsRedis) {
    redis = overrides.redis ?? createRedisClient(settings.redis)
    log.info('Using Redis', { connection: describeRedisConnection(settings.redis) })
  }

  let jobStore: JobStore
  let sessionStore: SearchSessionStore
  if (redis && settings.storeBackend === 'redis') {
    jobStore = new RedisJobStore(redis)
    sessionStore = new RedisSearchSessionStore(redis)
  } else {
    jobStore = new InMemoryJobStore()
    sessionStore = new InMemorySearchSessionStore()
  }

  const robotsPolicy = new RobotsPolicyImpl({
    cacheTtlMs: settings.crawler.robotsCacheTtlMs,
    userAgent: settings.crawler.userAgent,
  })
  const fetcher = overrides.fetcher ?? new HttpFetcher({ robotsPolicy, userAgent: settings.crawler.userAgent })
  const crawler = new Crawler({
    store: jobStore,
    fetcher,
    robotsPolicy,
    maxPageBytes: settings.crawler.maxPageBytes,
  })
  const executor = new CrawlExecutor({ store: jobStore, crawler })

  let queue: Queue<CrawlJobData> | null = null
  let inline: InlineJobRunner | null = null
  let runner: CrawlJobRunner
  if (redis && settings.jobRunner === 'queue') {
    queue = createCrawlQueue(redis)
    runner = new QueueJobRunner(queue)
  } else {
    inline = new InlineJobRunner(executor)
    runner = inline
  }

  const service = new RetrievalService({
    jobStore,
    sessionStore,
    credentials: overrides.credentials ?? new EnvCredentialProvider(settings.credentials),
    runner,
    searchSettings: settings.search,
  })

  return {
    settings,
    service,
    jobStore,
    sessionStore,
    executor,
    runner,
    redis,
    async close() {
      if (inline) await inline.drain()
      if (queue) await queue.close()
      if (redis && ownsRedis) await redis.quit()
    },
  }
}
