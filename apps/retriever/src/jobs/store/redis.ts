/**
 * Redis-backed stores
 *
 * Key layout:
 *   crawl:job:{id}          hash   status, counters, timestamps, config JSON
 *   crawl:job:{id}:pages    list   FetchedPage JSON, append order
 *   crawl:job:{id}:cancel   string set once cancellation is requested
 *   search:session:{id}     string SearchSession JSON
 *
 * Page append and counter snapshot run in one Lua script so readers never
 * see a page without its counters.
 */

import { createId } from '@paralleldrive/cuid2'
import { z } from 'zod'
import { PROVIDER_NAMES, type SearchSession, type SearchSessionStore } from '../../search/types.js'
import { validateCrawlConfig } from '../config.js'
import type {
  CrawlConfig,
  CrawlJob,
  CrawlProgress,
  FetchedPage,
  JobStore,
  TerminalStatus,
  TerminalUpdate,
} from '../types.js'
import { EMPTY_PROGRESS } from '../types.js'

/**
 * The subset of ioredis commands the stores use.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  hgetall(key: string): Promise<Record<string, string>>
  hset(key: string, values: Record<string, string | number>): Promise<number>
  lrange(key: string, start: number, stop: number): Promise<string[]>
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>
}

const MARK_RUNNING_LUA = `
  if redis.call("hget", KEYS[1], "status") == "pending" then
    redis.call("hset", KEYS[1], "status", "running", "startedAt", ARGV[1])
    return 1
  end
  return 0
`

const UPDATE_FIELDS_LUA = `
  if redis.call("exists", KEYS[1]) == 0 then
    return redis.error_reply("ERR crawl job not found")
  end
  redis.call("hset", KEYS[1], unpack(ARGV))
  return 1
`

const APPEND_PAGE_LUA = `
  if redis.call("exists", KEYS[1]) == 0 then
    return redis.error_reply("ERR crawl job not found")
  end
  redis.call("rpush", KEYS[2], ARGV[1])
  redis.call("hset", KEYS[1], unpack(ARGV, 2))
  return 1
`

export const JOB_STORE_SCRIPTS = {
  markRunning: MARK_RUNNING_LUA,
  updateFields: UPDATE_FIELDS_LUA,
  appendPage: APPEND_PAGE_LUA,
} as const

export const redisKeys = {
  job: (jobId: string) => `crawl:job:${jobId}`,
  pages: (jobId: string) => `crawl:job:${jobId}:pages`,
  cancel: (jobId: string) => `crawl:job:${jobId}:cancel`,
  session: (sessionId: string) => `search:session:${sessionId}`,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Serialization
// ═══════════════════════════════════════════════════════════════════════════════

const counter = z.coerce.number().int().nonnegative()

const jobHashSchema = z.object({
  id: z.string().min(1),
  config: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']),
  totalUrls: counter,
  urlsScraped: counter,
  urlsFailed: counter,
  urlsSkipped: counter,
  currentDepth: counter,
  errorCount: counter,
  createdAt: z.string().min(1),
  startedAt: z.string(),
  completedAt: z.string(),
  errorMessage: z.string(),
})

const pageSchema = z.object({
  url: z.string(),
  finalUrl: z.string(),
  httpStatus: z.number().nullable(),
  title: z.string().nullable(),
  metaDescription: z.string().nullable(),
  language: z.string().nullable(),
  extractedText: z.string(),
  wordCount: z.number(),
  outboundLinks: z.array(z.string()),
  depthLevel: z.number(),
  parentUrl: z.string().nullable(),
  status: z.enum(['success', 'failed', 'skipped']),
  errorMessage: z.string().nullable(),
  contentHash: z.string().nullable(),
  fetchDurationMs: z.number(),
  fetchedAt: z.coerce.date(),
})

const sessionSchema = z.object({
  id: z.string().min(1),
  providerName: z.enum(PROVIDER_NAMES),
  queries: z.array(z.string()),
  maxResults: z.number(),
  createdAt: z.coerce.date(),
  results: z.array(
    z.object({
      query: z.string(),
      hits: z.array(
        z.object({
          url: z.string(),
          title: z.string(),
          description: z.string(),
          rank: z.number(),
          domain: z.string(),
        })
      ),
    })
  ),
  uniqueUrls: z.array(z.string()),
})

function optionalDate(value: string): Date | null {
  return value ? new Date(value) : null
}

function progressFields(progress: CrawlProgress): (string | number)[] {
  return [
    'totalUrls', progress.totalUrls,
    'urlsScraped', progress.urlsScraped,
    'urlsFailed', progress.urlsFailed,
    'urlsSkipped', progress.urlsSkipped,
    'currentDepth', progress.currentDepth,
    'errorCount', progress.errorCount,
  ]
}

function parseJson(text: string): unknown {
  return JSON.parse(text)
}

export function deserializeJob(hash: Record<string, string>): CrawlJob {
  const row = jobHashSchema.parse(hash)
  return {
    id: row.id,
    config: validateCrawlConfig(parseJson(row.config)),
    status: row.status,
    totalUrls: row.totalUrls,
    urlsScraped: row.urlsScraped,
    urlsFailed: row.urlsFailed,
    urlsSkipped: row.urlsSkipped,
    currentDepth: row.currentDepth,
    errorCount: row.errorCount,
    createdAt: new Date(row.createdAt),
    startedAt: optionalDate(row.startedAt),
    completedAt: optionalDate(row.completedAt),
    errorMessage: row.errorMessage || null,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stores
// ═══════════════════════════════════════════════════════════════════════════════

export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createJob(config: CrawlConfig): Promise<CrawlJob> {
    const job: CrawlJob = {
      id: createId(),
      config,
      status: 'pending',
      ...EMPTY_PROGRESS,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      errorMessage: null,
    }

    await this.redis.hset(redisKeys.job(job.id), {
      id: job.id,
      config: JSON.stringify(config),
      status: job.status,
      ...EMPTY_PROGRESS,
      createdAt: job.createdAt.toISOString(),
      startedAt: '',
      completedAt: '',
      errorMessage: '',
    })
    return job
  }

  async getJob(jobId: string): Promise<CrawlJob | null> {
    const hash = await this.redis.hgetall(redisKeys.job(jobId))
    if (Object.keys(hash).length === 0) return null
    return deserializeJob(hash)
  }

  async markRunning(jobId: string, startedAt: Date): Promise<boolean> {
    const result = await this.redis.eval(MARK_RUNNING_LUA, 1, redisKeys.job(jobId), startedAt.toISOString())
    return Number(result) === 1
  }

  async appendPage(jobId: string, page: FetchedPage, progress: CrawlProgress): Promise<void> {
    await this.redis.eval(
      APPEND_PAGE_LUA,
      2,
      redisKeys.job(jobId),
      redisKeys.pages(jobId),
      JSON.stringify(page),
      ...progressFields(progress)
    )
  }

  async updateProgress(jobId: string, progress: CrawlProgress): Promise<void> {
    await this.redis.eval(UPDATE_FIELDS_LUA, 1, redisKeys.job(jobId), ...progressFields(progress))
  }

  async markTerminal(jobId: string, status: TerminalStatus, update: TerminalUpdate): Promise<void> {
    await this.redis.eval(
      UPDATE_FIELDS_LUA,
      1,
      redisKeys.job(jobId),
      'status', status,
      'completedAt', update.completedAt.toISOString(),
      'errorMessage', update.errorMessage ?? ''
    )
  }

  async requestCancellation(jobId: string): Promise<void> {
    await this.redis.set(redisKeys.cancel(jobId), '1')
  }

  async isCancelled(jobId: string): Promise<boolean> {
    return (await this.redis.get(redisKeys.cancel(jobId))) !== null
  }

  async listPages(jobId: string): Promise<FetchedPage[]> {
    const rows = await this.redis.lrange(redisKeys.pages(jobId), 0, -1)
    return rows.map((row) => pageSchema.parse(parseJson(row)))
  }
}

export class RedisSearchSessionStore implements SearchSessionStore {
  constructor(private readonly redis: RedisCommands) {}

  async saveSession(session: SearchSession): Promise<void> {
    await this.redis.set(redisKeys.session(session.id), JSON.stringify(session))
  }

  async getSession(sessionId: string): Promise<SearchSession | null> {
    const raw = await this.redis.get(redisKeys.session(sessionId))
    if (raw === null) return null
    return sessionSchema.parse(parseJson(raw))
  }
}
