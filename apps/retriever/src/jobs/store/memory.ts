/**
 * In-process stores for tests and single-process runs.
 */

import { createId } from '@paralleldrive/cuid2'
import type { SearchSession, SearchSessionStore } from '../../search/types.js'
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

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, CrawlJob>()
  private readonly pages = new Map<string, FetchedPage[]>()
  private readonly cancellations = new Set<string>()

  constructor(private readonly now: () => Date = () => new Date()) {}

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
    this.jobs.set(job.id, job)
    this.pages.set(job.id, [])
    return structuredClone(job)
  }

  async getJob(jobId: string): Promise<CrawlJob | null> {
    const job = this.jobs.get(jobId)
    return job ? structuredClone(job) : null
  }

  async markRunning(jobId: string, startedAt: Date): Promise<boolean> {
    const job = this.jobs.get(jobId)
    if (!job || job.status !== 'pending') return false
    job.status = 'running'
    job.startedAt = startedAt
    return true
  }

  async appendPage(jobId: string, page: FetchedPage, progress: CrawlProgress): Promise<void> {
    const job = this.require(jobId)
    this.pages.get(jobId)?.push(structuredClone(page))
    Object.assign(job, progress)
  }

  async updateProgress(jobId: string, progress: CrawlProgress): Promise<void> {
    Object.assign(this.require(jobId), progress)
  }

  async markTerminal(jobId: string, status: TerminalStatus, update: TerminalUpdate): Promise<void> {
    const job = this.require(jobId)
    job.status = status
    job.completedAt = update.completedAt
    job.errorMessage = update.errorMessage ?? null
  }

  async requestCancellation(jobId: string): Promise<void> {
    this.require(jobId)
    this.cancellations.add(jobId)
  }

  async isCancelled(jobId: string): Promise<boolean> {
    return this.cancellations.has(jobId)
  }

  async listPages(jobId: string): Promise<FetchedPage[]> {
    return structuredClone(this.pages.get(jobId) ?? [])
  }

  private require(jobId: string): CrawlJob {
    const job = this.jobs.get(jobId)
    if (!job) {
      throw new Error(`Crawl job '${jobId}' not found`)
    }
    return job
  }
}

export class InMemorySearchSessionStore implements SearchSessionStore {
  private readonly sessions = new Map<string, SearchSession>()

  async saveSession(session: SearchSession): Promise<void> {
    this.sessions.set(session.id, structuredClone(session))
  }

  async getSession(sessionId: string): Promise<SearchSession | null> {
    const session = this.sessions.get(sessionId)
    return session ? structuredClone(session) : null
  }
}
