/**
 * Retrieval service
 *
 * Entry points for the search-and-crawl pipeline: run a search session,
 * create crawl jobs (directly or seeded from a session), start and cancel
 * them, and report statistics.
 */

import { createId } from '@paralleldrive/cuid2'
import type { ILogger } from '@observatory/logger'
import { loggers } from './config/logger.js'
import type { Settings } from './config/settings.js'
import { createWorkflowLogger } from './config/structured-log.js'
import { InvalidStateError, ValidationError, classifyError } from './errors.js'
import { validateCrawlConfig } from './jobs/config.js'
import type { CrawlJobRunner } from './jobs/runner.js'
import { computeJobStatistics, type JobStatistics } from './jobs/statistics.js'
import type { CrawlConfigInput, CrawlJob, JobStore } from './jobs/types.js'
import { recordSearchCompleted } from './metrics.js'
import { SearchOrchestrator } from './search/orchestrator.js'
import { createSearchProvider } from './search/registry.js'
import {
  PROVIDER_NAMES,
  isProviderName,
  type CredentialProvider,
  type ProviderCredentials,
  type ProviderName,
  type SearchOptions,
  type SearchProvider,
  type SearchResultSet,
  type SearchSession,
  type SearchSessionStore,
} from './search/types.js'

export type ProviderFactory = (name: ProviderName, credentials: ProviderCredentials | null) => SearchProvider

export interface RetrievalServiceDependencies {
  jobStore: JobStore
  sessionStore: SearchSessionStore
  credentials: CredentialProvider
  runner: CrawlJobRunner
  searchSettings?: Settings['search']
  /** Overrides provider construction (tests, custom providers) */
  providerFactory?: ProviderFactory
  logger?: ILogger
  now?: () => Date
}

export class RetrievalService {
  private readonly jobStore: JobStore
  private readonly sessionStore: SearchSessionStore
  private readonly credentials: CredentialProvider
  private readonly runner: CrawlJobRunner
  private readonly providerFactory: ProviderFactory
  private readonly logger: ILogger
  private readonly now: () => Date

  constructor(deps: RetrievalServiceDependencies) {
    this.jobStore = deps.jobStore
    this.sessionStore = deps.sessionStore
    this.credentials = deps.credentials
    this.runner = deps.runner
    this.providerFactory =
      deps.providerFactory ??
      ((name, credentials) => createSearchProvider(name, credentials, { search: deps.searchSettings }))
    this.logger = deps.logger ?? loggers.jobs
    this.now = deps.now ?? (() => new Date())
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Search
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Run every query against one provider and persist the session.
   * Nothing is saved when a provider call fails.
   *
   * @returns the search session id
   */
  async startSearch(
    queries: string[],
    providerName: string,
    maxResults: number,
    options?: SearchOptions
  ): Promise<string> {
    if (!isProviderName(providerName)) {
      throw new ValidationError(
        `Unknown search provider '${providerName}'. Expected one of: ${PROVIDER_NAMES.join(', ')}`,
        { providerName }
      )
    }

    const cleaned = queries.map((query) => query.trim()).filter((query) => query.length > 0)
    if (cleaned.length === 0) {
      throw new ValidationError('At least one non-empty query is required')
    }

    const sessionId = createId()
    const log = createWorkflowLogger(this.logger, {
      workflow: 'search',
      stage: 'session',
      sessionId,
      provider: providerName,
    })
    const startedAt = Date.now()

    const credentials = await this.credentials.getProviderCredentials(providerName)
    const provider = this.providerFactory(providerName, credentials)

    let resultSet: SearchResultSet
    try {
      resultSet = await new SearchOrchestrator(provider).run({ queries: cleaned, maxResults, options })
    } catch (error) {
      const classified = classifyError(error)
      log.error('SEARCH_FAILED', { code: classified.code, category: classified.category }, error)
      throw error
    }

    const session: SearchSession = {
      id: sessionId,
      providerName,
      queries: cleaned,
      maxResults,
      createdAt: this.now(),
      ...resultSet,
    }
    await this.sessionStore.saveSession(session)

    recordSearchCompleted({
      sessionId,
      provider: providerName,
      queryCount: cleaned.length,
      hitCount: resultSet.results.reduce((sum, result) => sum + result.hits.length, 0),
      uniqueUrlCount: resultSet.uniqueUrls.length,
      durationMs: Date.now() - startedAt,
    })

    return sessionId
  }

  async getSearchSession(sessionId: string): Promise<SearchSession | null> {
    return this.sessionStore.getSession(sessionId)
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Crawl jobs
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Validate the configuration and create a pending job.
   */
  async createCrawlJob(input: CrawlConfigInput): Promise<CrawlJob> {
    const config = validateCrawlConfig(input)
    const job = await this.jobStore.createJob(config)
    this.logger.info('Crawl job created', {
      jobId: job.id,
      seeds: config.seedUrls.length,
      maxDepth: config.maxDepth,
      domainPolicy: config.domainPolicy,
    })
    return job
  }

  /**
   * Create a pending job seeded with a session's unique URLs, in rank order.
   */
  async createCrawlJobFromSearch(
    sessionId: string,
    input: Omit<CrawlConfigInput, 'seedUrls'> = {}
  ): Promise<CrawlJob> {
    const session = await this.sessionStore.getSession(sessionId)
    if (!session) {
      throw new ValidationError(`Search session '${sessionId}' not found`, { sessionId })
    }
    return this.createCrawlJob({ ...input, seedUrls: session.uniqueUrls, searchSessionId: sessionId })
  }

  /**
   * pending → running, then hand the job to the runner.
   */
  async startCrawlJob(jobId: string): Promise<void> {
    const job = await this.requireJob(jobId)
    if (job.status !== 'pending') {
      throw new InvalidStateError(`Crawl job '${jobId}' cannot be started from status '${job.status}'`, {
        jobId,
        status: job.status,
      })
    }

    const started = await this.jobStore.markRunning(jobId, this.now())
    if (!started) {
      throw new InvalidStateError(`Crawl job '${jobId}' was started concurrently`, { jobId })
    }

    try {
      await this.runner.dispatch(jobId)
    } catch (error) {
      const classified = classifyError(error)
      this.logger.error('Crawl job dispatch failed', { jobId, code: classified.code }, error)
      await this.jobStore.markTerminal(jobId, 'failed', {
        completedAt: this.now(),
        errorMessage: `Dispatch failed: ${classified.message}`,
      })
      throw error
    }
    this.logger.info('Crawl job started', { jobId })
  }

  /**
   * Request cancellation of a running job. No-op for any other status.
   */
  async cancelCrawlJob(jobId: string): Promise<void> {
    const job = await this.jobStore.getJob(jobId)
    if (!job || job.status !== 'running') return

    await this.jobStore.requestCancellation(jobId)
    this.logger.info('Crawl job cancellation requested', { jobId })
  }

  async getCrawlJob(jobId: string): Promise<CrawlJob | null> {
    return this.jobStore.getJob(jobId)
  }

  async getJobStatistics(jobId: string): Promise<JobStatistics> {
    const job = await this.requireJob(jobId)
    const pages = await this.jobStore.listPages(jobId)
    return computeJobStatistics(job, pages)
  }

  private async requireJob(jobId: string): Promise<CrawlJob> {
    const job = await this.jobStore.getJob(jobId)
    if (!job) {
      throw new ValidationError(`Crawl job '${jobId}' not found`, { jobId })
    }
    return job
  }
}
