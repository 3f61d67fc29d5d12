/**
 * Crawl job model and persistence contract.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export const DOMAIN_POLICIES = ['same_domain', 'allow_all', 'allow_tld_list'] as const

export type DomainPolicy = (typeof DOMAIN_POLICIES)[number]

export interface CrawlConfig {
  name?: string
  seedUrls: string[]
  /** 1..3; seeds are depth 1 */
  maxDepth: number
  domainPolicy: DomainPolicy
  /** Required for allow_tld_list, e.g. [".dk", ".eu"] */
  allowedTlds?: string[]
  /** Also excludes subdomains of each entry */
  excludedDomains?: string[]
  /** Politeness delay bounds in seconds */
  delayMin: number
  delayMax: number
  maxRetries: number
  timeoutSeconds: number
  respectRobots: boolean
  /** Set when seeds came from a search session */
  searchSessionId?: string
}

export type CrawlConfigInput = Partial<CrawlConfig> & Pick<CrawlConfig, 'seedUrls'>

export const DEFAULT_CRAWL_CONFIG = {
  maxDepth: 1,
  domainPolicy: 'same_domain',
  delayMin: 2,
  delayMax: 5,
  maxRetries: 3,
  timeoutSeconds: 30,
  respectRobots: true,
} as const satisfies Omit<CrawlConfig, 'seedUrls'>

// ═══════════════════════════════════════════════════════════════════════════════
// Job
// ═══════════════════════════════════════════════════════════════════════════════

export type CrawlJobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled'

export type TerminalStatus = Extract<CrawlJobStatus, 'completed' | 'failed' | 'cancelled'>

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['completed', 'failed', 'cancelled']

export function isTerminalStatus(status: CrawlJobStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.some((terminal) => terminal === status)
}

/**
 * Counter snapshot written alongside each page.
 * Counters never decrease while a job runs.
 */
export interface CrawlProgress {
  totalUrls: number
  urlsScraped: number
  urlsFailed: number
  urlsSkipped: number
  currentDepth: number
  errorCount: number
}

export const EMPTY_PROGRESS: Readonly<CrawlProgress> = Object.freeze({
  totalUrls: 0,
  urlsScraped: 0,
  urlsFailed: 0,
  urlsSkipped: 0,
  currentDepth: 0,
  errorCount: 0,
})

export interface CrawlJob extends CrawlProgress {
  id: string
  config: CrawlConfig
  status: CrawlJobStatus
  createdAt: Date
  startedAt: Date | null
  completedAt: Date | null
  errorMessage: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pages
// ═══════════════════════════════════════════════════════════════════════════════

export type PageStatus = 'success' | 'failed' | 'skipped'

export interface FetchedPage {
  url: string
  finalUrl: string
  httpStatus: number | null
  title: string | null
  metaDescription: string | null
  language: string | null
  extractedText: string
  wordCount: number
  outboundLinks: string[]
  depthLevel: number
  parentUrl: string | null
  status: PageStatus
  errorMessage: string | null
  contentHash: string | null
  fetchDurationMs: number
  fetchedAt: Date
}

// ═══════════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════════

export interface TerminalUpdate {
  completedAt: Date
  errorMessage?: string
}

/**
 * Persistence for jobs and their pages. Implementations must apply
 * appendPage (page row + counter snapshot) as one update.
 */
export interface JobStore {
  createJob(config: CrawlConfig): Promise<CrawlJob>
  getJob(jobId: string): Promise<CrawlJob | null>
  /** pending → running; false when the job was not pending */
  markRunning(jobId: string, startedAt: Date): Promise<boolean>
  appendPage(jobId: string, page: FetchedPage, progress: CrawlProgress): Promise<void>
  updateProgress(jobId: string, progress: CrawlProgress): Promise<void>
  markTerminal(jobId: string, status: TerminalStatus, update: TerminalUpdate): Promise<void>
  requestCancellation(jobId: string): Promise<void>
  isCancelled(jobId: string): Promise<boolean>
  listPages(jobId: string): Promise<FetchedPage[]>
}
