/**
 * Crawler Fetch Types
 *
 * The Fetcher interface lets the crawler run against real HTTP or an
 * in-memory site in tests. Fetchers report failures as results rather than
 * throwing.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Retries after the first attempt for transient failures */
  maxRetries?: number

  /** Check robots.txt before fetching (default: true) */
  respectRobots?: boolean

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Polled before each retry; a true result stops retrying */
  isCancelled?: () => Promise<boolean>
}

export const DEFAULT_USER_AGENT = 'IssueObservatoryBot/1.0 (+https://example.org/observatory-bot)'

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9,da;q=0.8',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
  maxRetries: 3,
  respectRobots: true,
} as const

export type FetchResultStatus =
  | 'ok'
  | 'error'
  | 'blocked'
  | 'timeout'
  | 'too_large'
  | 'robots_blocked'
  | 'not_html'
  | 'cancelled'

export interface FetchResult {
  status: FetchResultStatus
  /** URL after redirects */
  finalUrl: string
  statusCode?: number
  html?: string
  contentHash?: string
  error?: string
  durationMs: number
  attempts: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Robots.txt Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RobotsPolicy {
  /**
   * Whether the URL may be fetched. True when robots.txt is missing or
   * cannot be retrieved.
   */
  isAllowed(url: string): Promise<boolean>

  /**
   * Crawl-delay in seconds declared for the URL's origin, if any.
   */
  getCrawlDelay(url: string): Promise<number | null>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}
