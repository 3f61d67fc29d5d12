/**
 * Retrieval Metrics
 *
 * No metrics backend is wired up; operational events are emitted as
 * structured log records with an event_name field.
 */

import { loggers } from './config/logger.js'
import type { CrawlJobStatus } from './jobs/types.js'
import type { ProviderName } from './search/types.js'

const log = loggers.metrics

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_URLS_FOR_ALERT = 20

export function recordResultsClamped(payload: {
  provider: ProviderName
  requested: number
  cap: number
}): void {
  log.info('SEARCH_RESULTS_CLAMPED', {
    event_name: 'SEARCH_RESULTS_CLAMPED',
    ...payload,
  })
}

export function recordProviderRetry(payload: {
  provider: ProviderName
  attempt: number
  delayMs: number
  reason: string
}): void {
  log.warn('SEARCH_PROVIDER_RETRY', {
    event_name: 'SEARCH_PROVIDER_RETRY',
    ...payload,
  })
}

export function recordSearchCompleted(payload: {
  sessionId: string
  provider: ProviderName
  queryCount: number
  hitCount: number
  uniqueUrlCount: number
  durationMs: number
}): void {
  log.info('SEARCH_COMPLETED', {
    event_name: 'SEARCH_COMPLETED',
    ...payload,
  })
}

export interface CrawlCompletedPayload {
  jobId: string
  status: CrawlJobStatus
  totalUrls: number
  urlsScraped: number
  urlsFailed: number
  urlsSkipped: number
  maxDepthReached: number
  durationMs: number
}

export function recordCrawlCompleted(payload: CrawlCompletedPayload): void {
  const attempted = payload.urlsScraped + payload.urlsFailed
  const failureRate = attempted > 0 ? payload.urlsFailed / attempted : 0

  log.info('CRAWL_JOB_COMPLETED', {
    event_name: 'CRAWL_JOB_COMPLETED',
    ...payload,
    failureRate,
  })

  if (attempted >= MIN_URLS_FOR_ALERT && failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('CRAWL_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'CRAWL_ALERT_HIGH_FAILURE_RATE',
      jobId: payload.jobId,
      failureRate,
      urlsAttempted: attempted,
    })
  }
}
