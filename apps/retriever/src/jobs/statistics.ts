/**
 * Job statistics computed from a job record and its pages.
 */

import { getRegistrableDomain } from '../crawler/utils/url.js'
import type { CrawlJob, CrawlJobStatus, FetchedPage, PageStatus } from './types.js'

export interface JobTotals {
  totalUrls: number
  urlsScraped: number
  urlsFailed: number
  urlsSkipped: number
  errorCount: number
  pages: Record<PageStatus, number>
  totalWordCount: number
  /** Mean over successful pages, rounded to one decimal */
  averageWordCount: number
}

export interface JobStatistics {
  jobId: string
  name: string | null
  status: CrawlJobStatus
  totals: JobTotals
  progressPercentage: number
  currentDepth: number
  maxDepth: number
  /** Pages per depth level, keyed by depth */
  depthDistribution: Record<number, number>
  /** Successful pages per language; "unknown" when undetected */
  languageDistribution: Record<string, number>
  /** Successful pages per registrable domain */
  domainDistribution: Record<string, number>
  createdAt: Date
  startedAt: Date | null
  completedAt: Date | null
  durationMs: number | null
  errorMessage: string | null
}

export const UNKNOWN_LANGUAGE = 'unknown'

function increment<K extends string | number>(counts: Record<K, number>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1
}

export function progressPercentage(urlsScraped: number, totalUrls: number): number {
  return (urlsScraped / Math.max(totalUrls, 1)) * 100
}

export function computeJobStatistics(job: CrawlJob, pages: FetchedPage[]): JobStatistics {
  const pageCounts: Record<PageStatus, number> = { success: 0, failed: 0, skipped: 0 }
  const depthDistribution: Record<number, number> = {}
  const languageDistribution: Record<string, number> = {}
  const domainDistribution: Record<string, number> = {}
  let totalWordCount = 0

  for (const page of pages) {
    pageCounts[page.status] += 1
    increment(depthDistribution, page.depthLevel)

    if (page.status !== 'success') continue

    totalWordCount += page.wordCount
    increment(languageDistribution, page.language ?? UNKNOWN_LANGUAGE)
    const domain = getRegistrableDomain(page.finalUrl)
    if (domain) increment(domainDistribution, domain)
  }

  const averageWordCount =
    pageCounts.success > 0 ? Math.round((totalWordCount / pageCounts.success) * 10) / 10 : 0

  return {
    jobId: job.id,
    name: job.config.name ?? null,
    status: job.status,
    totals: {
      totalUrls: job.totalUrls,
      urlsScraped: job.urlsScraped,
      urlsFailed: job.urlsFailed,
      urlsSkipped: job.urlsSkipped,
      errorCount: job.errorCount,
      pages: pageCounts,
      totalWordCount,
      averageWordCount,
    },
    progressPercentage: progressPercentage(job.urlsScraped, job.totalUrls),
    currentDepth: job.currentDepth,
    maxDepth: job.config.maxDepth,
    depthDistribution,
    languageDistribution,
    domainDistribution,
    createdAt: job.createdAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
    durationMs:
      job.startedAt && job.completedAt ? job.completedAt.getTime() - job.startedAt.getTime() : null,
    errorMessage: job.errorMessage,
  }
}
