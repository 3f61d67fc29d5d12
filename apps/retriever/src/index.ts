export { createRetrievalContext } from './app.js'
export type { RetrievalContext, RetrievalContextOverrides } from './app.js'
export { RetrievalService } from './service.js'
export type { ProviderFactory, RetrievalServiceDependencies } from './service.js'
export { loadSettings } from './config/settings.js'
export type { Settings, RateLimitSettings } from './config/settings.js'
export * from './errors.js'

// Search
export { TokenBucket } from './search/rate-limiter.js'
export type { RateLimiterState } from './search/rate-limiter.js'
export { SearchOrchestrator } from './search/orchestrator.js'
export { createSearchProvider } from './search/registry.js'
export type { AnySearchProvider } from './search/registry.js'
export { GoogleCustomSearchProvider } from './search/providers/google-custom.js'
export { SerpApiSearchProvider } from './search/providers/serpapi.js'
export { SerperSearchProvider } from './search/providers/serper.js'
export { EnvCredentialProvider, StaticCredentialProvider } from './search/credentials.js'
export * from './search/types.js'

// Crawl
export { Crawler } from './crawler/crawler.js'
export type { CrawlOutcome, CrawlerDependencies } from './crawler/crawler.js'
export { LinkFilter } from './crawler/link-filter.js'
export type { LinkVerdict, LinkRejectionReason } from './crawler/link-filter.js'
export { HttpFetcher } from './crawler/fetch/http-fetcher.js'
export { RobotsPolicyImpl } from './crawler/fetch/robots.js'
export { canonicalizeUrl } from './crawler/utils/url.js'
export type { Fetcher, FetchOptions, FetchResult, RobotsPolicy } from './crawler/types.js'

// Jobs
export { validateCrawlConfig } from './jobs/config.js'
export { CrawlExecutor } from './jobs/executor.js'
export { InlineJobRunner } from './jobs/runner.js'
export type { CrawlJobRunner } from './jobs/runner.js'
export { QueueJobRunner, createCrawlQueue, startCrawlWorker, QUEUE_NAMES } from './jobs/queue.js'
export type { CrawlJobData } from './jobs/queue.js'
export { InMemoryJobStore, InMemorySearchSessionStore } from './jobs/store/memory.js'
export { RedisJobStore, RedisSearchSessionStore } from './jobs/store/redis.js'
export type { RedisCommands } from './jobs/store/redis.js'
export { computeJobStatistics } from './jobs/statistics.js'
export type { JobStatistics, JobTotals } from './jobs/statistics.js'
export * from './jobs/types.js'
