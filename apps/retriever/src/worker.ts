#!/usr/bin/env node

/**
 * Crawl Worker
 * Consumes the crawl queue and runs jobs against the Redis job store.
 */

// Load environment variables first, before any other imports
import './env.js'

import { createRetrievalContext } from './app.js'
import { logger } from './config/logger.js'
import { loadSettings } from './config/settings.js'
import { ConfigError } from './errors.js'
import { startCrawlWorker } from './jobs/queue.js'

const settings = loadSettings()

if (settings.storeBackend !== 'redis') {
  throw new ConfigError('The crawl worker requires STORE_BACKEND=redis so jobs are shared with producers')
}

const context = createRetrievalContext(settings)
const redis = context.redis
if (!redis) {
  throw new ConfigError('Redis connection unavailable')
}

const worker = startCrawlWorker({
  connection: redis,
  lockClient: redis,
  executor: context.executor,
  concurrency: settings.workerConcurrency,
})

logger.info('Crawl worker running', { concurrency: settings.workerConcurrency })

// Track if shutdown is in progress to prevent double-shutdown
let isShuttingDown = false

const shutdown = async (signal: string): Promise<void> => {
  if (isShuttingDown) return
  isShuttingDown = true

  logger.info('Shutting down', { signal })
  const shutdownStart = Date.now()

  try {
    // Waits for the current job to finish
    await worker.close()
    await context.close()
    logger.info('Shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    logger.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})
process.on('SIGINT', () => {
  void shutdown('SIGINT')
})
