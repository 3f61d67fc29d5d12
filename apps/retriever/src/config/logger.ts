/**
 * Retriever Logger Configuration
 *
 * Pre-configured loggers for retriever components
 */

import { createLogger } from '@observatory/logger'

export const logger = createLogger('retriever')

export const loggers = {
  search: logger.child('search'),
  crawler: logger.child('crawler'),
  fetch: logger.child('fetch'),
  jobs: logger.child('jobs'),
  queue: logger.child('queue'),
  redis: logger.child('redis'),
  metrics: logger.child('metrics'),
}
