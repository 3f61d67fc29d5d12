/**
 * Job runners
 *
 * A runner takes a job that has just moved to running and gets it executed
 * somewhere: in this process, or on a queue worker.
 */

import type { ILogger } from '@observatory/logger'
import { loggers } from '../config/logger.js'
import type { CrawlExecutor } from './executor.js'

export interface CrawlJobRunner {
  /** Resolves once the run is scheduled, not when it finishes */
  dispatch(jobId: string): Promise<void>
}

/**
 * Executes crawls in-process. In-flight runs are tracked so callers (and
 * tests) can wait for them with drain().
 */
export class InlineJobRunner implements CrawlJobRunner {
  private readonly inFlight = new Set<Promise<void>>()
  private readonly logger: ILogger

  constructor(
    private readonly executor: Pick<CrawlExecutor, 'execute'>,
    logger?: ILogger
  ) {
    this.logger = logger ?? loggers.jobs
  }

  async dispatch(jobId: string): Promise<void> {
    const run: Promise<void> = this.executor
      .execute(jobId)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error('Inline crawl run failed', { jobId }, error)
        }
      )
      .finally(() => {
        this.inFlight.delete(run)
      })
    this.inFlight.add(run)
  }

  get pending(): number {
    return this.inFlight.size
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }
}
