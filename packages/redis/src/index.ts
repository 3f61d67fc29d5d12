/**
 * @observatory/redis - Shared Redis connection utilities
 *
 * Single source of truth for how services build ioredis connections.
 * Connection details are always passed in explicitly; callers parse them
 * from their own settings (see parseRedisConfig for the env-variable form).
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@observatory/logger'

const log = createLogger('redis')

export interface RedisConfig {
  host: string
  port: number
  password?: string
  /** Logical database index (default: 0) */
  db?: number
  /** Connect over TLS (rediss:// or REDIS_TLS=true) */
  tls?: boolean
  /** Original URL when the config came from REDIS_URL (kept for logging only) */
  url?: string
}

// =============================================================================
// Configuration Parsing
// =============================================================================

/**
 * Parse Redis configuration from environment variables.
 *
 * Supports two modes:
 * - REDIS_URL: full URL (redis[s]://:password@host:port/db), parsed into components
 * - REDIS_HOST / REDIS_PORT / REDIS_PASSWORD / REDIS_DB / REDIS_TLS
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    let url: URL | null = null
    try {
      url = new URL(redisUrl)
    } catch {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT')
    }
    if (url) {
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
        db: parseDatabase(url.pathname.replace(/^\//, '')),
        tls: url.protocol === 'rediss:' ? true : undefined,
        url: redisUrl,
      }
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    db: parseDatabase(env.REDIS_DB ?? ''),
    tls: env.REDIS_TLS === 'true' ? true : undefined,
  }
}

function parseDatabase(value: string): number | undefined {
  if (!value) return undefined
  const db = Number(value)
  if (!Number.isInteger(db) || db < 0) {
    log.warn('Ignoring invalid Redis database index', { value })
    return undefined
  }
  return db
}

/**
 * Connection string for logs, password masked.
 */
export function describeRedisConnection(config: RedisConfig): string {
  return config.url
    ? config.url.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@')
    : `${config.host}:${config.port}`
}

// =============================================================================
// Connection Options
// =============================================================================

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

const CIRCUIT_BREAKER_ATTEMPTS = 20

/**
 * ioredis options with keepalive, capped reconnect backoff and a log-quieting
 * circuit breaker for prolonged outages.
 *
 * maxRetriesPerRequest is null so the same options work for BullMQ workers.
 */
export function createRedisOptions(config: RedisConfig): RedisOptions {
  const connection = describeRedisConnection(config)
  let consecutiveFailures = 0
  let lastCircuitBreakerLog = 0

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db ?? 0,
    tls: config.tls ? {} : undefined,
    maxRetriesPerRequest: null,
    keepAlive: 10000,
    connectTimeout: 10000,
    enableOfflineQueue: true,

    retryStrategy(times: number) {
      consecutiveFailures = times

      if (times > CIRCUIT_BREAKER_ATTEMPTS) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times, connection })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((code) => err.message.includes(code))) {
        if (consecutiveFailures <= CIRCUIT_BREAKER_ATTEMPTS) {
          log.warn('Reconnecting due to error', { error: err.message })
        }
        return true
      }
      return false
    },
  }
}

// =============================================================================
// Client Factory
// =============================================================================

/**
 * Create a dedicated client. Callers own its lifecycle and must quit() it.
 */
export function createRedisClient(config: RedisConfig): Redis {
  const client = new Redis(createRedisOptions(config))
  const connection = describeRedisConnection(config)

  client.on('error', (err: Error) => {
    log.error('Connection error', { connection, error: err.message })
  })
  client.on('connect', () => {
    log.info('Connected', { connection })
  })

  return client
}

export { Redis }
export type { RedisOptions }
export * from './lock.js'
