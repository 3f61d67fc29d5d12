/**
 * Retriever settings
 *
 * Parsed once from the environment into an explicit value that is passed to
 * constructors. Nothing below this module reads process.env directly.
 */

import { z } from 'zod'
import { parseRedisConfig, type RedisConfig } from '@observatory/redis'
import type { ProviderName } from '../search/types.js'

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
  })

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback)
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback)

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  GOOGLE_API_KEY: optionalString,
  GOOGLE_SEARCH_ENGINE_ID: optionalString,
  SERPAPI_KEY: optionalString,
  SERPER_API_KEY: optionalString,

  SEARCH_TIMEOUT_SECONDS: positiveNumber(30),
  SERPER_MAX_RETRIES: nonNegativeInt(3),
  GOOGLE_RATE_LIMIT_PER_MINUTE: positiveNumber(100),
  SERPAPI_RATE_LIMIT_PER_HOUR: positiveNumber(100),
  SERPER_RATE_LIMIT_PER_MINUTE: positiveNumber(60),

  CRAWLER_USER_AGENT: z
    .string()
    .min(1)
    .default('IssueObservatoryBot/1.0 (+https://example.org/observatory-bot)'),
  CRAWLER_MAX_PAGE_BYTES: positiveNumber(10 * 1024 * 1024),
  ROBOTS_CACHE_TTL_MINUTES: positiveNumber(60),

  STORE_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  JOB_RUNNER: z.enum(['inline', 'queue']).default('inline'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
})

export interface RateLimitSettings {
  capacity: number
  periodSeconds: number
}

export interface Settings {
  nodeEnv: 'development' | 'production' | 'test'
  credentials: {
    googleApiKey?: string
    googleSearchEngineId?: string
    serpapiKey?: string
    serperApiKey?: string
  }
  search: {
    timeoutSeconds: number
    serperMaxRetries: number
    rateLimits: Record<ProviderName, RateLimitSettings>
  }
  crawler: {
    userAgent: string
    maxPageBytes: number
    robotsCacheTtlMs: number
  }
  redis: RedisConfig
  storeBackend: 'memory' | 'redis'
  jobRunner: 'inline' | 'queue'
  workerConcurrency: number
}

/**
 * Parse settings from an environment map.
 * Throws ZodError on malformed values.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.parse(env)

  return {
    nodeEnv: parsed.NODE_ENV,
    credentials: {
      googleApiKey: parsed.GOOGLE_API_KEY,
      googleSearchEngineId: parsed.GOOGLE_SEARCH_ENGINE_ID,
      serpapiKey: parsed.SERPAPI_KEY,
      serperApiKey: parsed.SERPER_API_KEY,
    },
    search: {
      timeoutSeconds: parsed.SEARCH_TIMEOUT_SECONDS,
      serperMaxRetries: parsed.SERPER_MAX_RETRIES,
      rateLimits: {
        google_custom: { capacity: parsed.GOOGLE_RATE_LIMIT_PER_MINUTE, periodSeconds: 60 },
        serpapi: { capacity: parsed.SERPAPI_RATE_LIMIT_PER_HOUR, periodSeconds: 3600 },
        serper: { capacity: parsed.SERPER_RATE_LIMIT_PER_MINUTE, periodSeconds: 60 },
      },
    },
    crawler: {
      userAgent: parsed.CRAWLER_USER_AGENT,
      maxPageBytes: parsed.CRAWLER_MAX_PAGE_BYTES,
      robotsCacheTtlMs: parsed.ROBOTS_CACHE_TTL_MINUTES * 60 * 1000,
    },
    redis: parseRedisConfig(env),
    storeBackend: parsed.STORE_BACKEND,
    jobRunner: parsed.JOB_RUNNER,
    workerConcurrency: parsed.WORKER_CONCURRENCY,
  }
}
