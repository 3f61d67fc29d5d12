/**
 * Crawl configuration validation
 *
 * Fills defaults and rejects configurations the crawler cannot run.
 */

import { z } from 'zod'
import { ValidationError } from '../errors.js'
import { DEFAULT_CRAWL_CONFIG, DOMAIN_POLICIES, type CrawlConfig } from './types.js'

export const MIN_DEPTH = 1
export const MAX_DEPTH = 3

const crawlConfigSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    seedUrls: z.array(z.string().trim().min(1)).min(1, 'At least one seed URL is required'),
    maxDepth: z
      .number()
      .int('maxDepth must be an integer')
      .min(MIN_DEPTH, `maxDepth must be between ${MIN_DEPTH} and ${MAX_DEPTH}`)
      .max(MAX_DEPTH, `maxDepth must be between ${MIN_DEPTH} and ${MAX_DEPTH}`)
      .default(DEFAULT_CRAWL_CONFIG.maxDepth),
    domainPolicy: z
      .enum(DOMAIN_POLICIES, {
        errorMap: () => ({ message: `domainPolicy must be one of: ${DOMAIN_POLICIES.join(', ')}` }),
      })
      .default(DEFAULT_CRAWL_CONFIG.domainPolicy),
    allowedTlds: z.array(z.string().trim().min(1)).optional(),
    excludedDomains: z.array(z.string().trim().min(1)).optional(),
    delayMin: z.number().min(0, 'delayMin must be >= 0').default(DEFAULT_CRAWL_CONFIG.delayMin),
    delayMax: z.number().min(0, 'delayMax must be >= 0').default(DEFAULT_CRAWL_CONFIG.delayMax),
    maxRetries: z
      .number()
      .int('maxRetries must be an integer')
      .min(0, 'maxRetries must be >= 0')
      .default(DEFAULT_CRAWL_CONFIG.maxRetries),
    timeoutSeconds: z
      .number()
      .positive('timeoutSeconds must be > 0')
      .default(DEFAULT_CRAWL_CONFIG.timeoutSeconds),
    respectRobots: z.boolean().default(DEFAULT_CRAWL_CONFIG.respectRobots),
    searchSessionId: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.delayMax < config.delayMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['delayMax'],
        message: 'delayMax must be >= delayMin',
      })
    }
    if (config.domainPolicy === 'allow_tld_list' && (config.allowedTlds ?? []).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['allowedTlds'],
        message: 'allowedTlds is required for the allow_tld_list policy',
      })
    }
  })

/**
 * Validate caller input and apply defaults.
 *
 * @throws ValidationError with the zod issues in `details.issues`
 */
export function validateCrawlConfig(input: unknown): CrawlConfig {
  const parsed = crawlConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    throw new ValidationError(`Invalid crawl configuration: ${issues[0]?.message ?? 'unknown error'}`, { issues })
  }
  return parsed.data
}
