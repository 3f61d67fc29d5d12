/**
 * Robots.txt Policy Implementation
 *
 * Policy rules:
 * 1. Use the group for our agent token if present, otherwise `User-agent: *`
 * 2. Allow/Disallow by longest matching pattern (`*` and `$` supported);
 *    on a tie, Allow wins
 * 3. Crawl-delay is reported as declared, clamped to maxCrawlDelay
 * 4. Missing (4xx), unreachable or unreadable robots.txt: allow everything
 * 5. Cache per origin (default: 60 minutes)
 */

import type { RobotsPolicy } from '../types.js'
import { DEFAULT_USER_AGENT } from '../types.js'
import { loggers } from '../../config/logger.js'
import { errorMessage } from '../../errors.js'

const log = loggers.fetch

export interface RobotsRule {
  allow: boolean
  pattern: string
}

export interface RobotsRules {
  rules: RobotsRule[]
  /** Crawl-delay in seconds (null if not specified) */
  crawlDelay: number | null
}

interface CachedRules extends RobotsRules {
  cachedAt: number
}

export interface RobotsPolicyOptions {
  /** Cache TTL in ms (default: 60 minutes) */
  cacheTtlMs?: number
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number
  /** Full User-Agent header sent when fetching robots.txt */
  userAgent?: string
  /** Max crawl delay honoured, in seconds (default: 60) */
  maxCrawlDelay?: number
  /** Clock in epoch ms (default: Date.now) */
  now?: () => number
}

const DEFAULT_OPTIONS: Required<RobotsPolicyOptions> = {
  cacheTtlMs: 60 * 60 * 1000,
  fetchTimeoutMs: 10000,
  userAgent: DEFAULT_USER_AGENT,
  maxCrawlDelay: 60,
  now: Date.now,
}

const ALLOW_ALL: RobotsRules = { rules: [], crawlDelay: null }

/**
 * Product token of a User-Agent string, lowercased
 * ("IssueObservatoryBot/1.0 (+...)" → "issueobservatorybot").
 */
export function agentToken(userAgent: string): string {
  return userAgent.split(/[\s/]/)[0]?.toLowerCase() ?? ''
}

/**
 * Parse robots.txt content into the rule set for one agent.
 */
export function parseRobotsTxt(text: string, agent: string): RobotsRules {
  const token = agent.toLowerCase()
  const groups: { agents: string[]; rules: RobotsRule[]; crawlDelay: number | null }[] = []
  let current: (typeof groups)[number] | null = null
  let lastWasAgent = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [], crawlDelay: null }
        groups.push(current)
      }
      current.agents.push(value.toLowerCase())
      lastWasAgent = true
      continue
    }

    lastWasAgent = false
    if (!current) continue

    if (directive === 'disallow' || directive === 'allow') {
      // Empty Disallow means allow all
      if (!value) continue
      current.rules.push({ allow: directive === 'allow', pattern: value })
    } else if (directive === 'crawl-delay') {
      const delay = parseFloat(value)
      if (!Number.isNaN(delay) && delay >= 0) {
        current.crawlDelay = delay
      }
    }
  }

  const specific = groups.filter((g) => token && g.agents.some((a) => a !== '*' && token.includes(a)))
  const selected = specific.length > 0 ? specific : groups.filter((g) => g.agents.includes('*'))

  return {
    rules: selected.flatMap((g) => g.rules),
    crawlDelay: selected.reduce<number | null>((delay, g) => g.crawlDelay ?? delay, null),
  }
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$')
  const body = anchored ? pattern.slice(0, -1) : pattern
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return new RegExp(`^${source}${anchored ? '$' : ''}`)
}

/**
 * Whether a path (with query) may be fetched under the given rules.
 */
export function isPathAllowed(path: string, rules: RobotsRule[]): boolean {
  let best: RobotsRule | null = null
  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(path)) continue
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule
    }
  }
  return best ? best.allow : true
}

/**
 * Robots.txt policy with per-origin caching. Permissive when robots.txt
 * cannot be obtained.
 */
export class RobotsPolicyImpl implements RobotsPolicy {
  private readonly options: Required<RobotsPolicyOptions>
  private readonly cache = new Map<string, CachedRules>()

  constructor(options: RobotsPolicyOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options }
  }

  async isAllowed(url: string): Promise<boolean> {
    const parsed = new URL(url)
    const rules = await this.getRules(parsed.origin)
    return isPathAllowed(parsed.pathname + parsed.search, rules.rules)
  }

  async getCrawlDelay(url: string): Promise<number | null> {
    const rules = await this.getRules(new URL(url).origin)
    if (rules.crawlDelay === null) return null
    return Math.min(this.options.maxCrawlDelay, rules.crawlDelay)
  }

  private async getRules(origin: string): Promise<RobotsRules> {
    const cached = this.cache.get(origin)
    const now = this.options.now()

    if (cached && now - cached.cachedAt < this.options.cacheTtlMs) {
      return cached
    }

    const rules = await this.fetchRules(origin)
    this.cache.set(origin, { ...rules, cachedAt: now })
    return rules
  }

  private async fetchRules(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.options.fetchTimeoutMs)

    try {
      const response = await fetch(robotsUrl, {
        method: 'GET',
        headers: { 'User-Agent': this.options.userAgent },
        signal: controller.signal,
      })

      if (!response.ok) {
        log.debug('robots.txt unavailable, allowing all', { origin, status: response.status })
        return ALLOW_ALL
      }

      return parseRobotsTxt(await response.text(), agentToken(this.options.userAgent))
    } catch (error) {
      log.debug('robots.txt fetch failed, allowing all', { origin, error: errorMessage(error) })
      return ALLOW_ALL
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
