/**
 * Link admission rules for the crawl frontier.
 *
 * A pure predicate over (candidate URL, anchor URL, config). Visited and
 * queued URLs are tracked by the crawler, not here.
 */

import type { CrawlConfig, DomainPolicy } from '../jobs/types.js'
import { normalizeHost, parseHttpUrl } from './utils/url.js'

export type LinkRejectionReason =
  | 'invalid_url'
  | 'excluded_extension'
  | 'excluded_domain'
  | 'outside_domain'
  | 'tld_not_allowed'

export type LinkVerdict = { admissible: true } | { admissible: false; reason: LinkRejectionReason }

/**
 * Documents, archives, media and binaries that are never crawled.
 */
export const EXCLUDED_EXTENSIONS = new Set([
  'pdf', 'doc', 'docx', 'xls', 'xlsx', 'ppt', 'pptx', 'odt', 'ods', 'rtf',
  'zip', 'rar', '7z', 'tar', 'gz', 'bz2',
  'jpg', 'jpeg', 'png', 'gif', 'bmp', 'svg', 'webp', 'ico', 'tif', 'tiff',
  'mp3', 'wav', 'ogg', 'mp4', 'avi', 'mov', 'wmv', 'webm', 'mkv',
  'exe', 'dmg', 'msi', 'apk', 'iso', 'bin',
  'css', 'js', 'json', 'xml', 'rss', 'woff', 'woff2', 'ttf', 'eot',
])

export type LinkFilterConfig = Pick<CrawlConfig, 'domainPolicy' | 'allowedTlds' | 'excludedDomains'>

function extensionOf(pathname: string): string | null {
  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1)
  const dot = lastSegment.lastIndexOf('.')
  if (dot <= 0 || dot === lastSegment.length - 1) return null
  return lastSegment.slice(dot + 1).toLowerCase()
}

function normalizeDomainEntry(entry: string): string {
  const trimmed = entry.trim().toLowerCase()
  // Accept bare hosts and full URLs
  const host = parseHttpUrl(trimmed)?.hostname ?? trimmed.replace(/\/.*$/, '')
  return normalizeHost(host)
}

function normalizeTld(tld: string): string {
  const trimmed = tld.trim().toLowerCase()
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`
}

export class LinkFilter {
  private readonly domainPolicy: DomainPolicy
  private readonly allowedTlds: string[]
  private readonly excludedDomains: string[]

  constructor(config: LinkFilterConfig) {
    this.domainPolicy = config.domainPolicy
    this.allowedTlds = (config.allowedTlds ?? []).map(normalizeTld).filter((tld) => tld.length > 1)
    this.excludedDomains = (config.excludedDomains ?? []).map(normalizeDomainEntry).filter(Boolean)
  }

  /**
   * Decide whether `url` may join the frontier. `anchorUrl` is the seed the
   * crawl path started from; same_domain compares hosts against it.
   */
  evaluate(url: string, anchorUrl: string): LinkVerdict {
    const parsed = parseHttpUrl(url)
    if (!parsed) return { admissible: false, reason: 'invalid_url' }

    const extension = extensionOf(parsed.pathname)
    if (extension && EXCLUDED_EXTENSIONS.has(extension)) {
      return { admissible: false, reason: 'excluded_extension' }
    }

    const host = normalizeHost(parsed.hostname)
    if (this.isExcludedDomain(host)) {
      return { admissible: false, reason: 'excluded_domain' }
    }

    switch (this.domainPolicy) {
      case 'allow_all':
        return { admissible: true }
      case 'same_domain': {
        const anchor = parseHttpUrl(anchorUrl)
        if (!anchor || normalizeHost(anchor.hostname) !== host) {
          return { admissible: false, reason: 'outside_domain' }
        }
        return { admissible: true }
      }
      case 'allow_tld_list':
        return this.allowedTlds.some((tld) => `.${host}`.endsWith(tld))
          ? { admissible: true }
          : { admissible: false, reason: 'tld_not_allowed' }
    }
  }

  isAdmissible(url: string, anchorUrl: string): boolean {
    return this.evaluate(url, anchorUrl).admissible
  }

  /**
   * Excluded when equal to an entry or a subdomain of one.
   */
  isExcludedDomain(host: string): boolean {
    return this.excludedDomains.some((excluded) => host === excluded || host.endsWith(`.${excluded}`))
  }
}
