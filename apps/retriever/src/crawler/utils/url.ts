/**
 * URL Canonicalization Utilities
 *
 * Canonical form used for duplicate suppression (search dedup, crawl
 * visited set):
 * 1. Lowercase scheme and hostname, drop default ports
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, source, campaign
 * 3. Remove empty query parameters, sort the rest
 * 4. Remove fragment identifiers (#...)
 * 5. Remove trailing slash (except root path)
 */

import * as psl from 'psl'

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
])

export function parseHttpUrl(url: string): URL | null {
  try {
    const parsed = new URL(url)
    if ((parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname) {
      return parsed
    }
    return null
  } catch {
    return null
  }
}

export function isValidUrl(url: string): boolean {
  return parseHttpUrl(url) !== null
}

/**
 * Canonicalize an http(s) URL. Returns null for anything else.
 */
export function canonicalizeUrl(url: string): string | null {
  const parsed = parseHttpUrl(url.trim())
  if (!parsed) return null

  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }
  parsed.searchParams.sort()

  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Lowercased hostname with a leading "www." removed.
 */
export function normalizeHost(hostname: string): string {
  const host = hostname.toLowerCase().replace(/\.$/, '')
  return host.startsWith('www.') ? host.slice(4) : host
}

/**
 * Registrable domain (eTLD+1) via the Public Suffix List, so
 * "www.example.co.uk" → "example.co.uk". Falls back to the hostname.
 */
export function getRegistrableDomain(url: string): string {
  const parsed = parseHttpUrl(url)
  if (!parsed) return ''
  const hostname = parsed.hostname.toLowerCase()
  return psl.get(hostname) ?? hostname
}
