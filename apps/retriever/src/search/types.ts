/**
 * Search Layer Types
 *
 * Shared shapes for the provider clients, the orchestrator and the
 * credential lookup.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Providers
// ═══════════════════════════════════════════════════════════════════════════════

export const PROVIDER_NAMES = ['google_custom', 'serpapi', 'serper'] as const

export type ProviderName = (typeof PROVIDER_NAMES)[number]

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}

export type SerpApiEngine = 'google' | 'bing' | 'duckduckgo'

/**
 * Per-call options. Each provider reads the subset it supports and
 * ignores the rest.
 */
export interface SearchOptions {
  /** Interface language (hl) */
  locale?: string
  /** Country code (gl) */
  country?: string
  /** Restrict results to a document language, e.g. "lang_da" (google_custom) */
  language?: string
  /** Free-text location (serpapi, serper) */
  location?: string
  device?: 'desktop' | 'mobile'
  safeSearch?: boolean
  /** Inclusive date range (serpapi google engine) */
  dateFrom?: Date
  dateTo?: Date
  engine?: SerpApiEngine
}

// ═══════════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One ranked result. Rank is 1-based and increases across pages.
 */
export interface SearchHit {
  readonly url: string
  readonly title: string
  readonly description: string
  readonly rank: number
  readonly domain: string
}

export interface SearchProvider {
  readonly name: ProviderName

  search(query: string, maxResults: number, options?: SearchOptions): Promise<SearchHit[]>
}

export interface QueryResult {
  query: string
  hits: SearchHit[]
}

export interface SearchResultSet {
  results: QueryResult[]
  /** Canonical URLs across all queries, first occurrence order */
  uniqueUrls: string[]
}

export interface SearchSession extends SearchResultSet {
  id: string
  providerName: ProviderName
  queries: string[]
  maxResults: number
  createdAt: Date
}

export interface SearchSessionStore {
  saveSession(session: SearchSession): Promise<void>
  getSession(sessionId: string): Promise<SearchSession | null>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Credentials
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProviderCredentials {
  apiKey: string
  /** Programmable Search Engine id (google_custom only) */
  searchEngineId?: string
}

export interface CredentialProvider {
  getProviderCredentials(providerName: ProviderName): Promise<ProviderCredentials | null>
}
