/**
 * Provider factory
 *
 * Provider selection is a closed set keyed by ProviderName. Adding a provider
 * means adding a variant here and in PROVIDER_NAMES.
 */

import { ConfigError } from '../errors.js'
import type { Settings } from '../config/settings.js'
import { GoogleCustomSearchProvider } from './providers/google-custom.js'
import { SerpApiSearchProvider } from './providers/serpapi.js'
import { SerperSearchProvider } from './providers/serper.js'
import type { Sleep } from './providers/base.js'
import type { ProviderCredentials, ProviderName, SerpApiEngine } from './types.js'

export type AnySearchProvider =
  | GoogleCustomSearchProvider
  | SerpApiSearchProvider
  | SerperSearchProvider

export interface ProviderFactoryOptions {
  search?: Partial<Settings['search']>
  serpApiEngine?: SerpApiEngine
  sleep?: Sleep
}

/**
 * Build a provider from its credentials.
 * Throws ConfigError when credentials are missing or incomplete.
 */
export function createSearchProvider(
  name: ProviderName,
  credentials: ProviderCredentials | null,
  options: ProviderFactoryOptions = {}
): AnySearchProvider {
  if (!credentials) {
    throw new ConfigError(`No credentials configured for provider ${name}`, { provider: name })
  }

  const timeoutSeconds = options.search?.timeoutSeconds
  const rateLimit = options.search?.rateLimits?.[name]

  switch (name) {
    case 'google_custom':
      return new GoogleCustomSearchProvider({
        apiKey: credentials.apiKey,
        searchEngineId: credentials.searchEngineId,
        timeoutSeconds,
        rateLimit,
      })
    case 'serpapi':
      return new SerpApiSearchProvider({
        apiKey: credentials.apiKey,
        engine: options.serpApiEngine,
        timeoutSeconds,
        rateLimit,
      })
    case 'serper':
      return new SerperSearchProvider({
        apiKey: credentials.apiKey,
        maxRetries: options.search?.serperMaxRetries,
        sleep: options.sleep,
        timeoutSeconds,
        rateLimit,
      })
  }
}
