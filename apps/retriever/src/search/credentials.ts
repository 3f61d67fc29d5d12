import type { Settings } from '../config/settings.js'
import type { CredentialProvider, ProviderCredentials, ProviderName } from './types.js'

/**
 * Credentials read from settings (environment variables).
 * Returns null when the provider has no key configured.
 */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly credentials: Settings['credentials']) {}

  async getProviderCredentials(providerName: ProviderName): Promise<ProviderCredentials | null> {
    const { googleApiKey, googleSearchEngineId, serpapiKey, serperApiKey } = this.credentials

    switch (providerName) {
      case 'google_custom':
        return googleApiKey ? { apiKey: googleApiKey, searchEngineId: googleSearchEngineId } : null
      case 'serpapi':
        return serpapiKey ? { apiKey: serpapiKey } : null
      case 'serper':
        return serperApiKey ? { apiKey: serperApiKey } : null
    }
  }
}

/**
 * Fixed credentials, keyed by provider.
 */
export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly credentials: Partial<Record<ProviderName, ProviderCredentials>>) {}

  async getProviderCredentials(providerName: ProviderName): Promise<ProviderCredentials | null> {
    return this.credentials[providerName] ?? null
  }
}
