import type { AppConfig } from '@/config';
import type { ProviderHttpOptions, SearchProviderAdapter } from '@/services/search/providers/types';
import { createSerpApiProvider } from '@/services/search/providers/serpapi';
import { createBraveProvider } from '@/services/search/providers/brave';
import { createDuckDuckGoProvider } from '@/services/search/providers/duckduckgo';

export type { SearchProviderAdapter } from '@/services/search/providers/types';

export function createSearchProviders(
  config: AppConfig,
  fetchFn?: typeof globalThis.fetch,
): Record<string, SearchProviderAdapter> {
  const http: ProviderHttpOptions = { timeoutMs: config.httpTimeoutMs, fetchFn };
  return {
    serpapi: createSerpApiProvider(config.search.serpapiKey, http),
    brave: createBraveProvider(config.search.braveKey, http),
    duckduckgo: createDuckDuckGoProvider(http),
  };
}
