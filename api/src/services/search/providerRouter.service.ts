/**
 * Provider Router: multi-provider search with failover
 *
 * Routes a topic across the registered search providers by weight, applies
 * per-provider rate limits, records success/failure in the registry and falls
 * back to the offline cache. Failover is a bounded loop over a shrinking
 * candidate set: every failed provider joins `tried`, so the loop always
 * reaches the offline cache or the attempt cap.
 */

import type { RawSearchHit, SearchResult } from '@/types/research';
import type { SearchProviderAdapter } from '@/services/search/providers';
import type { ProviderRegistry, ProviderState } from '@/services/search/providerRegistry';
import type { OfflineCache } from '@/services/search/offlineCache';
import { ProviderFailureError, errorMessage } from '@/errors/research';
import { createLogger } from '@/utils/logger';

const log = createLogger('provider-router');

export const DEFAULT_SEARCH_LIMIT = 5;

export interface ProviderRouterOptions {
  /** Upper bound on live provider attempts per search */
  maxAttempts?: number;
}

export function normalizeResults(raw: readonly RawSearchHit[], provider: string): SearchResult[] {
  return dedupeResults(
    raw.map((hit) => ({
      title: hit.title || 'Untitled',
      url: hit.url || '',
      snippet: hit.snippet || hit.text || '',
      provider,
    }))
  );
}

export function dedupeResults(results: readonly SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  const unique: SearchResult[] = [];
  for (const result of results) {
    const key = JSON.stringify([result.url, result.title]);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(result);
  }
  return unique;
}

export class ProviderRouter {
  private readonly maxAttempts: number;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly adapters: Readonly<Record<string, SearchProviderAdapter>>,
    private readonly offlineCache: OfflineCache,
    options: ProviderRouterOptions = {},
  ) {
    this.maxAttempts = Math.max(0, options.maxAttempts ?? registry.names().length);
  }

  providerHealth(): ProviderState[] {
    return this.registry.snapshot();
  }

  async searchAndExtract(topic: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<SearchResult[]> {
    const tried = new Set<string>();

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const provider = this.registry.pickProvider(tried);
      if (provider === this.registry.fallbackProvider) break;
      tried.add(provider);

      log.info('Using provider', { provider, topic, attempt: attempt + 1 });

      try {
        const adapter = this.adapters[provider];
        if (!adapter) {
          throw new ProviderFailureError(provider, 'no adapter registered');
        }

        await this.registry.applyRateLimit(provider);
        const raw = await adapter.search(topic, limit);
        if (raw.length === 0) {
          throw new ProviderFailureError(provider, 'Empty results from provider');
        }

        this.registry.markSuccess(provider);
        const results = normalizeResults(raw, provider);
        await this.cacheResults(topic, results);
        return results.slice(0, limit);
      } catch (error) {
        log.warn('Provider failed; trying next', { provider, topic, error: errorMessage(error) });
        this.registry.markFailure(provider);
      }
    }

    log.info('Falling back to offline cache', { topic, tried: [...tried] });
    const cached = await this.offlineCache.lookup(topic);
    return dedupeResults(cached).slice(0, limit);
  }

  private async cacheResults(topic: string, results: SearchResult[]): Promise<void> {
    try {
      await this.offlineCache.save(topic, results);
    } catch (error) {
      log.error('Failed to write offline cache', { topic, error: errorMessage(error) });
    }
  }
}
