import type { ProviderHttpOptions, SearchProviderAdapter } from '@/services/search/providers/types';
import { ProviderFailureError } from '@/errors/research';
import { fetchJson } from '@/utils/http';

interface BraveResponse {
  web?: { results?: Array<{ title?: string; url?: string; description?: string }> };
}

export function createBraveProvider(apiKey: string | undefined, http: ProviderHttpOptions): SearchProviderAdapter {
  return {
    name: 'brave',

    async search(topic, limit) {
      if (!apiKey) {
        throw new ProviderFailureError('brave', 'BRAVE_KEY missing in env');
      }

      const data = await fetchJson<BraveResponse>('https://api.search.brave.com/res/v1/web/search', {
        query: { q: topic, count: limit },
        headers: { 'X-Subscription-Token': apiKey },
        timeoutMs: http.timeoutMs,
        fetchFn: http.fetchFn,
      });

      return (data.web?.results ?? []).map((item) => ({
        title: item.title,
        url: item.url,
        snippet: item.description ?? '',
      }));
    },
  };
}
