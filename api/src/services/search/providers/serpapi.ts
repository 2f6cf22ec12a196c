import type { ProviderHttpOptions, SearchProviderAdapter } from '@/services/search/providers/types';
import { ProviderFailureError } from '@/errors/research';
import { fetchJson } from '@/utils/http';

interface SerpApiResponse {
  organic_results?: Array<{ title?: string; link?: string; snippet?: string }>;
}

/** Google results through SerpAPI */
export function createSerpApiProvider(apiKey: string | undefined, http: ProviderHttpOptions): SearchProviderAdapter {
  return {
    name: 'serpapi',

    async search(topic, limit) {
      if (!apiKey) {
        throw new ProviderFailureError('serpapi', 'SERPAPI_KEY missing in env');
      }

      const data = await fetchJson<SerpApiResponse>('https://serpapi.com/search', {
        query: { q: topic, api_key: apiKey, engine: 'google', num: limit },
        timeoutMs: http.timeoutMs,
        fetchFn: http.fetchFn,
      });

      return (data.organic_results ?? []).map((item) => ({
        title: item.title,
        url: item.link,
        snippet: item.snippet ?? '',
      }));
    },
  };
}
