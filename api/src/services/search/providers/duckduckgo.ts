import type { RawSearchHit } from '@/types/research';
import type { ProviderHttpOptions, SearchProviderAdapter } from '@/services/search/providers/types';
import { fetchJson } from '@/utils/http';

interface DuckDuckGoTopic {
  FirstURL?: string;
  Text?: string;
  Topics?: DuckDuckGoTopic[];
}

interface DuckDuckGoResponse {
  Heading?: string;
  AbstractText?: string;
  AbstractURL?: string;
  RelatedTopics?: DuckDuckGoTopic[];
}

function flattenTopics(topics: DuckDuckGoTopic[]): DuckDuckGoTopic[] {
  return topics.flatMap((topic) => (topic.Topics ? flattenTopics(topic.Topics) : [topic]));
}

function titleFromText(text: string): string {
  // Related topics read "Title - description"
  const [head] = text.split(' - ');
  return head.trim() || 'Untitled';
}

/** DuckDuckGo Instant Answer API (keyless) */
export function createDuckDuckGoProvider(http: ProviderHttpOptions): SearchProviderAdapter {
  return {
    name: 'duckduckgo',

    async search(topic, limit) {
      const data = await fetchJson<DuckDuckGoResponse>('https://api.duckduckgo.com/', {
        query: { q: topic, format: 'json', no_html: 1, skip_disambig: 1 },
        timeoutMs: http.timeoutMs,
        fetchFn: http.fetchFn,
      });

      const hits: RawSearchHit[] = [];
      if (data.AbstractURL && data.AbstractText) {
        hits.push({ title: data.Heading || topic, url: data.AbstractURL, snippet: data.AbstractText });
      }

      for (const related of flattenTopics(data.RelatedTopics ?? [])) {
        if (!related.FirstURL || !related.Text) continue;
        hits.push({ title: titleFromText(related.Text), url: related.FirstURL, snippet: related.Text });
      }

      return hits.slice(0, limit);
    },
  };
}
