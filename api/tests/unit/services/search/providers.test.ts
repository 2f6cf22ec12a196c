import { describe, it, expect } from 'vitest';
import { createSerpApiProvider } from '@/services/search/providers/serpapi';
import { createBraveProvider } from '@/services/search/providers/brave';
import { createDuckDuckGoProvider } from '@/services/search/providers/duckduckgo';
import { ProviderFailureError } from '@/errors/research';
import { createFetchMock, jsonResponse } from '../../../helpers/fetch';

describe('serpapi provider', () => {
  it('should map organic results', async () => {
    const { fetchMock, requests } = createFetchMock(() =>
      jsonResponse({
        organic_results: [{ title: 'BTC today', link: 'https://example.com/btc', snippet: 'up 2%' }],
      }),
    );
    const provider = createSerpApiProvider('test-secret', { timeoutMs: 1000, fetchFn: fetchMock });

    const hits = await provider.search('bitcoin', 5);

    expect(hits).toEqual([{ title: 'BTC today', url: 'https://example.com/btc', snippet: 'up 2%' }]);
    const url = new URL(requests[0]?.url ?? '');
    expect(url.origin + url.pathname).toBe('https://serpapi.com/search');
    expect(url.searchParams.get('q')).toBe('bitcoin');
    expect(url.searchParams.get('api_key')).toBe('test-secret');
    expect(url.searchParams.get('num')).toBe('5');
  });

  it('should fail without an api key', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({}));
    const provider = createSerpApiProvider(undefined, { timeoutMs: 1000, fetchFn: fetchMock });

    await expect(provider.search('bitcoin', 5)).rejects.toBeInstanceOf(ProviderFailureError);
    expect(requests).toHaveLength(0);
  });
});

describe('brave provider', () => {
  it('should send the subscription token and map web results', async () => {
    const { fetchMock, requests } = createFetchMock(() =>
      jsonResponse({ web: { results: [{ title: 'Rain', url: 'https://example.com/rain', description: 'wet' }] } }),
    );
    const provider = createBraveProvider('test-secret', { timeoutMs: 1000, fetchFn: fetchMock });

    const hits = await provider.search('weather', 3);

    expect(hits).toEqual([{ title: 'Rain', url: 'https://example.com/rain', snippet: 'wet' }]);
    const headers = new Headers(requests[0]?.init?.headers);
    expect(headers.get('X-Subscription-Token')).toBe('test-secret');
  });

  it('should surface HTTP errors', async () => {
    const { fetchMock } = createFetchMock(() => jsonResponse({ error: 'quota' }, 429));
    const provider = createBraveProvider('test-secret', { timeoutMs: 1000, fetchFn: fetchMock });

    await expect(provider.search('weather', 3)).rejects.toThrow('HTTP 429');
  });
});

describe('duckduckgo provider', () => {
  it('should combine the abstract and flattened related topics', async () => {
    const { fetchMock } = createFetchMock(() =>
      jsonResponse({
        Heading: 'Solar power',
        AbstractText: 'Energy from the sun.',
        AbstractURL: 'https://example.com/solar',
        RelatedTopics: [
          { FirstURL: 'https://example.com/pv', Text: 'Photovoltaics - cells that convert light' },
          { Topics: [{ FirstURL: 'https://example.com/csp', Text: 'Concentrated solar - mirrors' }] },
          { Text: 'no url here' },
        ],
      }),
    );
    const provider = createDuckDuckGoProvider({ timeoutMs: 1000, fetchFn: fetchMock });

    const hits = await provider.search('solar', 10);

    expect(hits).toEqual([
      { title: 'Solar power', url: 'https://example.com/solar', snippet: 'Energy from the sun.' },
      { title: 'Photovoltaics', url: 'https://example.com/pv', snippet: 'Photovoltaics - cells that convert light' },
      { title: 'Concentrated solar', url: 'https://example.com/csp', snippet: 'Concentrated solar - mirrors' },
    ]);
  });

  it('should respect the limit', async () => {
    const { fetchMock } = createFetchMock(() =>
      jsonResponse({
        RelatedTopics: [
          { FirstURL: 'https://example.com/1', Text: 'One - a' },
          { FirstURL: 'https://example.com/2', Text: 'Two - b' },
        ],
      }),
    );
    const provider = createDuckDuckGoProvider({ timeoutMs: 1000, fetchFn: fetchMock });

    expect(await provider.search('x', 1)).toHaveLength(1);
  });
});
