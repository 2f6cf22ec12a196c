import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ProviderRouter, normalizeResults, dedupeResults } from '@/services/search/providerRouter.service';
import { ProviderRegistry } from '@/services/search/providerRegistry';
import { OfflineCache } from '@/services/search/offlineCache';
import type { SearchProviderAdapter } from '@/services/search/providers';
import { OFFLINE_PROVIDER, type ProviderConfig } from '@/config';
import type { RawSearchHit } from '@/types/research';

const PROVIDERS: ProviderConfig[] = [
  { name: 'alpha', weight: 1.0, quota: null, minCallIntervalMs: 0 },
  { name: 'beta', weight: 0.8, quota: null, minCallIntervalMs: 0 },
];

function adapter(name: string, search: (topic: string, limit: number) => Promise<RawSearchHit[]>): SearchProviderAdapter {
  return { name, search: vi.fn(search) };
}

const threeHits: RawSearchHit[] = [
  { title: 'One', url: 'https://example.com/1', snippet: 'first' },
  { title: 'Two', url: 'https://example.com/2', snippet: 'second' },
  { title: 'Three', url: 'https://example.com/3', snippet: 'third' },
];

describe('ProviderRouter.searchAndExtract', () => {
  let dir: string;
  let cache: OfflineCache;
  let registry: ProviderRegistry;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'router-'));
    cache = new OfflineCache(path.join(dir, 'offline_cache.json'));
    registry = new ProviderRegistry(PROVIDERS, { fallbackProvider: OFFLINE_PROVIDER });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should fail over from a failing provider to the next one', async () => {
    const router = new ProviderRouter(registry, {
      alpha: adapter('alpha', async () => {
        throw new Error('network down');
      }),
      beta: adapter('beta', async () => threeHits),
    }, cache);

    const results = await router.searchAndExtract('x');

    expect(results).toHaveLength(3);
    expect(results.map((r) => r.provider)).toEqual(['beta', 'beta', 'beta']);
    expect(registry.get('alpha')?.weight).toBe(0.9);
    expect(registry.get('beta')?.weight).toBe(0.85);
    expect(await cache.entries()).toHaveLength(3);
  });

  it('should treat an empty result as a provider failure', async () => {
    const router = new ProviderRouter(registry, {
      alpha: adapter('alpha', async () => []),
      beta: adapter('beta', async () => threeHits.slice(0, 1)),
    }, cache);

    const results = await router.searchAndExtract('x');

    expect(results).toEqual([{ title: 'One', url: 'https://example.com/1', snippet: 'first', provider: 'beta' }]);
    expect(registry.get('alpha')?.healthy).toBe(false);
  });

  it('should fall back to the offline cache when every provider fails', async () => {
    await cache.save('Bitcoin Price', [
      { title: 'Cached', url: 'https://example.com/cached', snippet: 'from before', provider: 'alpha' },
    ]);

    const failing = async (): Promise<RawSearchHit[]> => {
      throw new Error('boom');
    };
    const router = new ProviderRouter(registry, {
      alpha: adapter('alpha', failing),
      beta: adapter('beta', failing),
    }, cache);

    const results = await router.searchAndExtract('bitcoin');

    expect(results).toEqual([
      { title: 'Cached', url: 'https://example.com/cached', snippet: 'from before', provider: OFFLINE_PROVIDER },
    ]);
  });

  it('should return an empty list when everything fails and the cache is empty', async () => {
    const router = new ProviderRouter(registry, {}, cache);
    expect(await router.searchAndExtract('nothing')).toEqual([]);
    expect(registry.get('alpha')?.healthy).toBe(false);
    expect(registry.get('beta')?.healthy).toBe(false);
  });

  it('should try each provider at most once per search', async () => {
    const alpha = adapter('alpha', async () => {
      throw new Error('fail');
    });
    const router = new ProviderRouter(registry, { alpha }, cache);

    await router.searchAndExtract('x');

    expect(alpha.search).toHaveBeenCalledTimes(1);
  });

  it('should stop after maxAttempts live attempts', async () => {
    const beta = adapter('beta', async () => threeHits);
    const router = new ProviderRouter(registry, {
      alpha: adapter('alpha', async () => {
        throw new Error('fail');
      }),
      beta,
    }, cache, { maxAttempts: 1 });

    expect(await router.searchAndExtract('x')).toEqual([]);
    expect(beta.search).not.toHaveBeenCalled();
  });

  it('should slice results to the requested limit', async () => {
    const router = new ProviderRouter(registry, { alpha: adapter('alpha', async () => threeHits) }, cache);
    const results = await router.searchAndExtract('x', 2);
    expect(results.map((r) => r.title)).toEqual(['One', 'Two']);
  });

  it('should expose provider health', async () => {
    const router = new ProviderRouter(registry, {}, cache);
    expect(router.providerHealth().map((p) => p.name)).toEqual(['alpha', 'beta']);
  });
});

describe('normalizeResults', () => {
  it('should default missing fields and fall back to text for the snippet', () => {
    expect(normalizeResults([{ title: null, url: null, text: 'body' }], 'alpha')).toEqual([
      { title: 'Untitled', url: '', snippet: 'body', provider: 'alpha' },
    ]);
  });

  it('should dedupe on url and title', () => {
    const results = dedupeResults([
      { title: 'A', url: 'https://example.com/a', snippet: '1', provider: 'p' },
      { title: 'A', url: 'https://example.com/a', snippet: '2', provider: 'p' },
      { title: 'B', url: 'https://example.com/a', snippet: '3', provider: 'p' },
    ]);
    expect(results.map((r) => r.snippet)).toEqual(['1', '3']);
  });
});
