import { describe, it, expect, vi } from 'vitest';
import { RetrievalPipeline, type WebSearch } from '@/services/retrieval/ragPipeline.service';
import { MemoryStore, type VectorHit, type VectorIndex } from '@/services/vectorMemory.service';
import type { RealtimeSource } from '@/services/realtime/realtimeDispatcher';
import type { ConversationTurn, SearchResult } from '@/types/research';
import { loadConfig } from '@/config';
import { FixedEmbedder, ScriptedTextGenerator, StaticVectorIndex, memoryHit } from '../../../helpers/fakes';

const policy = loadConfig({}).retrieval;

function webResults(count: number, provider = 'alpha'): SearchResult[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Web ${i}`,
    url: `https://example.com/web/${i}`,
    snippet: `web snippet ${i}`,
    provider,
  }));
}

function setup(options: {
  hits?: VectorHit[];
  index?: VectorIndex;
  realtime?: SearchResult[];
  llm?: ScriptedTextGenerator;
} = {}) {
  const embedder = new FixedEmbedder();
  const llm = options.llm ?? new ScriptedTextGenerator();
  const memory = new MemoryStore(embedder, options.index ?? new StaticVectorIndex(options.hits ?? []));
  const searchAndExtract = vi.fn(async (_topic: string, limit?: number) => webResults(limit ?? 5));
  const web: WebSearch = { searchAndExtract };
  const realtimeFetch = vi.fn(async () => options.realtime ?? []);
  const realtime: RealtimeSource = { fetch: realtimeFetch };

  const pipeline = new RetrievalPipeline(llm, embedder, memory, web, realtime, policy);
  return { pipeline, llm, embedder, searchAndExtract, realtimeFetch };
}

describe('RetrievalPipeline strategy selection', () => {
  it('should use only memory when the top score clears the high threshold', async () => {
    const { pipeline, searchAndExtract, realtimeFetch } = setup({
      hits: [memoryHit(0.9, 'a'), memoryHit(0.85, 'b'), memoryHit(0.3, 'c')],
    });

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result.retrievalStrategy).toBe('cached');
    expect(result.confidence).toBe('high');
    expect(result.degraded).toBe(false);
    expect(result.contextUsed).toBe(false);
    expect(result.sources).toEqual([
      { title: 'a', url: 'https://example.com/a', summary: 'a text', score: 0.9, credibility: null, sourceKind: 'cached' },
      { title: 'b', url: 'https://example.com/b', summary: 'b text', score: 0.85, credibility: null, sourceKind: 'cached' },
    ]);
    expect(searchAndExtract).not.toHaveBeenCalled();
    expect(realtimeFetch).not.toHaveBeenCalled();
  });

  it('should truncate cached sources to maxResults', async () => {
    const { pipeline } = setup({ hits: [memoryHit(0.95, 'a'), memoryHit(0.9, 'b'), memoryHit(0.88, 'c')] });

    const result = await pipeline.retrieve('bitcoin', 'user-1', { maxResults: 2 });

    expect(result.sources.map((s) => s.title)).toEqual(['a', 'b']);
  });

  it('should go to the web when memory has nothing', async () => {
    const { pipeline, searchAndExtract } = setup();

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result.retrievalStrategy).toBe('web');
    expect(result.confidence).toBe('low');
    expect(result.sources.every((s) => s.sourceKind !== 'cached')).toBe(true);
    expect(searchAndExtract).toHaveBeenCalledWith('bitcoin', 5);
  });

  it('should drop hits at or below the minimum score', async () => {
    const { pipeline } = setup({ hits: [memoryHit(0.4, 'edge'), memoryHit(0.2, 'stale')] });

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result.retrievalStrategy).toBe('web');
  });

  it('should put realtime data first and fill the rest from web search', async () => {
    const live: SearchResult = {
      title: 'Live Bitcoin (BTC) Price',
      url: 'https://api.binance.com/api/v3/ticker/price?symbol=BTCUSDT',
      snippet: 'BTC/USDT: 65000.10',
      provider: 'binance',
    };
    const { pipeline, searchAndExtract } = setup({ realtime: [live] });

    const result = await pipeline.retrieve('bitcoin price', 'user-1', { maxResults: 3 });

    expect(searchAndExtract).toHaveBeenCalledWith('bitcoin price', 2);
    expect(result.sources).toEqual([
      { title: live.title, url: live.url, summary: live.snippet, score: 0, credibility: null, sourceKind: 'realtime' },
      { title: 'Web 0', url: 'https://example.com/web/0', summary: 'web snippet 0', score: 0, credibility: null, sourceKind: 'web' },
      { title: 'Web 1', url: 'https://example.com/web/1', summary: 'web snippet 1', score: 0, credibility: null, sourceKind: 'web' },
    ]);
  });

  it('should skip web search when realtime fills every slot', async () => {
    const { pipeline, searchAndExtract } = setup({ realtime: webResults(4, 'usgs') });

    const result = await pipeline.retrieve('earthquake', 'user-1', { maxResults: 3 });

    expect(result.sources).toHaveLength(3);
    expect(searchAndExtract).not.toHaveBeenCalled();
  });

  it('should blend at most two cached hits with web results for medium scores', async () => {
    const { pipeline, searchAndExtract } = setup({
      hits: [memoryHit(0.75, 'a'), memoryHit(0.72, 'b'), memoryHit(0.71, 'c')],
    });

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result.retrievalStrategy).toBe('hybrid');
    expect(result.confidence).toBe('medium');
    expect(result.sources.map((s) => s.sourceKind)).toEqual(['cached', 'cached', 'web', 'web', 'web']);
    expect(searchAndExtract).toHaveBeenCalledWith('bitcoin', 3);
  });

  it('should still blend when the top score is below the medium threshold', async () => {
    const { pipeline } = setup({ hits: [memoryHit(0.5, 'weak')] });

    const result = await pipeline.retrieve('bitcoin', 'user-1', { maxResults: 2 });

    expect(result.retrievalStrategy).toBe('hybrid');
    expect(result.sources.map((s) => s.title)).toEqual(['weak', 'Web 0']);
  });

  it('should not search the web when cached hits fill a small request', async () => {
    const { pipeline, searchAndExtract } = setup({ hits: [memoryHit(0.75, 'a'), memoryHit(0.72, 'b')] });

    const result = await pipeline.retrieve('bitcoin', 'user-1', { maxResults: 1 });

    expect(result.sources.map((s) => s.title)).toEqual(['a']);
    expect(searchAndExtract).not.toHaveBeenCalled();
  });

  it('should only see memory of the requesting user', async () => {
    const { pipeline } = setup({ hits: [memoryHit(0.95, 'theirs', 'user-2')] });

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result.retrievalStrategy).toBe('web');
  });
});

describe('RetrievalPipeline query rewriting', () => {
  const history: ConversationTurn[] = [
    { role: 'user', content: 'turn one' },
    { role: 'assistant', content: 'turn two' },
    { role: 'user', content: 'turn three' },
    { role: 'assistant', content: 'turn four' },
    { role: 'user', content: 'turn five' },
  ];

  it('should search memory with the rewrite and the web with the original query', async () => {
    const llm = new ScriptedTextGenerator([[/Standalone Query/, '"bitcoin price in INR"']]);
    const { pipeline, embedder, searchAndExtract } = setup({ llm });

    const result = await pipeline.retrieve('and in rupees?', 'user-1', { history });

    expect(result.contextUsed).toBe(true);
    expect(embedder.inputs).toEqual(['bitcoin price in INR']);
    expect(searchAndExtract).toHaveBeenCalledWith('and in rupees?', 5);
    expect(llm.prompts[0]?.prompt).not.toContain('turn one');
    expect(llm.prompts[0]?.prompt).toContain('turn five');
  });

  it('should not rewrite with fewer than two turns', async () => {
    const llm = new ScriptedTextGenerator([[/Standalone Query/, 'should not be used']]);
    const { pipeline } = setup({ llm });

    const result = await pipeline.retrieve('bitcoin', 'user-1', { history: [{ role: 'user', content: 'hi' }] });

    expect(result.contextUsed).toBe(false);
    expect(llm.prompts).toHaveLength(0);
  });

  it('should report no context use when the model gives no rewrite', async () => {
    const { pipeline } = setup();

    const result = await pipeline.retrieve('bitcoin', 'user-1', { history });

    expect(result.contextUsed).toBe(false);
  });
});

describe('RetrievalPipeline degraded mode', () => {
  it('should fall back to the web with low confidence when vector search fails', async () => {
    const index: VectorIndex = {
      upsert: vi.fn().mockResolvedValue(undefined),
      query: vi.fn().mockRejectedValue(new Error('connection refused')),
    };
    const { pipeline, searchAndExtract } = setup({ index });

    const result = await pipeline.retrieve('bitcoin', 'user-1');

    expect(result).toMatchObject({ retrievalStrategy: 'web', confidence: 'low', degraded: true });
    expect(searchAndExtract).toHaveBeenCalled();
  });
});
