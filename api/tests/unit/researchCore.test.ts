import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ZodError } from 'zod';

vi.mock('@/db/client', () => ({
  db: {},
  sql: Object.assign(vi.fn(), { unsafe: vi.fn() }),
  closeDatabase: vi.fn(),
}));

import { createResearchCore, type ResearchCore } from '@/index';
import { loadConfig } from '@/config';
import { IntervalScheduler } from '@/services/scheduler/intervalScheduler';
import { buildGraph } from '@/services/graph/knowledgeGraph';
import { InsufficientHistoryError } from '@/errors/research';
import { InMemoryHistoryRepository, InMemoryJobRepository } from '../helpers/inMemoryRepositories';
import { FixedEmbedder, ScriptedTextGenerator, StaticVectorIndex } from '../helpers/fakes';

describe('createResearchCore', () => {
  let dir: string;
  let core: ResearchCore;
  let timers: IntervalScheduler;
  let jobs: InMemoryJobRepository;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'research-core-'));
    timers = new IntervalScheduler({ now: () => 0 });
    jobs = new InMemoryJobRepository();
    core = createResearchCore(loadConfig({ OFFLINE_CACHE_PATH: path.join(dir, 'cache.json') }), {
      llm: new ScriptedTextGenerator(),
      embedder: new FixedEmbedder(),
      vectorIndex: new StaticVectorIndex(),
      realtime: { fetch: vi.fn().mockResolvedValue([]) },
      adapters: {
        serpapi: {
          name: 'serpapi',
          search: vi.fn().mockResolvedValue([{ title: 'Hit', url: 'https://example.com/hit', snippet: 'text' }]),
        },
      },
      jobs,
      history: new InMemoryHistoryRepository(),
      timers,
    });
  });

  afterEach(async () => {
    await core.shutdown();
    await rm(dir, { recursive: true, force: true });
  });

  it('should search through the provider router', async () => {
    expect(await core.searchAndExtract('anything')).toEqual([
      { title: 'Hit', url: 'https://example.com/hit', snippet: 'text', provider: 'serpapi' },
    ]);
    expect(core.providerHealth().find((p) => p.name === 'serpapi')?.quota).toBe(99);
  });

  it('should validate retrieval requests', async () => {
    await expect(core.retrieve({ query: 'bitcoin', userId: 'user-1', maxResults: 50 })).rejects.toBeInstanceOf(ZodError);

    const result = await core.retrieve({ query: 'bitcoin', userId: 'user-1', maxResults: 1 });
    expect(result.retrievalStrategy).toBe('web');
    expect(result.sources.map((s) => s.url)).toEqual(['https://example.com/hit']);
  });

  it('should merge graphs', () => {
    const a = buildGraph([{ id: 'a', label: 'A', type: 'CONCEPT' }], []);
    const b = buildGraph([{ id: 'b', label: 'B', type: 'CONCEPT' }], []);
    expect(core.mergeKnowledgeGraphs(a, b).counts).toEqual({ nodes: 2, edges: 0 });
  });

  it('should manage the job lifecycle', async () => {
    const id = await core.scheduleNewJob('bitcoin price', 'user-1', 60);

    expect(await core.listJobs()).toEqual({ [id]: { topic: 'bitcoin price', userId: 'user-1', intervalSeconds: 60 } });
    await expect(core.diff(id)).rejects.toBeInstanceOf(InsufficientHistoryError);
    expect(await core.jobHistory(id)).toEqual([]);

    expect(await core.cancelJob(id)).toBe(true);
    expect(await core.listJobs()).toEqual({});
  });

  it('should restore jobs and start the timer loop', async () => {
    await jobs.create({ userId: 'user-1', topic: 'restored', intervalSeconds: 60, nextRunAt: new Date(60_000) });
    const start = vi.spyOn(timers, 'start');
    const stop = vi.spyOn(timers, 'stop');

    expect(await core.start()).toBe(1);
    expect(start).toHaveBeenCalledTimes(1);

    await core.shutdown();
    expect(stop).toHaveBeenCalled();
  });
});
