/**
 * Research Core
 *
 * Composition root for:
 * - multi-provider web search with failover (searchAndExtract)
 * - retrieval strategy engine over vector memory (retrieve)
 * - recurring research jobs, run history and run diffs
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from '@/config';
import { db, sql, closeDatabase } from '@/db/client';
import { OfflineCache } from '@/services/search/offlineCache';
import { ProviderRegistry, type ProviderState } from '@/services/search/providerRegistry';
import { ProviderRouter } from '@/services/search/providerRouter.service';
import { createSearchProviders, type SearchProviderAdapter } from '@/services/search/providers';
import { RealtimeDispatcher, type RealtimeSource } from '@/services/realtime/realtimeDispatcher';
import { OpenAiTextGenerator, type TextGenerator } from '@/services/llm.service';
import { OpenAiEmbedder, type Embedder } from '@/services/embedding.service';
import { MemoryStore, PgVectorIndex, type VectorIndex } from '@/services/vectorMemory.service';
import { RetrievalPipeline } from '@/services/retrieval/ragPipeline.service';
import { mergeKnowledgeGraphs } from '@/services/graph/knowledgeGraph';
import { PgJobRepository, type JobRepository } from '@/services/scheduler/jobRepository';
import { PgHistoryRepository, type HistoryRepository } from '@/services/scheduler/historyRepository';
import { IntervalScheduler } from '@/services/scheduler/intervalScheduler';
import { ResearchTask } from '@/services/scheduler/researchTask';
import { JobScheduler, type JobSummary } from '@/services/scheduler/jobScheduler.service';
import { RunDiffService, type RunDiffResult } from '@/services/history/runDiff.service';
import { retrieveRequestSchema, type RetrieveRequestInput } from '@/validators/retrieval';
import type { KnowledgeGraph, RetrievalResult, RunHistoryRecord, SearchResult } from '@/types/research';
import { logger } from '@/utils/logger';

export interface ResearchCoreOverrides {
  fetchFn?: typeof globalThis.fetch;
  llm?: TextGenerator;
  embedder?: Embedder;
  vectorIndex?: VectorIndex;
  adapters?: Record<string, SearchProviderAdapter>;
  realtime?: RealtimeSource;
  jobs?: JobRepository;
  history?: HistoryRepository;
  timers?: IntervalScheduler;
}

export interface ResearchCore {
  searchAndExtract(topic: string, limit?: number): Promise<SearchResult[]>;
  retrieve(request: RetrieveRequestInput): Promise<RetrievalResult>;
  mergeKnowledgeGraphs(previous: KnowledgeGraph | null, next: KnowledgeGraph | null): KnowledgeGraph;
  scheduleNewJob(topic: string, userId: string, intervalSeconds?: number): Promise<string>;
  cancelJob(jobId: string): Promise<boolean>;
  listJobs(): Promise<Record<string, JobSummary>>;
  diff(jobId: string): Promise<RunDiffResult>;
  jobHistory(jobId: string, limit?: number): Promise<RunHistoryRecord[]>;
  providerHealth(): ProviderState[];
  /** Restore persisted jobs and start the timer loop. Returns the restored count. */
  start(): Promise<number>;
  /** Stop the timer loop and wait for in-flight runs */
  shutdown(): Promise<void>;
}

export function createResearchCore(config: AppConfig, overrides: ResearchCoreOverrides = {}): ResearchCore {
  const fetchFn = overrides.fetchFn;

  const llm =
    overrides.llm ??
    new OpenAiTextGenerator({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.model,
      timeoutMs: config.httpTimeoutMs,
      fetchFn,
    });

  const embedder =
    overrides.embedder ??
    new OpenAiEmbedder({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.embeddingModel,
      dimensions: config.openai.embeddingDim,
      timeoutMs: config.httpTimeoutMs,
      fetchFn,
    });

  const memory = new MemoryStore(embedder, overrides.vectorIndex ?? new PgVectorIndex(sql));

  const registry = new ProviderRegistry(config.search.providers, {
    fallbackProvider: config.search.fallbackProvider,
    weightStepUp: config.search.weightStepUp,
    weightStepDown: config.search.weightStepDown,
  });
  const router = new ProviderRouter(
    registry,
    overrides.adapters ?? createSearchProviders(config, fetchFn),
    new OfflineCache(config.search.offlineCachePath),
    { maxAttempts: config.search.maxAttempts },
  );

  const realtime =
    overrides.realtime ??
    new RealtimeDispatcher({
      timeoutMs: config.httpTimeoutMs,
      openWeatherApiKey: config.realtime.openWeatherApiKey,
      weatherCity: config.realtime.weatherCity,
      fetchFn,
    });

  const pipeline = new RetrievalPipeline(llm, embedder, memory, router, realtime, config.retrieval);

  const jobs = overrides.jobs ?? new PgJobRepository(db);
  const history = overrides.history ?? new PgHistoryRepository(db);
  const timers = overrides.timers ?? new IntervalScheduler({ tickMs: config.scheduler.tickMs });
  const task = new ResearchTask({ search: router, llm, memory, jobs, history });
  const scheduler = new JobScheduler({ jobs, history, timers, task });
  const runDiff = new RunDiffService(history, llm);

  return {
    searchAndExtract: (topic, limit) => router.searchAndExtract(topic, limit),

    async retrieve(request) {
      const { query, userId, history: turns, maxResults } = retrieveRequestSchema.parse(request);
      return pipeline.retrieve(query, userId, { history: turns, maxResults });
    },

    mergeKnowledgeGraphs: (previous, next) => mergeKnowledgeGraphs(previous, next),
    scheduleNewJob: (topic, userId, intervalSeconds) => scheduler.schedule(topic, userId, intervalSeconds),
    cancelJob: (jobId) => scheduler.cancel(jobId),
    listJobs: () => scheduler.list(),
    diff: (jobId) => runDiff.diff(jobId),
    jobHistory: (jobId, limit) => scheduler.history(jobId, limit),
    providerHealth: () => router.providerHealth(),

    async start() {
      const restored = await scheduler.restore();
      if (config.scheduler.enabled) {
        timers.start();
      } else {
        logger.info('Scheduler disabled via SCHEDULER_ENABLED=false');
      }
      return restored;
    },

    async shutdown() {
      timers.stop();
      await timers.drain();
    },
  };
}

// Start the job runner (skip in test mode)
if (process.env.NODE_ENV !== 'test') {
  const core = createResearchCore(loadConfig());

  core
    .start()
    .then((restored) => {
      logger.info('Research core running', { restoredJobs: restored });
    })
    .catch((error) => {
      logger.error('Failed to start research core', { error: String(error) });
      process.exit(1);
    });

  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);

    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();

    core
      .shutdown()
      .then(() => closeDatabase())
      .then(() => {
        logger.info('In-flight runs drained and database connections closed');
        process.exit(0);
      })
      .catch((err) => {
        logger.error('Error during shutdown', { error: String(err) });
        process.exit(1);
      });
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}
