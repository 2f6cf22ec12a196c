/**
 * Research Task
 *
 * One execution of a research job: search → summarise and score each
 * document → remember summaries → extract a graph and merge it into the job's
 * previous graph → append a history record → stamp the job.
 *
 * run() never rejects. Any failure becomes a history row with status=error.
 */

import type { KnowledgeGraph, NewRunHistoryRecord, RunHistoryRecord, RunStatus } from '@/types/research';
import type { TextGenerator } from '@/services/llm.service';
import { evaluateSource, summarizeText } from '@/services/llm.service';
import type { MemoryStore } from '@/services/vectorMemory.service';
import type { WebSearch } from '@/services/retrieval/ragPipeline.service';
import { extractKnowledgeGraph, mergeKnowledgeGraphs } from '@/services/graph/knowledgeGraph';
import type { HistoryRepository } from '@/services/scheduler/historyRepository';
import type { JobRepository } from '@/services/scheduler/jobRepository';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('research-task');

export interface ProcessedDocument {
  title: string;
  url: string;
  summary: string;
  credibility: number;
  provider: string;
}

export interface RunOptions {
  /** Stored on the job row as next_run_at */
  nextRunAt?: Date | null;
}

export interface RunOutcome {
  record: NewRunHistoryRecord | RunHistoryRecord;
  documents: ProcessedDocument[];
  /** false when the history row could not be written */
  persisted: boolean;
}

export interface ResearchTaskDeps {
  search: WebSearch;
  llm: TextGenerator;
  memory: MemoryStore;
  jobs: JobRepository;
  history: HistoryRepository;
  now?: () => Date;
}

export class ResearchTask {
  private readonly now: () => Date;

  constructor(private readonly deps: ResearchTaskDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(topic: string, userId: string, jobId: string | null = null, options: RunOptions = {}): Promise<RunOutcome> {
    const runStartedAt = this.now();
    log.info('Research run started', { topic, userId, jobId });

    let status: RunStatus = 'running';
    let errorText: string | null = null;
    let graph: KnowledgeGraph | null = null;
    const documents: ProcessedDocument[] = [];

    try {
      const articles = await this.deps.search.searchAndExtract(topic);
      if (articles.length === 0) {
        log.warn('No articles found', { topic, jobId });
      }

      for (const article of articles) {
        const rawText = article.snippet;
        if (!rawText) continue;

        const summary = await summarizeText(this.deps.llm, rawText);
        const credibility = await evaluateSource(this.deps.llm, article.url, rawText);
        documents.push({ title: article.title, url: article.url, summary, credibility, provider: article.provider });

        await this.deps.memory.safeRemember(userId, {
          text: summary,
          url: article.url,
          title: article.title,
          topic,
        });
      }

      if (documents.length > 0) {
        const extracted = await extractKnowledgeGraph(
          documents.map((doc) => doc.summary).join('\n\n'),
          this.deps.llm,
        );
        const previous = jobId ? await this.deps.history.latestGraph(jobId) : null;
        graph = mergeKnowledgeGraphs(previous, extracted);
      }

      status = 'success';
      log.info('Research run completed', {
        topic,
        jobId,
        documents: documents.length,
        kgNodes: graph?.counts.nodes ?? 0,
        kgEdges: graph?.counts.edges ?? 0,
      });
    } catch (error) {
      status = 'error';
      errorText = errorMessage(error);
      log.error('Research run failed', { topic, jobId, error: errorText });
    }

    const record: NewRunHistoryRecord = {
      jobId,
      userId,
      topic,
      status,
      resultCount: documents.length,
      kgNodes: graph?.counts.nodes ?? 0,
      kgEdges: graph?.counts.edges ?? 0,
      errorMessage: errorText,
      runStartedAt,
      runFinishedAt: this.now(),
      fullSummaryText: documents.map((doc) => doc.summary).join('\n\n'),
      knowledgeGraph: graph,
    };

    return this.persist(record, documents, options);
  }

  private async persist(
    record: NewRunHistoryRecord,
    documents: ProcessedDocument[],
    options: RunOptions,
  ): Promise<RunOutcome> {
    let stored: RunHistoryRecord | null = null;
    try {
      stored = await this.deps.history.append(record);
    } catch (error) {
      log.error('Failed to insert history row', { topic: record.topic, jobId: record.jobId, error: errorMessage(error) });
    }

    if (record.jobId) {
      try {
        await this.deps.jobs.recordRun(record.jobId, record.status, record.runFinishedAt, options.nextRunAt ?? null);
      } catch (error) {
        log.error('Failed to update job run metadata', { jobId: record.jobId, error: errorMessage(error) });
      }
    }

    return { record: stored ?? record, documents, persisted: stored !== null };
  }
}
