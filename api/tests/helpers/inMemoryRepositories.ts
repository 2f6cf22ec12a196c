/**
 * In-memory stand-ins for the job and history tables.
 */

import { randomUUID } from 'crypto';
import type { KnowledgeGraph, NewRunHistoryRecord, ResearchJob, RunHistoryRecord, RunStatus } from '@/types/research';
import type { JobRepository, NewJobInput, ReplaceActiveResult } from '@/services/scheduler/jobRepository';
import type { HistoryRepository } from '@/services/scheduler/historyRepository';

export class InMemoryJobRepository implements JobRepository {
  readonly rows = new Map<string, ResearchJob>();

  async deactivateActiveFor(userId: string, topic: string): Promise<string[]> {
    const ids: string[] = [];
    for (const job of this.rows.values()) {
      if (job.isActive && job.userId === userId && job.topic === topic) {
        job.isActive = false;
        ids.push(job.id);
      }
    }
    return ids;
  }

  async create(input: NewJobInput): Promise<ResearchJob> {
    const job: ResearchJob = {
      id: randomUUID(),
      userId: input.userId,
      topic: input.topic,
      intervalSeconds: input.intervalSeconds,
      isActive: true,
      lastRunAt: null,
      nextRunAt: input.nextRunAt,
      lastStatus: null,
      createdAt: new Date(),
    };
    this.rows.set(job.id, job);
    return { ...job };
  }

  async findById(id: string): Promise<ResearchJob | null> {
    const job = this.rows.get(id);
    return job ? { ...job } : null;
  }

  async deactivate(id: string): Promise<boolean> {
    const job = this.rows.get(id);
    if (!job?.isActive) return false;
    job.isActive = false;
    return true;
  }

  async listActive(): Promise<ResearchJob[]> {
    return [...this.rows.values()].filter((job) => job.isActive).map((job) => ({ ...job }));
  }

  async recordRun(id: string, status: RunStatus, finishedAt: Date, nextRunAt: Date | null): Promise<void> {
    const job = this.rows.get(id);
    if (!job) return;
    job.lastStatus = status;
    job.lastRunAt = finishedAt;
    job.nextRunAt = nextRunAt;
  }

  async replaceActive(input: NewJobInput): Promise<ReplaceActiveResult> {
    const deactivatedIds = await this.deactivateActiveFor(input.userId, input.topic);
    const job = await this.create(input);
    return { job, deactivatedIds };
  }
}

export class InMemoryHistoryRepository implements HistoryRepository {
  readonly rows: RunHistoryRecord[] = [];
  private nextId = 1;

  async append(record: NewRunHistoryRecord): Promise<RunHistoryRecord> {
    const stored: RunHistoryRecord = { ...record, id: this.nextId++ };
    this.rows.push(stored);
    return stored;
  }

  async latestTwo(jobId: string): Promise<RunHistoryRecord[]> {
    return this.listForJob(jobId, 2);
  }

  async listForJob(jobId: string, limit: number): Promise<RunHistoryRecord[]> {
    return this.rows
      .filter((row) => row.jobId === jobId)
      .sort((a, b) => b.runFinishedAt.getTime() - a.runFinishedAt.getTime())
      .slice(0, limit);
  }

  async latestGraph(jobId: string): Promise<KnowledgeGraph | null> {
    const rows = await this.listForJob(jobId, this.rows.length);
    return rows.find((row) => row.knowledgeGraph !== null)?.knowledgeGraph ?? null;
  }
}
