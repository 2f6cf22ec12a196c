/**
 * Job Scheduler Service
 *
 * Lifecycle of recurring research jobs. Job definitions live in the job table;
 * timers live in the IntervalScheduler and are rebuilt by restore() on start.
 * Jobs go active → inactive and are never deleted.
 */

import type { ResearchJob, RunHistoryRecord } from '@/types/research';
import { isJobId, scheduleJobSchema, type ScheduleJobInput } from '@/validators/jobs';
import type { JobRepository } from '@/services/scheduler/jobRepository';
import type { HistoryRepository } from '@/services/scheduler/historyRepository';
import type { IntervalScheduler } from '@/services/scheduler/intervalScheduler';
import type { ResearchTask, RunOutcome } from '@/services/scheduler/researchTask';
import { JobNotFoundError } from '@/errors/research';
import { createLogger } from '@/utils/logger';

const log = createLogger('job-scheduler');

export interface JobSummary {
  topic: string;
  userId: string;
  intervalSeconds: number;
}

export interface JobSchedulerDeps {
  jobs: JobRepository;
  history: HistoryRepository;
  timers: IntervalScheduler;
  task: ResearchTask;
  now?: () => number;
}

export const DEFAULT_HISTORY_LIMIT = 20;

export class JobScheduler {
  private readonly now: () => number;

  constructor(private readonly deps: JobSchedulerDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Create the active job for (userId, topic), replacing any previous one,
   * and start its timer. Returns the new job id.
   */
  async schedule(topic: string, userId: string, intervalSeconds?: number): Promise<string> {
    const input: ScheduleJobInput = { topic, userId, intervalSeconds };
    const request = scheduleJobSchema.parse(input);

    const nextRunAt = new Date(this.now() + request.intervalSeconds * 1000);
    const { job, deactivatedIds } = await this.deps.jobs.replaceActive({
      userId: request.userId,
      topic: request.topic,
      intervalSeconds: request.intervalSeconds,
      nextRunAt,
    });

    for (const oldId of deactivatedIds) {
      this.deps.timers.unregister(oldId);
    }
    this.register(job, nextRunAt.getTime());

    log.info('Job scheduled', {
      jobId: job.id,
      userId: job.userId,
      topic: job.topic,
      intervalSeconds: job.intervalSeconds,
      replaced: deactivatedIds.length,
    });
    return job.id;
  }

  /**
   * Deactivate a job and drop its timer. Cancelling an inactive job is a
   * no-op that still returns true; an unknown id returns false.
   */
  async cancel(jobId: string): Promise<boolean> {
    if (!isJobId(jobId)) {
      log.warn('Cancel requested with a malformed job id', { jobId });
      return false;
    }

    const job = await this.deps.jobs.findById(jobId);
    if (!job) {
      log.warn('Cancel requested for unknown job', { jobId });
      return false;
    }

    const wasActive = await this.deps.jobs.deactivate(jobId);
    const hadTimer = this.deps.timers.unregister(jobId);
    log.info('Job cancelled', { jobId, wasActive, hadTimer });
    return true;
  }

  async list(): Promise<Record<string, JobSummary>> {
    const jobs = await this.deps.jobs.listActive();
    const out: Record<string, JobSummary> = {};
    for (const job of jobs) {
      out[job.id] = { topic: job.topic, userId: job.userId, intervalSeconds: job.intervalSeconds };
    }
    return out;
  }

  /**
   * Re-register timers for every active job. A job whose stored next run is
   * already past runs on the next tick.
   */
  async restore(): Promise<number> {
    const jobs = await this.deps.jobs.listActive();
    for (const job of jobs) {
      this.register(job, job.nextRunAt?.getTime());
      log.info('Restored job', { jobId: job.id, topic: job.topic });
    }
    log.info('Restored jobs from storage', { count: jobs.length });
    return jobs.length;
  }

  async runNow(jobId: string): Promise<RunOutcome> {
    if (!isJobId(jobId)) throw new JobNotFoundError(jobId);
    const job = await this.deps.jobs.findById(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const next = this.deps.timers.nextRunAt(jobId);
    return this.deps.task.run(job.topic, job.userId, job.id, {
      nextRunAt: next === null ? job.nextRunAt : new Date(next),
    });
  }

  async history(jobId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<RunHistoryRecord[]> {
    if (!isJobId(jobId)) return [];
    return this.deps.history.listForJob(jobId, limit);
  }

  private register(job: ResearchJob, firstRunAt?: number): void {
    const intervalMs = job.intervalSeconds * 1000;
    this.deps.timers.register(
      job.id,
      intervalMs,
      async () => {
        await this.deps.task.run(job.topic, job.userId, job.id, {
          nextRunAt: new Date(this.now() + intervalMs),
        });
      },
      firstRunAt,
    );
  }
}
