/**
 * Interval Scheduler
 *
 * In-process timer registry for recurring jobs. A single setInterval poll calls
 * tick(), which fires every handler that is due. Timer state lives only in
 * memory; JobScheduler.restore() rebuilds it from the job table on start.
 */

import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('interval-scheduler');

export type JobHandler = () => Promise<void>;

interface ScheduledEntry {
  jobId: string;
  intervalMs: number;
  nextRunAt: number;
  handler: JobHandler;
  running: boolean;
}

export interface IntervalSchedulerOptions {
  tickMs?: number;
  now?: () => number;
}

export class IntervalScheduler {
  private readonly entries = new Map<string, ScheduledEntry>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly tickMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: IntervalSchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Register (or replace) the recurring handler for a job. The first run is
   * due one interval from now unless firstRunAt says otherwise.
   */
  register(jobId: string, intervalMs: number, handler: JobHandler, firstRunAt?: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Interval must be a positive number of milliseconds, got ${intervalMs}`);
    }

    const existing = this.entries.get(jobId);
    this.entries.set(jobId, {
      jobId,
      intervalMs,
      nextRunAt: firstRunAt ?? this.now() + intervalMs,
      handler,
      running: existing?.running ?? false,
    });
    log.debug('Job registered', { jobId, intervalMs });
  }

  /** Idempotent. A run already in flight is left to finish. */
  unregister(jobId: string): boolean {
    const removed = this.entries.delete(jobId);
    if (removed) log.debug('Job unregistered', { jobId });
    return removed;
  }

  has(jobId: string): boolean {
    return this.entries.has(jobId);
  }

  size(): number {
    return this.entries.size;
  }

  nextRunAt(jobId: string): number | null {
    return this.entries.get(jobId)?.nextRunAt ?? null;
  }

  /**
   * Fire every due handler without waiting on any of them. A job whose
   * previous run has not finished is skipped for this tick.
   * Returns the ids that were fired.
   */
  tick(now: number = this.now()): string[] {
    const fired: string[] = [];

    for (const entry of this.entries.values()) {
      if (entry.nextRunAt > now) continue;

      if (entry.running) {
        log.warn('Previous run still in flight; skipping', { jobId: entry.jobId });
        entry.nextRunAt = now + entry.intervalMs;
        continue;
      }

      entry.nextRunAt = now + entry.intervalMs;
      entry.running = true;
      fired.push(entry.jobId);

      const run = this.execute(entry);
      this.inFlight.add(run);
      void run.finally(() => this.inFlight.delete(run));
    }

    return fired;
  }

  private async execute(entry: ScheduledEntry): Promise<void> {
    try {
      await entry.handler();
    } catch (error) {
      log.error('Scheduled job failed', { jobId: entry.jobId, error: errorMessage(error) });
    } finally {
      entry.running = false;
      // register() may have swapped the entry while this run was in flight
      const current = this.entries.get(entry.jobId);
      if (current && current !== entry) current.running = false;
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickMs);
    log.info('Scheduler started', { tickMs: this.tickMs, jobs: this.entries.size });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Scheduler stopped');
    }
  }

  /** Wait for every run currently in flight */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
