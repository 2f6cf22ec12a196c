/**
 * Job Repository
 *
 * Persistence for recurring research jobs. Jobs are deactivated, never
 * deleted, so their history rows keep a valid parent.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { researchJobs, type ResearchJobRow } from '@/db/schema';
import type { ResearchJob, RunStatus } from '@/types/research';

export interface NewJobInput {
  userId: string;
  topic: string;
  intervalSeconds: number;
  nextRunAt: Date;
}

export interface ReplaceActiveResult {
  job: ResearchJob;
  /** ids of the jobs that were active for the same (userId, topic) */
  deactivatedIds: string[];
}

export interface JobRepository {
  deactivateActiveFor(userId: string, topic: string): Promise<string[]>;
  create(input: NewJobInput): Promise<ResearchJob>;
  findById(id: string): Promise<ResearchJob | null>;
  /** Returns true when the job was active before the call */
  deactivate(id: string): Promise<boolean>;
  listActive(): Promise<ResearchJob[]>;
  recordRun(id: string, status: RunStatus, finishedAt: Date, nextRunAt: Date | null): Promise<void>;
  /** deactivateActiveFor + create in one transaction */
  replaceActive(input: NewJobInput): Promise<ReplaceActiveResult>;
}

export function toResearchJob(row: ResearchJobRow): ResearchJob {
  return {
    id: row.id,
    userId: row.userId,
    topic: row.topic,
    intervalSeconds: row.intervalSeconds,
    isActive: row.isActive,
    lastRunAt: row.lastRunAt,
    nextRunAt: row.nextRunAt,
    lastStatus: row.lastStatus,
    createdAt: row.createdAt,
  };
}

type Executor = Pick<Database, 'select' | 'insert' | 'update'>;

async function deactivateActive(executor: Executor, userId: string, topic: string): Promise<string[]> {
  const rows = await executor
    .update(researchJobs)
    .set({ isActive: false, updatedAt: new Date() })
    .where(and(eq(researchJobs.userId, userId), eq(researchJobs.topic, topic), eq(researchJobs.isActive, true)))
    .returning({ id: researchJobs.id });
  return rows.map((row) => row.id);
}

async function insertJob(executor: Executor, input: NewJobInput): Promise<ResearchJob> {
  const [row] = await executor
    .insert(researchJobs)
    .values({
      userId: input.userId,
      topic: input.topic,
      intervalSeconds: input.intervalSeconds,
      isActive: true,
      nextRunAt: input.nextRunAt,
    })
    .returning();

  if (!row) {
    throw new Error(`Failed to insert research job for topic "${input.topic}"`);
  }
  return toResearchJob(row);
}

export class PgJobRepository implements JobRepository {
  constructor(private readonly db: Database) {}

  deactivateActiveFor(userId: string, topic: string): Promise<string[]> {
    return deactivateActive(this.db, userId, topic);
  }

  create(input: NewJobInput): Promise<ResearchJob> {
    return insertJob(this.db, input);
  }

  async findById(id: string): Promise<ResearchJob | null> {
    const [row] = await this.db.select().from(researchJobs).where(eq(researchJobs.id, id)).limit(1);
    return row ? toResearchJob(row) : null;
  }

  async deactivate(id: string): Promise<boolean> {
    const rows = await this.db
      .update(researchJobs)
      .set({ isActive: false, updatedAt: new Date() })
      .where(and(eq(researchJobs.id, id), eq(researchJobs.isActive, true)))
      .returning({ id: researchJobs.id });
    return rows.length > 0;
  }

  async listActive(): Promise<ResearchJob[]> {
    const rows = await this.db
      .select()
      .from(researchJobs)
      .where(eq(researchJobs.isActive, true))
      .orderBy(asc(researchJobs.createdAt));
    return rows.map(toResearchJob);
  }

  async recordRun(id: string, status: RunStatus, finishedAt: Date, nextRunAt: Date | null): Promise<void> {
    await this.db
      .update(researchJobs)
      .set({ lastRunAt: finishedAt, lastStatus: status, nextRunAt, updatedAt: new Date() })
      .where(eq(researchJobs.id, id));
  }

  replaceActive(input: NewJobInput): Promise<ReplaceActiveResult> {
    return this.db.transaction(async (tx) => {
      const deactivatedIds = await deactivateActive(tx, input.userId, input.topic);
      const job = await insertJob(tx, input);
      return { job, deactivatedIds };
    });
  }
}
