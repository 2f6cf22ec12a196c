/**
 * History Repository
 *
 * Append-only run history. Reads come back newest first by finish time.
 */

import { and, desc, eq, isNotNull } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type * as schema from '@/db/schema';
import { researchHistory, type ResearchHistoryRow } from '@/db/schema';
import type { KnowledgeGraph, NewRunHistoryRecord, RunHistoryRecord } from '@/types/research';
import { graphFromJson } from '@/services/graph/knowledgeGraph';

export interface HistoryRepository {
  append(record: NewRunHistoryRecord): Promise<RunHistoryRecord>;
  /** The two most recent runs, newest first */
  latestTwo(jobId: string): Promise<RunHistoryRecord[]>;
  listForJob(jobId: string, limit: number): Promise<RunHistoryRecord[]>;
  /** Graph of the most recent run that stored one */
  latestGraph(jobId: string): Promise<KnowledgeGraph | null>;
}

export function toRunHistoryRecord(row: ResearchHistoryRow): RunHistoryRecord {
  return {
    id: row.id,
    jobId: row.jobId,
    userId: row.userId,
    topic: row.topic,
    status: row.status,
    resultCount: row.resultCount,
    kgNodes: row.kgNodes,
    kgEdges: row.kgEdges,
    errorMessage: row.errorMessage,
    runStartedAt: row.runStartedAt,
    runFinishedAt: row.runFinishedAt,
    fullSummaryText: row.fullSummaryText,
    knowledgeGraph: row.knowledgeGraph ? graphFromJson(row.knowledgeGraph) : null,
  };
}

/** Drizzle implementation; works over any Postgres driver Drizzle supports. */
export class PgHistoryRepository<TQueryResult extends PgQueryResultHKT = PostgresJsQueryResultHKT>
  implements HistoryRepository
{
  constructor(private readonly db: PgDatabase<TQueryResult, typeof schema>) {}

  async append(record: NewRunHistoryRecord): Promise<RunHistoryRecord> {
    const [row] = await this.db
      .insert(researchHistory)
      .values({
        jobId: record.jobId,
        userId: record.userId,
        topic: record.topic,
        status: record.status,
        resultCount: record.resultCount,
        kgNodes: record.kgNodes,
        kgEdges: record.kgEdges,
        errorMessage: record.errorMessage,
        runStartedAt: record.runStartedAt,
        runFinishedAt: record.runFinishedAt,
        fullSummaryText: record.fullSummaryText,
        knowledgeGraph: record.knowledgeGraph
          ? {
              nodes: record.knowledgeGraph.nodes.map((node) => ({ ...node })),
              edges: record.knowledgeGraph.edges.map((edge) => ({ ...edge })),
              counts: { ...record.knowledgeGraph.counts },
            }
          : null,
      })
      .returning();

    if (!row) {
      throw new Error(`Failed to append history for topic "${record.topic}"`);
    }
    return toRunHistoryRecord(row);
  }

  latestTwo(jobId: string): Promise<RunHistoryRecord[]> {
    return this.listForJob(jobId, 2);
  }

  async listForJob(jobId: string, limit: number): Promise<RunHistoryRecord[]> {
    const rows = await this.db
      .select()
      .from(researchHistory)
      .where(eq(researchHistory.jobId, jobId))
      .orderBy(desc(researchHistory.runFinishedAt))
      .limit(limit);
    return rows.map(toRunHistoryRecord);
  }

  async latestGraph(jobId: string): Promise<KnowledgeGraph | null> {
    const [row] = await this.db
      .select()
      .from(researchHistory)
      .where(and(eq(researchHistory.jobId, jobId), isNotNull(researchHistory.knowledgeGraph)))
      .orderBy(desc(researchHistory.runFinishedAt))
      .limit(1);
    return row ? toRunHistoryRecord(row).knowledgeGraph : null;
  }
}
