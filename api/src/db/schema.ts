/**
 * Research Core Database Schema
 * Drizzle ORM 0.39.x schema for PostgreSQL (+ pgvector)
 *
 * Mirrors migrations/001_research_core.sql. Jobs are never hard-deleted and
 * history rows are append-only.
 */

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  timestamp,
  integer,
  jsonb,
  text,
  bigserial,
  vector,
  check,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { RunStatus } from '@/types/research';
import { MEMORY_VECTOR_DIMENSIONS } from '@/config';

export interface StoredGraph {
  nodes: Array<{ id: string; label: string; type: string }>;
  edges: Array<{ source: string; target: string; label: string }>;
  counts?: { nodes: number; edges: number };
}

/**
 * Recurring research jobs, one active row per (user_id, topic)
 */
export const researchJobs = pgTable(
  'research_jobs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: varchar('user_id', { length: 200 }).notNull(),
    topic: varchar('topic', { length: 500 }).notNull(),
    intervalSeconds: integer('interval_seconds').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    lastRunAt: timestamp('last_run_at', { withTimezone: true }),
    nextRunAt: timestamp('next_run_at', { withTimezone: true }),
    lastStatus: varchar('last_status', { length: 20 }).$type<RunStatus>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    activeIdx: index('idx_research_jobs_active').on(table.isActive),
    oneActivePerTopic: uniqueIndex('uq_research_jobs_active_topic')
      .on(table.userId, table.topic)
      .where(sql`${table.isActive}`),
    intervalCheck: check('interval_check', sql`${table.intervalSeconds} > 0`),
  })
);

/**
 * One row per job execution
 */
export const researchHistory = pgTable(
  'research_history',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    jobId: uuid('job_id').references(() => researchJobs.id),
    userId: varchar('user_id', { length: 200 }).notNull(),
    topic: varchar('topic', { length: 500 }).notNull(),
    status: varchar('status', { length: 20 }).notNull().$type<RunStatus>(),
    resultCount: integer('result_count').notNull().default(0),
    kgNodes: integer('kg_nodes').notNull().default(0),
    kgEdges: integer('kg_edges').notNull().default(0),
    errorMessage: text('error_message'),
    runStartedAt: timestamp('run_started_at', { withTimezone: true }).notNull(),
    runFinishedAt: timestamp('run_finished_at', { withTimezone: true }).notNull(),
    fullSummaryText: text('full_summary_text').notNull().default(''),
    knowledgeGraph: jsonb('knowledge_graph').$type<StoredGraph>(),
  },
  (table) => ({
    jobFinishedIdx: index('idx_research_history_job_finished').on(table.jobId, table.runFinishedAt),
    statusCheck: check('status_check', sql`${table.status} IN ('running', 'success', 'error')`),
  })
);

/**
 * Semantic memory of summarised documents, scoped by user
 */
export const researchMemory = pgTable(
  'research_memory',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    userId: varchar('user_id', { length: 200 }).notNull(),
    text: text('text').notNull(),
    url: varchar('url', { length: 2048 }).notNull().default(''),
    title: varchar('title', { length: 500 }).notNull().default('Untitled'),
    topic: varchar('topic', { length: 500 }).notNull().default('general'),
    conversationId: varchar('conversation_id', { length: 200 }).notNull().default('global'),
    embedding: vector('embedding', { dimensions: MEMORY_VECTOR_DIMENSIONS }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_research_memory_user').on(table.userId),
  })
);

export type ResearchJobRow = typeof researchJobs.$inferSelect;
export type NewResearchJobRow = typeof researchJobs.$inferInsert;
export type ResearchHistoryRow = typeof researchHistory.$inferSelect;
export type NewResearchHistoryRow = typeof researchHistory.$inferInsert;
