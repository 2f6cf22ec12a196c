/**
 * Vector Memory Service
 *
 * Semantic memory of summarised research documents.
 *
 * - VectorIndex: storage contract (upsert + similarity query with a filter)
 * - PgVectorIndex: pgvector implementation over research_memory
 * - MemoryStore: embeds text and talks to the index on behalf of a user
 */

import { createHash } from 'crypto';
import type postgres from 'postgres';
import type { Embedder } from '@/services/embedding.service';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('vector-memory');

export interface MemoryMetadata {
  userId: string;
  text: string;
  url: string;
  title: string;
  topic: string;
  conversationId: string;
}

export interface MemoryFilter {
  userId: string;
  topic?: string;
}

export interface VectorHit {
  id: string;
  score: number;
  metadata: MemoryMetadata;
}

export interface VectorIndex {
  upsert(id: string, vector: number[], metadata: MemoryMetadata): Promise<void>;
  query(vector: number[], topK: number, filter: MemoryFilter): Promise<VectorHit[]>;
}

/** A memory hit as the retrieval pipeline consumes it */
export interface MemoryMatch {
  score: number;
  text: string;
  url: string;
  title: string;
}

/** Raw row from the similarity query */
interface MemorySearchRow {
  id: string;
  user_id: string;
  text: string;
  url: string;
  title: string;
  topic: string;
  conversation_id: string;
  similarity: number;
}

type SqlClient = Pick<postgres.Sql, 'unsafe'>;

const STORED_TEXT_CHARS = 1000;

export class PgVectorIndex implements VectorIndex {
  constructor(private readonly client: SqlClient) {}

  async upsert(id: string, vector: number[], metadata: MemoryMetadata): Promise<void> {
    await this.client.unsafe(
      `
      INSERT INTO public.research_memory (
        id, user_id, text, url, title, topic, conversation_id, embedding, created_at
      ) VALUES (
        $1, $2, $3, $4, $5, $6, $7, $8::vector, NOW()
      )
      ON CONFLICT (id) DO UPDATE
      SET text = EXCLUDED.text,
          title = EXCLUDED.title,
          topic = EXCLUDED.topic,
          conversation_id = EXCLUDED.conversation_id,
          embedding = EXCLUDED.embedding
    `,
      [
        id,
        metadata.userId,
        metadata.text,
        metadata.url,
        metadata.title,
        metadata.topic,
        metadata.conversationId,
        JSON.stringify(vector),
      ]
    );
  }

  async query(vector: number[], topK: number, filter: MemoryFilter): Promise<VectorHit[]> {
    const params: Array<string | number> = [JSON.stringify(vector), filter.userId, topK];
    let topicClause = '';
    if (filter.topic) {
      params.push(filter.topic);
      topicClause = 'AND m.topic = $4';
    }

    const rows = await this.client.unsafe<MemorySearchRow[]>(
      `
      SELECT
        m.id, m.user_id, m.text, m.url, m.title, m.topic, m.conversation_id,
        1 - (m.embedding <=> $1::vector) AS similarity
      FROM public.research_memory m
      WHERE m.user_id = $2
        ${topicClause}
      ORDER BY m.embedding <=> $1::vector
      LIMIT $3
    `,
      params
    );

    return rows.map((row) => ({
      id: row.id,
      score: Number(row.similarity),
      metadata: {
        userId: row.user_id,
        text: row.text,
        url: row.url,
        title: row.title,
        topic: row.topic,
        conversationId: row.conversation_id,
      },
    }));
  }
}

export function memoryId(url: string, text: string): string {
  return createHash('sha256').update(url + text.slice(0, 50)).digest('hex');
}

export class MemoryStore {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
  ) {}

  async remember(
    userId: string,
    doc: { text: string; url: string; title: string; topic?: string; conversationId?: string },
  ): Promise<string> {
    const vector = await this.embedder.embed(doc.text);
    const id = memoryId(doc.url, doc.text);
    await this.index.upsert(id, vector, {
      userId,
      text: doc.text.slice(0, STORED_TEXT_CHARS),
      url: doc.url,
      title: doc.title || 'Untitled',
      topic: doc.topic ?? 'general',
      conversationId: doc.conversationId ?? 'global',
    });
    log.debug('Stored memory', { userId, id, title: doc.title.slice(0, 30) });
    return id;
  }

  /**
   * Ranked hits for the user, highest score first. Throws on index failure so
   * callers can tell "no memory" from "memory unavailable".
   */
  async search(userId: string, vector: number[], topK: number, topic?: string): Promise<MemoryMatch[]> {
    const hits = await this.index.query(vector, topK, { userId, topic });
    return hits
      .map((hit) => ({
        score: hit.score,
        text: hit.metadata.text,
        url: hit.metadata.url,
        title: hit.metadata.title || 'Untitled',
      }))
      .sort((a, b) => b.score - a.score);
  }

  async safeRemember(
    userId: string,
    doc: { text: string; url: string; title: string; topic?: string; conversationId?: string },
  ): Promise<boolean> {
    try {
      await this.remember(userId, doc);
      return true;
    } catch (error) {
      log.error('Memory upsert failed', { userId, url: doc.url, error: errorMessage(error) });
      return false;
    }
  }
}
