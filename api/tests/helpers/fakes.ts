/**
 * Scripted collaborators for unit tests.
 */

import type { TextGenerator } from '@/services/llm.service';
import type { Embedder } from '@/services/embedding.service';
import type { MemoryFilter, MemoryMetadata, VectorHit, VectorIndex } from '@/services/vectorMemory.service';

/** Answers each prompt with the first rule whose pattern matches, else '' */
export class ScriptedTextGenerator implements TextGenerator {
  readonly prompts: Array<{ prompt: string; jsonMode: boolean }> = [];

  constructor(private readonly rules: Array<[RegExp, string]> = []) {}

  async complete(prompt: string, jsonMode: boolean): Promise<string> {
    this.prompts.push({ prompt, jsonMode });
    const rule = this.rules.find(([pattern]) => pattern.test(prompt));
    return rule ? rule[1] : '';
  }
}

export class FixedEmbedder implements Embedder {
  readonly dimensions = 3;
  readonly inputs: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text);
    return text.trim() ? [0.1, 0.2, 0.3] : [0, 0, 0];
  }
}

export class StaticVectorIndex implements VectorIndex {
  readonly upserts: Array<{ id: string; vector: number[]; metadata: MemoryMetadata }> = [];
  readonly queries: Array<{ topK: number; filter: MemoryFilter }> = [];

  constructor(private readonly hits: VectorHit[] = []) {}

  async upsert(id: string, vector: number[], metadata: MemoryMetadata): Promise<void> {
    this.upserts.push({ id, vector, metadata });
  }

  async query(_vector: number[], topK: number, filter: MemoryFilter): Promise<VectorHit[]> {
    this.queries.push({ topK, filter });
    return this.hits.filter((hit) => hit.metadata.userId === filter.userId).slice(0, topK);
  }
}

export function memoryHit(score: number, title: string, userId = 'user-1'): VectorHit {
  return {
    id: `hit-${title}`,
    score,
    metadata: {
      userId,
      text: `${title} text`,
      url: `https://example.com/${title}`,
      title,
      topic: 'general',
      conversationId: 'global',
    },
  };
}
