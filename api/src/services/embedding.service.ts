/**
 * Embedding Service
 *
 * OpenAI embeddings behind the Embedder interface. Blank input short-circuits
 * to a zero vector of the configured dimension.
 */

import { fetchJson } from '@/utils/http';

export interface Embedder {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export interface OpenAiEmbedderOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
  fetchFn?: typeof globalThis.fetch;
}

const MAX_INPUT_CHARS = 8000;

export class OpenAiEmbedder implements Embedder {
  readonly dimensions: number;

  constructor(private readonly options: OpenAiEmbedderOptions) {
    this.dimensions = options.dimensions;
  }

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      return new Array<number>(this.dimensions).fill(0);
    }

    if (!this.options.apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is not set. Cannot generate embeddings.');
    }

    const data = await fetchJson<{ data?: Array<{ embedding?: number[] }> }>(`${this.options.baseUrl}/embeddings`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        input: text.slice(0, MAX_INPUT_CHARS),
        model: this.options.model,
        dimensions: this.options.dimensions,
      },
      timeoutMs: this.options.timeoutMs,
      fetchFn: this.options.fetchFn,
    });

    const embedding = data.data?.[0]?.embedding;
    if (!embedding || embedding.length !== this.dimensions) {
      throw new Error(
        `Failed to generate embedding: expected ${this.dimensions} dimensions, got ${embedding?.length ?? 0}`,
      );
    }
    return embedding;
  }
}
