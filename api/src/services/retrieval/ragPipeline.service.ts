/**
 * Retrieval Pipeline
 *
 * One decision per request:
 *   rewrite (history >= 2 turns) → embed + vector search → drop weak hits →
 *   pick a strategy from the top score → format sources.
 *
 * Strategies:
 * - cached: memory hits only, when the top score clears the high threshold
 * - hybrid: a few memory hits topped up with provider search
 * - web: realtime feeds first, then provider search for the remaining slots
 */

import type { RetrievalPolicy } from '@/config';
import type {
  ConversationTurn,
  RetrievalConfidence,
  RetrievalResult,
  RetrievalStrategy,
  RetrievedSource,
  SearchResult,
  SourceKind,
} from '@/types/research';
import type { TextGenerator } from '@/services/llm.service';
import { rewriteQuery } from '@/services/llm.service';
import type { Embedder } from '@/services/embedding.service';
import type { MemoryMatch, MemoryStore } from '@/services/vectorMemory.service';
import type { RealtimeSource } from '@/services/realtime/realtimeDispatcher';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('rag');

/** Web search as the pipeline consumes it (ProviderRouter satisfies this) */
export interface WebSearch {
  searchAndExtract(topic: string, limit?: number): Promise<SearchResult[]>;
}

export interface RetrieveOptions {
  history?: readonly ConversationTurn[];
  maxResults?: number;
}

const REWRITE_MIN_TURNS = 2;
const REWRITE_CONTEXT_TURNS = 4;

const CONFIDENCE: Record<RetrievalStrategy, RetrievalConfidence> = {
  cached: 'high',
  hybrid: 'medium',
  web: 'low',
};

type VectorSearchOutcome = { ok: true; matches: MemoryMatch[] } | { ok: false; matches: [] };

function fromMemory(matches: readonly MemoryMatch[]): RetrievedSource[] {
  return matches.map((match) => ({
    title: match.title || 'Untitled',
    url: match.url || '',
    summary: match.text || '',
    score: match.score,
    credibility: null,
    sourceKind: 'cached',
  }));
}

function fromSearch(results: readonly SearchResult[], kind: Exclude<SourceKind, 'cached'>): RetrievedSource[] {
  return results.map((result) => ({
    title: result.title || 'Untitled',
    url: result.url || '',
    summary: result.snippet || '',
    score: 0,
    credibility: null,
    sourceKind: kind,
  }));
}

export class RetrievalPipeline {
  constructor(
    private readonly llm: TextGenerator,
    private readonly embedder: Embedder,
    private readonly memory: MemoryStore,
    private readonly web: WebSearch,
    private readonly realtime: RealtimeSource,
    private readonly policy: RetrievalPolicy,
  ) {}

  async retrieve(query: string, userId: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const maxResults = options.maxResults ?? this.policy.defaultMaxResults;
    log.info('Retrieving', { userId, query, maxResults });

    const enhancedQuery = await this.rewrite(query, options.history ?? []);
    const vector = await this.searchMemory(enhancedQuery, userId);
    const candidates = vector.matches.filter((match) => match.score > this.policy.thresholdMinimum);

    // Memory is searched with the standalone rewrite; live and web search keep the caller's wording.
    const { strategy, sources } = await this.decide(query, candidates, maxResults);

    return {
      sources,
      retrievalStrategy: strategy,
      contextUsed: enhancedQuery !== query,
      confidence: vector.ok ? CONFIDENCE[strategy] : 'low',
      degraded: !vector.ok,
    };
  }

  private async rewrite(query: string, history: readonly ConversationTurn[]): Promise<string> {
    if (history.length < REWRITE_MIN_TURNS) return query;

    const rewritten = await rewriteQuery(this.llm, query, history.slice(-REWRITE_CONTEXT_TURNS));
    log.info('Query rewritten', { query, rewritten });
    return rewritten;
  }

  private async searchMemory(query: string, userId: string): Promise<VectorSearchOutcome> {
    try {
      const embedding = await this.embedder.embed(query);
      const matches = await this.memory.search(userId, embedding, this.policy.topK);
      return { ok: true, matches };
    } catch (error) {
      log.error('Vector search failed; continuing without memory', { userId, error: errorMessage(error) });
      return { ok: false, matches: [] };
    }
  }

  private async decide(
    query: string,
    candidates: readonly MemoryMatch[],
    maxResults: number,
  ): Promise<{ strategy: RetrievalStrategy; sources: RetrievedSource[] }> {
    const top = candidates[0];
    if (!top) {
      return { strategy: 'web', sources: await this.webStrategy(query, maxResults) };
    }

    if (top.score >= this.policy.thresholdHigh) {
      return { strategy: 'cached', sources: fromMemory(candidates.slice(0, maxResults)) };
    }

    // Below the medium threshold still blends in the best memory hits.
    return { strategy: 'hybrid', sources: await this.hybridStrategy(query, candidates, maxResults) };
  }

  private async hybridStrategy(
    query: string,
    candidates: readonly MemoryMatch[],
    maxResults: number,
  ): Promise<RetrievedSource[]> {
    const cachedCount = Math.min(this.policy.hybridCachedCap, maxResults);
    const sources = fromMemory(candidates.slice(0, cachedCount));

    const needed = maxResults - sources.length;
    if (needed > 0) {
      const web = await this.web.searchAndExtract(query, needed);
      sources.push(...fromSearch(web.slice(0, needed), 'web'));
    }
    return sources;
  }

  private async webStrategy(query: string, maxResults: number): Promise<RetrievedSource[]> {
    const realtime = await this.realtime.fetch(query);
    const sources = fromSearch(realtime.slice(0, maxResults), 'realtime');

    const needed = maxResults - sources.length;
    if (needed > 0) {
      const web = await this.web.searchAndExtract(query, needed);
      sources.push(...fromSearch(web.slice(0, needed), 'web'));
    }
    return sources;
  }
}
