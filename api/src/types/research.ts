/**
 * Research Core Domain Types
 */

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  provider: string;
}

/** Loosely shaped hit straight from a provider or feed, before normalisation. */
export interface RawSearchHit {
  title?: string | null;
  url?: string | null;
  snippet?: string | null;
  text?: string | null;
}

export type SourceKind = 'cached' | 'web' | 'realtime';

export interface RetrievedSource {
  title: string;
  url: string;
  summary: string;
  score: number;
  credibility: number | null;
  sourceKind: SourceKind;
}

export type RetrievalStrategy = 'cached' | 'hybrid' | 'web';
export type RetrievalConfidence = 'high' | 'medium' | 'low';

export interface ConversationTurn {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface RetrievalResult {
  sources: RetrievedSource[];
  retrievalStrategy: RetrievalStrategy;
  contextUsed: boolean;
  confidence: RetrievalConfidence;
  /** true when vector memory could not be queried and the answer is web-only */
  degraded: boolean;
}

export interface GraphNode {
  id: string;
  label: string;
  type: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  label: string;
}

export interface KnowledgeGraph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  readonly counts: { readonly nodes: number; readonly edges: number };
}

export type RunStatus = 'running' | 'success' | 'error';

export interface ResearchJob {
  id: string;
  userId: string;
  topic: string;
  intervalSeconds: number;
  isActive: boolean;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  lastStatus: RunStatus | null;
  createdAt: Date;
}

export interface NewRunHistoryRecord {
  jobId: string | null;
  userId: string;
  topic: string;
  status: RunStatus;
  resultCount: number;
  kgNodes: number;
  kgEdges: number;
  errorMessage: string | null;
  runStartedAt: Date;
  runFinishedAt: Date;
  fullSummaryText: string;
  knowledgeGraph: KnowledgeGraph | null;
}

export interface RunHistoryRecord extends NewRunHistoryRecord {
  id: number;
}
