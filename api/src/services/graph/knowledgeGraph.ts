/**
 * Knowledge Graph: extraction parsing and incremental merge
 *
 * Graphs are immutable values: every builder returns a frozen graph and merge
 * always produces a new one. Node ids are normalised (case-folded, whitespace
 * to hyphen, colons removed) and every edge endpoint exists in the node set.
 *
 * Exports:
 *   Pure functions:
 *     - normalizeNodeId(), emptyGraph(), buildGraph()
 *     - parseExtractorOutput()  → tagged ok | parse_error
 *     - mergeKnowledgeGraphs()
 *   Async:
 *     - extractKnowledgeGraph()
 */

import type { GraphEdge, GraphNode, KnowledgeGraph } from '@/types/research';
import type { TextGenerator } from '@/services/llm.service';
import {
  extractorEdgeSchema,
  extractorNodeSchema,
  extractorPayloadSchema,
  storedGraphSchema,
} from '@/validators/graph';
import { createLogger } from '@/utils/logger';

const log = createLogger('knowledge-graph');

// ── Limits ─────────────────────────────────────────────────────────────

export const GRAPH_LIMITS = {
  maxInputNodes: 100,
  maxInputEdges: 200,
  maxNodes: 50,
  maxEdges: 100,
  maxTextChars: 15_000,
} as const;

export type ExtractionResult =
  | { kind: 'ok'; graph: KnowledgeGraph }
  | { kind: 'parse_error'; raw: string; reason: string };

const ENTITY_TYPES = [
  'PERSON', 'ORG', 'PRODUCT', 'TECH', 'FRAMEWORK', 'COUNTRY', 'EVENT',
  'TOOL', 'CONCEPT', 'SKILL', 'METRIC', 'POLICY', 'DATASET', 'UNKNOWN',
] as const;

const EXTRACTION_PROMPT = `You are an expert Knowledge Graph extractor.

Your task:
1. Extract entities with labels and types.
2. Extract relationships between entities (subject -> relation -> object).
3. Output strictly valid JSON only, following the required schema.

ENTITY TYPES allowed:
${ENTITY_TYPES.join(', ')}

RELATION RULES:
- Keep relation labels short, 1-4 words max.
- No duplicate relations.

STRICT OUTPUT SCHEMA:
{
  "nodes": [{ "id": "kubernetes", "label": "Kubernetes", "type": "TECH" }],
  "edges": [{ "source": "kubernetes", "target": "cloud-native", "label": "enables" }]
}

Rules:
- IDs must be lowercase, hyphen-separated.
- JSON only, no explanations, no markdown.
- If unsure, classify entity type as "UNKNOWN".

TEXT:
-----
{TEXT}
-----`;

// ── Builders ───────────────────────────────────────────────────────────

export function normalizeNodeId(text: string): string {
  return text.trim().toLowerCase().replace(/:/g, '').replace(/\s+/g, '-');
}

function edgeKey(edge: GraphEdge): string {
  return JSON.stringify([edge.source, edge.target, edge.label]);
}

function freezeGraph(nodes: GraphNode[], edges: GraphEdge[]): KnowledgeGraph {
  return Object.freeze({
    nodes: Object.freeze(nodes.map((node) => Object.freeze({ ...node }))),
    edges: Object.freeze(edges.map((edge) => Object.freeze({ ...edge }))),
    counts: Object.freeze({ nodes: nodes.length, edges: edges.length }),
  });
}

export function emptyGraph(): KnowledgeGraph {
  return freezeGraph([], []);
}

export function isEmptyGraph(graph: KnowledgeGraph | null | undefined): boolean {
  return !graph || (graph.nodes.length === 0 && graph.edges.length === 0);
}

/**
 * Build a graph from already-normalised nodes and edges: duplicate node ids keep
 * the last entry, duplicate edges keep the first, dangling edges are dropped.
 */
export function buildGraph(nodes: readonly GraphNode[], edges: readonly GraphEdge[]): KnowledgeGraph {
  const nodeMap = new Map<string, GraphNode>();
  for (const node of nodes) {
    nodeMap.set(node.id, node);
  }

  const seen = new Set<string>();
  const finalEdges: GraphEdge[] = [];
  for (const edge of edges) {
    if (!nodeMap.has(edge.source) || !nodeMap.has(edge.target)) continue;
    const key = edgeKey(edge);
    if (seen.has(key)) continue;
    seen.add(key);
    finalEdges.push(edge);
  }

  return freezeGraph([...nodeMap.values()], finalEdges);
}

/**
 * Revive a graph stored as JSON (history rows). Anything that does not match
 * the stored shape becomes the empty graph.
 */
export function graphFromJson(value: unknown): KnowledgeGraph {
  const parsed = storedGraphSchema.safeParse(value);
  if (!parsed.success) return emptyGraph();
  return buildGraph(parsed.data.nodes, parsed.data.edges);
}

// ── Extraction parsing ─────────────────────────────────────────────────

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function repairFencedJson(raw: string): unknown {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (!fenced) return undefined;
  return parseJson(fenced[1].trim());
}

function finalizeGraph(payload: { nodes: unknown[]; edges: unknown[] }): KnowledgeGraph {
  const nodeMap = new Map<string, GraphNode>();

  for (const candidate of payload.nodes.slice(0, GRAPH_LIMITS.maxInputNodes)) {
    const parsed = extractorNodeSchema.safeParse(candidate);
    if (!parsed.success) continue;

    const id = normalizeNodeId(parsed.data.id);
    if (!id) continue;

    // First occurrence wins inside one extraction.
    if (!nodeMap.has(id)) {
      nodeMap.set(id, {
        id,
        label: parsed.data.label?.trim() || parsed.data.id.trim(),
        type: parsed.data.type?.trim() || 'UNKNOWN',
      });
    }
    if (nodeMap.size >= GRAPH_LIMITS.maxNodes) break;
  }

  const seen = new Set<string>();
  const edges: GraphEdge[] = [];
  for (const candidate of payload.edges.slice(0, GRAPH_LIMITS.maxInputEdges)) {
    const parsed = extractorEdgeSchema.safeParse(candidate);
    if (!parsed.success) continue;

    const edge: GraphEdge = {
      source: normalizeNodeId(parsed.data.source),
      target: normalizeNodeId(parsed.data.target),
      label: parsed.data.label.trim(),
    };
    if (!edge.source || !edge.target || !edge.label) continue;
    if (!nodeMap.has(edge.source) || !nodeMap.has(edge.target)) continue;

    const key = edgeKey(edge);
    if (seen.has(key)) continue;
    seen.add(key);
    edges.push(edge);
    if (edges.length >= GRAPH_LIMITS.maxEdges) break;
  }

  return freezeGraph([...nodeMap.values()], edges);
}

/**
 * Parse raw extractor text. Tries plain JSON first, then the content of a
 * fenced ```json block.
 */
export function parseExtractorOutput(raw: string): ExtractionResult {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { kind: 'parse_error', raw, reason: 'empty output' };
  }

  const json = parseJson(trimmed) ?? repairFencedJson(trimmed);
  if (json === undefined) {
    return { kind: 'parse_error', raw, reason: 'not valid JSON' };
  }

  const payload = extractorPayloadSchema.safeParse(json);
  if (!payload.success) {
    return { kind: 'parse_error', raw, reason: 'unexpected graph shape' };
  }

  return { kind: 'ok', graph: finalizeGraph(payload.data) };
}

export async function extractKnowledgeGraph(text: string, llm: TextGenerator): Promise<KnowledgeGraph> {
  if (!text.trim()) return emptyGraph();

  const prompt = EXTRACTION_PROMPT.replace('{TEXT}', text.slice(0, GRAPH_LIMITS.maxTextChars));
  const completion = await llm.complete(prompt, true);

  const result = parseExtractorOutput(completion);
  if (result.kind === 'parse_error') {
    if (completion) {
      log.warn('Extractor output rejected; using empty graph', {
        reason: result.reason,
        preview: result.raw.slice(0, 200),
      });
    }
    return emptyGraph();
  }

  log.debug('Knowledge graph extracted', { ...result.graph.counts });
  return result.graph;
}

// ── Merge ──────────────────────────────────────────────────────────────

/**
 * Union of two graphs. Nodes are keyed by id and the newer graph wins on label
 * and type; edges are keyed by (source, target, label) and the first seen is kept.
 */
export function mergeKnowledgeGraphs(
  previous: KnowledgeGraph | null | undefined,
  next: KnowledgeGraph | null | undefined,
): KnowledgeGraph {
  if (!previous || isEmptyGraph(previous)) return next ?? emptyGraph();
  if (!next || isEmptyGraph(next)) return previous;

  return buildGraph([...previous.nodes, ...next.nodes], [...previous.edges, ...next.edges]);
}
