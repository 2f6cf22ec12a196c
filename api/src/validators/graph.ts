/**
 * Knowledge Graph Validation Schemas
 *
 * Shapes accepted from the extraction model. Items are checked one by one so a
 * single malformed node does not discard the rest of the graph.
 */

import { z } from 'zod';

export const extractorPayloadSchema = z.object({
  nodes: z.array(z.unknown()).default([]),
  edges: z.array(z.unknown()).default([]),
});

export const extractorNodeSchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  type: z.string().optional(),
});

export const extractorEdgeSchema = z.object({
  source: z.string(),
  target: z.string(),
  label: z.string(),
});

export const storedGraphSchema = z.object({
  nodes: z.array(z.object({ id: z.string(), label: z.string(), type: z.string() })),
  edges: z.array(z.object({ source: z.string(), target: z.string(), label: z.string() })),
});

export type ExtractorNode = z.infer<typeof extractorNodeSchema>;
export type ExtractorEdge = z.infer<typeof extractorEdgeSchema>;
