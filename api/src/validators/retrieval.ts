/**
 * Retrieval Validation Schemas
 */

import { z } from 'zod';

export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

/**
 * Retrieve sources for a query
 */
export const retrieveRequestSchema = z.object({
  query: z.string().trim().min(1, { message: 'Query is required' }).max(2000),
  userId: z.string().trim().min(1, { message: 'User ID is required' }),
  history: z.array(conversationTurnSchema).default([]),
  maxResults: z
    .number()
    .int()
    .min(1, { message: 'maxResults must be between 1 and 20' })
    .max(20, { message: 'maxResults must be between 1 and 20' })
    .optional(),
}).strict();

// Type exports
export type RetrieveRequestInput = z.input<typeof retrieveRequestSchema>;
export type RetrieveRequest = z.infer<typeof retrieveRequestSchema>;
