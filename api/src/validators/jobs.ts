/**
 * Research Job Validation Schemas
 */

import { z } from 'zod';

export const MIN_INTERVAL_SECONDS = 60;
export const MAX_INTERVAL_SECONDS = 30 * 24 * 60 * 60;

/**
 * Schedule a recurring research job
 */
export const scheduleJobSchema = z.object({
  topic: z.string().trim().min(1, { message: 'Topic is required' }).max(500),
  userId: z.string().trim().min(1, { message: 'User ID is required' }),
  intervalSeconds: z
    .number()
    .int()
    .min(MIN_INTERVAL_SECONDS, { message: `Interval must be at least ${MIN_INTERVAL_SECONDS} seconds` })
    .max(MAX_INTERVAL_SECONDS, { message: 'Interval must be at most 30 days' })
    .default(3600),
}).strict();

export const jobIdSchema = z.string().uuid({ message: 'Job ID must be a UUID' });

/** Job ids are UUIDs; anything else cannot name a stored job. */
export function isJobId(value: string): boolean {
  return jobIdSchema.safeParse(value).success;
}

// Type exports
export type ScheduleJobInput = z.input<typeof scheduleJobSchema>;
export type ScheduleJobRequest = z.infer<typeof scheduleJobSchema>;
