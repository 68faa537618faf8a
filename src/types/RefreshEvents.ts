import { z } from 'zod';

/**
 * Event source and detail type of a refresh request on the event bus.
 */
export const REFRESH_EVENT_SOURCE = 'report-refresh.trigger';
export const REFRESH_REQUESTED = 'Report Refresh Requested';

const BATCH_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Detail of a refresh request. Published by the trigger, consumed by the refresh handler.
 */
export const RefreshRequestSchema = z.object({
  region: z.string().min(1),
  batchDate: z.string().regex(BATCH_DATE, 'batchDate must be YYYY-MM-DD'),
  reportSource: z.string().min(1),
  codebase: z.string().min(1).optional(),
  runId: z.string().min(1).optional(),
  requestedAt: z.string().optional(),
});

export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
