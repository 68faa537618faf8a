/**
 * Common types used across the system
 */

export interface TraceContext {
  traceId: string;
  region?: string;
  reportSource?: string;
  batchDate?: string;
}
