import { v4 as uuidv4 } from 'uuid';
import { TraceContext } from '../../types/CommonTypes';
import { RunKey } from '../../types/RefreshTypes';
import { Logger } from './Logger';

/**
 * TraceService - run ID generation and log context
 */
export class TraceService {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Generate a new run ID. Also used as the trace ID of every log line of the run.
   */
  generateRunId(): string {
    return `run-${Date.now()}-${uuidv4()}`;
  }

  /**
   * Create trace context for a run
   */
  createContext(key: RunKey, existingRunId?: string): TraceContext {
    const traceId = existingRunId || this.generateRunId();
    this.logger.debug('Trace context created', { traceId, region: key.region });
    return {
      traceId,
      region: key.region,
      reportSource: key.reportSource,
      batchDate: key.batchDate,
    };
  }
}
