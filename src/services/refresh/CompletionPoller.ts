import { describeError } from '../../types/RefreshErrors';
import { AttemptStatus, ExecutionHandle, TerminalResult } from '../../types/RefreshTypes';
import { Sleep, sleep as defaultSleep } from '../../utils/timing';
import { Logger } from '../core/Logger';
import { ExecutionEngine } from './RedshiftExecutionClient';

export const DEFAULT_POLL_INTERVAL_MS = 120_000;

/**
 * Engine status -> attempt status. Unknown statuses are treated as still running.
 */
export function toAttemptStatus(engineStatus: string): AttemptStatus {
  switch (engineStatus.toUpperCase()) {
    case 'SUBMITTED':
    case 'PICKED':
      return 'Submitted';
    case 'FINISHED':
      return 'Finished';
    case 'FAILED':
      return 'Failed';
    case 'ABORTED':
      return 'Aborted';
    default:
      return 'Running';
  }
}

/**
 * CompletionPoller - drives a submitted statement to a terminal status.
 *
 * Describes immediately, then sleeps the poll interval between non-terminal polls.
 * A failing describe call ends the wait with a Failed result carrying the error text.
 */
export class CompletionPoller {
  constructor(
    private engine: ExecutionEngine,
    private logger: Logger,
    private pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS,
    private sleep: Sleep = defaultSleep
  ) {}

  async awaitTerminal(handle: ExecutionHandle): Promise<TerminalResult> {
    let polls = 0;

    for (;;) {
      polls++;
      let status: AttemptStatus;
      let detail: string | undefined;
      try {
        const description = await this.engine.describe(handle.queryId);
        status = toAttemptStatus(description.status);
        detail = description.error;
      } catch (error) {
        this.logger.error('Statement describe failed', {
          unit: handle.unit.name,
          queryId: handle.queryId,
          error: describeError(error),
        });
        return { status: 'Failed', detail: describeError(error), polls };
      }

      if (status === 'Finished') {
        return { status, polls };
      }
      if (status === 'Failed' || status === 'Aborted') {
        return { status, detail: detail ?? `statement ${status.toLowerCase()}`, polls };
      }

      this.logger.debug('Statement not terminal', {
        unit: handle.unit.name,
        queryId: handle.queryId,
        status,
        polls,
      });
      await this.sleep(this.pollIntervalMs);
    }
  }
}
