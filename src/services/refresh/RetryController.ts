import {
  ConfigurationError,
  ExecutionFailure,
  SubmissionError,
  describeError,
} from '../../types/RefreshErrors';
import { ExecutionAttempt, ExecutionHandle, FailureRecord, UnitResult, WorkUnit } from '../../types/RefreshTypes';
import { Clock, Sleep, sleep as defaultSleep, systemClock } from '../../utils/timing';
import { Logger } from '../core/Logger';
import { CompletionPoller } from './CompletionPoller';
import { ExecutionEngine } from './RedshiftExecutionClient';

export const DEFAULT_RETRY_DELAY_MS = 120_000;

/**
 * Text after the first ':' of an engine error, trimmed; the whole text when there is none.
 */
export function extractErrorFragment(detail: string): string {
  const index = detail.indexOf(':');
  const fragment = index >= 0 ? detail.slice(index + 1).trim() : detail.trim();
  return fragment || detail.trim();
}

export interface RetryControllerOptions {
  retryDelayMs?: number;
  sleep?: Sleep;
  clock?: Clock;
}

/**
 * RetryController - bounded retry of one unit (submit + await terminal).
 *
 * Every attempt resubmits from scratch. Failed, Aborted and rejected submissions all
 * consume one attempt; the retry delay separates attempts but never follows the last one.
 */
export class RetryController {
  private retryDelayMs: number;
  private sleep: Sleep;
  private clock: Clock;

  constructor(
    private engine: ExecutionEngine,
    private poller: CompletionPoller,
    private region: string,
    private logger: Logger,
    options: RetryControllerOptions = {}
  ) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? systemClock;
  }

  async executeWithRetry(unit: WorkUnit, retryLimit: number): Promise<UnitResult> {
    if (!Number.isInteger(retryLimit) || retryLimit < 1) {
      throw new ConfigurationError(`Retry limit must be a positive integer, got ${retryLimit}`);
    }

    const attempts: ExecutionAttempt[] = [];

    for (let attemptNumber = 1; attemptNumber <= retryLimit; attemptNumber++) {
      const attempt = await this.runAttempt(unit, attemptNumber);
      attempts.push(attempt);

      if (attempt.status === 'Finished') {
        this.logger.info('Unit finished', { unit: unit.name, attempt: attemptNumber });
        return { kind: 'success', unit, attempts };
      }

      this.logger.warn('Unit attempt failed', {
        unit: unit.name,
        attempt: attemptNumber,
        retryLimit,
        status: attempt.status,
        error: attempt.errorDetail,
      });

      if (attemptNumber < retryLimit) {
        await this.sleep(this.retryDelayMs);
      }
    }

    const last = attempts[attempts.length - 1];
    const record: FailureRecord = {
      kind: 'unit',
      unit,
      lastError: extractErrorFragment(last?.errorDetail ?? 'unknown error'),
      dataSource: unit.dataSource,
      region: this.region,
      attempts: attempts.length,
    };
    this.logger.error('Unit exhausted retry budget', {
      unit: unit.name,
      attempts: record.attempts,
      error: record.lastError,
    });
    return { kind: 'failure', record, attempts };
  }

  private async runAttempt(unit: WorkUnit, attemptNumber: number): Promise<ExecutionAttempt> {
    const submittedAt = this.clock().toISOString();

    let handle: ExecutionHandle;
    try {
      handle = await this.engine.submit(unit);
    } catch (error) {
      const submissionError =
        error instanceof SubmissionError
          ? error
          : new SubmissionError(unit.name, describeError(error), error);
      return {
        unit,
        attemptNumber,
        submittedAt,
        status: 'ClientError',
        errorDetail: submissionError.detail,
        error: submissionError,
      };
    }

    const result = await this.poller.awaitTerminal(handle);
    if (result.status === 'Finished') {
      return { unit, attemptNumber, submittedAt: handle.submittedAt, status: 'Finished', queryId: handle.queryId };
    }

    const detail = result.detail ?? `statement ${result.status.toLowerCase()}`;
    return {
      unit,
      attemptNumber,
      submittedAt: handle.submittedAt,
      status: result.status,
      queryId: handle.queryId,
      errorDetail: detail,
      error: new ExecutionFailure(unit.name, result.status, detail),
    };
  }
}
