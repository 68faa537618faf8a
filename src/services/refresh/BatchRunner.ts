import {
  AuditWriteExhaustedError,
  DuplicateRunError,
  RetryBudgetExhaustedError,
  describeError,
} from '../../types/RefreshErrors';
import {
  FailureRecord,
  NULL_ERROR_MESSAGE,
  RunContext,
  RunOutcome,
  RunReport,
  UnexpectedFailure,
  UnitResult,
  WorkUnit,
} from '../../types/RefreshTypes';
import { Clock, systemClock } from '../../utils/timing';
import { AuditTrail } from '../audit/AuditRecorder';
import { Logger } from '../core/Logger';
import { RunNotifier } from '../notification/RefreshNotifier';
import { WorkListSource } from './WorkListProvider';

export interface UnitExecutor {
  executeWithRetry(unit: WorkUnit, retryLimit: number): Promise<UnitResult>;
}

export interface BatchRunnerOptions {
  retryLimit: number;
  clock?: Clock;
}

/**
 * BatchRunner - one refresh run, strictly ordered and fail-fast.
 *
 * NotStarted -> InProgress -> Completed | Failed. A refused claim ends as Skipped
 * without submitting anything. The first unit that exhausts its retry budget fails the
 * run: the end state and notification are written first, then RetryBudgetExhaustedError
 * is raised. Unexpected errors are recorded and notified the same way, then rethrown.
 */
export class BatchRunner {
  private retryLimit: number;
  private clock: Clock;

  constructor(
    private workList: WorkListSource,
    private executor: UnitExecutor,
    private audit: AuditTrail,
    private notifier: RunNotifier,
    private logger: Logger,
    options: BatchRunnerOptions
  ) {
    this.retryLimit = options.retryLimit;
    this.clock = options.clock ?? systemClock;
  }

  async run(run: RunContext): Promise<RunReport> {
    const warnings: AuditWriteExhaustedError[] = [];

    warnings.push(...(await this.audit.ensureRun(run)));

    const startedAt = this.clock();
    const start = await this.audit.recordStart(run, startedAt);
    warnings.push(...start.warnings);
    if (!start.claimed) {
      const duplicate = new DuplicateRunError(run);
      this.logger.warn('Run skipped, already held or finished', {
        runId: run.runId,
        errorCode: duplicate.error_code,
      });
      return {
        run,
        status: 'Skipped',
        skipReason: duplicate.message,
        unitsCompleted: 0,
        totalUnits: 0,
        warnings,
      };
    }

    this.logger.info('Run started', { runId: run.runId, retryLimit: this.retryLimit });

    let units: WorkUnit[] = [];
    let completed = 0;
    let failure: FailureRecord | undefined;

    try {
      units = await this.workList.fetchWorkList(run);

      for (const unit of units) {
        const result = await this.executor.executeWithRetry(unit, this.retryLimit);
        if (result.kind === 'failure') {
          failure = result.record;
          warnings.push(...(await this.audit.recordUnitOutcome(run, unit, {
            unitsCompleted: completed,
            totalUnits: units.length,
            status: 'Failed',
            errorMessage: result.record.lastError,
          })));
          break;
        }

        completed++;
        warnings.push(...(await this.audit.recordUnitOutcome(run, unit, {
          unitsCompleted: completed,
          totalUnits: units.length,
          status: 'Finished',
          errorMessage: NULL_ERROR_MESSAGE,
        })));
      }
    } catch (error) {
      await this.failUnexpected(run, startedAt, error, warnings);
      throw error;
    }

    if (failure) {
      const outcome = this.outcome('Failed', startedAt, failure.lastError, [failure]);
      warnings.push(...(await this.audit.recordEnd(run, outcome)));
      await this.notifier.notify(run, outcome, [failure]);
      this.logger.error('Run failed', {
        runId: run.runId,
        unit: failure.unit.name,
        unitsCompleted: completed,
        totalUnits: units.length,
      });
      throw new RetryBudgetExhaustedError(failure, this.retryLimit, warnings);
    }

    const outcome = this.outcome('Finished', startedAt, NULL_ERROR_MESSAGE, []);
    warnings.push(...(await this.audit.recordEnd(run, outcome)));
    await this.notifier.notify(run, outcome, []);
    this.logger.info('Run completed', {
      runId: run.runId,
      units: units.length,
      warnings: warnings.length,
    });

    return {
      run,
      status: 'Completed',
      outcome,
      unitsCompleted: completed,
      totalUnits: units.length,
      warnings,
    };
  }

  private async failUnexpected(
    run: RunContext,
    startedAt: Date,
    error: unknown,
    warnings: AuditWriteExhaustedError[]
  ): Promise<void> {
    const message = describeError(error);
    this.logger.error('Run aborted by unexpected error', { runId: run.runId, error: message });

    const failure: UnexpectedFailure = { kind: 'unexpected', message, region: run.region };
    const outcome = this.outcome('Failed', startedAt, message, [failure]);
    try {
      warnings.push(...(await this.audit.recordEnd(run, outcome)));
      await this.notifier.notify(run, outcome, [failure]);
    } catch (sideEffectError) {
      this.logger.error('Recording the aborted run failed', {
        runId: run.runId,
        error: describeError(sideEffectError),
      });
    }
  }

  private outcome(
    executionStatus: RunOutcome['executionStatus'],
    startedAt: Date,
    errorMessage: string,
    failedUnits: RunOutcome['failedUnits']
  ): RunOutcome {
    return {
      executionStatus,
      actualStartTime: startedAt.toISOString(),
      actualEndTime: this.clock().toISOString(),
      errorMessage,
      failedUnits,
    };
  }
}
