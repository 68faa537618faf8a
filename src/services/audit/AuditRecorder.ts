/**
 * Audit Recorder
 *
 * Run-level state transitions of the audit trail. A write that exhausts its attempts
 * becomes an AuditWriteExhaustedError returned to the caller as a warning; the batch
 * keeps going with possibly stale audit state.
 */

import {
  AuditWriteExhaustedError,
  TransientAccessError,
} from '../../types/RefreshErrors';
import {
  ExpectedWindow,
  MasterStatus,
  NULL_ERROR_MESSAGE,
  RunContext,
  RunKey,
  RunOutcome,
  UnitOutcome,
  WorkUnit,
} from '../../types/RefreshTypes';
import { Logger } from '../core/Logger';
import { RunLogRepository } from './RunLogRepository';

export interface StartRecord {
  claimed: boolean;
  warnings: AuditWriteExhaustedError[];
}

export interface AuditTrail {
  ensureRun(run: RunKey, window?: ExpectedWindow): Promise<AuditWriteExhaustedError[]>;
  recordStart(run: RunContext, startedAt: Date): Promise<StartRecord>;
  recordUnitOutcome(run: RunContext, unit: WorkUnit, outcome: UnitOutcome): Promise<AuditWriteExhaustedError[]>;
  recordEnd(run: RunContext, outcome: RunOutcome): Promise<AuditWriteExhaustedError[]>;
}

export function yetToStartMessage(reportSource: string): string {
  return `${reportSource} report refresh yet to start`;
}

type WriteResult<T> = { ok: true; value: T } | { ok: false; warning: AuditWriteExhaustedError };

export class AuditRecorder implements AuditTrail {
  constructor(
    private repository: RunLogRepository,
    private jobName: string,
    private logger: Logger
  ) {}

  async ensureRun(run: RunKey, window?: ExpectedWindow): Promise<AuditWriteExhaustedError[]> {
    const result = await this.write('ensure run row', () =>
      this.repository.insertYetToStart(run, this.jobName, yetToStartMessage(run.reportSource), window)
    );
    if (result.ok && result.value) {
      this.logger.info('Run row created', { ...run });
    }
    return result.ok ? [] : [result.warning];
  }

  /**
   * Claim the run row. An exhausted claim write is reported as a warning and the run proceeds.
   */
  async recordStart(run: RunContext, startedAt: Date): Promise<StartRecord> {
    const claim = await this.write('claim run', () =>
      this.repository.claim(run, startedAt, NULL_ERROR_MESSAGE)
    );
    if (claim.ok && !claim.value) {
      this.logger.warn('Run already held by another invocation', { ...run });
      return { claimed: false, warnings: [] };
    }

    const warnings: AuditWriteExhaustedError[] = claim.ok ? [] : [claim.warning];
    const master = await this.write('master status start', () =>
      this.repository.markMasterStarted(run.region, run.reportSource, startedAt)
    );
    if (!master.ok) {
      warnings.push(master.warning);
    }
    return { claimed: true, warnings };
  }

  async recordUnitOutcome(
    run: RunContext,
    unit: WorkUnit,
    outcome: UnitOutcome
  ): Promise<AuditWriteExhaustedError[]> {
    const result = await this.write('unit outcome', () =>
      this.repository.markUnitProgress(run, unit.name, outcome.unitsCompleted, outcome.errorMessage)
    );
    return result.ok ? [] : [result.warning];
  }

  async recordEnd(run: RunContext, outcome: RunOutcome): Promise<AuditWriteExhaustedError[]> {
    const warnings: AuditWriteExhaustedError[] = [];

    const end = await this.write('run end', () =>
      this.repository.markEnd(
        run,
        outcome.executionStatus,
        new Date(outcome.actualEndTime),
        outcome.errorMessage
      )
    );
    if (!end.ok) {
      warnings.push(end.warning);
    }

    const masterStatus: MasterStatus = outcome.executionStatus === 'Finished' ? 'Completed' : 'Failed';
    const master = await this.write('master status end', () =>
      this.repository.markMasterStatus(run.region, run.reportSource, masterStatus)
    );
    if (!master.ok) {
      warnings.push(master.warning);
    }

    this.logger.info('Run end recorded', {
      executionStatus: outcome.executionStatus,
      masterStatus,
      warnings: warnings.length,
    });
    return warnings;
  }

  private async write<T>(operation: string, action: () => Promise<T>): Promise<WriteResult<T>> {
    try {
      return { ok: true, value: await action() };
    } catch (error) {
      if (!(error instanceof TransientAccessError)) {
        throw error;
      }
      const warning = new AuditWriteExhaustedError(operation, error);
      this.logger.error('Audit write exhausted', { operation, error: warning.message });
      return { ok: false, warning };
    }
  }
}
