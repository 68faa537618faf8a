/**
 * Run Log Repository
 *
 * SQL for the run log row (one per region/batch date/report source) and the
 * master status row (one per region/identifier) read by dashboards.
 *
 * Status transitions are guarded in SQL so a late or replayed write never moves a
 * row backwards (e.g. Delay over InProgress, InProgress over Finished).
 */

import { z } from 'zod';
import { AuditTables } from '../../constants/AuditTables';
import { ExecutionStatus, ExpectedWindow, MasterStatus, RunContext, RunKey } from '../../types/RefreshTypes';
import { AuditStatementRunner, SqlParams, sqlDate } from './AuditStatementRunner';

const RUN_KEY_PREDICATE =
  'regionname = :region AND batchrundate = :batchDate AND report_source = :reportSource';

const RunLogRowSchema = z.object({
  execution_status: z.string(),
  run_id: z.string().nullable().optional(),
  error_message: z.string().nullable().optional(),
});

export type RunLogRow = z.infer<typeof RunLogRowSchema>;

const ScheduleRowSchema = z.object({
  expected_start_time: z.string(),
  average_runtime: z.coerce.number(),
});

export type ScheduleRow = z.infer<typeof ScheduleRowSchema>;

const RegionRowSchema = z.object({ regionname: z.string() });

function keyParams(key: RunKey): SqlParams {
  return {
    region: key.region,
    batchDate: sqlDate(key.batchDate),
    reportSource: key.reportSource,
  };
}

export class RunLogRepository {
  constructor(private runner: AuditStatementRunner) {}

  async findRun(key: RunKey): Promise<RunLogRow | null> {
    const rows = await this.runner.query(
      'run log lookup',
      `SELECT execution_status, run_id, error_message FROM ${AuditTables.RUN_LOG} WHERE ${RUN_KEY_PREDICATE}`,
      keyParams(key),
      RunLogRowSchema
    );
    return rows[0] ?? null;
  }

  /**
   * Insert the Yet-to-start row if the key has none. Returns true when a row was inserted.
   */
  async insertYetToStart(
    key: RunKey,
    jobName: string,
    errorMessage: string,
    window?: ExpectedWindow
  ): Promise<boolean> {
    const status: ExecutionStatus = 'Yet to start';
    const inserted = await this.runner.execute(
      'run log insert',
      `INSERT INTO ${AuditTables.RUN_LOG} ` +
        '(batchrundate, regionname, report_source, execution_status, gluejob, expected_start_time, expected_end_time, error_message) ' +
        'VALUES (:batchDate, :region, :reportSource, :status, :jobName, :expectedStart, :expectedEnd, :errorMessage) ' +
        'ON CONFLICT (regionname, batchrundate, report_source) DO NOTHING',
      {
        ...keyParams(key),
        status,
        jobName,
        expectedStart: window?.expectedStart ?? null,
        expectedEnd: window?.expectedEnd ?? null,
        errorMessage,
      }
    );
    return inserted > 0;
  }

  /**
   * Move the row to InProgress for this run.
   *
   * Only rows that have not started (Yet to start, Delay, Submitted) or that failed are
   * claimable. A row this invocation already claimed (same run id and start time, still
   * InProgress) matches again so a retried statement reports success. Finished rows and
   * rows held by any other invocation, even one carrying the same run id, are refused.
   */
  async claim(run: RunContext, startedAt: Date, errorMessage: string): Promise<boolean> {
    const yetToStart: ExecutionStatus = 'Yet to start';
    const delay: ExecutionStatus = 'Delay';
    const submitted: ExecutionStatus = 'Submitted';
    const failed: ExecutionStatus = 'Failed';
    const inProgress: ExecutionStatus = 'InProgress';
    const updated = await this.runner.execute(
      'run log claim',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET execution_status = :inProgress, actual_start_time = :startedAt, run_id = :runId, ' +
        'error_message = :errorMessage, current_unit = NULL, units_completed = 0 ' +
        `WHERE ${RUN_KEY_PREDICATE} ` +
        'AND (execution_status IN (:yetToStart, :delay, :submitted, :failed) ' +
        'OR (run_id = :runId AND execution_status = :inProgress AND actual_start_time = :startedAt))',
      {
        ...keyParams(run),
        yetToStart,
        delay,
        submitted,
        failed,
        inProgress,
        startedAt,
        runId: run.runId,
        errorMessage,
      }
    );
    return updated > 0;
  }

  async markUnitProgress(
    key: RunKey,
    unitName: string,
    unitsCompleted: number,
    errorMessage: string
  ): Promise<void> {
    await this.runner.execute(
      'run log unit progress',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET current_unit = :unitName, units_completed = :unitsCompleted, error_message = :errorMessage ' +
        `WHERE ${RUN_KEY_PREDICATE}`,
      { ...keyParams(key), unitName, unitsCompleted, errorMessage }
    );
  }

  async markEnd(
    key: RunKey,
    status: 'Finished' | 'Failed',
    endedAt: Date,
    errorMessage: string
  ): Promise<void> {
    await this.runner.execute(
      'run log end',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET execution_status = :status, actual_end_time = :endedAt, error_message = :errorMessage ' +
        `WHERE ${RUN_KEY_PREDICATE}`,
      { ...keyParams(key), status, endedAt, errorMessage }
    );
  }

  /**
   * Trigger handed the run to the orchestrator.
   */
  async markSubmitted(key: RunKey, submittedAt: Date, errorMessage: string): Promise<boolean> {
    const submitted: ExecutionStatus = 'Submitted';
    const yetToStart: ExecutionStatus = 'Yet to start';
    const delay: ExecutionStatus = 'Delay';
    const failed: ExecutionStatus = 'Failed';
    const updated = await this.runner.execute(
      'run log submitted',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET execution_status = :submitted, actual_start_time = :submittedAt, error_message = :errorMessage ' +
        `WHERE ${RUN_KEY_PREDICATE} AND execution_status IN (:yetToStart, :delay, :failed)`,
      { ...keyParams(key), submitted, submittedAt, errorMessage, yetToStart, delay, failed }
    );
    return updated > 0;
  }

  /**
   * Undo a Submitted transition whose refresh request never went out.
   */
  async markSubmissionFailed(key: RunKey, errorMessage: string): Promise<boolean> {
    const failed: ExecutionStatus = 'Failed';
    const submitted: ExecutionStatus = 'Submitted';
    const updated = await this.runner.execute(
      'run log submission failed',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET execution_status = :failed, error_message = :errorMessage ' +
        `WHERE ${RUN_KEY_PREDICATE} AND execution_status = :submitted`,
      { ...keyParams(key), failed, errorMessage, submitted }
    );
    return updated > 0;
  }

  /**
   * Annotate a run that has not started yet as delayed.
   */
  async markDelay(key: RunKey, errorMessage: string): Promise<boolean> {
    const delay: ExecutionStatus = 'Delay';
    const yetToStart: ExecutionStatus = 'Yet to start';
    const updated = await this.runner.execute(
      'run log delay',
      `UPDATE ${AuditTables.RUN_LOG} ` +
        'SET execution_status = :delay, error_message = :errorMessage ' +
        `WHERE ${RUN_KEY_PREDICATE} AND execution_status IN (:yetToStart, :delay)`,
      { ...keyParams(key), delay, yetToStart, errorMessage }
    );
    return updated > 0;
  }

  /**
   * Regions among `regions` whose run for the same date and source is Submitted or InProgress.
   */
  async findActiveRegions(regions: string[], key: Omit<RunKey, 'region'>): Promise<string[]> {
    if (regions.length === 0) {
      return [];
    }
    const submitted: ExecutionStatus = 'Submitted';
    const inProgress: ExecutionStatus = 'InProgress';
    const rows = await this.runner.query(
      'active dependent regions',
      `SELECT regionname FROM ${AuditTables.RUN_LOG} ` +
        "WHERE regionname = ANY(string_to_array(:regions, ',')) " +
        'AND batchrundate = :batchDate AND report_source = :reportSource ' +
        'AND execution_status IN (:submitted, :inProgress)',
      {
        regions: regions.join(','),
        batchDate: sqlDate(key.batchDate),
        reportSource: key.reportSource,
        submitted,
        inProgress,
      },
      RegionRowSchema
    );
    return rows.map((row) => row.regionname);
  }

  async markMasterStarted(region: string, identifier: string, startedAt: Date): Promise<void> {
    const status: MasterStatus = 'InProgress';
    await this.runner.execute(
      'master status start',
      `UPDATE ${AuditTables.MASTER_STATUS} SET actual_start_time = :startedAt, status = :status ` +
        'WHERE regionname = :region AND identifier = :identifier',
      { startedAt, status, region, identifier }
    );
  }

  async markMasterStatus(region: string, identifier: string, status: MasterStatus): Promise<void> {
    await this.runner.execute(
      'master status end',
      `UPDATE ${AuditTables.MASTER_STATUS} SET status = :status ` +
        'WHERE regionname = :region AND identifier = :identifier',
      { status, region, identifier }
    );
  }

  async getSchedule(region: string, identifier: string): Promise<ScheduleRow | null> {
    const rows = await this.runner.query(
      'master schedule lookup',
      `SELECT expected_start_time, average_runtime FROM ${AuditTables.MASTER_STATUS} ` +
        'WHERE regionname = :region AND identifier = :identifier',
      { region, identifier },
      ScheduleRowSchema
    );
    return rows[0] ?? null;
  }
}
