/**
 * Refresh Types - ordered stored-procedure execution
 *
 * Canonical shapes shared by the work-list provider, the execution engine client,
 * the retry controller, the batch runner and the audit trail.
 */

import type { AuditWriteExhaustedError, ExecutionFailure, SubmissionError } from './RefreshErrors';

/**
 * One executable stored procedure. Immutable once fetched for a run.
 *
 * `name` is an opaque executable reference, e.g. `published.sp_load_revenue('EMEA')`.
 * `execOrder` defines the total order; ties keep the order the provider returned.
 */
export interface WorkUnit {
  readonly name: string;
  readonly dataSource: string;
  readonly execOrder: number;
}

/**
 * Key of the run log row. Exactly one run is active per key.
 */
export interface RunKey {
  region: string;
  batchDate: string; // YYYY-MM-DD
  reportSource: string; // e.g. BMT, SPDST
}

/**
 * One orchestrated batch.
 *
 * `codebase` selects the work-list variant (Y: priority files checked, N: started after cutoff).
 */
export interface RunContext extends RunKey {
  runId: string;
  codebase?: string;
}

/**
 * Attempt status as seen by the retry controller.
 * Engine statuses collapse into these: SUBMITTED/PICKED -> Submitted, STARTED -> Running.
 * ClientError means the submission itself never reached the engine.
 */
export type AttemptStatus = 'Submitted' | 'Running' | 'Finished' | 'Failed' | 'Aborted' | 'ClientError';

export type TerminalStatus = 'Finished' | 'Failed' | 'Aborted';

/**
 * ExecutionAttempt - transient, never persisted individually.
 * `errorDetail` is present iff status is Failed, Aborted or ClientError.
 */
export interface ExecutionAttempt {
  unit: WorkUnit;
  attemptNumber: number;
  submittedAt: string; // ISO timestamp
  status: AttemptStatus;
  queryId?: string;
  errorDetail?: string;
  error?: SubmissionError | ExecutionFailure;
}

/**
 * Opaque handle returned by the engine on submission.
 */
export interface ExecutionHandle {
  queryId: string;
  unit: WorkUnit;
  submittedAt: string;
}

/**
 * Raw statement description from the engine.
 */
export interface StatementDescription {
  status: string;
  error?: string;
}

export interface TerminalResult {
  status: TerminalStatus;
  detail?: string;
  polls: number;
}

/**
 * Persisted run log status.
 *
 * Allowed transitions within one batch date:
 * - Yet to start -> Delay -> Submitted -> InProgress -> Finished | Failed
 * - Delay is a side annotation while the run waits to start, never terminal
 */
export type ExecutionStatus = 'Yet to start' | 'Delay' | 'Submitted' | 'InProgress' | 'Finished' | 'Failed';

/**
 * Coarse status on the master row read by dashboards.
 */
export type MasterStatus = 'InProgress' | 'Completed' | 'Failed';

/** Sentinel written to error_message when the last attempt succeeded. */
export const NULL_ERROR_MESSAGE = 'Null';

export interface FailureRecord {
  kind: 'unit';
  unit: WorkUnit;
  lastError: string;
  dataSource: string;
  region: string;
  attempts: number;
}

/**
 * Failure that did not come from a unit (work-list lookup, unexpected runtime error).
 */
export interface UnexpectedFailure {
  kind: 'unexpected';
  message: string;
  region: string;
}

export type RunFailure = FailureRecord | UnexpectedFailure;

export type UnitResult =
  | { kind: 'success'; unit: WorkUnit; attempts: ExecutionAttempt[] }
  | { kind: 'failure'; record: FailureRecord; attempts: ExecutionAttempt[] };

export interface RunOutcome {
  executionStatus: 'Finished' | 'Failed';
  actualStartTime: string;
  actualEndTime: string;
  errorMessage: string;
  failedUnits: RunFailure[];
}

/**
 * Per-unit boundary written to the run log so monitors see mid-run progress.
 */
export interface UnitOutcome {
  unitsCompleted: number;
  totalUnits: number;
  status: 'Finished' | 'Failed';
  errorMessage: string;
}

export type RunReportStatus = 'Completed' | 'Failed' | 'Skipped';

export interface RunReport {
  run: RunContext;
  status: RunReportStatus;
  /** Set when the run was skipped because another run holds or finished the key. */
  skipReason?: string;
  outcome?: RunOutcome;
  unitsCompleted: number;
  totalUnits: number;
  warnings: AuditWriteExhaustedError[];
}

/**
 * Expected start and end of a run on its batch date, from the master schedule.
 */
export interface ExpectedWindow {
  expectedStart: Date;
  expectedEnd: Date;
}
