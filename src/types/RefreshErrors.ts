/**
 * Refresh Errors - typed errors for retry and propagation decisions
 *
 * Every error carries error_class, error_code and a retryable flag so callers can
 * decide between local retry, unit-level retry and halting the batch.
 */

import type { FailureRecord, RunKey } from './RefreshTypes';

export type RefreshErrorClass =
  | 'TRANSIENT_ACCESS'
  | 'SUBMISSION'
  | 'EXECUTION'
  | 'BUDGET_EXHAUSTED'
  | 'AUDIT'
  | 'DUPLICATE_RUN'
  | 'CONFIGURATION'
  | 'VALIDATION';

/**
 * Base refresh error with error_class for retry/halt decisions
 */
export class RefreshError extends Error {
  constructor(
    message: string,
    public readonly error_class: RefreshErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false,
    cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Audit store or work-list lookup failed after its local attempt budget.
 */
export class TransientAccessError extends RefreshError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      `${operation} failed after ${attempts} attempts: ${describeError(cause)}`,
      'TRANSIENT_ACCESS',
      'TRANSIENT_ACCESS_EXHAUSTED',
      true,
      cause
    );
  }
}

/**
 * Work list could not be resolved. Fatal to the run.
 */
export class DataAccessError extends RefreshError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSIENT_ACCESS', 'WORK_LIST_UNAVAILABLE', false, cause);
  }
}

/**
 * Execution engine rejected the request (or it never reached the engine).
 * Counted as one retry-eligible unit failure.
 */
export class SubmissionError extends RefreshError {
  constructor(
    public readonly unitName: string,
    public readonly detail: string,
    cause?: unknown
  ) {
    super(`Submission of ${unitName} failed: ${detail}`, 'SUBMISSION', 'SUBMISSION_FAILED', true, cause);
  }
}

/**
 * Engine reported a terminal Failed/Aborted status. Counted as one retry-eligible unit failure.
 */
export class ExecutionFailure extends RefreshError {
  constructor(
    public readonly unitName: string,
    public readonly status: 'Failed' | 'Aborted',
    public readonly detail: string
  ) {
    super(`${unitName} ended ${status}: ${detail}`, 'EXECUTION', `EXECUTION_${status.toUpperCase()}`, true);
  }
}

/**
 * A unit used its whole retry budget. Halts the batch and is re-raised to the caller
 * after the audit trail and notifications are written.
 */
export class RetryBudgetExhaustedError extends RefreshError {
  constructor(
    public readonly record: FailureRecord,
    public readonly retryLimit: number,
    public readonly warnings: AuditWriteExhaustedError[] = []
  ) {
    super(
      `${record.unit.name} failed after ${retryLimit} attempts in ${record.region}: ${record.lastError}`,
      'BUDGET_EXHAUSTED',
      'RETRY_BUDGET_EXHAUSTED',
      false
    );
  }
}

/**
 * Audit write exhausted its attempts. Non-fatal: the batch continues but audit state may be stale.
 */
export class AuditWriteExhaustedError extends RefreshError {
  constructor(
    public readonly operation: string,
    cause?: unknown
  ) {
    super(`Audit write "${operation}" exhausted its attempts: ${describeError(cause)}`, 'AUDIT', 'AUDIT_WRITE_EXHAUSTED', false, cause);
  }
}

/**
 * Another run already holds (or finished) the same region/date/source triple.
 */
export class DuplicateRunError extends RefreshError {
  constructor(key: RunKey, currentStatus?: string) {
    super(
      `Report refresh already triggered for ${key.region}/${key.reportSource} on ${key.batchDate}` +
        (currentStatus ? ` (status: ${currentStatus})` : ''),
      'DUPLICATE_RUN',
      'DUPLICATE_RUN',
      false
    );
  }
}

export class ConfigurationError extends RefreshError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', 'CONFIGURATION_INVALID', false);
  }
}

export class ValidationError extends RefreshError {
  constructor(message: string, errorCode?: string) {
    super(message, 'VALIDATION', errorCode || 'VALIDATION_FAILED', false);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
