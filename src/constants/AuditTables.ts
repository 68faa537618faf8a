/**
 * Audit schema objects read and written by the orchestrator and the trigger.
 * Column layout: sql/audit-schema.sql
 */
export const AuditTables = {
  /** Ordered stored-procedure work list per region/data source/codebase. */
  PROCEDURES: 'audit.report_refresh_procedures',
  /** One row per (regionname, batchrundate, report_source). */
  RUN_LOG: 'audit.report_refresh_run_log',
  /** Coarse status and schedule per (regionname, identifier). */
  MASTER_STATUS: 'audit.report_master_status',
  /** Per-report expected window and dashboard status. */
  REPORT_DASHBOARD: 'audit.report_dashboard',
  /** Priority files per region and data source. */
  PRIORITY_FILES: 'audit.priority_file_config',
  /** Upstream file load process log. */
  FILE_LOAD_LOG: 'audit.file_load_log',
} as const;

/** Process name of the upstream load that publishes a file. */
export const PUBLISHED_LOAD_PROCESS = 'RedshiftPublishedLoad';
