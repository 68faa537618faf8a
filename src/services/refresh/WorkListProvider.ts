import { z } from 'zod';
import { AuditTables } from '../../constants/AuditTables';
import { DataAccessError, TransientAccessError } from '../../types/RefreshErrors';
import { RunContext, WorkUnit } from '../../types/RefreshTypes';
import { AuditStatementRunner, SqlParams } from '../audit/AuditStatementRunner';
import { Logger } from '../core/Logger';

/**
 * Selects the data sources of a run, e.g. include `%BMT%` for BMT runs and
 * exclude it for the other sources.
 */
export interface DataSourceFilter {
  mode: 'include' | 'exclude';
  pattern: string;
}

export interface WorkListSource {
  fetchWorkList(run: RunContext): Promise<WorkUnit[]>;
}

const ProcedureRowSchema = z.object({
  stored_procedure_name: z.string().min(1),
  file_datasource: z.string().nullable().transform((value) => value ?? ''),
  exec_order: z.coerce.number(),
});

/**
 * Ascending by execOrder. Array.prototype.sort is stable, so ties keep provider order.
 */
export function sortByExecOrder(units: WorkUnit[]): WorkUnit[] {
  return [...units].sort((a, b) => a.execOrder - b.execOrder);
}

/**
 * WorkListProvider - ordered stored procedures for a run from the procedures table
 */
export class WorkListProvider implements WorkListSource {
  constructor(
    private runner: AuditStatementRunner,
    private filter: DataSourceFilter,
    private logger: Logger
  ) {}

  async fetchWorkList(run: RunContext): Promise<WorkUnit[]> {
    const operator = this.filter.mode === 'include' ? 'LIKE' : 'NOT LIKE';
    const params: SqlParams = { region: run.region, pattern: this.filter.pattern };
    let sql =
      `SELECT stored_procedure_name, file_datasource, exec_order FROM ${AuditTables.PROCEDURES} ` +
      `WHERE region = :region AND file_datasource ${operator} :pattern`;
    if (run.codebase !== undefined) {
      sql += ' AND codebase = :codebase';
      params.codebase = run.codebase;
    }
    sql += ' ORDER BY exec_order';

    let rows: z.infer<typeof ProcedureRowSchema>[];
    try {
      rows = await this.runner.query('work list lookup', sql, params, ProcedureRowSchema);
    } catch (error) {
      if (error instanceof TransientAccessError) {
        throw new DataAccessError(`Work list unavailable for ${run.region}: ${error.message}`, error);
      }
      throw error;
    }

    const units = sortByExecOrder(
      rows.map((row) => ({
        name: row.stored_procedure_name,
        dataSource: row.file_datasource,
        execOrder: row.exec_order,
      }))
    );

    this.logger.info('Work list resolved', {
      region: run.region,
      codebase: run.codebase,
      units: units.length,
    });
    return units;
  }
}
