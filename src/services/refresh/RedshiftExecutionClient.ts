import {
  DescribeStatementCommand,
  ExecuteStatementCommand,
  RedshiftDataClient,
} from '@aws-sdk/client-redshift-data';
import { describeError, SubmissionError } from '../../types/RefreshErrors';
import { ExecutionHandle, StatementDescription, WorkUnit } from '../../types/RefreshTypes';
import { Clock, systemClock } from '../../utils/timing';
import { Logger } from '../core/Logger';

/**
 * Execution engine seam used by the poller and the retry controller.
 */
export interface ExecutionEngine {
  submit(unit: WorkUnit): Promise<ExecutionHandle>;
  describe(queryId: string): Promise<StatementDescription>;
}

/**
 * Provisioned cluster (clusterIdentifier) or serverless workgroup (workgroupName).
 */
export interface RedshiftTarget {
  clusterIdentifier?: string;
  workgroupName?: string;
  database: string;
  secretArn: string;
}

const PROCEDURE_REFERENCE =
  /^[A-Za-z_][\w$]*(?:\.[A-Za-z_][\w$]*){0,2}(?:\s*\([^;]*\))?$/;

/**
 * `CALL <name>;` for a qualified procedure reference with an optional argument list.
 * Anything else (statement separators, comments) is refused before reaching the engine.
 */
export function buildCallStatement(unit: WorkUnit): string {
  const reference = unit.name.trim().replace(/;$/, '').trim();
  if (
    !PROCEDURE_REFERENCE.test(reference) ||
    reference.includes('--') ||
    reference.includes('/*')
  ) {
    throw new SubmissionError(unit.name, 'not a valid stored procedure reference');
  }
  return `CALL ${reference};`;
}

export class RedshiftExecutionClient implements ExecutionEngine {
  constructor(
    private client: RedshiftDataClient,
    private target: RedshiftTarget,
    private logger: Logger,
    private clock: Clock = systemClock
  ) {}

  async submit(unit: WorkUnit): Promise<ExecutionHandle> {
    const sql = buildCallStatement(unit);
    const submittedAt = this.clock().toISOString();

    let queryId: string | undefined;
    try {
      const result = await this.client.send(new ExecuteStatementCommand({
        ...(this.target.workgroupName
          ? { WorkgroupName: this.target.workgroupName }
          : { ClusterIdentifier: this.target.clusterIdentifier }),
        Database: this.target.database,
        SecretArn: this.target.secretArn,
        Sql: sql,
        WithEvent: true,
      }));
      queryId = result.Id;
    } catch (error) {
      this.logger.error('Statement submission rejected', {
        unit: unit.name,
        error: describeError(error),
      });
      throw new SubmissionError(unit.name, describeError(error), error);
    }

    if (!queryId) {
      throw new SubmissionError(unit.name, 'engine returned no statement id');
    }

    this.logger.info('Statement submitted', { unit: unit.name, queryId });
    return { queryId, unit, submittedAt };
  }

  async describe(queryId: string): Promise<StatementDescription> {
    const result = await this.client.send(new DescribeStatementCommand({ Id: queryId }));
    return {
      status: result.Status ?? 'UNKNOWN',
      ...(result.Error ? { error: result.Error } : {}),
    };
  }
}
