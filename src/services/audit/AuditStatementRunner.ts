/**
 * Audit Statement Runner
 *
 * Executes parameterized SQL against the audit database through the RDS Data API.
 * Values are always bound as named parameters; SQL text never carries values.
 *
 * Each statement gets a narrow connectivity retry (3 attempts, linear backoff
 * 3s × attempt). Exhaustion raises TransientAccessError; deciding whether that is
 * fatal is the caller's business.
 */

import {
  ExecuteStatementCommand,
  ExecuteStatementCommandOutput,
  RDSDataClient,
  SqlParameter,
} from '@aws-sdk/client-rds-data';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import { TransientAccessError } from '../../types/RefreshErrors';
import { Sleep, sleep as defaultSleep, toSqlTimestamp } from '../../utils/timing';

export const AUDIT_MAX_ATTEMPTS = 3;
export const AUDIT_BACKOFF_MS = 3000;

export interface AuditDatabaseConfig {
  resourceArn: string;
  secretArn: string;
  database: string;
}

/** Bind a YYYY-MM-DD string with a DATE type hint. */
export interface SqlDate {
  readonly kind: 'date';
  readonly value: string;
}

export type SqlParamValue = string | number | boolean | null | Date | SqlDate;

export type SqlParams = Record<string, SqlParamValue>;

export function sqlDate(value: string): SqlDate {
  return { kind: 'date', value };
}

export function toSqlParameters(params: SqlParams): SqlParameter[] {
  return Object.entries(params).map(([name, value]): SqlParameter => {
    if (value === null) {
      return { name, value: { isNull: true } };
    }
    if (value instanceof Date) {
      return { name, value: { stringValue: toSqlTimestamp(value) }, typeHint: 'TIMESTAMP' };
    }
    if (typeof value === 'object') {
      return { name, value: { stringValue: value.value }, typeHint: 'DATE' };
    }
    if (typeof value === 'number') {
      return Number.isInteger(value)
        ? { name, value: { longValue: value } }
        : { name, value: { doubleValue: value } };
    }
    if (typeof value === 'boolean') {
      return { name, value: { booleanValue: value } };
    }
    return { name, value: { stringValue: value } };
  });
}

export interface AuditStatementRunnerOptions {
  maxAttempts?: number;
  backoffMs?: number;
  sleep?: Sleep;
}

export class AuditStatementRunner {
  private maxAttempts: number;
  private backoffMs: number;
  private sleep: Sleep;

  constructor(
    private client: RDSDataClient,
    private database: AuditDatabaseConfig,
    private logger: Logger,
    options: AuditStatementRunnerOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? AUDIT_MAX_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? AUDIT_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Run a write statement. Returns the number of rows it touched.
   */
  async execute(description: string, sql: string, params: SqlParams = {}): Promise<number> {
    const result = await this.send(description, sql, params, false);
    return result.numberOfRecordsUpdated ?? 0;
  }

  /**
   * Run a query and validate each row against the schema.
   * Rows come back as JSON objects keyed by column name.
   */
  async query<T>(description: string, sql: string, params: SqlParams, rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const result = await this.send(description, sql, params, true);
    if (!result.formattedRecords) {
      return [];
    }
    const parsed: unknown = JSON.parse(result.formattedRecords);
    return z.array(rowSchema).parse(parsed);
  }

  private async send(
    description: string,
    sql: string,
    params: SqlParams,
    formatAsJson: boolean
  ): Promise<ExecuteStatementCommandOutput> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        this.logger.debug('Executing audit statement', { description, attempt });
        return await this.client.send(new ExecuteStatementCommand({
          resourceArn: this.database.resourceArn,
          secretArn: this.database.secretArn,
          database: this.database.database,
          sql,
          parameters: toSqlParameters(params),
          ...(formatAsJson ? { formatRecordsAs: 'JSON' as const } : {}),
        }));
      } catch (error) {
        lastError = error;
        this.logger.warn('Audit statement failed', {
          description,
          attempt,
          maxAttempts: this.maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffMs * attempt);
        }
      }
    }

    throw new TransientAccessError(description, this.maxAttempts, lastError);
  }
}
