/**
 * Report Refresh Handler
 *
 * Runs one ordered stored-procedure refresh.
 *
 * Input: an EventBridge "Report Refresh Requested" event (request in `detail`) or the
 * request itself: { region, batchDate, reportSource, codebase?, runId? }
 * Output: run summary. A failed run rejects with RetryBudgetExhaustedError.
 */

import { Handler } from 'aws-lambda';
import { z } from 'zod';
import { RefreshConfig, loadRefreshConfig } from '../../config/refreshConfig';
import { Logger } from '../../services/core/Logger';
import {
  RefreshClients,
  RuntimeOverrides,
  createRefreshClients,
  executeRefresh,
} from '../../services/refresh/RefreshRunnerFactory';
import { RefreshRequest, RefreshRequestSchema } from '../../types/RefreshEvents';
import { ValidationError } from '../../types/RefreshErrors';
import { RunReportStatus } from '../../types/RefreshTypes';

const RefreshEventSchema = z.union([
  z.object({ detail: RefreshRequestSchema }).transform((event) => event.detail),
  RefreshRequestSchema,
]);

export interface RefreshHandlerResult {
  status: RunReportStatus;
  runId: string;
  skipReason?: string;
  unitsCompleted: number;
  totalUnits: number;
  warnings: string[];
}

export function parseRefreshEvent(event: unknown): RefreshRequest {
  const validationResult = RefreshEventSchema.safeParse(event);
  if (!validationResult.success) {
    throw new ValidationError(
      `Invalid refresh request: ${validationResult.error.message}. ` +
        'Expected: { region, batchDate (YYYY-MM-DD), reportSource, codebase?, runId? } or an event carrying it in detail.',
      'INVALID_REFRESH_REQUEST'
    );
  }
  return validationResult.data;
}

/**
 * Create handler function with dependency injection for testability
 */
export function createHandler(
  config: RefreshConfig,
  clients: RefreshClients,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): (event: unknown) => Promise<RefreshHandlerResult> {
  return async (event: unknown) => {
    const request = parseRefreshEvent(event);
    logger.info('Report refresh invoked', {
      region: request.region,
      reportSource: request.reportSource,
      batchDate: request.batchDate,
      runId: request.runId,
    });

    try {
      const report = await executeRefresh(request, config, clients, overrides);
      return {
        status: report.status,
        runId: report.run.runId,
        ...(report.skipReason ? { skipReason: report.skipReason } : {}),
        unitsCompleted: report.unitsCompleted,
        totalUnits: report.totalUnits,
        warnings: report.warnings.map((warning) => warning.message),
      };
    } catch (error) {
      logger.error('Report refresh failed', {
        region: request.region,
        reportSource: request.reportSource,
        error: error instanceof Error ? error.message : String(error),
        errorName: error instanceof Error ? error.name : undefined,
      });
      throw error;
    }
  };
}

const logger = new Logger('ReportRefreshHandler');

export const handler: Handler<unknown, RefreshHandlerResult> = async (event: unknown) => {
  const config = loadRefreshConfig();
  logger.setLevel(config.logLevel);
  return createHandler(config, createRefreshClients(config.awsRegion), logger)(event);
};
