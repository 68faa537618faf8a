/**
 * Refresh Trigger Handler
 *
 * Called by an EventBridge scheduled rule every few minutes for one region. Updates the
 * report dashboard, then decides whether the day's refresh can start.
 */

import { Handler } from 'aws-lambda';
import { TriggerConfig, loadTriggerConfig } from '../../config/refreshConfig';
import { Logger } from '../../services/core/Logger';
import {
  RuntimeOverrides,
  TriggerClients,
  createTriggerClients,
  createTriggerServices,
} from '../../services/refresh/RefreshRunnerFactory';
import { TriggerDecision } from '../../services/trigger/RefreshTriggerService';

export interface TriggerHandlerResult {
  region: string;
  decision: TriggerDecision;
  dashboardReports: number;
}

/**
 * Create handler function with dependency injection for testability
 */
export function createHandler(
  config: TriggerConfig,
  clients: TriggerClients,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): () => Promise<TriggerHandlerResult> {
  return async () => {
    const { trigger, dashboard } = createTriggerServices(config, clients, logger, overrides);
    logger.info('Refresh trigger invoked', { region: config.region, reportSource: config.reportSource });

    try {
      const reports = await dashboard.refresh(config.region);
      const decision = await trigger.evaluate(config.region);
      logger.info('Refresh trigger decision', { region: config.region, decision });
      return { region: config.region, decision, dashboardReports: reports.length };
    } catch (error) {
      logger.error('Refresh trigger failed', {
        region: config.region,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  };
}

const logger = new Logger('RefreshTriggerHandler');

export const handler: Handler<unknown, TriggerHandlerResult> = async () => {
  const config = loadTriggerConfig();
  logger.setLevel(config.logLevel);
  return createHandler(config, createTriggerClients(config.awsRegion), logger)();
};
