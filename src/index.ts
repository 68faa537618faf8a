#!/usr/bin/env node
/**
 * Report Refresh Orchestrator
 *
 * CLI entry point for long-running hosts. Lambda deployments use the handlers under
 * handlers/refresh instead.
 *
 *   report-refresh run --region EMEA --source BMT [--batch-date 2026-01-31] [--codebase Y]
 *   report-refresh trigger
 *
 * Exit code is 1 when the run fails, 0 otherwise (including a skipped duplicate run).
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { loadRefreshConfig, loadTriggerConfig } from './config/refreshConfig';
import { Logger } from './services/core/Logger';
import {
  createRefreshClients,
  createTriggerClients,
  createTriggerServices,
  executeRefresh,
} from './services/refresh/RefreshRunnerFactory';
import { RefreshRequestSchema } from './types/RefreshEvents';
import { ValidationError, describeError } from './types/RefreshErrors';
import { systemClock, toBatchDate } from './utils/timing';

// Load environment variables
config();

const logger = new Logger('ReportRefreshCli');

interface RunOptions {
  region: string;
  source: string;
  batchDate?: string;
  codebase?: string;
  runId?: string;
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('report-refresh')
    .description('Ordered stored-procedure report refresh with retry and audit trail');

  program
    .command('run')
    .description('Run the refresh for one region and report source')
    .requiredOption('--region <region>', 'Report region, e.g. EMEA')
    .requiredOption('--source <source>', 'Report source, e.g. BMT')
    .option('--batch-date <date>', 'Batch date YYYY-MM-DD (default: today, UTC)')
    .option('--codebase <codebase>', 'Work-list variant (Y: priority files checked, N: started after cutoff)')
    .option('--run-id <id>', 'Run id handed over by the trigger')
    .action(async (options: RunOptions) => {
      const parsed = RefreshRequestSchema.safeParse({
        region: options.region,
        reportSource: options.source,
        batchDate: options.batchDate ?? toBatchDate(systemClock()),
        codebase: options.codebase,
        runId: options.runId,
      });
      if (!parsed.success) {
        throw new ValidationError(`Invalid run options: ${parsed.error.message}`, 'INVALID_RUN_OPTIONS');
      }

      const refreshConfig = loadRefreshConfig();
      logger.setLevel(refreshConfig.logLevel);
      const report = await executeRefresh(parsed.data, refreshConfig, createRefreshClients(refreshConfig.awsRegion));
      logger.info('Refresh run ended', {
        status: report.status,
        runId: report.run.runId,
        skipReason: report.skipReason,
        unitsCompleted: report.unitsCompleted,
        totalUnits: report.totalUnits,
        warnings: report.warnings.length,
      });
    });

  program
    .command('trigger')
    .description('Update the dashboard and evaluate whether the configured refresh can start')
    .action(async () => {
      const triggerConfig = loadTriggerConfig();
      logger.setLevel(triggerConfig.logLevel);
      const { trigger, dashboard } = createTriggerServices(
        triggerConfig,
        createTriggerClients(triggerConfig.awsRegion),
        logger
      );
      await dashboard.refresh(triggerConfig.region);
      const decision = await trigger.evaluate(triggerConfig.region);
      logger.info('Trigger evaluated', { region: triggerConfig.region, decision });
    });

  return program;
}

async function main(): Promise<void> {
  try {
    await buildCli().parseAsync(process.argv);
  } catch (error) {
    logger.error('Report refresh command failed', {
      error: describeError(error),
      errorName: error instanceof Error ? error.name : undefined,
    });
    process.exitCode = 1;
  }
}

// Run main function if this file is executed directly
if (require.main === module) {
  void main();
}
