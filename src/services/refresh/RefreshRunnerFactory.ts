/**
 * Wiring of the refresh runner and the trigger from validated configuration.
 *
 * Every collaborator is built per call; nothing is shared between runs.
 */

import { EventBridgeClient } from '@aws-sdk/client-eventbridge';
import { RDSDataClient } from '@aws-sdk/client-rds-data';
import { RedshiftDataClient } from '@aws-sdk/client-redshift-data';
import { S3Client } from '@aws-sdk/client-s3';
import { SNSClient } from '@aws-sdk/client-sns';
import { RefreshConfig, TriggerConfig } from '../../config/refreshConfig';
import { RefreshRequest } from '../../types/RefreshEvents';
import { RunContext, RunReport } from '../../types/RefreshTypes';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import { Clock, Sleep } from '../../utils/timing';
import { AuditRecorder } from '../audit/AuditRecorder';
import { AuditStatementRunner } from '../audit/AuditStatementRunner';
import { RunLogRepository } from '../audit/RunLogRepository';
import { Logger } from '../core/Logger';
import { TraceService } from '../core/TraceService';
import { ReportDashboardService } from '../dashboard/ReportDashboardService';
import { RefreshRequestPublisher } from '../events/RefreshRequestPublisher';
import { RefreshNotifier } from '../notification/RefreshNotifier';
import { LandingZonePriorityFileGate } from '../trigger/PriorityFileGate';
import { RefreshTriggerService } from '../trigger/RefreshTriggerService';
import { BatchRunner } from './BatchRunner';
import { CompletionPoller } from './CompletionPoller';
import { RedshiftExecutionClient } from './RedshiftExecutionClient';
import { RetryController } from './RetryController';
import { WorkListProvider } from './WorkListProvider';

export interface RefreshClients {
  rdsData: RDSDataClient;
  redshiftData: RedshiftDataClient;
  sns: SNSClient;
}

export interface TriggerClients {
  rdsData: RDSDataClient;
  s3: S3Client;
  sns: SNSClient;
  eventBridge: EventBridgeClient;
}

export interface RuntimeOverrides {
  sleep?: Sleep;
  clock?: Clock;
}

export function createRefreshClients(awsRegion?: string): RefreshClients {
  const clientConfig = getAWSClientConfig(awsRegion);
  return {
    rdsData: new RDSDataClient(clientConfig),
    redshiftData: new RedshiftDataClient(clientConfig),
    sns: new SNSClient(clientConfig),
  };
}

export function createTriggerClients(awsRegion?: string): TriggerClients {
  const clientConfig = getAWSClientConfig(awsRegion);
  return {
    rdsData: new RDSDataClient(clientConfig),
    s3: new S3Client(clientConfig),
    sns: new SNSClient(clientConfig),
    eventBridge: new EventBridgeClient(clientConfig),
  };
}

export function createBatchRunner(
  config: RefreshConfig,
  run: RunContext,
  clients: RefreshClients,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): BatchRunner {
  const statements = new AuditStatementRunner(clients.rdsData, config.audit, logger.child('AuditStatementRunner'), {
    sleep: overrides.sleep,
  });
  const engine = new RedshiftExecutionClient(
    clients.redshiftData,
    config.redshift,
    logger.child('RedshiftExecutionClient'),
    overrides.clock
  );
  const poller = new CompletionPoller(engine, logger.child('CompletionPoller'), config.pollIntervalMs, overrides.sleep);
  const retryController = new RetryController(engine, poller, run.region, logger.child('RetryController'), {
    retryDelayMs: config.retryDelayMs,
    sleep: overrides.sleep,
    clock: overrides.clock,
  });
  const notifier = new RefreshNotifier(
    clients.sns,
    {
      env: config.env,
      reportLabel: config.reportLabel ?? run.reportSource,
      operatorsTopicArn: config.operatorsTopicArn,
      usersTopicArn: config.usersTopicArn,
      reportUrl: config.reportUrl,
      jobName: config.jobName,
      logGroup: config.logGroup,
    },
    logger.child('RefreshNotifier')
  );

  return new BatchRunner(
    new WorkListProvider(statements, config.dataSourceFilter, logger.child('WorkListProvider')),
    retryController,
    new AuditRecorder(new RunLogRepository(statements), config.jobName, logger.child('AuditRecorder')),
    notifier,
    logger,
    { retryLimit: config.retryLimit, clock: overrides.clock }
  );
}

/**
 * Run one refresh request end to end. Rejects with RetryBudgetExhaustedError when a unit
 * fails terminally and rethrows unexpected errors after they are recorded.
 */
export async function executeRefresh(
  request: RefreshRequest,
  config: RefreshConfig,
  clients: RefreshClients,
  overrides: RuntimeOverrides = {}
): Promise<RunReport> {
  const logger = new Logger('BatchRunner', { level: config.logLevel });
  const traceService = new TraceService(logger);
  const key = { region: request.region, batchDate: request.batchDate, reportSource: request.reportSource };
  const context = traceService.createContext(key, request.runId);
  logger.setContext(context);

  const run: RunContext = {
    ...key,
    runId: context.traceId,
    ...(request.codebase ? { codebase: request.codebase } : {}),
  };
  return createBatchRunner(config, run, clients, logger, overrides).run(run);
}

export interface TriggerServices {
  trigger: RefreshTriggerService;
  dashboard: ReportDashboardService;
}

export function createTriggerServices(
  config: TriggerConfig,
  clients: TriggerClients,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): TriggerServices {
  const statements = new AuditStatementRunner(clients.rdsData, config.audit, logger.child('AuditStatementRunner'), {
    sleep: overrides.sleep,
  });
  const gate = new LandingZonePriorityFileGate(
    statements,
    clients.s3,
    {
      bucket: config.landingBucket,
      dataSource: config.reportSource,
      metadataPrefix: config.metadataPrefix,
    },
    logger.child('PriorityFileGate')
  );
  const notifier = new RefreshNotifier(
    clients.sns,
    {
      env: config.env,
      reportLabel: config.reportLabel ?? config.reportSource,
      operatorsTopicArn: config.operatorsTopicArn,
      jobName: config.jobName,
      logGroup: config.logGroup,
    },
    logger.child('RefreshNotifier')
  );

  const trigger = new RefreshTriggerService(
    new RunLogRepository(statements),
    gate,
    new RefreshRequestPublisher(clients.eventBridge, config.eventBusName, logger.child('RefreshRequestPublisher')),
    notifier,
    new TraceService(logger),
    {
      reportSource: config.reportSource,
      jobName: config.jobName,
      dependentRegions: config.dependentRegions,
      cutoff: config.cutoff,
    },
    logger,
    overrides.clock
  );

  return {
    trigger,
    dashboard: new ReportDashboardService(statements, logger.child('ReportDashboardService'), overrides.clock),
  };
}
