/**
 * Refresh Trigger Service
 *
 * Runs on a schedule for one region. Creates the day's run row on first sight, then
 * on later ticks decides whether the refresh can start:
 * 1. Row already Finished/Submitted/InProgress -> nothing to do
 * 2. A dependent region is running -> wait (Delay once past expected start)
 * 3. Past cutoff start + grace -> start without priority files (codebase N)
 * 4. All priority files ready -> start (codebase Y)
 * 5. Inside the cutoff window -> Delay and escalate missing/failed files
 * 6. Otherwise -> Delay listing the missing files once past expected start
 */

import { ConfigurationError, describeError } from '../../types/RefreshErrors';
import {
  ExecutionStatus,
  ExpectedWindow,
  NULL_ERROR_MESSAGE,
  RunContext,
  RunKey,
} from '../../types/RefreshTypes';
import { Clock, systemClock, toBatchDate } from '../../utils/timing';
import { yetToStartMessage } from '../audit/AuditRecorder';
import { RunLogRepository } from '../audit/RunLogRepository';
import { Logger } from '../core/Logger';
import { TraceService } from '../core/TraceService';
import { RefreshRequestSink } from '../events/RefreshRequestPublisher';
import { PriorityFileGate } from './PriorityFileGate';
import { CutoffPolicy, computeExpectedWindow, isInCutoffWindow, isPastGrace } from './RefreshWindow';

export const OTHER_REGION_RUNNING = 'Other Region Report Refresh is already running';
export const CUTOFF_REACHED = 'Cut off time Reached and priority files not received';
export const PRIORITY_FILES_MISSING = 'PF Missing';
export const FILES_NOT_RECEIVED = 'Files Not Received';
export const REQUEST_NOT_PUBLISHED = 'Refresh request not published';

const ALREADY_TRIGGERED: readonly string[] = ['Finished', 'Submitted', 'InProgress'] satisfies ExecutionStatus[];

export interface TriggerSettings {
  reportSource: string;
  jobName: string;
  dependentRegions: string[];
  cutoff: CutoffPolicy;
}

export interface TriggerNotifier {
  notifyStarted(run: RunContext, withoutPriorityFiles: boolean): Promise<void>;
  notifyPriorityFilesMissing(region: string, files: string[], failedProcesses: string[]): Promise<void>;
  notifyPriorityFilesFailed(region: string, files: string[], failedProcesses: string[]): Promise<void>;
}

export type TriggerDecision =
  | { action: 'initialized'; window: ExpectedWindow }
  | { action: 'skipped'; status: string }
  | {
      action: 'waiting';
      reason: 'dependent-region' | 'cutoff' | 'priority-files';
      detail: string;
      delayed: boolean;
    }
  | { action: 'started'; codebase: 'Y' | 'N'; runId: string };

export class RefreshTriggerService {
  constructor(
    private repository: RunLogRepository,
    private gate: PriorityFileGate,
    private requests: RefreshRequestSink,
    private notifier: TriggerNotifier,
    private traceService: TraceService,
    private settings: TriggerSettings,
    private logger: Logger,
    private clock: Clock = systemClock
  ) {}

  async evaluate(region: string): Promise<TriggerDecision> {
    const now = this.clock();
    const key: RunKey = {
      region,
      batchDate: toBatchDate(now),
      reportSource: this.settings.reportSource,
    };

    const schedule = await this.repository.getSchedule(region, key.reportSource);
    if (!schedule) {
      throw new ConfigurationError(`No refresh schedule for ${key.reportSource} in ${region}`);
    }
    const window = computeExpectedWindow(key.batchDate, schedule.expected_start_time, schedule.average_runtime);

    const row = await this.repository.findRun(key);
    if (!row) {
      await this.repository.insertYetToStart(key, this.settings.jobName, yetToStartMessage(key.reportSource), window);
      this.logger.info('Run row initialized', { ...key, expectedStart: window.expectedStart.toISOString() });
      return { action: 'initialized', window };
    }

    if (ALREADY_TRIGGERED.includes(row.execution_status)) {
      this.logger.info('Report refresh already triggered for the day', { ...key, status: row.execution_status });
      return { action: 'skipped', status: row.execution_status };
    }

    const pastExpectedStart = now.getTime() > window.expectedStart.getTime();

    const activeRegions = await this.repository.findActiveRegions(this.settings.dependentRegions, key);
    if (activeRegions.length > 0) {
      const delayed = pastExpectedStart ? await this.repository.markDelay(key, OTHER_REGION_RUNNING) : false;
      this.logger.info(OTHER_REGION_RUNNING, { ...key, activeRegions });
      return { action: 'waiting', reason: 'dependent-region', detail: OTHER_REGION_RUNNING, delayed };
    }

    if (isPastGrace(now, this.settings.cutoff)) {
      this.logger.info('Cutoff grace elapsed, starting without priority files', { ...key });
      return this.start(key, 'N', now);
    }

    const files = await this.gate.check(key);
    const failedFiles = files.failed.map((entry) => entry.file);
    if (files.missing.length === 0 && files.failed.length === 0 && files.pending.length === 0) {
      return this.start(key, 'Y', now);
    }

    const notReceived = [...files.missing, ...failedFiles].join(',');

    if (isInCutoffWindow(now, this.settings.cutoff)) {
      const detail = notReceived ? `${CUTOFF_REACHED} ${notReceived}` : CUTOFF_REACHED;
      const delayed = pastExpectedStart ? await this.repository.markDelay(key, detail) : false;
      if (files.missing.length > 0) {
        await this.notifier.notifyPriorityFilesMissing(region, files.missing, [FILES_NOT_RECEIVED]);
      }
      if (files.failed.length > 0) {
        const processes = [...new Set(files.failed.flatMap((entry) => entry.processes))];
        await this.notifier.notifyPriorityFilesFailed(region, failedFiles, processes);
      }
      this.logger.warn(CUTOFF_REACHED, { ...key, missing: files.missing, failed: failedFiles });
      return { action: 'waiting', reason: 'cutoff', detail, delayed };
    }

    const detail = notReceived ? `${PRIORITY_FILES_MISSING} ${notReceived}` : PRIORITY_FILES_MISSING;
    const delayed = pastExpectedStart ? await this.repository.markDelay(key, detail) : false;
    this.logger.info('Priority files not received yet', {
      ...key,
      missing: files.missing,
      pending: files.pending,
      failed: failedFiles,
    });
    return { action: 'waiting', reason: 'priority-files', detail, delayed };
  }

  /**
   * The Submitted transition is the trigger's claim: nothing is published unless it
   * succeeds. A request that cannot be published leaves the row Failed for a later tick.
   */
  private async start(key: RunKey, codebase: 'Y' | 'N', now: Date): Promise<TriggerDecision> {
    const runId = this.traceService.generateRunId();
    const run: RunContext = { ...key, runId, codebase };

    const submitted = await this.repository.markSubmitted(key, now, NULL_ERROR_MESSAGE);
    if (!submitted) {
      const current = await this.repository.findRun(key);
      const status = current?.execution_status ?? 'unknown';
      this.logger.warn('Run row moved before submission, not requesting', { ...key, status });
      return { action: 'skipped', status };
    }

    try {
      await this.requests.requestRefresh({
        region: key.region,
        batchDate: key.batchDate,
        reportSource: key.reportSource,
        codebase,
        runId,
        requestedAt: now.toISOString(),
      });
    } catch (error) {
      await this.repository.markSubmissionFailed(key, `${REQUEST_NOT_PUBLISHED}: ${describeError(error)}`);
      throw error;
    }
    await this.notifier.notifyStarted(run, codebase === 'N');

    this.logger.info('Report refresh submitted', { ...key, codebase, runId });
    return { action: 'started', codebase, runId };
  }
}
