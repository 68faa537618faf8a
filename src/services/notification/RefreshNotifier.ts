import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { describeError } from '../../types/RefreshErrors';
import { RunContext, RunFailure, RunOutcome } from '../../types/RefreshTypes';
import { Logger } from '../core/Logger';

export interface NotificationSettings {
  env: string;
  /** Label used in subjects, e.g. "BMT". */
  reportLabel: string;
  operatorsTopicArn: string;
  usersTopicArn?: string;
  reportUrl?: string;
  jobName: string;
  logGroup?: string;
}

export interface RunNotifier {
  notify(run: RunContext, outcome: RunOutcome, failures: RunFailure[]): Promise<void>;
}

export type OperatorFailureEntry =
  | {
      'Stored Procedure Name': string;
      Error: string;
      'Data Source': string;
      Region: string;
    }
  | string;

export function toOperatorEntry(failure: RunFailure): OperatorFailureEntry {
  if (failure.kind === 'unexpected') {
    return `Unexpected error: ${failure.message}`;
  }
  return {
    'Stored Procedure Name': failure.unit.name,
    Error: failure.lastError,
    'Data Source': failure.dataSource,
    Region: failure.region,
  };
}

/**
 * RefreshNotifier - SNS summaries for operators and users.
 *
 * Publish failures are logged and never escalated.
 */
export class RefreshNotifier implements RunNotifier {
  constructor(
    private client: SNSClient,
    private settings: NotificationSettings,
    private logger: Logger
  ) {}

  async notify(run: RunContext, outcome: RunOutcome, failures: RunFailure[]): Promise<void> {
    const failed = failures.length > 0;
    const label = this.settings.reportLabel;

    await this.publish(this.settings.operatorsTopicArn, `${run.region} ${label} Report Refresh ${failed ? 'Failed' : 'Successful'}`, {
      Env: this.settings.env,
      'Error Message': failures.map(toOperatorEntry),
      status: failed ? 'Failed' : 'Succeeded',
      Region: run.region,
      Job_Name: this.settings.jobName,
      Log_Group: this.settings.logGroup ?? '',
      Log_Stream_ID: run.runId,
      Execution_Status: outcome.executionStatus,
    });

    if (failed || !this.settings.usersTopicArn) {
      return;
    }

    await this.publish(this.settings.usersTopicArn, `${run.region} ${label} Report Refresh Successful`, {
      Env: this.settings.env,
      Message: `${run.region} ${label} Report Refresh is Completed Successfully.`,
      Report_Url: this.settings.reportUrl ?? '',
    });
  }

  async notifyStarted(run: RunContext, withoutPriorityFiles: boolean): Promise<void> {
    const label = this.settings.reportLabel;
    const subject = withoutPriorityFiles
      ? `${run.region} ${label} Report Refresh Started Without Priority Files`
      : `${run.region} ${label} Report Refresh Started`;
    await this.publish(this.settings.operatorsTopicArn, subject, {
      Env: this.settings.env,
      Message: withoutPriorityFiles
        ? `${run.region} ${label} Report Refresh started without priority files after cutoff.`
        : `${run.region} ${label} Report Refresh started with all priority files received.`,
      Region: run.region,
      Codebase: run.codebase ?? '',
      Job_Name: this.settings.jobName,
    });
  }

  async notifyPriorityFilesMissing(region: string, files: string[], failedProcesses: string[]): Promise<void> {
    await this.publish(this.settings.operatorsTopicArn, `*** ${region} ${this.settings.reportLabel} Priority File Missing ***`, {
      Env: this.settings.env,
      'Missing Priority File': files,
      'Process Name failed, If any': failedProcesses,
      Region: region,
      Job_Name: this.settings.jobName,
      Log_Group: this.settings.logGroup ?? '',
    });
  }

  async notifyPriorityFilesFailed(region: string, files: string[], failedProcesses: string[]): Promise<void> {
    await this.publish(this.settings.operatorsTopicArn, `*** ${region} ${this.settings.reportLabel} Priority File Failure ***`, {
      Env: this.settings.env,
      'Priority File Failed': files,
      'Process Name failed, If any': failedProcesses,
      Region: region,
      Job_Name: this.settings.jobName,
      Log_Group: this.settings.logGroup ?? '',
    });
  }

  private async publish(topicArn: string, subject: string, message: Record<string, unknown>): Promise<void> {
    try {
      await this.client.send(new PublishCommand({
        TopicArn: topicArn,
        Subject: subject,
        Message: JSON.stringify(message),
      }));
      this.logger.info('Notification published', { subject });
    } catch (error) {
      this.logger.error('Notification publish failed', {
        subject,
        error: describeError(error),
      });
    }
  }
}
