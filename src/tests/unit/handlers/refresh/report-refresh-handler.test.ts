import { DescribeStatementCommand, ExecuteStatementCommand } from '@aws-sdk/client-redshift-data';
import { RefreshConfig } from '../../../../config/refreshConfig';
import { createHandler } from '../../../../handlers/refresh/report-refresh-handler';
import { Logger } from '../../../../services/core/Logger';
import { RetryBudgetExhaustedError, ValidationError } from '../../../../types/RefreshErrors';
import {
  createRdsQueryResponse,
  createRdsUpdateResponse,
  createRecordingSleep,
  mockRdsDataClient,
  mockRedshiftDataClient,
  mockSnsClient,
  resetAllMocks,
} from '../../../__mocks__/aws-sdk-clients';

describe('Report Refresh Handler', () => {
  const config: RefreshConfig = {
    env: 'test',
    jobName: 'report-refresh',
    logLevel: 'info',
    reportLabel: 'BMT',
    operatorsTopicArn: 'arn:aws:sns:us-east-1:000000000000:ops',
    audit: { resourceArn: 'arn:cluster', secretArn: 'arn:secret', database: 'audit_db' },
    redshift: { workgroupName: 'reporting', database: 'reporting_db', secretArn: 'arn:redshift-secret' },
    dataSourceFilter: { mode: 'include', pattern: 'BMT%' },
    retryLimit: 2,
    pollIntervalMs: 1000,
    retryDelayMs: 5000,
  };
  const request = { region: 'EMEA', batchDate: '2026-03-02', reportSource: 'BMT', runId: 'run-abc' };

  let handler: ReturnType<typeof createHandler>;
  let recording: ReturnType<typeof createRecordingSleep>;

  beforeEach(() => {
    resetAllMocks();
    mockRdsDataClient.send.mockImplementation(async (command: any) => {
      const sql: string = command.input.sql;
      if (sql.startsWith('SELECT stored_procedure_name')) {
        return createRdsQueryResponse([
          { stored_procedure_name: 'published.sp_b()', file_datasource: 'BMT', exec_order: 2 },
          { stored_procedure_name: 'published.sp_a()', file_datasource: 'BMT', exec_order: 1 },
        ]);
      }
      return createRdsUpdateResponse(1);
    });
    mockRedshiftDataClient.send.mockImplementation(async (command: any) => {
      if (command instanceof ExecuteStatementCommand) {
        return { Id: `query-${mockRedshiftDataClient.send.mock.calls.length}` };
      }
      return { Status: 'FINISHED' };
    });
    mockSnsClient.send.mockResolvedValue({ MessageId: 'message-1' });

    recording = createRecordingSleep();
    const clients = {
      rdsData: mockRdsDataClient as any,
      redshiftData: mockRedshiftDataClient as any,
      sns: mockSnsClient as any,
    };
    handler = createHandler(config, clients, new Logger('ReportRefreshHandlerTest'), {
      sleep: recording.sleep,
      clock: () => new Date('2026-03-02T06:00:00.000Z'),
    });
  });

  const submittedSql = () =>
    mockRedshiftDataClient.send.mock.calls
      .map(([command]) => command)
      .filter((command) => command instanceof ExecuteStatementCommand)
      .map((command) => command.input.Sql);

  it('should run the work list in order from an EventBridge event', async () => {
    const result = await handler({ 'detail-type': 'Report Refresh Requested', detail: request });

    expect(result).toEqual({
      status: 'Completed',
      runId: 'run-abc',
      unitsCompleted: 2,
      totalUnits: 2,
      warnings: [],
    });
    expect(submittedSql()).toEqual(['CALL published.sp_a();', 'CALL published.sp_b();']);
    expect(mockSnsClient.send).toHaveBeenCalledTimes(1);
    expect(mockSnsClient.send.mock.calls[0][0].input.Subject).toBe('EMEA BMT Report Refresh Successful');
    expect(recording.calls).toEqual([]);
  });

  it('should accept the bare request', async () => {
    const result = await handler(request);

    expect(result.status).toBe('Completed');
  });

  it('should filter the work list by the configured data source pattern', async () => {
    await handler(request);

    const lookup = mockRdsDataClient.send.mock.calls
      .map(([command]) => command.input)
      .find((input) => input.sql.startsWith('SELECT stored_procedure_name'));
    expect(lookup.parameters).toContainEqual({ name: 'pattern', value: { stringValue: 'BMT%' } });
  });

  it('should fail the run once a unit exhausts its retries', async () => {
    mockRedshiftDataClient.send.mockImplementation(async (command: any) => {
      if (command instanceof DescribeStatementCommand) {
        return { Status: 'FAILED', Error: 'ERROR: division by zero' };
      }
      return { Id: 'query-failed' };
    });

    const promise = handler(request);

    await expect(promise).rejects.toBeInstanceOf(RetryBudgetExhaustedError);
    await expect(promise).rejects.toThrow('published.sp_a() failed after 2 attempts in EMEA: division by zero');
    expect(submittedSql()).toEqual(['CALL published.sp_a();', 'CALL published.sp_a();']);
    expect(recording.calls).toEqual([5000]);
    expect(mockSnsClient.send.mock.calls[0][0].input.Subject).toBe('EMEA BMT Report Refresh Failed');
  });

  it('should reject a malformed request without touching the audit store', async () => {
    await expect(handler({ detail: { region: 'EMEA', batchDate: '02/03/2026' } })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(mockRdsDataClient.send).not.toHaveBeenCalled();
  });

  describe('with a stateful run log', () => {
    let row: { status: string; runId: string | null; startedAt: string | null };

    const param = (input: any, name: string): string | undefined =>
      input.parameters.find((parameter: any) => parameter.name === name)?.value.stringValue;

    beforeEach(() => {
      row = { status: 'Submitted', runId: null, startedAt: null };
      mockRdsDataClient.send.mockImplementation(async (command: any) => {
        const input = command.input;
        const sql: string = input.sql;
        if (sql.startsWith('SELECT stored_procedure_name')) {
          return createRdsQueryResponse([
            { stored_procedure_name: 'published.sp_a()', file_datasource: 'BMT', exec_order: 1 },
            { stored_procedure_name: 'published.sp_b()', file_datasource: 'BMT', exec_order: 2 },
          ]);
        }
        if (sql.startsWith('UPDATE audit.report_refresh_run_log SET execution_status = :inProgress')) {
          const claimable = ['yetToStart', 'delay', 'submitted', 'failed'].map((name) => param(input, name));
          const ownClaim =
            row.runId === param(input, 'runId') &&
            row.status === param(input, 'inProgress') &&
            row.startedAt === param(input, 'startedAt');
          if (!claimable.includes(row.status) && !ownClaim) {
            return createRdsUpdateResponse(0);
          }
          row = {
            status: param(input, 'inProgress') ?? '',
            runId: param(input, 'runId') ?? null,
            startedAt: param(input, 'startedAt') ?? null,
          };
          return createRdsUpdateResponse(1);
        }
        if (sql.startsWith('UPDATE audit.report_refresh_run_log SET execution_status = :status')) {
          row = { ...row, status: param(input, 'status') ?? '' };
        }
        return createRdsUpdateResponse(1);
      });
    });

    it('should skip a redelivered request once the run has finished', async () => {
      const event = { detail: request };

      const first = await handler(event);
      expect(first.status).toBe('Completed');
      expect(row.status).toBe('Finished');

      const second = await handler(event);

      expect(second).toEqual({
        status: 'Skipped',
        runId: 'run-abc',
        skipReason: 'Report refresh already triggered for EMEA/BMT on 2026-03-02',
        unitsCompleted: 0,
        totalUnits: 0,
        warnings: [],
      });
      expect(submittedSql()).toEqual(['CALL published.sp_a();', 'CALL published.sp_b();']);
      expect(row.status).toBe('Finished');
    });

    it('should refuse a second invocation while the same run id is in progress', async () => {
      row = { status: 'InProgress', runId: 'run-abc', startedAt: '2026-03-02 05:55:00.000' };

      const result = await handler(request);

      expect(result.status).toBe('Skipped');
      expect(submittedSql()).toEqual([]);
    });

    it('should claim a failed run again', async () => {
      row = { status: 'Failed', runId: 'run-old', startedAt: '2026-03-02 05:00:00.000' };

      const result = await handler(request);

      expect(result.status).toBe('Completed');
      expect(row).toEqual({ status: 'Finished', runId: 'run-abc', startedAt: '2026-03-02 06:00:00.000' });
    });
  });
});
