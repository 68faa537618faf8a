import { AuditStatementRunner } from '../../../services/audit/AuditStatementRunner';
import { Logger } from '../../../services/core/Logger';
import { WorkListProvider, sortByExecOrder } from '../../../services/refresh/WorkListProvider';
import { DataAccessError } from '../../../types/RefreshErrors';
import {
  createRdsQueryResponse,
  createRecordingSleep,
  mockRdsDataClient,
  resetAllMocks,
} from '../../__mocks__/aws-sdk-clients';

describe('WorkListProvider', () => {
  const run = { region: 'EMEA', batchDate: '2026-03-02', reportSource: 'BMT', runId: 'run-1' };
  let recording: ReturnType<typeof createRecordingSleep>;
  let runner: AuditStatementRunner;

  beforeEach(() => {
    resetAllMocks();
    recording = createRecordingSleep();
    runner = new AuditStatementRunner(
      mockRdsDataClient as any,
      { resourceArn: 'arn:cluster', secretArn: 'arn:secret', database: 'audit_db' },
      new Logger('WorkListProviderTest'),
      { sleep: recording.sleep }
    );
  });

  it('should return units ascending by exec order, keeping ties in provider order', async () => {
    mockRdsDataClient.send.mockResolvedValue(
      createRdsQueryResponse([
        { stored_procedure_name: 'published.sp_c()', file_datasource: 'BMT', exec_order: 3 },
        { stored_procedure_name: 'published.sp_a()', file_datasource: 'BMT', exec_order: '1' },
        { stored_procedure_name: 'published.sp_b1()', file_datasource: 'BMT_X', exec_order: 2 },
        { stored_procedure_name: 'published.sp_b2()', file_datasource: null, exec_order: 2 },
      ])
    );
    const provider = new WorkListProvider(runner, { mode: 'include', pattern: '%BMT%' }, new Logger('Test'));

    const units = await provider.fetchWorkList(run);

    expect(units).toEqual([
      { name: 'published.sp_a()', dataSource: 'BMT', execOrder: 1 },
      { name: 'published.sp_b1()', dataSource: 'BMT_X', execOrder: 2 },
      { name: 'published.sp_b2()', dataSource: '', execOrder: 2 },
      { name: 'published.sp_c()', dataSource: 'BMT', execOrder: 3 },
    ]);
  });

  it('should filter by data source pattern and bind the region', async () => {
    mockRdsDataClient.send.mockResolvedValue(createRdsQueryResponse([]));
    const provider = new WorkListProvider(runner, { mode: 'exclude', pattern: '%BMT%' }, new Logger('Test'));

    await expect(provider.fetchWorkList(run)).resolves.toEqual([]);

    const input = mockRdsDataClient.send.mock.calls[0][0].input;
    expect(input.sql).toBe(
      'SELECT stored_procedure_name, file_datasource, exec_order FROM audit.report_refresh_procedures ' +
        'WHERE region = :region AND file_datasource NOT LIKE :pattern ORDER BY exec_order'
    );
    expect(input.parameters).toEqual([
      { name: 'region', value: { stringValue: 'EMEA' } },
      { name: 'pattern', value: { stringValue: '%BMT%' } },
    ]);
  });

  it('should select the codebase variant when the run has one', async () => {
    mockRdsDataClient.send.mockResolvedValue(createRdsQueryResponse([]));
    const provider = new WorkListProvider(runner, { mode: 'include', pattern: '%BMT%' }, new Logger('Test'));

    await provider.fetchWorkList({ ...run, codebase: 'N' });

    const input = mockRdsDataClient.send.mock.calls[0][0].input;
    expect(input.sql).toContain('AND codebase = :codebase ORDER BY exec_order');
    expect(input.parameters[2]).toEqual({ name: 'codebase', value: { stringValue: 'N' } });
  });

  it('should raise DataAccessError once the lookup exhausts its attempts', async () => {
    mockRdsDataClient.send.mockRejectedValue(new Error('Database unavailable'));
    const provider = new WorkListProvider(runner, { mode: 'include', pattern: '%BMT%' }, new Logger('Test'));

    const result = provider.fetchWorkList(run);

    await expect(result).rejects.toBeInstanceOf(DataAccessError);
    await expect(result).rejects.toThrow(
      'Work list unavailable for EMEA: work list lookup failed after 3 attempts: Database unavailable'
    );
    expect(mockRdsDataClient.send).toHaveBeenCalledTimes(3);
    expect(recording.calls).toEqual([3000, 6000]);
  });

  describe('sortByExecOrder', () => {
    it('should not mutate its input', () => {
      const units = [
        { name: 'b', dataSource: '', execOrder: 2 },
        { name: 'a', dataSource: '', execOrder: 1 },
      ];

      expect(sortByExecOrder(units).map((unit) => unit.name)).toEqual(['a', 'b']);
      expect(units[0]?.name).toBe('b');
    });
  });
});
