import { Logger } from '../../../services/core/Logger';
import { BatchRunner } from '../../../services/refresh/BatchRunner';
import {
  AuditWriteExhaustedError,
  DataAccessError,
  RetryBudgetExhaustedError,
} from '../../../types/RefreshErrors';
import { FailureRecord, RunContext, UnitResult, WorkUnit } from '../../../types/RefreshTypes';

describe('BatchRunner', () => {
  const run: RunContext = {
    region: 'EMEA',
    batchDate: '2026-03-02',
    reportSource: 'BMT',
    runId: 'run-1',
  };
  const units: WorkUnit[] = [
    { name: 'published.sp_a()', dataSource: 'BMT', execOrder: 1 },
    { name: 'published.sp_b()', dataSource: 'BMT', execOrder: 2 },
    { name: 'published.sp_c()', dataSource: 'BMT', execOrder: 3 },
  ];
  const clock = () => new Date('2026-03-02T06:00:00.000Z');

  let workList: { fetchWorkList: jest.Mock };
  let executor: { executeWithRetry: jest.Mock };
  let audit: { ensureRun: jest.Mock; recordStart: jest.Mock; recordUnitOutcome: jest.Mock; recordEnd: jest.Mock };
  let notifier: { notify: jest.Mock };
  let runner: BatchRunner;

  const success = (unit: WorkUnit): UnitResult => ({ kind: 'success', unit, attempts: [] });
  const failure = (unit: WorkUnit): UnitResult => ({
    kind: 'failure',
    record: {
      kind: 'unit',
      unit,
      lastError: 'division by zero',
      dataSource: unit.dataSource,
      region: 'EMEA',
      attempts: 3,
    },
    attempts: [],
  });

  beforeEach(() => {
    workList = { fetchWorkList: jest.fn().mockResolvedValue(units) };
    executor = { executeWithRetry: jest.fn(async (unit: WorkUnit) => success(unit)) };
    audit = {
      ensureRun: jest.fn().mockResolvedValue([]),
      recordStart: jest.fn().mockResolvedValue({ claimed: true, warnings: [] }),
      recordUnitOutcome: jest.fn().mockResolvedValue([]),
      recordEnd: jest.fn().mockResolvedValue([]),
    };
    notifier = { notify: jest.fn().mockResolvedValue(undefined) };
    runner = new BatchRunner(workList, executor, audit, notifier, new Logger('BatchRunnerTest'), {
      retryLimit: 3,
      clock,
    });
  });

  it('should execute every unit in order and complete the run', async () => {
    const report = await runner.run(run);

    expect(executor.executeWithRetry.mock.calls.map(([unit]) => unit.name)).toEqual([
      'published.sp_a()',
      'published.sp_b()',
      'published.sp_c()',
    ]);
    expect(executor.executeWithRetry).toHaveBeenCalledWith(units[0], 3);
    expect(report).toEqual({
      run,
      status: 'Completed',
      outcome: {
        executionStatus: 'Finished',
        actualStartTime: '2026-03-02T06:00:00.000Z',
        actualEndTime: '2026-03-02T06:00:00.000Z',
        errorMessage: 'Null',
        failedUnits: [],
      },
      unitsCompleted: 3,
      totalUnits: 3,
      warnings: [],
    });
    expect(audit.recordUnitOutcome.mock.calls.map(([, , outcome]) => outcome)).toEqual([
      { unitsCompleted: 1, totalUnits: 3, status: 'Finished', errorMessage: 'Null' },
      { unitsCompleted: 2, totalUnits: 3, status: 'Finished', errorMessage: 'Null' },
      { unitsCompleted: 3, totalUnits: 3, status: 'Finished', errorMessage: 'Null' },
    ]);
    expect(audit.recordEnd).toHaveBeenCalledTimes(1);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
    expect(notifier.notify).toHaveBeenCalledWith(run, report.outcome, []);
  });

  it('should stop at the first unit that exhausts its retry budget', async () => {
    executor.executeWithRetry.mockImplementation(async (unit: WorkUnit) =>
      unit.execOrder === 2 ? failure(unit) : success(unit)
    );

    const promise = runner.run(run);

    await expect(promise).rejects.toBeInstanceOf(RetryBudgetExhaustedError);
    await expect(promise).rejects.toThrow(
      'published.sp_b() failed after 3 attempts in EMEA: division by zero'
    );
    expect(executor.executeWithRetry).toHaveBeenCalledTimes(2);
    expect(audit.recordUnitOutcome).toHaveBeenLastCalledWith(run, units[1], {
      unitsCompleted: 1,
      totalUnits: 3,
      status: 'Failed',
      errorMessage: 'division by zero',
    });

    const [, outcome] = audit.recordEnd.mock.calls[0];
    expect(outcome.executionStatus).toBe('Failed');
    expect(outcome.errorMessage).toBe('division by zero');

    const [, , failures] = notifier.notify.mock.calls[0];
    expect((failures as FailureRecord[]).map((record) => record.unit.name)).toEqual(['published.sp_b()']);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('should write the end state before raising the budget error', async () => {
    const order: string[] = [];
    executor.executeWithRetry.mockImplementation(async (unit: WorkUnit) => failure(unit));
    audit.recordEnd.mockImplementation(async () => {
      order.push('recordEnd');
      return [];
    });
    notifier.notify.mockImplementation(async () => {
      order.push('notify');
    });

    await expect(runner.run(run)).rejects.toBeInstanceOf(RetryBudgetExhaustedError);
    expect(order).toEqual(['recordEnd', 'notify']);
  });

  it('should complete an empty work list with a single notification', async () => {
    workList.fetchWorkList.mockResolvedValue([]);

    const report = await runner.run(run);

    expect(report.status).toBe('Completed');
    expect(report.unitsCompleted).toBe(0);
    expect(report.totalUnits).toBe(0);
    expect(executor.executeWithRetry).not.toHaveBeenCalled();
    expect(audit.recordUnitOutcome).not.toHaveBeenCalled();
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('should skip the run when the claim is refused', async () => {
    audit.recordStart.mockResolvedValue({ claimed: false, warnings: [] });

    const report = await runner.run(run);

    expect(report).toEqual({
      run,
      status: 'Skipped',
      skipReason: 'Report refresh already triggered for EMEA/BMT on 2026-03-02',
      unitsCompleted: 0,
      totalUnits: 0,
      warnings: [],
    });
    expect(workList.fetchWorkList).not.toHaveBeenCalled();
    expect(executor.executeWithRetry).not.toHaveBeenCalled();
    expect(audit.recordEnd).not.toHaveBeenCalled();
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should record, notify and rethrow an unavailable work list', async () => {
    const error = new DataAccessError('Work list unavailable for EMEA: timeout');
    workList.fetchWorkList.mockRejectedValue(error);

    await expect(runner.run(run)).rejects.toBe(error);

    const [, outcome] = audit.recordEnd.mock.calls[0];
    expect(outcome.executionStatus).toBe('Failed');
    expect(outcome.errorMessage).toBe('Work list unavailable for EMEA: timeout');
    expect(notifier.notify).toHaveBeenCalledWith(run, outcome, [
      { kind: 'unexpected', message: 'Work list unavailable for EMEA: timeout', region: 'EMEA' },
    ]);
  });

  it('should rethrow the original error when recording the abort also fails', async () => {
    const error = new Error('boom');
    executor.executeWithRetry.mockRejectedValue(error);
    audit.recordEnd.mockRejectedValue(new Error('audit store down'));

    await expect(runner.run(run)).rejects.toBe(error);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('should collect audit warnings without failing the run', async () => {
    const startWarning = new AuditWriteExhaustedError('claim run');
    const endWarning = new AuditWriteExhaustedError('run end');
    audit.recordStart.mockResolvedValue({ claimed: true, warnings: [startWarning] });
    audit.recordEnd.mockResolvedValue([endWarning]);

    const report = await runner.run(run);

    expect(report.status).toBe('Completed');
    expect(report.warnings).toEqual([startWarning, endWarning]);
  });

  it('should carry audit warnings on the budget error', async () => {
    const warning = new AuditWriteExhaustedError('unit outcome');
    executor.executeWithRetry.mockImplementation(async (unit: WorkUnit) => failure(unit));
    audit.recordUnitOutcome.mockResolvedValue([warning]);

    const promise = runner.run(run);

    await expect(promise).rejects.toMatchObject({ warnings: [warning], retryLimit: 3 });
  });
});
