import { z } from 'zod';
import { AuditTables } from '../../constants/AuditTables';
import { ExpectedWindow } from '../../types/RefreshTypes';
import { AuditStatementRunner } from '../audit/AuditStatementRunner';
import { Logger } from '../core/Logger';
import { computeExpectedWindow } from '../trigger/RefreshWindow';
import { Clock, systemClock, toBatchDate } from '../../utils/timing';

/** Reports refreshed on their file-arrival cutoff date instead of every batch date. */
export const PERIODIC_FREQUENCIES: readonly string[] = ['Weekly', 'Monthly', 'Quarterly', 'Yearly'];

const ReportRowSchema = z.object({
  report_name: z.string(),
  report_refresh_frequency: z.string(),
  expected_start_time: z.string(),
  average_runtime: z.coerce.number(),
  status: z.string().nullable().transform((value) => value ?? 'Null'),
  actual_start_date: z.string().nullable(),
  file_arrival_cutoff_datetime: z.string().nullable(),
});

export type ReportRow = z.infer<typeof ReportRowSchema>;

export interface DashboardEntry {
  reportName: string;
  window: ExpectedWindow;
  status: string;
}

/**
 * Date the report is expected to refresh on: the batch date for daily reports,
 * the date part of the file-arrival cutoff for periodic ones.
 */
export function scheduleDate(report: ReportRow, batchDate: string): string {
  if (PERIODIC_FREQUENCIES.includes(report.report_refresh_frequency) && report.file_arrival_cutoff_datetime) {
    return report.file_arrival_cutoff_datetime.trim().split(/\s+/)[0] ?? batchDate;
  }
  return batchDate;
}

/**
 * Dashboard status of a report.
 *
 * Only a report whose last actual start falls on its expected start date is tracked;
 * every other report reads 'Null'.
 */
export function deriveDashboardStatus(
  currentStatus: string,
  actualStartDate: string | null,
  expectedStart: Date,
  now: Date
): string {
  if (!actualStartDate || actualStartDate !== toBatchDate(expectedStart)) {
    return 'Null';
  }
  if (now.getTime() <= expectedStart.getTime()) {
    return currentStatus === 'Null' ? 'Yet to start' : currentStatus;
  }
  return currentStatus === 'Completed' ? 'Completed' : 'Delay';
}

/**
 * ReportDashboardService - expected window and status of every report of a region
 */
export class ReportDashboardService {
  constructor(
    private runner: AuditStatementRunner,
    private logger: Logger,
    private clock: Clock = systemClock
  ) {}

  async refresh(region: string): Promise<DashboardEntry[]> {
    const now = this.clock();
    const batchDate = toBatchDate(now);

    const reports = await this.runner.query(
      'dashboard reports',
      'SELECT report_name, report_refresh_frequency, expected_start_time, average_runtime, status, ' +
        'CAST(DATE(actual_start_time) AS VARCHAR) AS actual_start_date, file_arrival_cutoff_datetime ' +
        `FROM ${AuditTables.REPORT_DASHBOARD} WHERE regionname = :region`,
      { region },
      ReportRowSchema
    );

    const entries: DashboardEntry[] = [];
    for (const report of reports) {
      const window = computeExpectedWindow(
        scheduleDate(report, batchDate),
        report.expected_start_time,
        report.average_runtime
      );
      const status = deriveDashboardStatus(report.status, report.actual_start_date, window.expectedStart, now);

      await this.runner.execute(
        'dashboard report update',
        `UPDATE ${AuditTables.REPORT_DASHBOARD} ` +
          'SET expected_start = :expectedStart, expected_end = :expectedEnd, status = :status ' +
          'WHERE report_name = :reportName AND regionname = :region',
        {
          expectedStart: window.expectedStart,
          expectedEnd: window.expectedEnd,
          status,
          reportName: report.report_name,
          region,
        }
      );
      entries.push({ reportName: report.report_name, window, status });
    }

    this.logger.info('Dashboard refreshed', { region, reports: entries.length });
    return entries;
  }
}
