import { ListObjectsV2Command, S3Client } from '@aws-sdk/client-s3';
import { z } from 'zod';
import { AuditTables, PUBLISHED_LOAD_PROCESS } from '../../constants/AuditTables';
import { RunKey } from '../../types/RefreshTypes';
import { AuditStatementRunner, sqlDate } from '../audit/AuditStatementRunner';
import { Logger } from '../core/Logger';

export interface FailedPriorityFile {
  file: string;
  processes: string[];
}

/**
 * Readiness of the priority files of a run.
 * - ready: published load succeeded on the batch date
 * - failed: an upstream process failed for the file
 * - pending: received in the landing or archive zone, load not finished
 * - missing: not received
 */
export interface PriorityFileStatus {
  ready: string[];
  missing: string[];
  failed: FailedPriorityFile[];
  pending: string[];
}

export interface PriorityFileGate {
  check(key: RunKey): Promise<PriorityFileStatus>;
}

export interface LandingZoneSettings {
  bucket: string;
  /** Data source whose priority files gate the run, e.g. BMT. */
  dataSource: string;
  /** Object names with this prefix are control files, not data files. */
  metadataPrefix?: string;
  zones?: string[];
}

const DEFAULT_ZONES = ['LandingZone', 'ArchiveZone'];

const FileRowSchema = z.object({ filename: z.string() });
const FailedProcessRowSchema = z.object({ filename: z.string(), processname: z.string() });

export class LandingZonePriorityFileGate implements PriorityFileGate {
  private zones: string[];

  constructor(
    private runner: AuditStatementRunner,
    private s3Client: S3Client,
    private settings: LandingZoneSettings,
    private logger: Logger
  ) {
    this.zones = settings.zones ?? DEFAULT_ZONES;
  }

  async check(key: RunKey): Promise<PriorityFileStatus> {
    const priorityFiles = await this.priorityFiles(key.region);
    if (priorityFiles.length === 0) {
      return { ready: [], missing: [], failed: [], pending: [] };
    }

    const published = new Set(await this.publishedFiles(key, priorityFiles));
    const ready = priorityFiles.filter((file) => published.has(file));
    const outstanding = priorityFiles.filter((file) => !published.has(file));

    const status: PriorityFileStatus = { ready, missing: [], failed: [], pending: [] };
    if (outstanding.length === 0) {
      return status;
    }

    const failedProcesses = await this.failedProcesses(key, outstanding);
    const received = await this.receivedObjectNames(key.batchDate);

    for (const file of outstanding) {
      const processes = failedProcesses.get(file);
      if (processes && processes.length > 0) {
        status.failed.push({ file, processes });
      } else if (received.some((name) => name.includes(file))) {
        status.pending.push(file);
      } else {
        status.missing.push(file);
      }
    }

    this.logger.info('Priority files checked', {
      region: key.region,
      ready: status.ready.length,
      missing: status.missing,
      failed: status.failed.map((entry) => entry.file),
      pending: status.pending,
    });
    return status;
  }

  private async priorityFiles(region: string): Promise<string[]> {
    const rows = await this.runner.query(
      'priority file config',
      `SELECT filename FROM ${AuditTables.PRIORITY_FILES} ` +
        'WHERE region = :region AND data_source = :dataSource AND priority_flag = :flag',
      { region, dataSource: this.settings.dataSource, flag: 'YES' },
      FileRowSchema
    );
    return rows.map((row) => row.filename);
  }

  private async publishedFiles(key: RunKey, files: string[]): Promise<string[]> {
    const rows = await this.runner.query(
      'published priority files',
      `SELECT DISTINCT filename FROM ${AuditTables.FILE_LOAD_LOG} ` +
        'WHERE batchrundate = :batchDate AND regionname = :region AND processname = :process ' +
        "AND executionstatus = :succeeded AND filename = ANY(string_to_array(:files, ','))",
      {
        batchDate: sqlDate(key.batchDate),
        region: key.region,
        process: PUBLISHED_LOAD_PROCESS,
        succeeded: 'Succeeded',
        files: files.join(','),
      },
      FileRowSchema
    );
    return rows.map((row) => row.filename);
  }

  private async failedProcesses(key: RunKey, files: string[]): Promise<Map<string, string[]>> {
    const rows = await this.runner.query(
      'failed priority file processes',
      `SELECT DISTINCT filename, processname FROM ${AuditTables.FILE_LOAD_LOG} ` +
        'WHERE batchrundate = :batchDate AND regionname = :region AND executionstatus = :failed ' +
        "AND filename = ANY(string_to_array(:files, ','))",
      {
        batchDate: sqlDate(key.batchDate),
        region: key.region,
        failed: 'Failed',
        files: files.join(','),
      },
      FailedProcessRowSchema
    );

    const byFile = new Map<string, string[]>();
    for (const row of rows) {
      const processes = byFile.get(row.filename) ?? [];
      processes.push(row.processname);
      byFile.set(row.filename, processes);
    }
    return byFile;
  }

  /**
   * Data file names under `<zone>/dt=<batchDate>/` across the configured zones.
   */
  private async receivedObjectNames(batchDate: string): Promise<string[]> {
    const names: string[] = [];
    for (const zone of this.zones) {
      let continuationToken: string | undefined;
      do {
        const result = await this.s3Client.send(new ListObjectsV2Command({
          Bucket: this.settings.bucket,
          Prefix: `${zone}/dt=${batchDate}/`,
          ContinuationToken: continuationToken,
        }));
        for (const object of result.Contents ?? []) {
          const name = object.Key?.split('/').pop() ?? '';
          if (name.length === 0) continue;
          if (this.settings.metadataPrefix && name.startsWith(this.settings.metadataPrefix)) continue;
          names.push(name);
        }
        continuationToken = result.IsTruncated ? result.NextContinuationToken : undefined;
      } while (continuationToken);
    }
    return names;
  }
}
