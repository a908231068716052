import path from 'node:path';
import { CompanyRecord, HarvestArtifacts } from '../types';
import { Logger } from '../utils/logger';
import { OutputWriter, toRow } from './writer';

export interface CheckpointOptions {
  outputDir: string;
  filePrefix: string;
  runId: string;
  logger?: Logger;
}

/**
 * Persists the record set as CSV and JSON under
 * `<outputDir>/output_<runId>/scraper/data/`. Progress snapshots overwrite the
 * `_progress` pair; `finalize` writes the final pair.
 */
export class CheckpointWriter {
  readonly directory: string;
  private baseName: string;
  private logger: Logger;

  constructor(opts: CheckpointOptions) {
    this.directory = path.join(opts.outputDir, `output_${opts.runId}`, 'scraper', 'data');
    this.baseName = `${opts.filePrefix}_${opts.runId}`;
    this.logger = (opts.logger ?? new Logger()).child({ name: 'checkpoint' });
  }

  snapshot(records: readonly CompanyRecord[]): HarvestArtifacts | null {
    const artifacts = this.write(records, `${this.baseName}_progress`);
    if (artifacts) this.logger.debug('Progress saved', { records: records.length });
    return artifacts;
  }

  finalize(records: readonly CompanyRecord[]): HarvestArtifacts | null {
    const artifacts = this.write(records, this.baseName);
    if (artifacts) this.logger.info('Results saved', { records: records.length, csv: artifacts.csv, json: artifacts.json });
    return artifacts;
  }

  // Rows are built before any file is opened.
  private write(records: readonly CompanyRecord[], filename: string): HarvestArtifacts | null {
    if (!records.length) return null;
    const rows = records.map(toRow);
    try {
      const csv = new OutputWriter({ directory: this.directory, filename, format: 'csv' });
      const json = new OutputWriter({ directory: this.directory, filename, format: 'json' });
      csv.write(rows);
      json.write(rows);
      return { directory: this.directory, csv: csv.path(), json: json.path() };
    } catch (error) {
      this.logger.error('Failed to write results', { filename, error });
      return null;
    }
  }
}
