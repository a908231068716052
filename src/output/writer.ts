import fs from 'node:fs';
import path from 'node:path';
import { CompanyRecord, CompanyRow, OutputFormat, OutputTarget } from '../types';

const COLUMNS: ReadonlyArray<keyof CompanyRow> = [
  'name',
  'description',
  'url',
  'categories',
  'founders',
  'summary',
  'scraped_at',
  'status',
];

export function toRow(record: CompanyRecord): CompanyRow {
  return {
    name: record.name,
    description: record.description,
    url: record.identityKey,
    categories: [...record.categories],
    founders: record.founders.map(f => ({ name: f.name, profile_url: f.profileUrl })),
    summary: record.summary,
    scraped_at: (record.enrichedAt ?? record.capturedAt).toISOString(),
    status: record.status,
  };
}

function csvCell(row: CompanyRow, key: keyof CompanyRow): string {
  switch (key) {
    case 'categories':
      return row.categories.join(', ');
    case 'founders':
      return JSON.stringify(row.founders);
    default:
      return row[key];
  }
}

export function csvEscape(v: string) {
  if (/[",\r\n]/.test(v)) return '"' + v.replace(/"/g, '""') + '"';
  return v;
}

export function serialize(rows: readonly CompanyRow[], format: OutputFormat): string {
  if (format === 'json') return JSON.stringify(rows, null, 2);
  const lines = [COLUMNS.join(',')].concat(
    rows.map(row => COLUMNS.map(k => csvEscape(csvCell(row, k))).join(','))
  );
  return lines.join('\n');
}

/** Overwrites one artifact file per call; the directory is created up front. */
export class OutputWriter {
  private filePath: string;
  private format: OutputFormat;

  constructor(target: OutputTarget) {
    this.format = target.format;
    this.filePath = path.join(target.directory, `${target.filename}.${this.format}`);
    fs.mkdirSync(target.directory, { recursive: true });
  }

  write(rows: readonly CompanyRow[]): void {
    fs.writeFileSync(this.filePath, serialize(rows, this.format));
  }

  path() { return this.filePath; }
}
