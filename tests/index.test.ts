import { describe, it, expect } from 'vitest';
import { reportHarvest } from '../src/index';
import { CompanyRecord, HarvestResult } from '../src/types';
import { Logger, LogLevel } from '../src/utils/logger';
import { FIXED_NOW } from './helpers/context';

const ACME: CompanyRecord = {
  identityKey: 'https://www.example.com/companies/acme',
  name: 'Acme',
  categories: [],
  description: 'Description not available',
  summary: 'Summary not available',
  founders: [],
  capturedAt: FIXED_NOW,
  status: 'enrichment_failed',
};

function result(overrides: Partial<HarvestResult> = {}): HarvestResult {
  return {
    records: [ACME],
    stats: {
      totalProcessed: 1,
      successfulCaptures: 1,
      successfulEnrichments: 0,
      errors: 1,
      skipped: 0,
      startTime: FIXED_NOW,
      endTime: FIXED_NOW,
    },
    discovery: { links: [], converged: true, rounds: 3, reason: 'stable' },
    artifacts: null,
    ...overrides,
  };
}

function report(harvest: HarvestResult) {
  const lines: Array<[LogLevel, unknown]> = [];
  const logger = new Logger('debug', 'harvester', (level, line) => {
    const entry: unknown = JSON.parse(line);
    if (typeof entry === 'object' && entry !== null && 'msg' in entry) lines.push([level, entry.msg]);
  });
  reportHarvest(harvest, logger);
  return lines;
}

describe('reportHarvest', () => {
  it('reports an empty harvest', () => {
    expect(report(result({ records: [] }))).toEqual([['warn', 'No records harvested']]);
  });

  it('reports records whose final output was not written', () => {
    expect(report(result())).toEqual([['error', 'Final output was not written']]);
  });

  it('reports where the output went', () => {
    const artifacts = { directory: '/tmp/out', csv: '/tmp/out/a.csv', json: '/tmp/out/a.json' };
    expect(report(result({ artifacts }))).toEqual([['info', 'Harvest written']]);
  });
});
