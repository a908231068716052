import { describe, it, expect } from 'vitest';
import { RecordStore, transitionStatus } from '../../src/core/automation/context';
import { formatSessionSummary, SessionStatsTracker } from '../../src/core/automation/stats';
import { CompanyRecord } from '../../src/types';

const clock = (...times: string[]) => {
  const queue = times.map(t => new Date(t));
  return () => queue.shift() ?? new Date(0);
};

describe('SessionStatsTracker', () => {
  it('counts and stamps start and end times', () => {
    const stats = new SessionStatsTracker(clock('2025-01-01T10:00:00Z', '2025-01-01T11:02:03Z'));
    stats.start();
    stats.increment('totalProcessed', 4);
    stats.increment('successfulCaptures');
    stats.increment('skipped');
    stats.finish();

    expect(stats.snapshot()).toEqual({
      totalProcessed: 4,
      successfulCaptures: 1,
      successfulEnrichments: 0,
      errors: 0,
      skipped: 1,
      startTime: new Date('2025-01-01T10:00:00Z'),
      endTime: new Date('2025-01-01T11:02:03Z'),
    });
  });

  it('is read-only once finished', () => {
    const stats = new SessionStatsTracker();
    stats.start();
    stats.finish();
    expect(stats.finished).toBe(true);
    expect(() => stats.increment('errors')).toThrow('finalized');
    expect(() => stats.finish()).toThrow('finalized');
  });

  it('hands out frozen snapshots', () => {
    const stats = new SessionStatsTracker();
    const snap = stats.snapshot();
    stats.increment('errors');
    expect(snap.errors).toBe(0);
    expect(Object.isFrozen(snap)).toBe(true);
  });
});

describe('formatSessionSummary', () => {
  it('reports every counter and the duration', () => {
    const stats = new SessionStatsTracker(clock('2025-01-01T10:00:00Z', '2025-01-01T11:02:03Z'));
    stats.start();
    stats.increment('totalProcessed', 10);
    stats.increment('successfulCaptures', 7);
    stats.increment('successfulEnrichments', 6);
    stats.increment('errors');
    stats.increment('skipped', 3);
    stats.finish();

    expect(formatSessionSummary(stats.snapshot(), 7)).toEqual([
      '='.repeat(50),
      'SCRAPING SESSION SUMMARY',
      '='.repeat(50),
      'Total Links Processed: 10',
      'Successfully Captured: 7',
      'Successfully Enriched: 6',
      'Errors Encountered: 1',
      'Skipped Items: 3',
      'Final Company Count: 7',
      'Total Duration: 1:02:03',
      '='.repeat(50),
    ]);
  });
});

describe('RecordStore', () => {
  const make = (key: string): CompanyRecord => ({
    identityKey: key,
    name: key,
    categories: [],
    description: '',
    summary: '',
    founders: [],
    capturedAt: new Date(0),
    status: 'captured',
  });

  it('holds one record per identity in insertion order', () => {
    const store = new RecordStore();
    expect(store.add(make('b'))).toBe(true);
    expect(store.add(make('a'))).toBe(true);
    const second = { ...make('b'), name: 'other' };
    expect(store.add(second)).toBe(false);

    expect(store.size).toBe(2);
    expect(store.values().map(r => r.identityKey)).toEqual(['b', 'a']);
    expect(store.get('b')?.name).toBe('b');
  });

  it('only allows transitions out of captured', () => {
    const r = make('x');
    transitionStatus(r, 'enriched');
    expect(r.status).toBe('enriched');
    expect(() => transitionStatus(r, 'enrichment_failed')).toThrow('Invalid status transition enriched -> enrichment_failed');
    expect(() => transitionStatus(make('y'), 'captured')).toThrow('Invalid status transition');
  });
});
