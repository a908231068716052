import { SessionStats, StatCounter } from '../../types/scraping';
import { formatDuration } from '../../utils/time';

export class SessionStatsTracker {
  private stats: SessionStats = {
    totalProcessed: 0,
    successfulCaptures: 0,
    successfulEnrichments: 0,
    errors: 0,
    skipped: 0,
    startTime: null,
    endTime: null,
  };

  constructor(private now: () => Date = () => new Date()) {}

  get finished(): boolean {
    return this.stats.endTime !== null;
  }

  start(): void {
    this.assertOpen();
    this.stats.startTime = this.now();
  }

  increment(counter: StatCounter, by = 1): void {
    this.assertOpen();
    this.stats[counter] += by;
  }

  /** Stamps the end time; the tracker is read-only afterwards. */
  finish(): void {
    this.assertOpen();
    this.stats.endTime = this.now();
  }

  snapshot(): Readonly<SessionStats> {
    return Object.freeze({ ...this.stats });
  }

  private assertOpen(): void {
    if (this.finished) throw new Error('Session statistics are finalized');
  }
}

export function formatSessionSummary(stats: Readonly<SessionStats>, recordCount: number): string[] {
  const rule = '='.repeat(50);
  const lines = [
    rule,
    'SCRAPING SESSION SUMMARY',
    rule,
    `Total Links Processed: ${stats.totalProcessed}`,
    `Successfully Captured: ${stats.successfulCaptures}`,
    `Successfully Enriched: ${stats.successfulEnrichments}`,
    `Errors Encountered: ${stats.errors}`,
    `Skipped Items: ${stats.skipped}`,
    `Final Company Count: ${recordCount}`,
  ];
  if (stats.startTime && stats.endTime) {
    lines.push(`Total Duration: ${formatDuration(stats.endTime.getTime() - stats.startTime.getTime())}`);
  }
  lines.push(rule);
  return lines;
}
