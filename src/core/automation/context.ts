import { CompanyRecord, CompanyStatus } from '../../types/company';
import { HarvestConfig } from '../../types/schema';
import { Logger } from '../../utils/logger';
import { sleep as realSleep, Sleep } from '../../utils/time';
import { SessionStatsTracker } from './stats';

/**
 * Records in discovery order, keyed by identity. There is no removal: the set
 * only grows during a run and Pass 2 mutates records in place.
 */
export class RecordStore {
  private byKey = new Map<string, CompanyRecord>();

  /** Returns false (and keeps the existing record) when the identity is taken. */
  add(record: CompanyRecord): boolean {
    if (this.byKey.has(record.identityKey)) return false;
    this.byKey.set(record.identityKey, record);
    return true;
  }

  get(identityKey: string): CompanyRecord | undefined {
    return this.byKey.get(identityKey);
  }

  has(identityKey: string): boolean {
    return this.byKey.has(identityKey);
  }

  get size(): number {
    return this.byKey.size;
  }

  values(): CompanyRecord[] {
    return Array.from(this.byKey.values());
  }
}

const TRANSITIONS: Record<CompanyStatus, readonly CompanyStatus[]> = {
  captured: ['enriched', 'enrichment_failed'],
  enriched: [],
  enrichment_failed: [],
};

export function transitionStatus(record: CompanyRecord, next: CompanyStatus): void {
  if (!TRANSITIONS[record.status].includes(next)) {
    throw new Error(`Invalid status transition ${record.status} -> ${next} for ${record.identityKey}`);
  }
  record.status = next;
}

/** Everything a pipeline stage may touch, passed explicitly. */
export interface RunContext {
  readonly config: HarvestConfig;
  readonly recordPath: RegExp;
  readonly records: RecordStore;
  readonly stats: SessionStatsTracker;
  readonly logger: Logger;
  readonly sleep: Sleep;
  readonly now: () => Date;
}

export function createRunContext(
  config: HarvestConfig,
  opts: { logger?: Logger; sleep?: Sleep; now?: () => Date } = {}
): RunContext {
  const now = opts.now ?? (() => new Date());
  return {
    config,
    recordPath: new RegExp(config.recordPathPattern),
    records: new RecordStore(),
    stats: new SessionStatsTracker(now),
    logger: opts.logger ?? new Logger(),
    sleep: opts.sleep ?? realSleep,
    now,
  };
}
