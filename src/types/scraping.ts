import { CompanyRecord } from './company';
import { DiscoveryResult } from './navigation';

export type ScrapingErrorType = 'navigation' | 'timeout' | 'extraction' | 'capture';

export class ScrapingError extends Error {
  readonly timestamp = new Date();

  constructor(
    readonly type: ScrapingErrorType,
    message: string,
    readonly url?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScrapingError';
  }
}

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export interface SessionStats {
  totalProcessed: number;
  successfulCaptures: number;
  successfulEnrichments: number;
  errors: number;
  skipped: number;
  startTime: Date | null;
  endTime: Date | null;
}

export type StatCounter = Exclude<keyof SessionStats, 'startTime' | 'endTime'>;

export interface HarvestArtifacts {
  directory: string;
  csv: string;
  json: string;
}

export interface HarvestResult {
  records: CompanyRecord[];
  stats: Readonly<SessionStats>;
  discovery: DiscoveryResult;
  artifacts: HarvestArtifacts | null;
}
