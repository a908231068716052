export type CompanyStatus = 'captured' | 'enriched' | 'enrichment_failed';

export interface Founder {
  name: string;
  profileUrl: string; // '' for name-only founders
}

export interface CompanyRecord {
  readonly identityKey: string;
  name: string;
  categories: string[];
  description: string;
  summary: string;
  founders: Founder[];
  capturedAt: Date;
  enrichedAt?: Date;
  status: CompanyStatus;
}

/** Fields Pass 2 may contribute to an existing record. */
export interface EnrichedFields {
  name?: string;
  categories?: string[];
  description?: string;
  founders?: Founder[];
  summary?: string;
}

export const DESCRIPTION_NOT_AVAILABLE = 'Description not available';
export const SUMMARY_NOT_AVAILABLE = 'Summary not available';
export const MAX_FOUNDERS = 5;

/** Row shape shared by checkpoints and final artifacts. */
export interface CompanyRow {
  name: string;
  description: string;
  url: string;
  categories: string[];
  founders: Array<{ name: string; profile_url: string }>;
  summary: string;
  scraped_at: string;
  status: CompanyStatus;
}
