export type OutputFormat = 'json' | 'csv';
export type OutputTarget = { directory: string; filename: string; format: OutputFormat };

export type BrowserKind = 'chromium' | 'firefox' | 'webkit';

export interface BrowserConfig {
  kind: BrowserKind;
  headless: boolean;
  slowMo: number;
  timeout: number;
  userAgent?: string;
}

export interface HarvestConfig {
  listingUrl: string;
  linkSelector: string;
  recordPathPattern: string;
  navigationLabels: string[];

  // scrolling
  scrollStabilityRounds: number;
  maxScrollAttempts: number;
  scrollDelay: number;
  targetRecordUpperBound: number;
  minExpectedRecords: number;

  // navigation
  pageTimeout: number;
  companyPageTimeout: number;
  listingSettleDelay: number;
  detailSettleDelay: number;

  // passes
  chunkSize: number;
  chunkDelay: number;
  progressSaveInterval: number;

  // output
  outputDir: string;
  filePrefix: string;

  browser: BrowserConfig;
}
