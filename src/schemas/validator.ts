import { z } from 'zod';
import { HarvestConfig } from '../types';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigError';
  }
}

const isRegExp = (source: string) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

const delay = z.number().int().nonnegative();
const count = z.number().int().positive();

const browserSchema = z.object({
  kind: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
  headless: z.boolean().default(true),
  slowMo: delay.default(0),
  timeout: count.default(30000),
  userAgent: z.string().min(1).optional(),
});

export const harvestConfigSchema: z.ZodType<HarvestConfig, z.ZodTypeDef, unknown> = z.object({
  listingUrl: z.string().url().default('https://www.ycombinator.com/companies'),
  linkSelector: z.string().min(1).default("a[href*='/companies/']"),
  recordPathPattern: z
    .string()
    .min(1)
    .refine(isRegExp, 'must be a valid regular expression')
    .default('^/companies/[a-z0-9-]+$'),
  navigationLabels: z.array(z.string()).default(['founder directory', 'companies', 'about', 'contact']),

  scrollStabilityRounds: count.default(3),
  maxScrollAttempts: count.default(60),
  scrollDelay: delay.default(2000),
  targetRecordUpperBound: count.default(200),
  minExpectedRecords: z.number().int().nonnegative().default(100),

  pageTimeout: count.default(30000),
  companyPageTimeout: count.default(15000),
  listingSettleDelay: delay.default(3000),
  detailSettleDelay: delay.default(2000),

  chunkSize: count.default(3),
  chunkDelay: delay.default(1000),
  progressSaveInterval: count.default(10),

  outputDir: z.string().min(1).default('.'),
  filePrefix: z.string().min(1).default('companies'),

  browser: browserSchema.default({}),
});

/** Applies defaults and checks ranges; throws ConfigError listing every bad key. */
export function validateConfig(input: unknown): HarvestConfig {
  const parsed = harvestConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  return parsed.data;
}
