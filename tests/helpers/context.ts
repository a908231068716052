import { createRunContext, RunContext } from '../../src/core/automation/context';
import { validateConfig } from '../../src/schemas/validator';
import { HarvestConfig } from '../../src/types';
import { Logger } from '../../src/utils/logger';
import { LISTING_URL } from './fakeBrowser';

export const FIXED_NOW = new Date('2025-03-04T05:06:07.000Z');

export const quietLogger = () => new Logger('error', 'test', () => {});

/** Zero-delay config pointed at the fake listing. */
export function testConfig(overrides: Record<string, unknown> = {}): HarvestConfig {
  return validateConfig({
    listingUrl: LISTING_URL,
    scrollDelay: 0,
    listingSettleDelay: 0,
    detailSettleDelay: 0,
    chunkDelay: 0,
    minExpectedRecords: 0,
    ...overrides,
  });
}

export function testContext(overrides: Record<string, unknown> = {}): RunContext {
  return createRunContext(testConfig(overrides), {
    logger: quietLogger(),
    sleep: async () => {},
    now: () => FIXED_NOW,
  });
}
