#!/usr/bin/env node
import { HarvestEngine } from './core/automation/engine';
import { BrowserManager } from './core/browser/browserManager';
import { loadConfig, loadEnvFile } from './schemas/config';
import { HarvestResult } from './types';
import { Logger } from './utils/logger';

export { HarvestEngine } from './core/automation/engine';
export type { HarvestEngineOptions } from './core/automation/engine';
export { BrowserManager, PlaywrightSession } from './core/browser/browserManager';
export type { BrowserSession, PageHandle, SessionFactory } from './core/browser/session';
export { normalizeRecordUrl } from './core/navigation/normalize';
export { createDefaultRegistry } from './core/automation/init';
export { CheckpointWriter } from './output/checkpoint';
export { ConfigParser } from './schemas/parser';
export { ConfigError, validateConfig } from './schemas/validator';
export { loadConfig, loadEnvFile } from './schemas/config';
export * from './types';
export { Logger } from './utils/logger';

/** End-of-run notice: an empty harvest and unwritten final files are reported apart. */
export function reportHarvest(result: HarvestResult, logger: Logger): void {
  if (!result.records.length) {
    logger.warn('No records harvested');
  } else if (!result.artifacts) {
    logger.error('Final output was not written', { records: result.records.length });
  } else {
    logger.info('Harvest written', { records: result.records.length, ...result.artifacts });
  }
}

async function main() {
  const logger = new Logger();
  try {
    loadEnvFile();
    const config = loadConfig();
    const browser = new BrowserManager(config.browser, logger.child({ name: 'browser' }));
    const engine = new HarvestEngine(config, () => browser.openSession(), { logger });
    const result = await engine.run();
    reportHarvest(result, logger);
  } catch (error) {
    logger.error('Harvest failed', { error });
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
