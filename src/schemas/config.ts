import dotenv from 'dotenv';
import { HarvestConfig } from '../types';
import { ConfigParser, isRecord, RawConfig } from './parser';
import { ConfigError, validateConfig } from './validator';

type Env = Record<string, string | undefined>;

/** Loads `.env` into process.env; variables already set win. */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : {});
}

function parseBoolean(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  throw new ConfigError('Invalid configuration', [`${name}: expected a boolean, got "${value}"`]);
}

function envOverrides(env: Env): { top: RawConfig; browser: RawConfig } {
  const top: RawConfig = {};
  const browser: RawConfig = {};
  if (env.LISTING_URL) top.listingUrl = env.LISTING_URL;
  if (env.OUTPUT_DIR) top.outputDir = env.OUTPUT_DIR;
  if (env.HEADLESS) browser.headless = parseBoolean('HEADLESS', env.HEADLESS);
  if (env.BROWSER) browser.kind = env.BROWSER.toLowerCase();
  return { top, browser };
}

/**
 * Defaults, then the file named by HARVEST_CONFIG, then LISTING_URL,
 * OUTPUT_DIR, HEADLESS and BROWSER from the environment.
 */
export function loadConfig(env: Env = process.env): HarvestConfig {
  const file = env.HARVEST_CONFIG ? ConfigParser.read(env.HARVEST_CONFIG) : {};
  const { top, browser } = envOverrides(env);
  // A malformed browser section is passed through so validation reports it.
  const merged = isRecord(file.browser) || file.browser === undefined
    ? { ...(isRecord(file.browser) ? file.browser : {}), ...browser }
    : file.browser;
  return validateConfig({ ...file, ...top, browser: merged });
}
