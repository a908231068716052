import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { HarvestConfig } from '../types';
import { ConfigError, validateConfig } from './validator';

export type ConfigFormat = 'json' | 'yaml';

export type RawConfig = Record<string, unknown>;

export const isRecord = (value: unknown): value is RawConfig =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export class ConfigParser {
  static formatOf(filePath: string): ConfigFormat {
    if (filePath.endsWith('.json')) return 'json';
    if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) return 'yaml';
    throw new ConfigError(`Unsupported config file ${filePath}. Use .json or .yaml`);
  }

  /** Reads a config file without applying defaults, for layering under env overrides. */
  static read(filePath: string): RawConfig {
    const format = ConfigParser.formatOf(filePath);
    let content: string;
    try {
      content = readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Failed to read config file ${filePath}`, [], { cause: error });
    }
    return ConfigParser.readString(content, format);
  }

  static readString(content: string, format: ConfigFormat): RawConfig {
    let raw: unknown;
    try {
      raw = format === 'json' ? JSON.parse(content) : parse(content);
    } catch (error) {
      throw new ConfigError(`Failed to parse ${format} config`, [error instanceof Error ? error.message : String(error)], { cause: error });
    }
    if (raw === null || raw === undefined) return {};
    if (!isRecord(raw)) throw new ConfigError(`Config ${format} must describe an object`);
    return raw;
  }

  static parse(filePath: string): HarvestConfig {
    return validateConfig(ConfigParser.read(filePath));
  }

  static parseFromString(content: string, format: ConfigFormat): HarvestConfig {
    return validateConfig(ConfigParser.readString(content, format));
  }
}
