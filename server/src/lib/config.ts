/**
 * Dataset and runtime configuration.
 *
 * Precedence, lowest first: defaults, JSON config file, environment, overrides.
 */

import fs from 'fs';
import type { ColumnKey, ColumnMapping } from '@heritage-pathfind/shared';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface HeritageConfig {
  delimiter: string;
  columns: ColumnMapping;
  unknownName: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<Omit<HeritageConfig, 'columns'>> & {
  columns?: Partial<ColumnMapping>;
};

export const config: HeritageConfig = {
  delimiter: ';',
  columns: {
    sourceId: 'PersonID',
    sourceName: 'Person',
    age: 'Age',
    kind: 'Relationship',
    targetId: 'RelativeID',
    targetName: 'Relative',
    targetAge: 'RelativeAge',
  },
  unknownName: 'Unknown',
  logLevel: 'info',
};

const COLUMN_KEYS = Object.keys(config.columns).filter(
  (key): key is ColumnKey => key in config.columns
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const checkDelimiter = (delimiter: string, origin: string): string => {
  // a quote would be ambiguous with quoted fields
  if (delimiter.length !== 1 || delimiter === '"') {
    throw new ConfigError(`${origin}: delimiter must be a single character other than '"', got "${delimiter}"`);
  }
  return delimiter;
};

const checkLogLevel = (value: string, origin: string): LogLevel => {
  if (!isLogLevel(value)) {
    throw new ConfigError(`${origin}: unknown log level "${value}"`);
  }
  return value;
};

/**
 * Validate the parsed contents of a JSON config file
 */
export function parseConfigFile(raw: unknown, origin: string): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new ConfigError(`${origin}: expected a JSON object`);
  }
  const overrides: ConfigOverrides = {};

  for (const key of Object.keys(raw)) {
    const value = raw[key];
    switch (key) {
      case 'delimiter':
        if (typeof value !== 'string') throw new ConfigError(`${origin}: "delimiter" must be a string`);
        overrides.delimiter = checkDelimiter(value, origin);
        break;
      case 'unknownName':
        if (typeof value !== 'string') throw new ConfigError(`${origin}: "unknownName" must be a string`);
        overrides.unknownName = value;
        break;
      case 'logLevel':
        if (typeof value !== 'string') throw new ConfigError(`${origin}: "logLevel" must be a string`);
        overrides.logLevel = checkLogLevel(value, origin);
        break;
      case 'columns': {
        if (!isRecord(value)) throw new ConfigError(`${origin}: "columns" must be an object`);
        const columns: Partial<ColumnMapping> = {};
        for (const [column, header] of Object.entries(value)) {
          const known = COLUMN_KEYS.find((k) => k === column);
          if (!known) throw new ConfigError(`${origin}: unknown column "${column}"`);
          if (typeof header !== 'string' || !header.trim()) {
            throw new ConfigError(`${origin}: column "${column}" must name a header`);
          }
          columns[known] = header.trim();
        }
        overrides.columns = columns;
        break;
      }
      default:
        throw new ConfigError(`${origin}: unknown setting "${key}"`);
    }
  }

  return overrides;
}

function readConfigFile(filePath: string): ConfigOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read config ${filePath}: ${reason}`);
  }
  return parseConfigFile(raw, filePath);
}

function readEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.HERITAGE_DELIMITER) {
    overrides.delimiter = checkDelimiter(env.HERITAGE_DELIMITER, 'HERITAGE_DELIMITER');
  }
  if (env.HERITAGE_LOG_LEVEL) {
    overrides.logLevel = checkLogLevel(env.HERITAGE_LOG_LEVEL, 'HERITAGE_LOG_LEVEL');
  }
  return overrides;
}

const merge = (base: HeritageConfig, next: ConfigOverrides): HeritageConfig => ({
  delimiter: next.delimiter ?? base.delimiter,
  unknownName: next.unknownName ?? base.unknownName,
  logLevel: next.logLevel ?? base.logLevel,
  columns: { ...base.columns, ...next.columns },
});

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export function loadConfig(options: LoadConfigOptions = {}): HeritageConfig {
  let resolved = merge(config, {});
  if (options.configPath) {
    resolved = merge(resolved, readConfigFile(options.configPath));
  }
  resolved = merge(resolved, readEnv(options.env ?? process.env));
  if (options.overrides) {
    const { delimiter } = options.overrides;
    if (delimiter !== undefined) checkDelimiter(delimiter, 'overrides');
    resolved = merge(resolved, options.overrides);
  }
  return resolved;
}
