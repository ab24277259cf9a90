import { existsSync, readFileSync } from 'fs';
import yaml from 'js-yaml';
import { DEFAULT_SIMILARITY_THRESHOLD, isMergeStrategy, ValidationError } from '@semdiff/core';
import type { MergeStrategy } from '@semdiff/core';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface AppConfig {
  server: {
    host: string;
    port: number;
    log_level: LogLevel;
  };
  analysis: {
    similarity_threshold: number;
  };
  merge: {
    default_strategy: MergeStrategy;
  };
  limits: {
    body_limit_bytes: number;
  };
}

export const DEFAULT_CONFIG: AppConfig = {
  server: { host: '0.0.0.0', port: 3000, log_level: 'info' },
  analysis: { similarity_threshold: DEFAULT_SIMILARITY_THRESHOLD },
  merge: { default_strategy: 'ours' },
  limits: { body_limit_bytes: 5 * 1024 * 1024 },
};

export interface LoadConfigOptions {
  /** YAML file to read; falls back to SEMDIFF_CONFIG. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(filePath: string): Section {
  if (!existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid configuration file ${filePath}: ${reason}`, 'config');
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError(`Invalid configuration file ${filePath}: expected a mapping`, 'config');
  }
  return parsed;
}

function sectionOf(file: Section, name: keyof AppConfig): Section {
  const section = file[name];
  if (section === undefined || section === null) return {};
  if (!isRecord(section)) {
    throw new ValidationError(`Configuration section "${name}" must be a mapping`, name);
  }
  return section;
}

function toNumber(value: unknown, field: string): number {
  const candidate = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof candidate !== 'number' || !Number.isFinite(candidate)) {
    throw new ValidationError(`${field} must be a number, got ${String(value)}`, field);
  }
  return candidate;
}

function toInteger(value: unknown, field: string, min: number, max: number): number {
  const n = toNumber(value, field);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ValidationError(`${field} must be an integer between ${min} and ${max}, got ${n}`, field);
  }
  return n;
}

function toThreshold(value: unknown, field: string): number {
  const n = toNumber(value, field);
  if (n < 0 || n > 1) {
    throw new ValidationError(`${field} must be between 0 and 1, got ${n}`, field);
  }
  return n;
}

function toHost(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

function toLogLevel(value: unknown, field: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  if (level === undefined) {
    throw new ValidationError(`${field} must be one of ${LOG_LEVELS.join(', ')}, got ${String(value)}`, field);
  }
  return level;
}

function toStrategy(value: unknown, field: string): MergeStrategy {
  if (!isMergeStrategy(value)) {
    throw new ValidationError(`${field} must be one of ours, theirs, union, got ${String(value)}`, field);
  }
  return value;
}

/**
 * Resolve the service configuration: defaults, then the YAML file, then environment
 * variables (PORT, HOST, LOG_LEVEL, SIMILARITY_THRESHOLD, MERGE_STRATEGY).
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const filePath = options.path ?? env.SEMDIFF_CONFIG;
  const file = filePath ? readConfigFile(filePath) : {};

  const server = sectionOf(file, 'server');
  const analysis = sectionOf(file, 'analysis');
  const merge = sectionOf(file, 'merge');
  const limits = sectionOf(file, 'limits');

  return {
    server: {
      host: toHost(env.HOST ?? server.host ?? DEFAULT_CONFIG.server.host, 'server.host'),
      port: toInteger(env.PORT ?? server.port ?? DEFAULT_CONFIG.server.port, 'server.port', 0, 65535),
      log_level: toLogLevel(
        env.LOG_LEVEL ?? server.log_level ?? DEFAULT_CONFIG.server.log_level,
        'server.log_level',
      ),
    },
    analysis: {
      similarity_threshold: toThreshold(
        env.SIMILARITY_THRESHOLD ??
          analysis.similarity_threshold ??
          DEFAULT_CONFIG.analysis.similarity_threshold,
        'analysis.similarity_threshold',
      ),
    },
    merge: {
      default_strategy: toStrategy(
        env.MERGE_STRATEGY ?? merge.default_strategy ?? DEFAULT_CONFIG.merge.default_strategy,
        'merge.default_strategy',
      ),
    },
    limits: {
      body_limit_bytes: toInteger(
        limits.body_limit_bytes ?? DEFAULT_CONFIG.limits.body_limit_bytes,
        'limits.body_limit_bytes',
        1,
        Number.MAX_SAFE_INTEGER,
      ),
    },
  };
}
