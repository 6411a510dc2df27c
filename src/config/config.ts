import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

export type ReferenceTimeStrategy = 'latest-observation' | 'wall-clock';
export type InvalidInputPolicy = 'skip-store' | 'fail-job';

export interface ServerConfig {
  port: number;
}

export interface StorageConfig {
  databasePath: string;
  dataDir: string;
  stateDir: string;
  reportsDir: string;
}

export interface ReportConfig {
  defaultTimezone: string;
  referenceTime: ReferenceTimeStrategy;
  concurrency: number;     // stores computed in parallel per chunk
  batchSize: number;       // stores per progress log line
  onInvalidInput: InvalidInputPolicy;
  queuePollIntervalMs: number;
}

export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  report: ReportConfig;
}

type RawSection = Record<string, unknown>;

// Environment variables that are optional (won't crash if missing)
const OPTIONAL_ENV_VARS = new Set([
  'PORT',
  'DATABASE_PATH',
  'DATA_DIR',
  'STATE_DIR',
  'REPORTS_DIR',
  'DEFAULT_TIMEZONE',
]);

function resolveEnvValue(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.substring(4);
    const envValue = process.env[envKey];

    if (envValue === undefined || envValue === '') {
      if (!OPTIONAL_ENV_VARS.has(envKey)) {
        throw new Error(`Environment variable ${envKey} is not set`);
      }
      return '';
    }
    return envValue;
  }
  return value;
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function readString(raw: RawSection, key: string, fallback: string): string {
  const value = raw[key];
  if (typeof value !== 'string') return fallback;
  const resolved = resolveEnvValue(value).trim();
  return resolved || fallback;
}

function readNumber(raw: RawSection, key: string, fallback: number): number {
  const value = raw[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const resolved = resolveEnvValue(value).trim();
    const parsed = Number(resolved);
    if (resolved !== '' && Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function readChoice<T extends string>(raw: RawSection, key: string, choices: readonly T[], fallback: T): T {
  const value = readString(raw, key, fallback);
  const match = choices.find(choice => choice === value);
  if (!match) {
    throw new Error(`Invalid value "${value}" for ${key}; expected one of ${choices.join(', ')}`);
  }
  return match;
}

export function loadConfig(baseDir: string = process.cwd()): Config {
  const configPath = path.join(baseDir, 'config', 'config.json');
  const examplePath = path.join(baseDir, 'config', 'config.example.json');

  let configData: unknown = {};

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
  }

  const raw = isRecord(configData) ? configData : {};
  const server = section(raw, 'server');
  const storage = section(raw, 'storage');
  const report = section(raw, 'report');

  const resolvePath = (value: string) => path.isAbsolute(value) ? value : path.join(baseDir, value);

  return {
    server: {
      port: readNumber(server, 'port', 8000),
    },
    storage: {
      databasePath: resolvePath(process.env.DATABASE_PATH || readString(storage, 'databasePath', 'store_monitoring.db')),
      dataDir: resolvePath(process.env.DATA_DIR || readString(storage, 'dataDir', 'data')),
      stateDir: resolvePath(process.env.STATE_DIR || readString(storage, 'stateDir', 'state')),
      reportsDir: resolvePath(process.env.REPORTS_DIR || readString(storage, 'reportsDir', 'reports')),
    },
    report: {
      defaultTimezone: process.env.DEFAULT_TIMEZONE || readString(report, 'defaultTimezone', 'America/Chicago'),
      referenceTime: readChoice(report, 'referenceTime', ['latest-observation', 'wall-clock'] as const, 'latest-observation'),
      concurrency: Math.max(1, readNumber(report, 'concurrency', 8)),
      batchSize: Math.max(1, readNumber(report, 'batchSize', 100)),
      onInvalidInput: readChoice(report, 'onInvalidInput', ['skip-store', 'fail-job'] as const, 'skip-store'),
      queuePollIntervalMs: Math.max(100, readNumber(report, 'queuePollIntervalMs', 5000)),
    },
  };
}
