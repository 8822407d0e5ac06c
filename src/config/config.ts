import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

export type SourceName = 'jetphotos' | 'airlinersnet' | 'planespotters' | 'airplane_pictures';

export const SOURCE_NAMES: readonly SourceName[] = ['jetphotos', 'airlinersnet', 'planespotters', 'airplane_pictures'];

export interface ServerConfig {
  port: number;
}

export interface StorageConfig {
  dataDir: string;
}

export interface SourceConfig {
  enabled: boolean;
  domain: string;
  maxRequests: number;
  windowSeconds: number;
}

export interface ScrapingConfig {
  requestTimeoutMs: number;
  userAgent: string;
  maxAttempts: number;
  backoffBaseMs: number;      // First retry delay, doubled per attempt
  backoffMaxMs: number;
  maxRateLimitDeferrals: number;
  sources: Record<SourceName, SourceConfig>;
}

export interface QueueConfig {
  concurrency: number;
  minConcurrency: number;
  maxConcurrency: number;
  rescanIntervalHours: number; // 0 disables periodic rescans
  rescanTickMs: number;
  stalledTaskMinutes: number;  // Jobs left running this long by a dead task are failed
  shutdownTimeoutMs: number;   // How long shutdown waits for running tasks
}

export interface AirportsConfig {
  /** Extra airport records merged over the bundled table; empty for none. */
  dataFile: string;
}

export interface MatchingConfig {
  lowConfidenceThreshold: number;
  maxDateWindowDays: number;
}

export interface Config {
  server: ServerConfig;
  storage: StorageConfig;
  scraping: ScrapingConfig;
  queue: QueueConfig;
  matching: MatchingConfig;
  airports: AirportsConfig;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: Config = {
  server: { port: 3000 },
  storage: { dataDir: './state' },
  scraping: {
    requestTimeoutMs: 30000,
    userAgent: DEFAULT_USER_AGENT,
    maxAttempts: 3,
    backoffBaseMs: 2000,
    backoffMaxMs: 60000,
    maxRateLimitDeferrals: 5,
    sources: {
      jetphotos: { enabled: true, domain: 'jetphotos.com', maxRequests: 30, windowSeconds: 60 },
      airlinersnet: { enabled: true, domain: 'airliners.net', maxRequests: 30, windowSeconds: 60 },
      planespotters: { enabled: true, domain: 'planespotters.net', maxRequests: 30, windowSeconds: 60 },
      airplane_pictures: { enabled: true, domain: 'airplane-pictures.net', maxRequests: 30, windowSeconds: 60 },
    },
  },
  queue: {
    concurrency: 3,
    minConcurrency: 1,
    maxConcurrency: 10,
    rescanIntervalHours: 168,
    rescanTickMs: 5 * 60 * 1000,
    stalledTaskMinutes: 10,
    shutdownTimeoutMs: 30000,
  },
  matching: {
    lowConfidenceThreshold: 60,
    maxDateWindowDays: 3,
  },
  airports: {
    dataFile: '',
  },
};

// Environment variables that may be referenced as "env:NAME" but left unset
const OPTIONAL_ENV_VARS = new Set(['DATA_DIR', 'PORT', 'SCRAPER_USER_AGENT', 'AIRPORTS_FILE']);

function resolveEnvValue(value: string): string {
  if (!value.startsWith('env:')) {
    return value;
  }
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

function resolveEnvObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvObject);
  }
  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(inner);
    }
    return resolved;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep-merges a parsed config file over the defaults. Keys whose value has a
 * different type than the default are ignored, as are empty strings left by
 * unset optional env vars.
 */
function mergeInto<T>(defaults: T, override: unknown): T {
  if (!isRecord(defaults) || !isRecord(override)) {
    return defaults;
  }
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, base] of Object.entries(defaults)) {
    const next = override[key];
    if (next === undefined || next === '') continue;
    if (isRecord(base)) {
      merged[key] = mergeInto(base, next);
    } else if (typeof base === typeof next) {
      merged[key] = next;
    } else if (typeof base === 'number' && typeof next === 'string' && Number.isFinite(Number(next))) {
      merged[key] = Number(next);
    }
  }
  return merged as T;
}

export function loadConfig(cwd: string = process.cwd()): Config {
  const configPath = path.join(cwd, 'config', 'config.json');
  const examplePath = path.join(cwd, 'config', 'config.example.json');

  let configData: unknown = {};

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
  }

  const resolved = mergeInto(DEFAULT_CONFIG, resolveEnvObject(configData));

  // Plain env overrides win over the file
  if (process.env.DATA_DIR) {
    resolved.storage.dataDir = process.env.DATA_DIR;
  }
  if (process.env.PORT && Number.isFinite(Number(process.env.PORT))) {
    resolved.server.port = Number(process.env.PORT);
  }

  return resolved;
}

export const config = loadConfig();
