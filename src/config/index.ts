/**
 * Configuration management
 * Behavior is driven by environment variables; company boards and default
 * keyword lists live in JSON files under config/
 */

import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import { CompanyTarget, SOURCE_KINDS } from '../types/job';
import { FilterRules } from '../types/filter';
import { ConfigError } from '../utils/errors';

export type HistoryBackendKind = 'file' | 'postgres';

export interface Config {
  // Telegram delivery
  telegram: {
    botToken: string;
    chatIds: string[];
  };

  // Seen-posting history
  history: {
    backend: HistoryBackendKind;
    filePath: string;
    storeId: string;
    databaseUrl?: string;
  };

  // Boards to poll and how to filter them
  companies: CompanyTarget[];
  filters: FilterRules;

  // Run behavior
  httpTimeoutMs: number;
  sendEmptyDigest: boolean;
  dryRun: boolean;
}

export interface LoadConfigOptions {
  /** Dry runs skip delivery, so Telegram credentials are not required */
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_CONFIG_DIR = 'config';
const DEFAULT_HTTP_TIMEOUT_MS = 30000;

const companiesFileSchema = z.array(
  z.object({
    source: z.enum(SOURCE_KINDS),
    slug: z.string().min(1),
    name: z.string().min(1),
  })
);

const filtersFileSchema = z.object({
  includeKeywords: z.array(z.string()),
  excludeKeywords: z.array(z.string()),
  locationKeywords: z.array(z.string()),
  remoteKeywords: z.array(z.string()),
});

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  const lower = value.trim().toLowerCase();
  return lower === 'true' || lower === '1';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function readJsonFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}`, { cause: error });
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, { cause: error });
  }
}

function parseWith<T>(schema: z.ZodType<T>, value: unknown, path: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration file ${path}: ${issues}`);
  }
  return result.data;
}

/**
 * Loads the company boards to poll
 */
export function loadCompanies(path: string): CompanyTarget[] {
  return parseWith(companiesFileSchema, readJsonFile(path), path);
}

/**
 * Loads default keyword lists, then applies comma-separated env overrides
 */
export function loadFilterRules(path: string, env: NodeJS.ProcessEnv): FilterRules {
  const defaults = parseWith(filtersFileSchema, readJsonFile(path), path);
  return {
    includeKeywords: parseStringArray(env.JOB_INCLUDE_KEYWORDS, defaults.includeKeywords),
    excludeKeywords: parseStringArray(env.JOB_EXCLUDE_KEYWORDS, defaults.excludeKeywords),
    locationKeywords: parseStringArray(env.JOB_LOCATION_KEYWORDS, defaults.locationKeywords),
    remoteKeywords: parseStringArray(env.JOB_REMOTE_KEYWORDS, defaults.remoteKeywords),
  };
}

function parseHistoryBackend(value: string | undefined): HistoryBackendKind {
  const backend = (value || 'file').trim().toLowerCase();
  if (backend === 'file' || backend === 'postgres') {
    return backend;
  }
  throw new ConfigError(`Unsupported HISTORY_BACKEND "${value}" (expected "file" or "postgres")`);
}

function parseTimeout(value: string | undefined): number {
  const timeout = parseNumber(value, DEFAULT_HTTP_TIMEOUT_MS);
  if (timeout <= 0) {
    throw new ConfigError(`HTTP_TIMEOUT_MS must be a positive number of milliseconds, got "${value}"`);
  }
  return timeout;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const dryRun = options.dryRun || parseBoolean(env.DRY_RUN);

  const requiredEnvVars = dryRun ? [] : ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_IDS'];
  for (const envVar of requiredEnvVars) {
    if (!env[envVar]) {
      throw new ConfigError(`Missing required environment variable: ${envVar}`);
    }
  }

  const backend = parseHistoryBackend(env.HISTORY_BACKEND);
  if (backend === 'postgres' && !env.DATABASE_URL) {
    throw new ConfigError('Missing required environment variable: DATABASE_URL');
  }

  const companiesPath = resolve(env.COMPANIES_FILE || join(DEFAULT_CONFIG_DIR, 'companies.json'));
  const filtersPath = resolve(env.FILTERS_FILE || join(DEFAULT_CONFIG_DIR, 'filters.json'));

  return {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN || '',
      chatIds: parseStringArray(env.TELEGRAM_CHAT_IDS),
    },
    history: {
      backend,
      filePath: resolve(env.HISTORY_FILE || 'job_history.json'),
      storeId: env.HISTORY_STORE_ID || 'default',
      databaseUrl: env.DATABASE_URL,
    },
    companies: loadCompanies(companiesPath),
    filters: loadFilterRules(filtersPath, env),
    httpTimeoutMs: parseTimeout(env.HTTP_TIMEOUT_MS),
    sendEmptyDigest: parseBoolean(env.SEND_EMPTY_DIGEST),
    dryRun,
  };
}
