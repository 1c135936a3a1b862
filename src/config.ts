import fs from 'fs/promises';
import {
  DatabaseConfigSchema,
  MonitorCliOptionsSchema,
  type DatabaseConfig,
  type MonitorCliOptions,
} from './schemas/config.js';
import { ConfigError } from './errors.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from './prober/http-prober.js';
import { DEFAULT_HEALTHCHECK_TABLE, DEFAULT_WEBSITE_TABLE } from './database/tables.js';
import { DEFAULT_RETRY_OPTIONS } from './utils/retry.js';
import type { MonitorAction } from './types/monitor.js';

export const DEFAULT_MONITOR_OPTIONS = {
  concurrency: 100,
  timeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  websiteTable: DEFAULT_WEBSITE_TABLE,
  healthcheckTable: DEFAULT_HEALTHCHECK_TABLE,
  statsIntervalMs: 60000,
  retry: DEFAULT_RETRY_OPTIONS,
} as const;

// Config file key -> environment variable used when the key is absent.
const ENV_FALLBACKS = {
  db_user: 'DB_USER',
  db_pass: 'DB_PASSWORD',
  db_name: 'DB_NAME',
  db_host: 'DB_HOST',
  db_port: 'DB_PORT',
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function envFallbacks(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_FALLBACKS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

/** Validates a parsed config object; keys present in `raw` win over the environment. */
export function parseDatabaseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Database config must be a JSON object');
  }

  const result = DatabaseConfigSchema.safeParse({ ...envFallbacks(env), ...raw });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid database config: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export async function loadDatabaseConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<DatabaseConfig> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Cannot read database config ${path}: ${errorMessage}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Database config ${path} is not valid JSON: ${errorMessage}`, { cause: error });
  }

  return parseDatabaseConfig(raw, env);
}

export function parseCliOptions(raw: unknown): MonitorCliOptions {
  const result = MonitorCliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `--${issue.path.join('.').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid arguments: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/** `--drop-tables` wins; otherwise a site source is needed to monitor. */
export function resolveAction(options: MonitorCliOptions): MonitorAction {
  if (options.dropTables) return 'drop-tables';

  if (options.sitesCsv === undefined && options.sitesTable === undefined) {
    throw new ConfigError('Nothing to do: pass --sites-csv, --sites-table or --drop-tables');
  }
  if (options.numberHealthchecks === undefined) {
    throw new ConfigError('--number-healthchecks is required to monitor, use -1 for no limit');
  }
  return 'monitor';
}
