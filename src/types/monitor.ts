import type { Logger } from 'winston';
import type { AxiosInstance } from 'axios';
import type { ConcurrencyLimiter, LimiterStats } from '../utils/limiter.js';
import type { StorageDriver } from '../database/driver.js';
import type { DatabaseConfig } from '../schemas/config.js';
import type { RetryOptions } from '../utils/retry.js';
import type { HttpProber } from '../prober/http-prober.js';
import type { ResultSink } from '../database/table-store.js';

export type MonitorAction = 'monitor' | 'drop-tables';

export interface SchedulerOptions {
  prober: Pick<HttpProber, 'probe'>;
  sink: ResultSink;
  logger: Logger;
  healthcheckTable: string;
  /** Checks per site; -1 runs until cancelled. */
  numberHealthchecks: number;
  statsIntervalMs?: number;
  /** Only read for statistics; the prober does the acquiring. */
  limiter?: ConcurrencyLimiter;
}

export interface SchedulerStats {
  sites: number;
  activeTasks: number;
  completedChecks: number;
  failedChecks: number;
  taskErrors: number;
  limiter: LimiterStats | null;
  cancelled: boolean;
}

export interface WebMonitorOptions {
  database: DatabaseConfig;
  logger: Logger;
  sitesCsv?: string;
  numberHealthchecks?: number;
  concurrency?: number;
  timeoutMs?: number;
  websiteTable?: string;
  healthcheckTable?: string;
  retry?: Omit<RetryOptions, 'name' | 'logger' | 'signal'>;
  statsIntervalMs?: number;
  /** Overrides the driver built from `database`. */
  driver?: StorageDriver;
  http?: AxiosInstance;
  raiseFileLimit?: (minimum: number, logger: Logger) => Promise<unknown>;
}
