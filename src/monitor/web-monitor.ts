import type { Logger } from 'winston';
import type { AxiosInstance } from 'axios';
import type { StorageDriver } from '../database/driver.js';
import { createDriver } from '../database/driver-factory.js';
import { TableStore } from '../database/table-store.js';
import { HEALTHCHECK_TABLE, WEBSITE_TABLE } from '../database/tables.js';
import { HttpProber } from '../prober/http-prober.js';
import { DEFAULT_MONITOR_OPTIONS } from '../config.js';
import { HealthcheckScheduler } from './scheduler.js';
import { SiteRegistry } from './site-registry.js';
import { ConfigError } from '../errors.js';
import { ConcurrencyLimiter } from '../utils/limiter.js';
import { componentLogger } from '../utils/logger.js';
import { raiseOpenFileLimit } from '../utils/resource-limits.js';
import type { Website } from '../types/website.js';
import type { MonitorAction, SchedulerStats, WebMonitorOptions } from '../types/monitor.js';

/** Open-file headroom per monitored site. */
const FILE_LIMIT_PER_SITE = 2;

interface MonitorPlan {
  numberHealthchecks: number;
  sites: Website[];
}

export class WebMonitor {
  private readonly options: WebMonitorOptions;
  private readonly logger: Logger;
  private readonly driver: StorageDriver;
  private readonly websiteTable: string;
  private readonly healthcheckTable: string;
  private readonly http: AxiosInstance | undefined;
  private scheduler: HealthcheckScheduler | null = null;

  constructor(options: WebMonitorOptions) {
    this.options = options;
    this.logger = options.logger;
    this.driver = options.driver ?? createDriver(options.database, componentLogger(options.logger, 'database'));
    this.websiteTable = options.websiteTable ?? DEFAULT_MONITOR_OPTIONS.websiteTable;
    this.healthcheckTable = options.healthcheckTable ?? DEFAULT_MONITOR_OPTIONS.healthcheckTable;
    this.http = options.http;
  }

  async run(action: MonitorAction, signal?: AbortSignal): Promise<SchedulerStats | null> {
    // Input problems surface before the database is touched.
    const plan = action === 'monitor' ? await this.prepareMonitor() : null;

    await this.driver.open();
    const store = new TableStore(this.driver, {
      logger: componentLogger(this.logger, 'store'),
      retry: this.options.retry ?? DEFAULT_MONITOR_OPTIONS.retry,
      signal,
    });

    try {
      if (plan === null) {
        await this.dropTables(store);
        return null;
      }
      return await this.monitor(store, plan, signal);
    } finally {
      await this.driver.close();
    }
  }

  getStats(): SchedulerStats | null {
    return this.scheduler ? this.scheduler.getStats() : null;
  }

  private async dropTables(store: TableStore): Promise<void> {
    await store.dropTableIfExists(this.healthcheckTable);
    await store.dropTableIfExists(this.websiteTable);
  }

  private async prepareMonitor(): Promise<MonitorPlan> {
    const numberHealthchecks = this.options.numberHealthchecks;
    if (numberHealthchecks === undefined) {
      throw new ConfigError('The number of healthchecks is required to monitor, use -1 for no limit');
    }
    const sites = this.options.sitesCsv ? await SiteRegistry.loadFromFile(this.options.sitesCsv) : [];
    return { numberHealthchecks, sites };
  }

  private async monitor(store: TableStore, plan: MonitorPlan, signal?: AbortSignal): Promise<SchedulerStats> {
    await store.createTableIfMissing(this.websiteTable, WEBSITE_TABLE);
    await store.createTableIfMissing(this.healthcheckTable, HEALTHCHECK_TABLE);

    const registry = new SiteRegistry(store, this.websiteTable, componentLogger(this.logger, 'registry'));
    const sites = await registry.reconcile(plan.sites);

    const raiseFileLimit = this.options.raiseFileLimit ?? raiseOpenFileLimit;
    await raiseFileLimit(sites.length * FILE_LIMIT_PER_SITE, componentLogger(this.logger, 'limits'));

    const limiter = new ConcurrencyLimiter(this.options.concurrency ?? DEFAULT_MONITOR_OPTIONS.concurrency);
    const prober = new HttpProber({
      limiter,
      logger: componentLogger(this.logger, 'prober'),
      timeoutMs: this.options.timeoutMs ?? DEFAULT_MONITOR_OPTIONS.timeoutMs,
      http: this.http,
    });

    this.scheduler = new HealthcheckScheduler({
      prober,
      sink: store,
      limiter,
      logger: componentLogger(this.logger, 'scheduler'),
      healthcheckTable: this.healthcheckTable,
      numberHealthchecks: plan.numberHealthchecks,
      statsIntervalMs: this.options.statsIntervalMs ?? DEFAULT_MONITOR_OPTIONS.statsIntervalMs,
    });

    return this.scheduler.run(sites, signal);
  }
}
