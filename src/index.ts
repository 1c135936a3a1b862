export { WebMonitor } from './monitor/web-monitor.js';
export { HealthcheckScheduler, UNBOUNDED_HEALTHCHECKS } from './monitor/scheduler.js';
export { SiteRegistry, parseSiteRow } from './monitor/site-registry.js';
export {
  HttpProber,
  STATUS_TIMEOUT,
  STATUS_TRANSPORT_ERROR,
  DEFAULT_PROBE_TIMEOUT_MS,
  describeError,
} from './prober/http-prober.js';

export type { StorageDriver } from './database/driver.js';
export { PostgresDriver, toPgSsl, toPoolConfig } from './database/postgres-driver.js';
export { createDriver } from './database/driver-factory.js';
export { TableStore, type ResultSink, type TableStoreOptions } from './database/table-store.js';
export { buildCreateTable, buildDropTable, buildInsertMany, buildSelectAll } from './database/query-builder.js';
export {
  WEBSITE_TABLE,
  HEALTHCHECK_TABLE,
  DEFAULT_WEBSITE_TABLE,
  DEFAULT_HEALTHCHECK_TABLE,
  UNSAVED_ID,
} from './database/tables.js';

export {
  DEFAULT_MONITOR_OPTIONS,
  loadDatabaseConfig,
  parseDatabaseConfig,
  parseCliOptions,
  resolveAction,
} from './config.js';

export * from './errors.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export type * from './types/index.js';
