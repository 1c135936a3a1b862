export type { Website } from './website.js';

export type { Healthcheck, HttpProberOptions } from './healthcheck.js';

export type {
  ColumnType,
  ColumnRole,
  ColumnSpec,
  TableDefinition,
  SqlValue,
  QueryRow,
  InsertQuery,
} from './database.js';

export type {
  MonitorAction,
  SchedulerOptions,
  SchedulerStats,
  WebMonitorOptions,
} from './monitor.js';
