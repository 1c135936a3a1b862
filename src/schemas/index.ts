// Config schemas
export {
  DatabaseTypeSchema,
  SslModeSchema,
  DatabaseConfigSchema,
  NumberHealthchecksSchema,
  MonitorCliOptionsSchema,
  type DatabaseType,
  type SslMode,
  type DatabaseConfig,
  type DatabaseConfigInput,
  type MonitorCliOptions,
} from './config.js';

// Database schemas
export {
  MatchStatus,
  MatchStatusSchema,
  WebsiteRowSchema,
  HealthcheckRowSchema,
  VersionRowSchema,
  type WebsiteRow,
  type HealthcheckRow,
} from './database.js';
