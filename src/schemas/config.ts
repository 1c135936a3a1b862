import { z } from 'zod';

export const DatabaseTypeSchema = z.enum(['postgresql']);

export const SslModeSchema = z.enum(['disable', 'allow', 'prefer', 'require', 'verify-ca', 'verify-full']);

// Keys follow the on-disk JSON config file.
export const DatabaseConfigSchema = z.object({
  db_type: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(DatabaseTypeSchema)
    .default('postgresql'),
  db_user: z.string().min(1).default('postgres'),
  db_pass: z.string().default(''),
  db_name: z.string().min(1).default('defaultdb'),
  db_host: z.string().min(1).default('localhost'),
  db_port: z.coerce.number().int().min(1).max(65535).default(5432),
  db_ssl: SslModeSchema.default('prefer'),
  db_pool_max: z.coerce.number().int().positive().default(20),
  db_connection_timeout_ms: z.coerce.number().int().positive().default(10000),
});

export const NumberHealthchecksSchema = z.coerce
  .number()
  .int()
  .refine((value) => value === -1 || value >= 1, {
    message: 'must be a positive integer, or -1 for an unbounded number of checks',
  });

export const MonitorCliOptionsSchema = z.object({
  dbConfig: z.string().min(1),
  sitesCsv: z.string().min(1).optional(),
  sitesTable: z.union([z.boolean(), z.string()]).optional(),
  numberHealthchecks: NumberHealthchecksSchema.optional(),
  dropTables: z.boolean().default(false),
  logLevel: z.string().default('INFO'),
  logFile: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().positive().default(100),
  timeout: z.coerce.number().positive().default(15),
});

export type DatabaseType = z.infer<typeof DatabaseTypeSchema>;
export type SslMode = z.infer<typeof SslModeSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;
export type MonitorCliOptions = z.infer<typeof MonitorCliOptionsSchema>;
