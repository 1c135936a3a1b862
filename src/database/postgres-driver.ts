import pg from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import type { Logger } from 'winston';
import type { StorageDriver } from './driver.js';
import type { DatabaseConfig, SslMode } from '../schemas/config.js';
import { VersionRowSchema } from '../schemas/database.js';
import type { QueryRow, SqlValue } from '../types/database.js';

const { Pool } = pg;

// pg cannot fall back from TLS to plain text, so the opportunistic modes connect without TLS.
export function toPgSsl(mode: SslMode): PoolConfig['ssl'] {
  switch (mode) {
    case 'disable':
    case 'allow':
    case 'prefer':
      return false;
    case 'require':
      return { rejectUnauthorized: false };
    case 'verify-ca':
    case 'verify-full':
      return { rejectUnauthorized: true };
  }
}

export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  return {
    host: config.db_host,
    port: config.db_port,
    database: config.db_name,
    user: config.db_user,
    password: config.db_pass,
    ssl: toPgSsl(config.db_ssl),
    max: config.db_pool_max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.db_connection_timeout_ms,
  };
}

export class PostgresDriver implements StorageDriver {
  private readonly poolConfig: PoolConfig;
  private readonly logger: Logger;
  private pool: pg.Pool | null = null;

  constructor(config: DatabaseConfig, logger: Logger) {
    this.poolConfig = toPoolConfig(config);
    this.logger = logger;
  }

  async open(): Promise<void> {
    if (this.pool) return;

    const pool = new Pool(this.poolConfig);
    pool.on('error', (err) => {
      this.logger.error('Database pool error', { error: err.message });
    });

    let rows: QueryRow[];
    try {
      const result = await pool.query<QueryRow>('SELECT version() AS version');
      rows = result.rows;
    } catch (error) {
      await pool.end();
      throw error;
    }
    this.pool = pool;

    const version = VersionRowSchema.safeParse(rows[0]);
    this.logger.info('Connected to database', {
      host: this.poolConfig.host,
      database: this.poolConfig.database,
      version: version.success ? version.data.version : 'unknown',
    });
  }

  async close(): Promise<void> {
    if (!this.pool) return;

    const pool = this.pool;
    this.pool = null;
    await pool.end();
    this.logger.info('Database connection pool closed');
  }

  async fetch(query: string, params: SqlValue[] = []): Promise<QueryRow[]> {
    const result = await this.getPool().query<QueryRow>(query, params);
    return result.rows;
  }

  async execute(query: string, params: SqlValue[] = []): Promise<void> {
    await this.getPool().query(query, params);
  }

  async executeMany(query: string, rows: SqlValue[][]): Promise<void> {
    if (rows.length === 0) return;

    await this.transaction(async (client) => {
      for (const params of rows) {
        await client.query(query, params);
      }
    });
  }

  private async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getPool().connect();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getPool(): pg.Pool {
    if (!this.pool) {
      throw new Error('Database driver is not open');
    }
    return this.pool;
  }
}
