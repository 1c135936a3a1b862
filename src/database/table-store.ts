import type { Logger } from 'winston';
import type { StorageDriver } from './driver.js';
import { buildCreateTable, buildDropTable, buildInsertMany, buildSelectAll } from './query-builder.js';
import { StorageError } from '../errors.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import type { ColumnSpec, QueryRow, TableDefinition } from '../types/database.js';

/** Where check results and site rows are written. Safe to call from many site tasks at once. */
export interface ResultSink {
  createTableIfMissing<Row extends object>(tableName: string, definition: TableDefinition<Row>): Promise<void>;
  dropTableIfExists(tableName: string): Promise<void>;
  /** `signal` overrides the store-wide signal for this call. */
  insertMany<Row extends object>(
    tableName: string,
    definition: TableDefinition<Row>,
    rows: readonly Row[],
    signal?: AbortSignal
  ): Promise<void>;
  fetchAll<Row extends object>(tableName: string, definition: TableDefinition<Row>): Promise<Row[]>;
}

export interface TableStoreOptions {
  logger: Logger;
  retry?: Omit<RetryOptions, 'name' | 'logger' | 'signal'>;
  signal?: AbortSignal;
}

export class TableStore implements ResultSink {
  private readonly driver: StorageDriver;
  private readonly logger: Logger;
  private readonly retry: Omit<RetryOptions, 'name' | 'logger' | 'signal'>;
  private readonly signal: AbortSignal | undefined;

  constructor(driver: StorageDriver, options: TableStoreOptions) {
    this.driver = driver;
    this.logger = options.logger;
    this.retry = options.retry ?? {};
    this.signal = options.signal;
  }

  async createTableIfMissing<Row extends object>(tableName: string, definition: TableDefinition<Row>): Promise<void> {
    const query = buildCreateTable(tableName, definition);
    await this.run(`create table ${tableName}`, () => this.driver.execute(query));
    this.logger.debug('Table ready', { table: tableName });
  }

  async dropTableIfExists(tableName: string): Promise<void> {
    const query = buildDropTable(tableName);
    await this.run(`drop table ${tableName}`, () => this.driver.execute(query));
    this.logger.info('Table dropped', { table: tableName });
  }

  async insertMany<Row extends object>(
    tableName: string,
    definition: TableDefinition<Row>,
    rows: readonly Row[],
    signal?: AbortSignal
  ): Promise<void> {
    if (rows.length === 0) return;

    const insert = buildInsertMany(tableName, definition, rows);
    await this.run(`insert into ${tableName}`, () => this.driver.executeMany(insert.text, insert.rows), signal);
    this.logger.debug('Insert completed', { table: tableName, rows: rows.length });
  }

  async fetchAll<Row extends object>(tableName: string, definition: TableDefinition<Row>): Promise<Row[]> {
    const query = buildSelectAll(tableName, definition);
    const rows = await this.run(`fetch from ${tableName}`, () => this.driver.fetch(query));
    const columns = Object.entries<ColumnSpec>(definition.columns);

    return rows.map((row) => {
      const parsed = definition.schema.safeParse(fillNulls(row, columns));
      if (!parsed.success) {
        throw new StorageError(`fetch from ${tableName}`, parsed.error);
      }
      return parsed.data;
    });
  }

  private run<T>(operation: string, fn: () => Promise<T>, signal: AbortSignal | undefined = this.signal): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (error) {
          throw new StorageError(operation, error);
        }
      },
      { ...this.retry, name: operation, logger: this.logger, signal }
    );
  }
}

// NULL becomes '' in text columns and 0 in numeric ones.
function fillNulls(row: QueryRow, columns: Array<[string, ColumnSpec]>): QueryRow {
  const filled: QueryRow = { ...row };
  for (const [name, spec] of columns) {
    if (filled[name] !== null) continue;
    if (spec.type === 'text') {
      filled[name] = '';
    } else if (spec.type !== 'timestamp') {
      filled[name] = 0;
    }
  }
  return filled;
}
