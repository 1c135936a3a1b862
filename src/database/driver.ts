import type { QueryRow, SqlValue } from '../types/database.js';

/**
 * Capability set every storage backend provides. Connection pooling and SSL
 * stay inside the implementation.
 */
export interface StorageDriver {
  open(): Promise<void>;
  close(): Promise<void>;
  fetch(query: string, params?: SqlValue[]): Promise<QueryRow[]>;
  execute(query: string, params?: SqlValue[]): Promise<void>;
  /** Runs `query` once per parameter row, all in one transaction. */
  executeMany(query: string, rows: SqlValue[][]): Promise<void>;
}
