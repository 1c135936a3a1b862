import type { z } from 'zod';

export type ColumnType = 'text' | 'integer' | 'float' | 'enum' | 'timestamp';

/**
 * `primary` columns are auto-incremented and left out of inserts. `unique`
 * columns are the conflict target of inserts, which then skip the row.
 */
export type ColumnRole = 'primary' | 'unique' | 'plain';

export interface ColumnSpec {
  type: ColumnType;
  role?: ColumnRole;
}

export interface TableDefinition<Row extends object> {
  columns: { readonly [K in keyof Row]-?: ColumnSpec };
  schema: z.ZodType<Row, z.ZodTypeDef, unknown>;
}

export type SqlValue = string | number | boolean | Date | null;

export type QueryRow = Record<string, unknown>;

export interface InsertQuery {
  text: string;
  rows: SqlValue[][];
}
