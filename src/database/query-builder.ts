import type { ColumnSpec, ColumnType, InsertQuery, SqlValue, TableDefinition } from '../types/database.js';

const SQL_TYPES: Record<ColumnType, string> = {
  text: 'TEXT',
  integer: 'INT',
  float: 'FLOAT',
  enum: 'INT',
  timestamp: 'TIMESTAMPTZ',
};

const IDENTIFIER_REGEX = /^[a-z_][a-z0-9_]*$/i;

export function assertIdentifier(name: string): string {
  if (!IDENTIFIER_REGEX.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

function columnEntries<Row extends object>(definition: TableDefinition<Row>): Array<[string, ColumnSpec]> {
  return Object.entries<ColumnSpec>(definition.columns).map(([name, spec]) => [assertIdentifier(name), spec]);
}

function primaryKey<Row extends object>(definition: TableDefinition<Row>): string | null {
  const entry = columnEntries(definition).find(([, spec]) => spec.role === 'primary');
  return entry ? entry[0] : null;
}

export function buildCreateTable<Row extends object>(tableName: string, definition: TableDefinition<Row>): string {
  const lines = columnEntries(definition).map(([name, spec]) => {
    if (spec.role === 'primary') return `${name} SERIAL`;
    const unique = spec.role === 'unique' ? ' UNIQUE' : '';
    return `${name} ${SQL_TYPES[spec.type]}${unique}`;
  });

  const pk = primaryKey(definition);
  if (pk) {
    lines.push(`PRIMARY KEY (${pk})`);
  }

  return `CREATE TABLE IF NOT EXISTS ${assertIdentifier(tableName)} (\n${lines.join(',\n')}\n);`;
}

export function buildDropTable(tableName: string): string {
  return `DROP TABLE IF EXISTS ${assertIdentifier(tableName)};`;
}

/**
 * Parameterized insert for `rows`. The primary key is left to the database,
 * and a row whose unique column already exists is skipped.
 */
export function buildInsertMany<Row extends object>(
  tableName: string,
  definition: TableDefinition<Row>,
  rows: readonly Row[]
): InsertQuery {
  const columns = columnEntries(definition).filter(([, spec]) => spec.role !== 'primary');
  const names = columns.map(([name]) => name);
  const placeholders = names.map((_, i) => `$${i + 1}`);
  const conflict = columns.filter(([, spec]) => spec.role === 'unique').map(([name]) => name);
  const onConflict = conflict.length > 0 ? ` ON CONFLICT (${conflict.join(', ')}) DO NOTHING` : '';

  const text =
    `INSERT INTO ${assertIdentifier(tableName)} (${names.join(', ')}) ` +
    `VALUES (${placeholders.join(', ')})${onConflict};`;

  const values = rows.map((row) => {
    const record = new Map<string, unknown>(Object.entries(row));
    return names.map((name) => toSqlValue(record.get(name)));
  });

  return { text, rows: values };
}

export function buildSelectAll<Row extends object>(tableName: string, definition: TableDefinition<Row>): string {
  const names = columnEntries(definition).map(([name]) => name);
  const pk = primaryKey(definition);
  const orderBy = pk ? ` ORDER BY ${pk}` : '';
  return `SELECT ${names.join(', ')} FROM ${assertIdentifier(tableName)}${orderBy};`;
}

function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  throw new Error(`Unsupported column value: ${JSON.stringify(value)}`);
}
