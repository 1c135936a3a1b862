import type { StorageDriver } from '../../src/database/driver.js';
import type { QueryRow, SqlValue } from '../../src/types/database.js';

interface MemoryTable {
  columns: string[];
  serial: string | null;
  unique: string[];
  rows: QueryRow[];
  nextId: number;
}

const CREATE_REGEX = /^CREATE TABLE IF NOT EXISTS (\w+) \(\n([\s\S]*)\n\);$/;
const DROP_REGEX = /^DROP TABLE IF EXISTS (\w+);$/;
const INSERT_REGEX = /^INSERT INTO (\w+) \(([^)]*)\) VALUES \([^)]*\)(?: ON CONFLICT \(([^)]*)\) DO NOTHING)?;$/;
const SELECT_REGEX = /^SELECT (.+) FROM (\w+)(?: ORDER BY (\w+))?;$/;

function splitNames(list: string): string[] {
  return list.split(',').map((name) => name.trim());
}

/**
 * In-process StorageDriver that understands the statements the query builder
 * emits. `failures` makes the next N driver calls reject.
 */
export class MemoryDriver implements StorageDriver {
  readonly tables = new Map<string, MemoryTable>();
  readonly statements: string[] = [];
  opened = 0;
  closed = 0;
  failures = 0;
  failure: Error = new Error('connection reset');

  async open(): Promise<void> {
    this.opened++;
  }

  async close(): Promise<void> {
    this.closed++;
  }

  async fetch(query: string): Promise<QueryRow[]> {
    this.record(query);
    const match = SELECT_REGEX.exec(query);
    if (!match) throw new Error(`Unsupported query: ${query}`);

    const [, columnList = '', tableName = '', orderBy] = match;
    const table = this.table(tableName);
    const names = splitNames(columnList);
    const rows = orderBy
      ? [...table.rows].sort((a, b) => Number(a[orderBy]) - Number(b[orderBy]))
      : table.rows;

    return rows.map((row) => Object.fromEntries(names.map((name) => [name, row[name] ?? null])));
  }

  async execute(query: string): Promise<void> {
    this.record(query);

    const create = CREATE_REGEX.exec(query);
    if (create) {
      const [, tableName = '', body = ''] = create;
      if (this.tables.has(tableName)) return;

      const table: MemoryTable = { columns: [], serial: null, unique: [], rows: [], nextId: 1 };
      for (const line of body.split(',\n')) {
        if (line.startsWith('PRIMARY KEY')) continue;
        const [name = '', type = '', modifier] = line.split(' ');
        table.columns.push(name);
        if (type === 'SERIAL') table.serial = name;
        if (modifier === 'UNIQUE') table.unique.push(name);
      }
      this.tables.set(tableName, table);
      return;
    }

    const drop = DROP_REGEX.exec(query);
    if (drop) {
      this.tables.delete(drop[1] ?? '');
      return;
    }

    throw new Error(`Unsupported statement: ${query}`);
  }

  async executeMany(query: string, rows: SqlValue[][]): Promise<void> {
    this.record(query);
    const match = INSERT_REGEX.exec(query);
    if (!match) throw new Error(`Unsupported statement: ${query}`);

    const [, tableName = '', columnList = '', conflictList] = match;
    const table = this.table(tableName);
    const names = splitNames(columnList);
    const conflict = conflictList ? splitNames(conflictList) : [];

    // Staged first so a bad row leaves the table untouched.
    const staged: QueryRow[] = [];
    for (const values of rows) {
      const row: QueryRow = {};
      names.forEach((name, i) => {
        row[name] = values[i] ?? null;
      });

      const exists = [...table.rows, ...staged].some((existing) =>
        conflict.some((name) => existing[name] === row[name])
      );
      if (exists) continue;
      staged.push(row);
    }

    for (const row of staged) {
      if (table.serial) {
        row[table.serial] = table.nextId++;
      }
      table.rows.push(row);
    }
  }

  rowsOf(tableName: string): QueryRow[] {
    return this.tables.get(tableName)?.rows ?? [];
  }

  private table(name: string): MemoryTable {
    const table = this.tables.get(name);
    if (!table) throw new Error(`relation "${name}" does not exist`);
    return table;
  }

  private record(query: string): void {
    this.statements.push(query);
    if (this.failures > 0) {
      this.failures--;
      throw this.failure;
    }
  }
}
