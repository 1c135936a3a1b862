import { beforeEach, describe, it, expect, vi } from 'vitest';
import { PostgresDriver } from '../../src/database/postgres-driver.js';
import { DatabaseConfigSchema } from '../../src/schemas/config.js';
import { silentLogger } from '../helpers/logger.js';

const pool = vi.hoisted(() => ({
  created: 0,
  query: vi.fn(),
  end: vi.fn(),
  on: vi.fn(),
}));

vi.mock('pg', () => {
  class Pool {
    query = pool.query;
    end = pool.end;
    on = pool.on;

    constructor() {
      pool.created++;
    }
  }
  return { default: { Pool } };
});

const config = DatabaseConfigSchema.parse({ db_pass: 'test-secret' });

describe('PostgresDriver', () => {
  beforeEach(() => {
    pool.created = 0;
    pool.query.mockReset();
    pool.end.mockReset().mockResolvedValue(undefined);
    pool.on.mockReset();
  });

  it('ends the pool when the first query fails, and connects again on the next open', async () => {
    const driver = new PostgresDriver(config, silentLogger());
    pool.query
      .mockRejectedValueOnce(new Error('password authentication failed'))
      .mockResolvedValueOnce({ rows: [{ version: 'PostgreSQL 16.2' }] });

    await expect(driver.open()).rejects.toThrow('password authentication failed');
    expect(pool.end).toHaveBeenCalledTimes(1);
    await expect(driver.fetch('SELECT 1')).rejects.toThrow('Database driver is not open');

    await driver.open();
    expect(pool.created).toBe(2);
    expect(pool.query).toHaveBeenCalledTimes(2);
  });

  it('keeps one pool across repeated opens and ends it on close', async () => {
    const driver = new PostgresDriver(config, silentLogger());
    pool.query.mockResolvedValue({ rows: [{ version: 'PostgreSQL 16.2' }] });

    await driver.open();
    await driver.open();
    await driver.close();

    expect(pool.created).toBe(1);
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
