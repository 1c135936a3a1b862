import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { WebMonitor } from '../../src/monitor/web-monitor.js';
import { DatabaseConfigSchema } from '../../src/schemas/config.js';
import { ConfigError, EmptySiteListError } from '../../src/errors.js';
import type { WebMonitorOptions } from '../../src/types/monitor.js';
import { MemoryDriver } from '../helpers/memory-driver.js';
import { fakeHttp } from '../helpers/http.js';
import { silentLogger } from '../helpers/logger.js';

const logger = silentLogger();
let dir: string;
let driver: MemoryDriver;
let fileLimitRequests: number[];

function monitor(options: Partial<WebMonitorOptions> = {}): WebMonitor {
  return new WebMonitor({
    database: DatabaseConfigSchema.parse({}),
    logger,
    driver,
    http: fakeHttp(() => ({ status: 200, body: 'all good' })),
    retry: { tries: 2, delayMs: 0 },
    statsIntervalMs: 0,
    raiseFileLimit: async (minimum) => {
      fileLimitRequests.push(minimum);
    },
    ...options,
  });
}

async function writeCsv(content: string): Promise<string> {
  const file = path.join(dir, 'sites.csv');
  await fs.writeFile(file, content, 'utf8');
  return file;
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'webmon-monitor-'));
  driver = new MemoryDriver();
  fileLimitRequests = [];
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('WebMonitor', () => {
  it('seeds sites from a file and checks each of them', async () => {
    const sitesCsv = await writeCsv('host,interval,regex\nfoo.test,0,good\nbar.test:8080,0\n');

    const stats = await monitor({ sitesCsv, numberHealthchecks: 2 }).run('monitor');

    expect(stats).toMatchObject({ sites: 2, completedChecks: 4, cancelled: false });
    expect(driver.rowsOf('website').map((row) => row['url'])).toEqual([
      'https://foo.test:443',
      'http://bar.test:8080',
    ]);
    expect(driver.rowsOf('healthcheck')).toHaveLength(4);
    expect(driver.rowsOf('healthcheck').filter((row) => row['regex_match_status'] === 1)).toHaveLength(2);
    expect(fileLimitRequests).toEqual([4]);
    expect(driver.closed).toBe(1);
  });

  it('monitors the stored sites when no file is given', async () => {
    const sitesCsv = await writeCsv('foo.test,0\n');
    await monitor({ sitesCsv, numberHealthchecks: 1 }).run('monitor');

    const stats = await monitor({ numberHealthchecks: 1 }).run('monitor');

    expect(stats?.sites).toBe(1);
    expect(driver.rowsOf('website')).toHaveLength(1);
    expect(driver.rowsOf('healthcheck')).toHaveLength(2);
  });

  it('fails on an empty store and still closes the driver', async () => {
    await expect(monitor({ numberHealthchecks: 1 }).run('monitor')).rejects.toBeInstanceOf(EmptySiteListError);
    expect(driver.closed).toBe(1);
  });

  it('checks its input before touching the database', async () => {
    const sitesCsv = await writeCsv('foo.test,often\n');

    await expect(monitor({ sitesCsv, numberHealthchecks: 1 }).run('monitor')).rejects.toBeInstanceOf(ConfigError);
    await expect(monitor({ sitesCsv }).run('monitor')).rejects.toThrow('The number of healthchecks is required');
    expect(driver.opened).toBe(0);
  });

  it('uses its own table names', async () => {
    const sitesCsv = await writeCsv('foo.test,0\n');

    await monitor({
      sitesCsv,
      numberHealthchecks: 1,
      websiteTable: 'site_list',
      healthcheckTable: 'site_checks',
    }).run('monitor');

    expect([...driver.tables.keys()]).toEqual(['site_list', 'site_checks']);
  });

  it('drops both tables, results first', async () => {
    const sitesCsv = await writeCsv('foo.test,0\n');
    await monitor({ sitesCsv, numberHealthchecks: 1 }).run('monitor');

    await expect(monitor().run('drop-tables')).resolves.toBeNull();

    expect(driver.tables.size).toBe(0);
    expect(driver.statements.filter((statement) => statement.startsWith('DROP'))).toEqual([
      'DROP TABLE IF EXISTS healthcheck;',
      'DROP TABLE IF EXISTS website;',
    ]);
  });

  it('resolves with cancelled stats when aborted', async () => {
    const sitesCsv = await writeCsv('foo.test,0\nbar.test,0\n');
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const stats = await monitor({ sitesCsv, numberHealthchecks: -1 }).run('monitor', controller.signal);

    expect(stats?.cancelled).toBe(true);
    expect(driver.closed).toBe(1);
  });
});
