import fs from 'fs/promises';
import type { Logger } from 'winston';
import type { ResultSink } from '../database/table-store.js';
import { UNSAVED_ID, WEBSITE_TABLE } from '../database/tables.js';
import { ConfigError, EmptySiteListError } from '../errors.js';
import { parseCsvLine } from '../utils/csv.js';
import { normalizeUrl } from '../utils/url.js';
import type { Website } from '../types/website.js';

const DELIMITER = ',';
const INTEGER_REGEX = /^\d+$/;

function isHeader(fields: string[]): boolean {
  const tokens = fields.map((field) => field.trim().toLowerCase());
  return tokens.includes('host') && tokens.includes('interval');
}

/** Parses one `host,interval[,pattern]` row. `lineNumber` is 1-based and only used in errors. */
export function parseSiteRow(fields: string[], lineNumber: number): Website {
  if (fields.length < 2 || fields.length > 3) {
    throw new ConfigError(`Line ${lineNumber}: expected "host,interval[,pattern]", got ${fields.length} column(s)`);
  }

  const [host = '', interval = '', regex = ''] = fields;
  const trimmedInterval = interval.trim();
  if (!INTEGER_REGEX.test(trimmedInterval)) {
    throw new ConfigError(`Line ${lineNumber}: interval must be a non-negative integer, got "${interval}"`);
  }

  let url: string;
  try {
    url = normalizeUrl(host, false);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigError(`Line ${lineNumber}: ${errorMessage}`, { cause: error });
  }

  return {
    website_id: UNSAVED_ID,
    url,
    interval: parseInt(trimmedInterval, 10),
    regex,
  };
}

export class SiteRegistry {
  private readonly sink: ResultSink;
  private readonly tableName: string;
  private readonly logger: Logger;
  private current: Website[] = [];

  constructor(sink: ResultSink, tableName: string, logger: Logger) {
    this.sink = sink;
    this.tableName = tableName;
    this.logger = logger;
  }

  /** Reads a site list; the first line is skipped when it names the `host` and `interval` columns. */
  static async loadFromFile(path: string): Promise<Website[]> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf8');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new ConfigError(`Cannot read site list ${path}: ${errorMessage}`, { cause: error });
    }

    const sites: Website[] = [];
    const lines = content.split(/\r?\n/);

    lines.forEach((line, index) => {
      if (line.trim() === '') return;

      const fields = parseCsvLine(line, DELIMITER);
      if (index === 0 && isHeader(fields)) return;

      sites.push(parseSiteRow(fields, index + 1));
    });

    return sites;
  }

  get sites(): readonly Website[] {
    return this.current;
  }

  /**
   * Inserts `sites` (existing URLs are left alone) and reloads the full list,
   * so every returned site carries its stored id.
   */
  async reconcile(sites: readonly Website[]): Promise<Website[]> {
    if (sites.length > 0) {
      await this.sink.insertMany(this.tableName, WEBSITE_TABLE, sites);
      this.logger.info(`Registered ${sites.length} websites`, { table: this.tableName });
    }

    this.current = await this.sink.fetchAll(this.tableName, WEBSITE_TABLE);
    if (this.current.length === 0) {
      throw new EmptySiteListError(this.tableName);
    }

    this.logger.info(`Loaded ${this.current.length} websites to monitor`, { table: this.tableName });
    return this.current;
  }
}
