import { HealthcheckRowSchema, WebsiteRowSchema } from '../schemas/database.js';
import type { TableDefinition } from '../types/database.js';
import type { Website } from '../types/website.js';
import type { Healthcheck } from '../types/healthcheck.js';

/** Id of a row that has not been written yet; the store assigns the real one. */
export const UNSAVED_ID = -1;

export const DEFAULT_WEBSITE_TABLE = 'website';
export const DEFAULT_HEALTHCHECK_TABLE = 'healthcheck';

export const WEBSITE_TABLE: TableDefinition<Website> = {
  columns: {
    website_id: { type: 'integer', role: 'primary' },
    url: { type: 'text', role: 'unique' },
    interval: { type: 'integer' },
    regex: { type: 'text' },
  },
  schema: WebsiteRowSchema,
};

export const HEALTHCHECK_TABLE: TableDefinition<Healthcheck> = {
  columns: {
    check_id: { type: 'integer', role: 'primary' },
    website_fk: { type: 'integer' },
    request_timestamp: { type: 'float' },
    response_time: { type: 'float' },
    http_status_code: { type: 'integer' },
    regex_match_status: { type: 'enum' },
    error_message: { type: 'text' },
  },
  schema: HealthcheckRowSchema,
};
