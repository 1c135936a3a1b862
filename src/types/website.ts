import type { WebsiteRow } from '../schemas/database.js';

/** A monitored URL with its check interval (seconds) and optional content pattern. */
export type Website = WebsiteRow;
