import type { AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import type { HealthcheckRow } from '../schemas/database.js';
import type { ConcurrencyLimiter } from '../utils/limiter.js';

/** The persisted outcome of one probe. */
export type Healthcheck = HealthcheckRow;

export interface HttpProberOptions {
  limiter: ConcurrencyLimiter;
  logger: Logger;
  /** Total budget per probe, including the wait for a limiter slot. */
  timeoutMs?: number;
  http?: AxiosInstance;
}
