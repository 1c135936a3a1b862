import type { Logger } from 'winston';
import type { StorageDriver } from './driver.js';
import { PostgresDriver } from './postgres-driver.js';
import type { DatabaseConfig } from '../schemas/config.js';

export function createDriver(config: DatabaseConfig, logger: Logger): StorageDriver {
  switch (config.db_type) {
    case 'postgresql':
      return new PostgresDriver(config, logger);
  }
}
