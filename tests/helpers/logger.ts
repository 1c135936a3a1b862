import { createLogger, type Logger } from '../../src/utils/logger.js';

export function silentLogger(name = 'test'): Logger {
  return createLogger({ name, level: 'debug', silent: true });
}
