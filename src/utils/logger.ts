import winston from 'winston';
import { ConfigError } from '../errors.js';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  name: string;
  logFile?: string;
  silent?: boolean;
}

const LEVEL_ALIASES: Record<string, string> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'error',
};

/** Maps a CLI level name (DEBUG, INFO, WARNING, ERROR, CRITICAL) onto a winston level. */
export function parseLogLevel(level: string): string {
  const mapped = LEVEL_ALIASES[level.trim().toUpperCase()];
  if (!mapped) {
    throw new ConfigError(`Unknown log level "${level}"`);
  }
  return mapped;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level = 'info', name, logFile, silent = false } = options;

  const transports: winston.transport[] = [
    new winston.transports.Console(),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    defaultMeta: { component: name },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level.toUpperCase()} [${String(component)}] ${String(message)}${metaStr}`;
      })
    ),
    transports,
  });
}

export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
