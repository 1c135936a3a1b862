export { delay } from './delay.js';
export { createLogger, componentLogger, parseLogLevel, type Logger, type LoggerOptions } from './logger.js';
export { normalizeUrl } from './url.js';
export { parseCsvLine } from './csv.js';
export { withRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from './retry.js';
export { ConcurrencyLimiter, type LimiterStats, type ReleaseFn } from './limiter.js';
export { raiseOpenFileLimit, readOpenFileLimit, type CommandRunner, type OpenFileLimit } from './resource-limits.js';
