import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from './logger.js';

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

export interface ResourceLimitOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  pid?: number;
}

export interface OpenFileLimit {
  soft: number;
  hard: number;
}

const execFileAsync = promisify(execFile);
const defaultRunner: CommandRunner = (file, args) => execFileAsync(file, args);

function parseLimit(value: string | undefined): number {
  if (value === undefined) return NaN;
  return value === 'unlimited' ? Number.POSITIVE_INFINITY : parseInt(value, 10);
}

export async function readOpenFileLimit(runner: CommandRunner, pid: number): Promise<OpenFileLimit> {
  const { stdout } = await runner('prlimit', [
    `--pid=${pid}`,
    '--nofile',
    '--raw',
    '--noheadings',
    '--output=SOFT,HARD',
  ]);
  const [soft, hard] = stdout.trim().split(/\s+/);
  const limit = { soft: parseLimit(soft), hard: parseLimit(hard) };

  if (Number.isNaN(limit.soft) || Number.isNaN(limit.hard)) {
    throw new Error(`Unexpected prlimit output: ${stdout.trim()}`);
  }
  return limit;
}

/**
 * Raises the soft RLIMIT_NOFILE of this process to at least `minimum`, never
 * above the hard limit. Best effort: failures are logged and the current
 * limit (if known) is returned.
 */
export async function raiseOpenFileLimit(
  minimum: number,
  logger: Logger,
  options: ResourceLimitOptions = {}
): Promise<OpenFileLimit | null> {
  const platform = options.platform ?? process.platform;
  const runner = options.runner ?? defaultRunner;
  const pid = options.pid ?? process.pid;

  if (platform !== 'linux') {
    logger.info('Open file limit adjustment not supported on this platform', { platform });
    return null;
  }

  let limit: OpenFileLimit;
  try {
    limit = await readOpenFileLimit(runner, pid);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.warn('Could not read open file limit', { error: errorMessage });
    return null;
  }

  if (limit.soft >= minimum) {
    logger.info('Open file limit sufficient', { soft: limit.soft, required: minimum });
    return limit;
  }

  const target = Math.min(minimum, limit.hard);
  const hard = Number.isFinite(limit.hard) ? String(limit.hard) : 'unlimited';

  try {
    await runner('prlimit', [`--pid=${pid}`, `--nofile=${target}:${hard}`]);
    logger.info('Raised open file limit', { previous: limit.soft, current: target, required: minimum });
    if (target < minimum) {
      logger.warn('Open file limit capped by hard limit', { hard: limit.hard, required: minimum });
    }
    return { soft: target, hard: limit.hard };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.warn('Could not raise open file limit', { error: errorMessage, soft: limit.soft, required: minimum });
    return limit;
  }
}
