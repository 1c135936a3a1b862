import type { Logger } from 'winston';
import { HEALTHCHECK_TABLE } from '../database/tables.js';
import type { ResultSink } from '../database/table-store.js';
import { RetriesExhaustedError } from '../errors.js';
import { delay } from '../utils/delay.js';
import type { ConcurrencyLimiter } from '../utils/limiter.js';
import type { SchedulerOptions, SchedulerStats } from '../types/monitor.js';
import type { Website } from '../types/website.js';

export const UNBOUNDED_HEALTHCHECKS = -1;

/**
 * Runs one repeating check loop per site. Loops share nothing but the
 * prober's limiter and the result sink; a failing site never stops the
 * others, while an exhausted storage retry stops them all.
 */
export class HealthcheckScheduler {
  private readonly prober: SchedulerOptions['prober'];
  private readonly sink: ResultSink;
  private readonly logger: Logger;
  private readonly healthcheckTable: string;
  private readonly numberHealthchecks: number;
  private readonly statsIntervalMs: number;
  private readonly limiter: ConcurrencyLimiter | null;
  private statsTimer: ReturnType<typeof setInterval> | null = null;
  private sites = 0;
  private activeTasks = 0;
  private completedChecks = 0;
  private failedChecks = 0;
  private taskErrors = 0;
  private cancelled = false;

  constructor(options: SchedulerOptions) {
    if (options.numberHealthchecks !== UNBOUNDED_HEALTHCHECKS && options.numberHealthchecks < 1) {
      throw new RangeError(`numberHealthchecks must be >= 1 or ${UNBOUNDED_HEALTHCHECKS}`);
    }
    this.prober = options.prober;
    this.sink = options.sink;
    this.logger = options.logger;
    this.healthcheckTable = options.healthcheckTable;
    this.numberHealthchecks = options.numberHealthchecks;
    this.statsIntervalMs = options.statsIntervalMs ?? 60000;
    this.limiter = options.limiter ?? null;
  }

  /**
   * Resolves once every site has used up its check budget, or after `signal`
   * aborts. Rejects with the first fatal error, after stopping the other tasks.
   */
  async run(sites: readonly Website[], signal?: AbortSignal): Promise<SchedulerStats> {
    const controller = new AbortController();
    const onCancel = (): void => {
      this.cancelled = true;
      controller.abort(signal?.reason);
    };
    if (signal?.aborted) {
      onCancel();
    } else {
      signal?.addEventListener('abort', onCancel, { once: true });
    }

    this.sites = sites.length;
    this.logger.info('Starting healthchecks', {
      sites: sites.length,
      checks_per_site: this.numberHealthchecks === UNBOUNDED_HEALTHCHECKS ? 'unbounded' : this.numberHealthchecks,
    });
    this.startStatsReporter();

    let fatalError: unknown = null;
    const tasks = sites.map((site) =>
      this.runSiteTask(site, controller.signal).catch((error: unknown) => {
        if (controller.signal.aborted) return;
        fatalError = error;
        controller.abort(error);
      })
    );

    try {
      await Promise.all(tasks);
    } finally {
      this.stopStatsReporter();
      signal?.removeEventListener('abort', onCancel);
    }

    if (fatalError !== null) {
      const errorMessage = fatalError instanceof Error ? fatalError.message : 'Unknown error';
      this.logger.error('Healthchecks stopped by fatal error', { error: errorMessage });
      throw fatalError;
    }

    const stats = this.getStats();
    this.logger.info(this.cancelled ? 'Healthchecks cancelled' : 'Healthchecks finished', { ...stats });
    return stats;
  }

  getStats(): SchedulerStats {
    return {
      sites: this.sites,
      activeTasks: this.activeTasks,
      completedChecks: this.completedChecks,
      failedChecks: this.failedChecks,
      taskErrors: this.taskErrors,
      limiter: this.limiter ? this.limiter.getStats() : null,
      cancelled: this.cancelled,
    };
  }

  private async runSiteTask(site: Website, signal: AbortSignal): Promise<void> {
    let remaining = this.numberHealthchecks;
    this.activeTasks++;
    this.logger.debug('Site task started', { url: site.url, interval: site.interval });

    try {
      while (remaining !== 0) {
        await delay(site.interval * 1000, signal);

        try {
          const result = await this.prober.probe(site, signal);
          await this.sink.insertMany(this.healthcheckTable, HEALTHCHECK_TABLE, [result], signal);
          this.completedChecks++;
          if (result.http_status_code >= 300) {
            this.failedChecks++;
          }
        } catch (error) {
          if (signal.aborted || error instanceof RetriesExhaustedError) {
            throw error;
          }
          this.taskErrors++;
          const errorMessage = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error('Healthcheck failed', { url: site.url, error: errorMessage });
        }

        if (remaining > 0) remaining--;
      }
    } finally {
      this.activeTasks--;
      this.logger.debug('Site task finished', { url: site.url });
    }
  }

  private startStatsReporter(): void {
    if (this.statsIntervalMs <= 0) return;
    this.statsTimer = setInterval(() => {
      this.logger.info('Healthcheck statistics', { ...this.getStats() });
    }, this.statsIntervalMs);
  }

  private stopStatsReporter(): void {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }
  }
}
