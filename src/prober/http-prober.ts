import axios, { type AxiosInstance } from 'axios';
import { Readable } from 'node:stream';
import type { Logger } from 'winston';
import { getRequestConfig } from './request-config.js';
import { MatchStatus } from '../schemas/database.js';
import { UNSAVED_ID } from '../database/tables.js';
import { ProbeTimeoutError } from '../errors.js';
import type { ConcurrencyLimiter, ReleaseFn } from '../utils/limiter.js';
import type { Healthcheck, HttpProberOptions } from '../types/healthcheck.js';
import type { Website } from '../types/website.js';

export const STATUS_TIMEOUT = 598;
export const STATUS_TRANSPORT_ERROR = 555;
export const MAX_ERROR_MESSAGE_LENGTH = 300;
export const DEFAULT_PROBE_TIMEOUT_MS = 15000;

export function roundTo3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function truncate(text: string, maxLength: number = MAX_ERROR_MESSAGE_LENGTH): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/** `<ErrorName> [<code>]: <message>`, e.g. `AxiosError [ECONNREFUSED]: connect ECONNREFUSED 127.0.0.1:80`. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const code = 'code' in error && typeof error.code === 'string' ? ` [${error.code}]` : '';
  return `${error.name}${code}: ${error.message}`;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return '';
}

function discardBody(data: unknown): void {
  if (data instanceof Readable) {
    data.destroy();
  }
}

/**
 * Runs one GET per call and turns the outcome into a Healthcheck. Transport
 * failures become sentinel status codes; only cancellation through `signal`
 * is thrown.
 */
export class HttpProber {
  private readonly limiter: ConcurrencyLimiter;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: HttpProberOptions) {
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.http = options.http ?? axios.create();
  }

  async probe(site: Website, signal?: AbortSignal): Promise<Healthcheck> {
    const controller = new AbortController();
    const timeoutError = new ProbeTimeoutError(site.url, this.timeoutMs);
    const timer = setTimeout(() => controller.abort(timeoutError), this.timeoutMs);
    const onCancel = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      onCancel();
    } else {
      signal?.addEventListener('abort', onCancel, { once: true });
    }

    const readBody = site.regex !== '';
    let start = Date.now();
    let release: ReleaseFn | null = null;
    let statusCode = STATUS_TRANSPORT_ERROR;
    let body = '';
    let errorMessage = '';

    try {
      this.logger.debug('Waiting for slot', { url: site.url, ...this.limiter.getStats() });
      release = await this.limiter.acquire(controller.signal);
      this.logger.debug('Slot acquired', { url: site.url });

      start = Date.now();
      const response = await this.http.get<unknown>(
        site.url,
        getRequestConfig(controller.signal, readBody)
      );
      statusCode = response.status;

      if (readBody) {
        body = bodyText(response.data);
      } else {
        discardBody(response.data);
      }
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (controller.signal.reason === timeoutError) {
        statusCode = STATUS_TIMEOUT;
        errorMessage = describeError(timeoutError);
      } else {
        statusCode = STATUS_TRANSPORT_ERROR;
        errorMessage = describeError(error);
      }
    } finally {
      release?.();
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCancel);
    }

    const end = Date.now();

    let matchStatus: MatchStatus = MatchStatus.NotApplicable;
    if (readBody) {
      matchStatus = MatchStatus.NotMatched;
      if (!errorMessage) {
        try {
          matchStatus = new RegExp(site.regex).test(body) ? MatchStatus.Matched : MatchStatus.NotMatched;
        } catch (error) {
          errorMessage = describeError(error);
        }
      }
    }

    const result: Healthcheck = {
      check_id: UNSAVED_ID,
      website_fk: site.website_id,
      request_timestamp: roundTo3(start / 1000),
      response_time: roundTo3((end - start) / 1000),
      http_status_code: statusCode,
      regex_match_status: matchStatus,
      error_message: truncate(errorMessage),
    };

    const meta = {
      url: site.url,
      status: statusCode,
      response_time: result.response_time,
      match: matchStatus,
      ...(errorMessage ? { error: result.error_message } : {}),
    };
    if (statusCode >= 300) {
      this.logger.error(`Got response [${statusCode}] for URL: ${site.url}`, meta);
    } else {
      this.logger.info(`Got response [${statusCode}] for URL: ${site.url}`, meta);
    }

    return result;
  }
}
