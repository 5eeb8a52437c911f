import type { Session } from './types.js';
import type { Config } from '../shared/config.js';
import { HttpError, SessionError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface HttpSessionOptions {
  userAgent: string;
  cookie?: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

/**
 * HTTP connection handle for one run. Opened before the first request and
 * closed afterwards; closing aborts whatever is still in flight.
 * Transient failures (network errors, timeouts, 429, 5xx) are retried with
 * exponential backoff.
 */
export class HttpSession implements Session {
  private controller: AbortController | null = null;

  constructor(private readonly options: HttpSessionOptions) {}

  static fromConfig(collector: Config['collector']): HttpSession {
    return new HttpSession({
      userAgent: collector.user_agent,
      cookie: collector.cookie || undefined,
      timeoutMs: collector.timeout_ms,
      retries: collector.retries,
      retryDelayMs: collector.retry_delay_ms,
    });
  }

  async open(): Promise<void> {
    if (this.controller) return;
    this.controller = new AbortController();
    logger.debug('HTTP session opened');
  }

  async close(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    this.controller = null;
    logger.debug('HTTP session closed');
  }

  /**
   * `signal` cancels this request only; closing the session cancels all of them.
   */
  async getHtml(url: string, signal?: AbortSignal): Promise<string> {
    let attempt = 0;
    while (true) {
      try {
        return await this.fetchOnce(url, signal);
      } catch (err) {
        const retryable = err instanceof HttpError ? err.details?.['retryable'] === true : !(err instanceof SessionError);
        if (!retryable || attempt >= this.options.retries) throw err;
        const delay = this.options.retryDelayMs * 2 ** attempt;
        attempt++;
        logger.debug({ url, attempt, delay, error: errorMessage(err) }, 'Retrying request');
        await sleep(delay);
      }
    }
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<string> {
    const session = this.controller;
    if (!session || session.signal.aborted) {
      throw new SessionError('HTTP session is not open', { url });
    }
    if (signal?.aborted) {
      throw new SessionError('Request cancelled', { url });
    }

    const controller = new AbortController();
    const abortRequest = (): void => controller.abort();
    session.signal.addEventListener('abort', abortRequest);
    signal?.addEventListener('abort', abortRequest);
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const headers: Record<string, string> = {
        'User-Agent': this.options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      };
      if (this.options.cookie) {
        headers['Cookie'] = this.options.cookie;
      }

      let response: Response;
      try {
        response = await fetch(url, { headers, signal: controller.signal, redirect: 'follow' });
      } catch (err) {
        if (session.signal.aborted) {
          throw new SessionError('HTTP session closed during request', { url });
        }
        if (signal?.aborted) {
          throw new SessionError('Request cancelled', { url });
        }
        throw new HttpError(`Request failed: ${errorMessage(err)}`, { url, retryable: true });
      }

      if (!response.ok) {
        throw new HttpError(`Request failed with status ${response.status}`, {
          url,
          status: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      return await response.text();
    } finally {
      clearTimeout(timer);
      session.signal.removeEventListener('abort', abortRequest);
      signal?.removeEventListener('abort', abortRequest);
    }
  }
}
