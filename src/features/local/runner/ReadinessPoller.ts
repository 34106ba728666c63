/**
 * HTTP readiness poller
 *
 * GETs a URL until it answers 200 or the time budget runs out. Non-200
 * answers and transport errors only mean "not ready yet".
 */

import axios, { AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import type { ILogger } from '../../../shared/utils/logger.js';
import { InvalidUrlError, ReadinessTimeoutError, errorMessage } from '../../../shared/utils/errors.js';

export interface ReadinessOptions {
  /** Total budget. Default 5 minutes */
  timeoutMs?: number;
  /** Pause between polls. Default 5 seconds */
  intervalMs?: number;
  /** Budget of a single request. Default 10 seconds */
  requestTimeoutMs?: number;
}

export interface IReadinessProbe {
  waitForReady(url: string, options?: ReadinessOptions): Promise<void>;
}

export function parseHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidUrlError(url);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(url);
  }
  return parsed;
}

export class ReadinessPoller implements IReadinessProbe {
  private http: AxiosInstance;

  constructor(
    private readonly logger: ILogger,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create();
  }

  async waitForReady(url: string, options: ReadinessOptions = {}): Promise<void> {
    const target = parseHttpUrl(url);
    const timeoutMs = options.timeoutMs ?? 5 * 60_000;
    const intervalMs = options.intervalMs ?? 5_000;
    const requestTimeoutMs = options.requestTimeoutMs ?? 10_000;

    const deadline = Date.now() + timeoutMs;
    let attempt = 0;

    for (;;) {
      if (Date.now() > deadline) {
        throw new ReadinessTimeoutError(url, timeoutMs);
      }

      attempt++;
      try {
        const response = await this.http.get(target.toString(), {
          timeout: Math.min(requestTimeoutMs, Math.max(deadline - Date.now(), 1)),
          validateStatus: () => true,
          responseType: 'text',
        });
        if (response.status === 200) {
          this.logger.debug(`${url} ready after ${attempt} attempt(s)`);
          return;
        }
        this.logger.debug(`${url} not ready yet`, { attempt, status: response.status });
      } catch (error) {
        this.logger.debug(`${url} not reachable yet`, { attempt, error: errorMessage(error) });
      }

      await sleep(intervalMs);
    }
  }
}
