// src/core/http/ThrottleHandler.ts

import { isAxiosError } from 'axios';
import type { ThrottleConfig } from './types';
import type { Sleep } from '../auth/flows/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent } from '../../observability/tracing';

export const THROTTLE_STATUS = 429;

/**
 * Re-runs a request for as long as the API answers with a throttling status,
 * sleeping for the advertised Retry-After each time. There is no attempt cap.
 */
export class ThrottleHandler {
  constructor(
    private config: ThrottleConfig,
    private logger: Logger,
    private metrics: MetricsCollector,
    private sleep: Sleep
  ) {}

  async execute<T>(task: () => Promise<T>, method: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        if (!isAxiosError(error) || error.response?.status !== THROTTLE_STATUS) {
          throw error;
        }

        const retryAfter = error.response.headers['retry-after'];
        const delay = this.retryAfterMs(
          typeof retryAfter === 'string' || typeof retryAfter === 'number' ? String(retryAfter) : undefined
        );

        this.logger.warn('Request throttled, waiting before retry', {
          method,
          attempt,
          delay,
          retryAfter,
        });
        this.metrics.incrementCounter('api_throttled_total', { method });
        addSpanEvent('throttled', { attempt, delay });

        await this.sleep(delay);
      }
    }
  }

  /**
   * Retry-After is either delta-seconds or an HTTP date.
   */
  retryAfterMs(retryAfter: string | undefined): number {
    if (retryAfter === undefined || retryAfter.trim() === '') {
      return this.config.defaultRetryAfterSeconds * 1000;
    }

    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }

    const retryDate = Date.parse(retryAfter);
    if (!Number.isNaN(retryDate)) {
      return Math.max(0, retryDate - Date.now());
    }
    return this.config.defaultRetryAfterSeconds * 1000;
  }
}
