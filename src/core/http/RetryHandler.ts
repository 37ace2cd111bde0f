// src/core/http/RetryHandler.ts

import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { RateLimitedError, TransientError } from '../../utils/errors';

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxTransientRetries: 2,
  maxRateLimitRetries: 1,
  baseDelay: 200,
  maxDelay: 2000,
  maxRetryAfter: 30000,
};

/**
 * Retries already spent. One budget is shared by every request of a single
 * adapter fetch, so paging does not multiply the allowance.
 */
export class RetryBudget {
  rateLimitRetries = 0;
  transientRetries = 0;
}

/**
 * Bounded retries for provider calls. Rate-limited and transient failures
 * have separate budgets; every other error is rethrown on first sight.
 */
export class RetryHandler {
  private config: RetryConfig;

  constructor(
    config: Partial<RetryConfig> | undefined,
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  async execute<T>(
    task: () => Promise<T>,
    provider: string,
    budget: RetryBudget = new RetryBudget()
  ): Promise<T> {
    for (;;) {
      try {
        return await task();
      } catch (error: unknown) {
        let delay: number;

        if (error instanceof RateLimitedError) {
          if (budget.rateLimitRetries >= this.config.maxRateLimitRetries) throw error;
          budget.rateLimitRetries++;

          delay = Math.min(error.retryAfterMs ?? this.config.baseDelay, this.config.maxRetryAfter);
          this.logger.warn('Rate limited, retrying after hint', {
            provider,
            attempt: budget.rateLimitRetries,
            delay,
            retryAfterMs: error.retryAfterMs,
          });
          this.metrics?.incrementCounter('http_retries_total', { provider, reason: 'rate_limited' });
        } else if (error instanceof TransientError) {
          if (budget.transientRetries >= this.config.maxTransientRetries) throw error;

          delay = Math.min(
            this.config.baseDelay * Math.pow(2, budget.transientRetries),
            this.config.maxDelay
          );
          budget.transientRetries++;
          this.logger.warn('Retrying request', {
            provider,
            attempt: budget.transientRetries,
            delay,
            status: error.status,
            error: error.message,
          });
          this.metrics?.incrementCounter('http_retries_total', { provider, reason: 'transient' });
        } else {
          throw error;
        }

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
