import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  RetryBudget,
  RetryHandler,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
} from '../../src/core/http/RetryHandler';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import type { Logger } from '../../src/observability/Logger';
import {
  ProviderRequestError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
} from '../../src/utils/errors';
import { createTestLogger } from '../helpers';

describe('RetryHandler', () => {
  let logger: Logger;
  let handler: RetryHandler;

  beforeEach(() => {
    logger = createTestLogger();
    handler = new RetryHandler({ baseDelay: 1, maxDelay: 4, maxRetryAfter: 20 }, logger);
  });

  it('should cap retries at two transient and one rate-limited by default', () => {
    expect(DEFAULT_RETRY_CONFIG.maxTransientRetries).toBe(2);
    expect(DEFAULT_RETRY_CONFIG.maxRateLimitRetries).toBe(1);
  });

  it('should return the first successful result', async () => {
    const task = vi.fn().mockResolvedValue('ok');

    await expect(handler.execute(task, 'hubspot')).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures up to two more times', async () => {
    const task = vi
      .fn()
      .mockRejectedValueOnce(new TransientError('Server error: 503', {}, 503))
      .mockRejectedValueOnce(new TransientError('Network error'))
      .mockResolvedValue('ok');

    await expect(handler.execute(task, 'hubspot')).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('should give up after the transient budget is spent', async () => {
    const failure = new TransientError('Server error: 500', {}, 500);
    const task = vi.fn().mockRejectedValue(failure);

    await expect(handler.execute(task, 'hubspot')).rejects.toBe(failure);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('should retry a rate-limited call exactly once', async () => {
    const failure = new RateLimitedError('Rate limit exceeded', 5);
    const task = vi.fn().mockRejectedValue(failure);

    await expect(handler.execute(task, 'airtable')).rejects.toBe(failure);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should draw on a shared budget across calls', async () => {
    const budget = new RetryBudget();
    const limited = new RateLimitedError('Rate limit exceeded', 0);
    const first = vi.fn().mockRejectedValueOnce(limited).mockResolvedValue('page-1');
    const second = vi.fn().mockRejectedValue(limited);

    await expect(handler.execute(first, 'hubspot', budget)).resolves.toBe('page-1');
    await expect(handler.execute(second, 'hubspot', budget)).rejects.toBe(limited);

    expect(second).toHaveBeenCalledTimes(1);
    expect(budget.rateLimitRetries).toBe(1);
    expect(budget.transientRetries).toBe(0);
  });

  it('should wait for the retry-after hint, capped by maxRetryAfter', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const task = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError('Rate limit exceeded', 5000))
      .mockResolvedValue('ok');

    await expect(handler.execute(task, 'notion')).resolves.toBe('ok');
    expect(warn).toHaveBeenCalledWith(
      'Rate limited, retrying after hint',
      expect.objectContaining({ provider: 'notion', delay: 20, retryAfterMs: 5000 })
    );
  });

  it('should not retry other failures', async () => {
    const unauthorized = vi.fn().mockRejectedValue(new UnauthorizedError());
    const notFound = vi.fn().mockRejectedValue(new ProviderRequestError('Client error: 404', 404));

    await expect(handler.execute(unauthorized, 'hubspot')).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(handler.execute(notFound, 'hubspot')).rejects.toBeInstanceOf(ProviderRequestError);
    expect(unauthorized).toHaveBeenCalledTimes(1);
    expect(notFound).toHaveBeenCalledTimes(1);
  });

  it('should honour a zero transient budget', async () => {
    const strict = new RetryHandler({ maxTransientRetries: 0, baseDelay: 1 }, logger);
    const task = vi.fn().mockRejectedValue(new TransientError('Network error'));

    await expect(strict.execute(task, 'hubspot')).rejects.toBeInstanceOf(TransientError);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should count retries by reason', async () => {
    const metrics = new MetricsCollector({}, logger);
    const counted = new RetryHandler({ baseDelay: 1, maxRetryAfter: 1 }, logger, metrics);
    const task = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitedError('Rate limit exceeded', 0))
      .mockRejectedValueOnce(new TransientError('Network error'))
      .mockResolvedValue('ok');

    await counted.execute(task, 'hubspot');

    const output = await metrics.getMetrics();
    expect(output).toContain('http_retries_total{provider="hubspot",reason="rate_limited"} 1');
    expect(output).toContain('http_retries_total{provider="hubspot",reason="transient"} 1');
  });
});

describe('parseRetryAfter', () => {
  it('should parse delta seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('0')).toBe(0);
  });

  it('should parse an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or unparseable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
