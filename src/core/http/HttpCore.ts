// src/core/http/HttpCore.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpConfig, HttpRequestConfig, HttpResponse, RateLimitConfig } from './types';
import { PROVIDER_IDS, type ProviderId } from '../normalizer/types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler, parseRetryAfter } from './RetryHandler';
import {
  UnauthorizedError,
  RateLimitedError,
  ProviderRequestError,
  TransientError,
  NetworkTimeoutError,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Outbound calls to provider data endpoints: per-provider rate limiting,
 * bounded timeouts, typed errors and the rate-limit/transient retry policy.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<ProviderId, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(
    config: HttpConfig,
    rateLimits: Partial<Record<ProviderId, RateLimitConfig>>,
    metrics: MetricsCollector,
    logger: Logger
  ) {
    this.metrics = metrics;
    this.logger = logger;
    this.retryHandler = new RetryHandler(config.retry, logger, metrics);

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 10000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters(rateLimits);
  }

  async get(url: string, config: Omit<HttpRequestConfig, 'url' | 'method'>): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'GET' });
  }

  async post(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'>
  ): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'POST', body });
  }

  async delete(url: string, config: Omit<HttpRequestConfig, 'url' | 'method'>): Promise<HttpResponse> {
    return this.request({ ...config, url, method: 'DELETE' });
  }

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const { provider } = config;
    const method = config.method ?? 'GET';
    const requestId = generateCorrelationId();

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': 'oauth-integration-broker/0.1',
      Accept: 'application/json',
      ...config.headers,
    };

    // One attempt: rate-limited slot, span, typed error
    const attempt = (): Promise<HttpResponse> =>
      this.runThroughRateLimiter(provider, () =>
        withHttpSpan(method, config.url, async () => {
          const startTime = Date.now();
          this.logger.debug('HTTP request', { requestId, provider, method, url: config.url });

          try {
            const response = await this.axiosInstance.request<unknown>({
              url: config.url,
              method,
              headers,
              params: config.query,
              data: config.body,
            });

            this.metrics.incrementCounter('http_requests_total', {
              provider,
              method,
              status: response.status,
            });
            this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
              provider,
              status: response.status,
            });

            return {
              data: response.data,
              status: response.status,
              headers: this.toHeaderRecord(response.headers),
            };
          } catch (error: unknown) {
            const transformed = this.transformError(error, provider);
            this.metrics.incrementCounter('http_requests_total', {
              provider,
              method,
              status: transformed instanceof TransientError ? 'transient' : String(this.statusOf(error)),
            });
            throw transformed;
          }
        })
      );

    return this.retryHandler.execute(attempt, provider, config.retryBudget);
  }

  private async runThroughRateLimiter<T>(provider: ProviderId, task: () => Promise<T>): Promise<T> {
    const queue = this.rateLimiters.get(provider);

    if (!queue) {
      return task();
    }

    return queue.add(task, { throwOnTimeout: true });
  }

  private initializeRateLimiters(rateLimits: Partial<Record<ProviderId, RateLimitConfig>>): void {
    for (const provider of PROVIDER_IDS) {
      const config = rateLimits[provider];
      if (!config) continue;

      // Fractional QPS becomes one request per 1/qps seconds
      const intervalCap = config.qps >= 1 ? Math.floor(config.qps) : 1;
      const interval = config.qps >= 1 ? 1000 : Math.floor(1000 / config.qps);

      this.rateLimiters.set(
        provider,
        new PQueue({ intervalCap, interval, concurrency: config.concurrency })
      );

      this.logger.debug('Rate limiter initialized', {
        provider,
        qps: config.qps,
        intervalCap,
        interval,
        concurrency: config.concurrency,
      });
    }
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private statusOf(error: unknown): number | 'error' {
    return isAxiosError(error) && error.response ? error.response.status : 'error';
  }

  private transformError(error: unknown, provider: ProviderId): Error {
    if (!isAxiosError(error)) {
      return new TransientError('Network error', { provider, cause: error });
    }

    if (error.response) {
      const { status } = error.response;

      this.logger.debug('HTTP error response', {
        provider,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 401) {
        return new UnauthorizedError('Access token rejected by provider', { provider });
      }
      if (status === 429) {
        const header = error.response.headers['retry-after'];
        const retryAfterMs = parseRetryAfter(typeof header === 'string' ? header : undefined);
        this.logger.warn('Rate limited', { provider, retryAfterMs });
        return new RateLimitedError('Rate limit exceeded', retryAfterMs, { provider });
      }
      if (status >= 500) {
        return new TransientError(`Server error: ${status}`, { provider }, status);
      }
      return new ProviderRequestError(`Client error: ${status}`, status, {
        provider,
        response: error.response.data,
      });
    }

    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new NetworkTimeoutError('Request timeout', { provider });
    }
    return new TransientError('Network error', { provider, cause: error.message });
  }
}
