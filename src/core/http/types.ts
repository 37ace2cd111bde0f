// src/core/http/types.ts

import type { ProviderId } from '../normalizer/types';
import type { RetryBudget } from './RetryHandler';

export interface HttpRequestConfig {
  provider: ProviderId;
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  retryBudget?: RetryBudget; // Shared across the requests of one fetch
}

export interface HttpResponse {
  data: unknown; // Parsed by the calling adapter
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxTransientRetries: number; // Additional attempts after network/5xx failures (max 2)
  maxRateLimitRetries: number; // Additional attempts after 429 (max 1)
  baseDelay: number; // milliseconds
  maxDelay: number;
  maxRetryAfter: number; // Cap applied to provider Retry-After hints
}

export interface HttpConfig {
  timeout?: number;
  retry?: Partial<RetryConfig>;
}
