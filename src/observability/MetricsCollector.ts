// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

/**
 * Prometheus metrics on a private registry. The host application exposes
 * `getMetrics()` on whatever endpoint it serves.
 */
export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    } else {
      this.logger?.debug('Metrics disabled');
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.addCounter('http_requests_total', 'Total provider HTTP requests', [
      'provider',
      'method',
      'status',
    ]);
    this.addCounter('http_retries_total', 'Provider HTTP retries', ['provider', 'reason']);
    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'Provider HTTP request duration',
        labelNames: ['provider', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    // Authorization flow
    this.addCounter('authorization_transitions', 'Authorization attempt phase transitions', [
      'provider',
      'phase',
    ]);

    // Token lifecycle
    this.addCounter('token_refresh_total', 'Token refresh attempts', ['provider', 'status']);
    this.addCounter('token_refresh_dedup_local', 'Token refreshes joined in-process', ['provider']);
    this.addCounter('token_refresh_dedup_distributed', 'Token refreshes deferred to another instance', [
      'provider',
    ]);
    this.histograms.set(
      'token_refresh_duration',
      new Histogram({
        name: 'token_refresh_duration_seconds',
        help: 'Token refresh duration',
        labelNames: ['provider', 'status'],
        buckets: [0.1, 0.3, 0.5, 1, 2],
        registers: [this.registry],
      })
    );

    // Data fetches
    this.histograms.set(
      'fetch_duration',
      new Histogram({
        name: 'fetch_duration_seconds',
        help: 'loadItems duration',
        labelNames: ['provider'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );
    this.gauges.set(
      'items_fetched',
      new Gauge({
        name: 'items_fetched',
        help: 'Number of items returned by the last loadItems',
        labelNames: ['provider'],
        registers: [this.registry],
      })
    );
  }

  private addCounter(key: string, help: string, labelNames: string[]): void {
    this.counters.set(
      key,
      new Counter({
        name: `${key.replace(/_total$/, '')}_total`,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels): void {
    this.counters.get(name)?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels): void {
    this.histograms.get(name)?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels): void {
    this.gauges.get(name)?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
