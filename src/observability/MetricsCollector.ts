// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // Identity provider metrics
    this.counters.set(
      'token_requests_total',
      new Counter({
        name: 'token_requests_total',
        help: 'Token endpoint exchanges',
        labelNames: ['grant_type', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_total',
      new Counter({
        name: 'token_refresh_total',
        help: 'Connection refresh outcomes',
        labelNames: ['flow', 'outcome'],
        registers: [this.registry],
      })
    );

    // API metrics
    this.counters.set(
      'api_requests_total',
      new Counter({
        name: 'api_requests_total',
        help: 'Total API requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'api_throttled_total',
      new Counter({
        name: 'api_throttled_total',
        help: 'Throttled API responses',
        labelNames: ['method'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'api_request_duration',
      new Histogram({
        name: 'api_request_duration_seconds',
        help: 'API request duration',
        labelNames: ['method'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
