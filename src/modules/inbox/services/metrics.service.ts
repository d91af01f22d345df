import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry } from 'prom-client';
import { IngestionOutcome, LifecycleHooks } from '../../../core';

export const LATENCY_BUCKETS_MS = [100, 500, 1000, 5000];

/**
 * Prometheus metrics for the inbox, kept in a registry of its own so that
 * several app instances (tests) never collide on the global one.
 */
@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  private readonly httpRequests = new Counter({
    name: 'http_requests_total',
    help: 'HTTP requests by path and status code',
    labelNames: ['path', 'status'] as const,
    registers: [this.registry],
  });

  private readonly webhookRequests = new Counter({
    name: 'webhook_requests_total',
    help: 'Webhook requests by ingestion outcome',
    labelNames: ['result'] as const,
    registers: [this.registry],
  });

  private readonly requestLatency = new Histogram({
    name: 'request_latency_ms',
    help: 'HTTP request latency in milliseconds',
    buckets: LATENCY_BUCKETS_MS,
    registers: [this.registry],
  });

  recordRequest(path: string, status: number, latencyMs: number): void {
    this.httpRequests.inc({ path, status: String(status) });
    this.requestLatency.observe(latencyMs);
  }

  recordWebhookOutcome(outcome: IngestionOutcome): void {
    this.webhookRequests.inc({ result: outcome });
  }

  /**
   * Hooks that feed pipeline outcomes into the webhook counter
   */
  lifecycleHooks(): LifecycleHooks {
    return {
      onWebhookOutcome: (event) => this.recordWebhookOutcome(event.outcome),
    };
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async exposition(): Promise<string> {
    return this.registry.metrics();
  }
}
