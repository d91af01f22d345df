import { IngestionOutcome, MetricsService } from '../../src';

describe('MetricsService', () => {
  let metrics: MetricsService;

  beforeEach(() => {
    metrics = new MetricsService();
  });

  it('should count HTTP requests by path and status', async () => {
    metrics.recordRequest('/webhook', 200, 12);
    metrics.recordRequest('/webhook', 200, 30);
    metrics.recordRequest('/webhook', 401, 3);

    const text = await metrics.exposition();

    expect(text).toContain('http_requests_total{path="/webhook",status="200"} 2');
    expect(text).toContain('http_requests_total{path="/webhook",status="401"} 1');
  });

  it('should count webhook outcomes', async () => {
    metrics.recordWebhookOutcome(IngestionOutcome.CREATED);
    metrics.recordWebhookOutcome(IngestionOutcome.DUPLICATE);
    metrics.recordWebhookOutcome(IngestionOutcome.DUPLICATE);

    const text = await metrics.exposition();

    expect(text).toContain('webhook_requests_total{result="created"} 1');
    expect(text).toContain('webhook_requests_total{result="duplicate"} 2');
  });

  it('should bucket latencies at 100, 500, 1000 and 5000 ms', async () => {
    metrics.recordRequest('/stats', 200, 50);
    metrics.recordRequest('/stats', 200, 700);
    metrics.recordRequest('/stats', 200, 9000);

    const text = await metrics.exposition();

    expect(text).toContain('request_latency_ms_bucket{le="100"} 1');
    expect(text).toContain('request_latency_ms_bucket{le="500"} 1');
    expect(text).toContain('request_latency_ms_bucket{le="1000"} 2');
    expect(text).toContain('request_latency_ms_bucket{le="5000"} 2');
    expect(text).toContain('request_latency_ms_bucket{le="+Inf"} 3');
    expect(text).toContain('request_latency_ms_count 3');
  });

  it('should feed outcomes from the pipeline hooks', async () => {
    await metrics.lifecycleHooks().onWebhookOutcome?.({
      outcome: IngestionOutcome.INVALID_SIGNATURE,
      processingId: 'p-1',
      latencyMs: 1,
    });

    expect(await metrics.exposition()).toContain(
      'webhook_requests_total{result="invalid_signature"} 1',
    );
  });

  it('should keep registries separate between instances', async () => {
    metrics.recordWebhookOutcome(IngestionOutcome.CREATED);
    const other = new MetricsService();

    expect(await other.exposition()).not.toContain(
      'webhook_requests_total{result="created"}',
    );
  });

  it('should expose the Prometheus text content type', () => {
    expect(metrics.contentType).toContain('text/plain');
  });
});
