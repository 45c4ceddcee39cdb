import assert from "node:assert/strict";
import test from "node:test";
import { MetricsService } from "../../src/services/metrics-service";

test("metrics render enqueue counters and latency histogram", () => {
  const metrics = new MetricsService();
  metrics.observeEnqueue({ result: "accepted", latencyMs: 12 });
  metrics.observeEnqueue({ result: "failed", latencyMs: 700 });

  const lines = metrics.renderPrometheus().split("\n");
  assert.ok(lines.includes('firmware_enqueue_total{result="accepted"} 1'));
  assert.ok(lines.includes('firmware_enqueue_total{result="failed"} 1'));
  assert.ok(lines.includes('firmware_enqueue_latency_ms_bucket{le="10"} 0'));
  assert.ok(lines.includes('firmware_enqueue_latency_ms_bucket{le="25"} 1'));
  assert.ok(lines.includes('firmware_enqueue_latency_ms_bucket{le="1000"} 2'));
  assert.ok(lines.includes('firmware_enqueue_latency_ms_bucket{le="+Inf"} 2'));
  assert.ok(lines.includes("firmware_enqueue_latency_ms_sum 712.000"));
  assert.ok(lines.includes("firmware_enqueue_latency_ms_count 2"));
});

test("metrics count api errors by status and code", () => {
  const metrics = new MetricsService();
  metrics.observeApiError({ statusCode: 401, code: "unauthorized" });
  metrics.observeApiError({ statusCode: 401, code: "unauthorized" });
  metrics.observeApiError({ statusCode: 404, code: "device_not_found" });
  metrics.observeListRequest();

  assert.deepEqual(metrics.snapshot(), {
    enqueue: { accepted: 0, failed: 0 },
    list_requests: 1,
    api_errors: [
      { status_code: 401, code: "unauthorized", total: 2 },
      { status_code: 404, code: "device_not_found", total: 1 }
    ]
  });

  const lines = metrics.renderPrometheus().split("\n");
  assert.ok(lines.includes('firmware_api_errors_total{status_code="401",code="unauthorized"} 2'));
  assert.ok(lines.includes("firmware_list_requests_total 1"));
});

test("metrics escape label values and reset to zero", () => {
  const metrics = new MetricsService();
  metrics.observeApiError({ statusCode: 400, code: 'bad"code' });

  assert.ok(
    metrics.renderPrometheus().split("\n").includes('firmware_api_errors_total{status_code="400",code="bad\\"code"} 1')
  );

  metrics.reset();
  assert.deepEqual(metrics.snapshot(), {
    enqueue: { accepted: 0, failed: 0 },
    list_requests: 0,
    api_errors: []
  });
});

test("negative latencies are clamped to zero", () => {
  const metrics = new MetricsService();
  metrics.observeEnqueue({ result: "accepted", latencyMs: -3 });

  const lines = metrics.renderPrometheus().split("\n");
  assert.ok(lines.includes('firmware_enqueue_latency_ms_bucket{le="5"} 1'));
  assert.ok(lines.includes("firmware_enqueue_latency_ms_sum 0.000"));
});
