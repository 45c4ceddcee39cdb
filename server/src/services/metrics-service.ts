type EnqueueResult = "accepted" | "failed";

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1_000, 2_500, 5_000];

type ApiErrorKey = `${number}|${string}`;

type LatencyHistogram = {
  buckets: number[];
  count: number;
  sum: number;
};

function apiErrorKey(statusCode: number, code: string): ApiErrorKey {
  return `${statusCode}|${code}`;
}

function escapeLabel(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\n/g, "\\n")
    .replace(/"/g, '\\"');
}

function emptyHistogram(): LatencyHistogram {
  return {
    buckets: new Array<number>(LATENCY_BUCKETS_MS.length).fill(0),
    count: 0,
    sum: 0
  };
}

export class MetricsService {
  private readonly enqueueTotals: Record<EnqueueResult, number> = { accepted: 0, failed: 0 };
  private enqueueLatency = emptyHistogram();
  private listRequests = 0;
  private readonly apiErrors = new Map<ApiErrorKey, number>();

  observeEnqueue(params: { result: EnqueueResult; latencyMs: number }): void {
    this.enqueueTotals[params.result] += 1;

    const boundedLatency = Math.max(0, params.latencyMs);
    this.enqueueLatency.count += 1;
    this.enqueueLatency.sum += boundedLatency;
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      if (boundedLatency <= LATENCY_BUCKETS_MS[i]) {
        this.enqueueLatency.buckets[i] += 1;
      }
    }
  }

  observeListRequest(): void {
    this.listRequests += 1;
  }

  observeApiError(params: { statusCode: number; code: string }): void {
    const key = apiErrorKey(params.statusCode, params.code);
    this.apiErrors.set(key, (this.apiErrors.get(key) ?? 0) + 1);
  }

  snapshot(): {
    enqueue: Record<EnqueueResult, number>;
    list_requests: number;
    api_errors: Array<{
      status_code: number;
      code: string;
      total: number;
    }>;
  } {
    return {
      enqueue: { ...this.enqueueTotals },
      list_requests: this.listRequests,
      api_errors: [...this.apiErrors.entries()].map(([key, total]) => {
        const separator = key.indexOf("|");
        return {
          status_code: Number(key.slice(0, separator)),
          code: key.slice(separator + 1),
          total
        };
      })
    };
  }

  reset(): void {
    this.enqueueTotals.accepted = 0;
    this.enqueueTotals.failed = 0;
    this.enqueueLatency = emptyHistogram();
    this.listRequests = 0;
    this.apiErrors.clear();
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push("# HELP firmware_enqueue_total Firmware report enqueue attempts by result.");
    lines.push("# TYPE firmware_enqueue_total counter");
    lines.push(`firmware_enqueue_total{result="accepted"} ${this.enqueueTotals.accepted}`);
    lines.push(`firmware_enqueue_total{result="failed"} ${this.enqueueTotals.failed}`);

    lines.push("# HELP firmware_enqueue_latency_ms Enqueue latency histogram in milliseconds.");
    lines.push("# TYPE firmware_enqueue_latency_ms histogram");
    for (let i = 0; i < LATENCY_BUCKETS_MS.length; i += 1) {
      lines.push(
        `firmware_enqueue_latency_ms_bucket{le="${LATENCY_BUCKETS_MS[i]}"} ${this.enqueueLatency.buckets[i]}`
      );
    }
    lines.push(`firmware_enqueue_latency_ms_bucket{le="+Inf"} ${this.enqueueLatency.count}`);
    lines.push(`firmware_enqueue_latency_ms_sum ${this.enqueueLatency.sum.toFixed(3)}`);
    lines.push(`firmware_enqueue_latency_ms_count ${this.enqueueLatency.count}`);

    lines.push("# HELP firmware_list_requests_total Successful firmware event listings.");
    lines.push("# TYPE firmware_list_requests_total counter");
    lines.push(`firmware_list_requests_total ${this.listRequests}`);

    lines.push("# HELP firmware_api_errors_total API error responses by status/code.");
    lines.push("# TYPE firmware_api_errors_total counter");
    for (const [key, value] of this.apiErrors) {
      const separator = key.indexOf("|");
      lines.push(
        `firmware_api_errors_total{status_code="${escapeLabel(key.slice(0, separator))}",code="${escapeLabel(key.slice(separator + 1))}"} ${value}`
      );
    }

    return lines.join("\n");
  }
}

export const metricsService = new MetricsService();
