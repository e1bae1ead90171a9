export type Labels = Record<string, string>;

export interface CounterValue {
  name: string;
  labels: Labels;
  value: number;
}

export interface HistogramValue {
  name: string;
  labels: Labels;
  count: number;
  sum: number;
  /** Upper bound (ms) → observations at or below it */
  buckets: Map<number, number>;
}

const LATENCY_BOUNDS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000] as const;

interface HistogramSeries {
  name: string;
  labels: Labels;
  count: number;
  sum: number;
  bucketCounts: number[];
}

/**
 * In-process counters and latency histograms:
 *
 * - `tool_invocations_total{toolName, ok}`
 * - `tool_errors_total{toolName, kind}`
 * - `tool_latency_ms{toolName}`
 * - `http_retries_total{toolName, cause}`
 * - `policy_denied_total{toolName}`
 */
export class Metrics {
  private readonly counters = new Map<string, CounterValue>();
  private readonly histograms = new Map<string, HistogramSeries>();

  increment(name: string, labels: Labels = {}, by = 1): void {
    const key = seriesKey(name, labels);
    const series = this.counters.get(key);
    if (series) {
      series.value += by;
    } else {
      this.counters.set(key, { name, labels: { ...labels }, value: by });
    }
  }

  observe(name: string, labels: Labels, value: number): void {
    const key = seriesKey(name, labels);
    const series = this.histograms.get(key) ?? this.addHistogram(key, name, labels);
    series.count += 1;
    series.sum += value;
    LATENCY_BOUNDS_MS.forEach((bound, i) => {
      if (value <= bound) series.bucketCounts[i] = (series.bucketCounts[i] ?? 0) + 1;
    });
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  getHistogram(name: string, labels: Labels): HistogramValue | undefined {
    const series = this.histograms.get(seriesKey(name, labels));
    if (!series) return undefined;
    const buckets = new Map<number, number>(
      LATENCY_BOUNDS_MS.map((bound, i): [number, number] => [bound, series.bucketCounts[i] ?? 0]),
    );
    return { name, labels: series.labels, count: series.count, sum: series.sum, buckets };
  }

  /** One call: counted by outcome, timed, and counted by error kind when it failed. */
  recordInvocation(toolName: string, ok: boolean, durationMs: number, errorKind?: string): void {
    this.increment("tool_invocations_total", { toolName, ok: String(ok) });
    this.observe("tool_latency_ms", { toolName }, durationMs);
    if (!ok) {
      this.increment("tool_errors_total", { toolName, kind: errorKind ?? "UPSTREAM_ERROR" });
    }
  }

  /** `cause` is the HTTP status, or the error kind for network failures. */
  recordRetry(toolName: string, cause: string): void {
    this.increment("http_retries_total", { toolName, cause });
  }

  recordPolicyDenied(toolName: string): void {
    this.increment("policy_denied_total", { toolName });
  }

  private addHistogram(key: string, name: string, labels: Labels): HistogramSeries {
    const series: HistogramSeries = {
      name,
      labels: { ...labels },
      count: 0,
      sum: 0,
      bucketCounts: LATENCY_BOUNDS_MS.map(() => 0),
    };
    this.histograms.set(key, series);
    return series;
  }
}

function seriesKey(name: string, labels: Labels): string {
  const sorted = Object.keys(labels)
    .sort()
    .map((key) => [key, labels[key]]);
  return `${name}${JSON.stringify(sorted)}`;
}
