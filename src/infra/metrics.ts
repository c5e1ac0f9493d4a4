import type { DayPeriod } from "../application/time-of-day.js";

export const UNMATCHED_ROUTE = "unmatched";

const DURATION_BUCKETS_SECONDS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5] as const;

interface CounterSeries<TLabels> {
  labels: TLabels;
  value: number;
}

interface HistogramSeries<TLabels> {
  labels: TLabels;
  count: number;
  sum: number;
  bucketCounts: number[];
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(names: readonly string[], values: readonly string[]): string {
  if (names.length === 0) {
    return "";
  }
  const pairs = names.map((name, index) => `${name}="${escapeLabelValue(values[index] ?? "")}"`);
  return `{${pairs.join(",")}}`;
}

// Keyed by the JSON of the label tuple; label values may contain any character.
function seriesKey(labels: readonly string[]): string {
  return JSON.stringify(labels);
}

class Counter<TLabels extends readonly string[]> {
  private readonly series = new Map<string, CounterSeries<TLabels>>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: readonly string[],
  ) {}

  inc(labels: TLabels, amount = 1): void {
    const key = seriesKey(labels);
    const current = this.series.get(key);
    if (current) {
      current.value += amount;
      return;
    }
    this.series.set(key, { labels, value: amount });
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const { labels, value } of this.series.values()) {
      lines.push(`${this.name}${formatLabels(this.labelNames, labels)} ${value}`);
    }
    return lines;
  }
}

class Histogram<TLabels extends readonly string[]> {
  private readonly series = new Map<string, HistogramSeries<TLabels>>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: readonly string[],
    private readonly buckets: readonly number[],
  ) {}

  observe(labels: TLabels, value: number): void {
    const key = seriesKey(labels);
    let current = this.series.get(key);
    if (!current) {
      current = { labels, count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
      this.series.set(key, current);
    }
    current.count += 1;
    current.sum += value;
    for (const [index, upperBound] of this.buckets.entries()) {
      if (value <= upperBound) {
        current.bucketCounts[index] = (current.bucketCounts[index] ?? 0) + 1;
      }
    }
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    const bucketLabelNames = [...this.labelNames, "le"];
    for (const { labels, count, sum, bucketCounts } of this.series.values()) {
      for (const [index, upperBound] of this.buckets.entries()) {
        const bucketLabels = formatLabels(bucketLabelNames, [...labels, String(upperBound)]);
        lines.push(`${this.name}_bucket${bucketLabels} ${bucketCounts[index] ?? 0}`);
      }
      lines.push(`${this.name}_bucket${formatLabels(bucketLabelNames, [...labels, "+Inf"])} ${count}`);
      lines.push(`${this.name}_sum${formatLabels(this.labelNames, labels)} ${sum}`);
      lines.push(`${this.name}_count${formatLabels(this.labelNames, labels)} ${count}`);
    }
    return lines;
  }
}

export class ClockMetricsRegistry {
  private readonly httpRequests = new Counter<readonly [method: string, route: string, statusCode: string]>(
    "clock_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new Histogram<readonly [method: string, route: string]>(
    "clock_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    DURATION_BUCKETS_SECONDS,
  );
  private readonly timeOfDayReads = new Counter<readonly [period: DayPeriod]>(
    "clock_time_of_day_reads_total",
    "Total number of time-of-day readings served by day period.",
    ["period"],
  );

  /** `route` must be a registered route pattern or `UNMATCHED_ROUTE`, never a raw path. */
  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const upperMethod = method.toUpperCase();
    this.httpRequests.inc([upperMethod, route, String(statusCode)]);
    this.httpDuration.observe([upperMethod, route], durationSeconds);
  }

  recordTimeOfDayRead(period: DayPeriod): void {
    this.timeOfDayReads.inc([period]);
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.timeOfDayReads.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
