import { describe, expect, it } from "vitest";
import { ClockMetricsRegistry } from "../src/infra/metrics.js";

function seriesLines(registry: ClockMetricsRegistry): string[] {
  return registry
    .renderPrometheus()
    .split("\n")
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

describe("ClockMetricsRegistry", () => {
  it("renders only metadata before anything is recorded", () => {
    const registry = new ClockMetricsRegistry();

    expect(registry.renderPrometheus()).toBe(
      [
        "# HELP clock_http_requests_total Total number of HTTP requests handled by route, method, and status code.",
        "# TYPE clock_http_requests_total counter",
        "# HELP clock_http_request_duration_seconds HTTP request duration in seconds by route and method.",
        "# TYPE clock_http_request_duration_seconds histogram",
        "# HELP clock_time_of_day_reads_total Total number of time-of-day readings served by day period.",
        "# TYPE clock_time_of_day_reads_total counter",
        "",
      ].join("\n"),
    );
  });

  it("counts requests and buckets their durations", () => {
    const registry = new ClockMetricsRegistry();

    registry.recordHttpRequest("get", "/v1/clock/now", 200, 0.02);
    registry.recordHttpRequest("GET", "/v1/clock/now", 200, 0.3);

    expect(seriesLines(registry)).toEqual([
      'clock_http_requests_total{method="GET",route="/v1/clock/now",status_code="200"} 2',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.005"} 0',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.01"} 0',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.025"} 1',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.05"} 1',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.1"} 1',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.25"} 1',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="0.5"} 2',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="1"} 2',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="2"} 2',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="5"} 2',
      'clock_http_request_duration_seconds_bucket{method="GET",route="/v1/clock/now",le="+Inf"} 2',
      'clock_http_request_duration_seconds_sum{method="GET",route="/v1/clock/now"} 0.32',
      'clock_http_request_duration_seconds_count{method="GET",route="/v1/clock/now"} 2',
    ]);
  });

  it("keeps label values containing separators and quotes intact", () => {
    const registry = new ClockMetricsRegistry();

    registry.recordHttpRequest("GET", "/a|b", 404, 7);
    registry.recordHttpRequest("GET", 'say "hi"', 200, 7);

    const counterLines = seriesLines(registry).filter((line) => line.startsWith("clock_http_requests_total"));
    expect(counterLines).toEqual([
      'clock_http_requests_total{method="GET",route="/a|b",status_code="404"} 1',
      'clock_http_requests_total{method="GET",route="say \\"hi\\"",status_code="200"} 1',
    ]);
  });

  it("counts time-of-day reads per period", () => {
    const registry = new ClockMetricsRegistry();

    registry.recordTimeOfDayRead("morning");
    registry.recordTimeOfDayRead("night");
    registry.recordTimeOfDayRead("morning");

    expect(seriesLines(registry)).toEqual([
      'clock_time_of_day_reads_total{period="morning"} 2',
      'clock_time_of_day_reads_total{period="night"} 1',
    ]);
  });
});
