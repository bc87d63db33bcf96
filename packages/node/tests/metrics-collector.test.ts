/**
 * Tests for MetricsCollector and the /metrics route.
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector } from "../src/middleware/metrics.js";
import { createTestApp, jsonRequest } from "./setup.js";

describe("MetricsCollector", () => {
  it("render() produces Prometheus format for recorded requests", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("POST", "/api/v1/reconcile", 200, 12);
    collector.recordRequest("GET", "/health", 200, 3);

    const lines = collector.render().split("\n");

    expect(lines).toContain("# TYPE http_requests_total counter");
    expect(lines).toContain('http_requests_total{method="GET",path="/health",status="200"} 2');
    expect(lines).toContain(
      'http_requests_total{method="POST",path="/api/v1/reconcile",status="200"} 1',
    );
    expect(lines).toContain("# TYPE http_request_duration_seconds histogram");
    expect(lines).toContain(
      'http_request_duration_seconds_bucket{method="GET",path="/health",le="+Inf"} 2',
    );
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="/health"} 2');
  });

  it("render() returns headers only when nothing was recorded", () => {
    const output = new MetricsCollector().render();

    expect(output).toBe(
      [
        "# HELP http_requests_total Total HTTP requests",
        "# TYPE http_requests_total counter",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        "",
      ].join("\n"),
    );
  });

  it("histogram buckets count fast and slow requests separately", () => {
    const collector = new MetricsCollector([0.01, 1]);

    collector.recordRequest("GET", "/x", 200, 5);
    collector.recordRequest("GET", "/x", 200, 500);

    const lines = collector.render().split("\n");
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",path="/x",le="0.01"} 1');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",path="/x",le="1"} 2');
  });

  it("named counters accumulate by labels and amount", () => {
    const collector = new MetricsCollector();

    collector.incrementCounter("reconciliation_pairs_total", { discrepancy_type: "NONE" }, 3, "Pairs");
    collector.incrementCounter("reconciliation_pairs_total", { discrepancy_type: "NONE" }, 2);
    collector.incrementCounter("reconciliation_pairs_total", { discrepancy_type: "DECIMAL_SHIFT" });

    expect(collector.counterValue("reconciliation_pairs_total", { discrepancy_type: "NONE" })).toBe(5);
    expect(collector.counterValue("reconciliation_pairs_total", { discrepancy_type: "MISSING_IN_POS" })).toBe(0);

    const lines = collector.render().split("\n");
    expect(lines).toContain("# HELP reconciliation_pairs_total Pairs");
    expect(lines).toContain('reconciliation_pairs_total{discrepancy_type="NONE"} 5');
    expect(lines).toContain('reconciliation_pairs_total{discrepancy_type="DECIMAL_SHIFT"} 1');
  });

  it("escapes quotes in label values", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("odd_total", { name: 'say "hi"' });

    expect(collector.render().split("\n")).toContain('odd_total{name="say \\"hi\\""} 1');
  });

  it("clear() resets all metrics", () => {
    const collector = new MetricsCollector();

    collector.recordRequest("GET", "/health", 200, 5);
    collector.incrementCounter("reconciliation_runs_total");
    collector.clear();

    const output = collector.render();
    expect(output).not.toContain("http_requests_total{");
    expect(output).not.toContain("reconciliation_runs_total");
  });
});

describe("GET /metrics", () => {
  it("exposes request and reconciliation counters", async () => {
    const { app } = createTestApp();

    await app.request(
      jsonRequest("/api/v1/reconcile", "POST", {
        pos: [
          { transactionId: "TX-1", amount: "5.00" },
          { transactionId: "TX-2", amount: "7.00" },
        ],
        processor: [{ transactionId: "P-1", referenceId: "TX-1", amount: "5.00" }],
      }),
    );

    const res = await app.request("/metrics");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(res.headers.get("Cache-Control")).toBe("no-store");

    const lines = (await res.text()).split("\n");
    expect(lines).toContain(
      'http_requests_total{method="POST",path="/api/v1/reconcile",status="200"} 1',
    );
    expect(lines).toContain("reconciliation_runs_total 1");
    expect(lines).toContain('reconciliation_pairs_total{discrepancy_type="NONE"} 1');
    expect(lines).toContain(
      'reconciliation_pairs_total{discrepancy_type="MISSING_IN_PROCESSOR"} 1',
    );
  });

  it("is absent when metrics are disabled", async () => {
    const { app } = createTestApp({ enableMetrics: false });
    const res = await app.request("/metrics");

    expect(res.status).toBe(404);
  });
});
