import { describe, expect, it } from "vitest";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../src/observability";
import type { LogLevel } from "../src/observability";

describe("createRunId", () => {
  it("stamps the run with a compact UTC time and a random suffix", () => {
    expect(createRunId(new Date("2026-03-04T05:06:07.890Z"), () => 0.5)).toBe("extract_20260304T050607Z_i00000");
  });
});

describe("Logger", () => {
  it("writes json lines carrying the child's component and bindings", () => {
    const written: Array<[LogLevel, string]> = [];
    const root = new Logger({ component: "cli", runId: "run-9" }, { writer: (level, line) => written.push([level, line]) });

    root.child("item", { page: 3, rowIndex: 1 }).warn("item_failed", { note: "surface_timeout" });

    expect(written).toHaveLength(1);
    expect(written[0][0]).toBe("warn");
    expect(JSON.parse(written[0][1])).toEqual({
      ts: expect.any(String),
      level: "warn",
      msg: "item_failed",
      component: "item",
      runId: "run-9",
      page: 3,
      rowIndex: 1,
      note: "surface_timeout",
    });
  });

  it("drops lines below the minimum level, in children too", () => {
    const written: string[] = [];
    const root = new Logger({ component: "cli", runId: "run-9" }, { minLevel: "info", writer: (_level, line) => written.push(line) });

    root.debug("hidden");
    root.child("traversal").debug("hidden_too");
    root.info("shown");

    expect(written.map((line) => JSON.parse(line).msg)).toEqual(["shown"]);
  });

  it("parses known levels and falls back otherwise", () => {
    expect(parseLogLevel("warn", "info")).toBe("warn");
    expect(parseLogLevel("verbose", "info")).toBe("info");
    expect(parseLogLevel(undefined, "debug")).toBe("debug");
  });
});

describe("MetricsRegistry", () => {
  it("counts and summarizes timers", () => {
    let now = 0;
    const metrics = new MetricsRegistry(() => now);
    metrics.incrementCounter("items_seen");
    metrics.incrementCounter("items_seen", 2);

    const first = metrics.startTimer("item_ms");
    now = 40;
    expect(first()).toBe(40);
    const second = metrics.startTimer("item_ms");
    now = 100;
    second();

    expect(metrics.getCounters().items_seen).toBe(3);
    expect(metrics.getCounters().items_error).toBe(0);
    expect(metrics.getTimerSummaries().item_ms).toEqual({ count: 2, min: 40, max: 60, avg: 50, total: 100 });
    expect(metrics.getTimerSummaries().capture_ms.count).toBe(0);
  });

  it("prints a single summary document", () => {
    const lines: string[] = [];
    new MetricsRegistry().printSummary((line) => lines.push(line));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe("metrics_summary");
  });
});
