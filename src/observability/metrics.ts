import type { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_visited: this.counterValue("pages_visited"),
      pages_skipped: this.counterValue("pages_skipped"),
      items_seen: this.counterValue("items_seen"),
      items_success: this.counterValue("items_success"),
      items_confidential: this.counterValue("items_confidential"),
      items_error: this.counterValue("items_error"),
      items_skipped: this.counterValue("items_skipped"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      page_select_ms: this.summarize("page_select_ms"),
      item_ms: this.summarize("item_ms"),
      capture_ms: this.summarize("capture_ms"),
    };
  }

  printSummary(write: (line: string) => void = console.log): void {
    write(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private counterValue(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, total: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
      total,
    };
  }
}
