import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  min: number;
  max: number;
  avg: number;
}

function summarize(samples: readonly number[]): TimerSummary {
  if (samples.length === 0) {
    return { count: 0, totalMs: 0, min: 0, max: 0, avg: 0 };
  }
  const totalMs = samples.reduce((sum, value) => sum + value, 0);
  return {
    count: samples.length,
    totalMs,
    min: Math.min(...samples),
    max: Math.max(...samples),
    avg: Number((totalMs / samples.length).toFixed(2)),
  };
}

/** Process-local counters and duration samples for one command run. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly samples = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  counter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const elapsedMs = Date.now() - startedAt;
      const recorded = this.samples.get(name);
      if (recorded) {
        recorded.push(elapsedMs);
      } else {
        this.samples.set(name, [elapsedMs]);
      }
      return elapsedMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_fetched: this.counter("pages_fetched"),
      records_written: this.counter("records_written"),
      fetch_failures: this.counter("fetch_failures"),
      batch_discrepancies: this.counter("batch_discrepancies"),
      facet_entries_skipped: this.counter("facet_entries_skipped"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      page_fetch_ms: summarize(this.samples.get("page_fetch_ms") ?? []),
      throttle_ms: summarize(this.samples.get("throttle_ms") ?? []),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }
}
