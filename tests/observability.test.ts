/**
 * Observability Tests
 *
 * JSON log lines, level filtering, metrics summaries and error exit codes.
 */

import { describe, it, expect } from "vitest";
import {
  AlreadyExistsError,
  CannotResumeError,
  EXIT_FAILED,
  EXIT_INTERRUPTED,
  exitCodeFor,
  HarvestInterruptedError,
} from "../src/core/errors";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../src/observability";
import { captureLogger } from "./helpers/context";

describe("Logger", () => {
  it("writes one JSON object per event with context and fields", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "harvest", runId: "run-1" }, { writer: { write: (line) => lines.push(line) } });

    logger.info("harvest_page_complete", { offset: 1000, fetched: 1000 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: "info",
      msg: "harvest_page_complete",
      component: "harvest",
      runId: "run-1",
      offset: 1000,
      fetched: 1000,
    });
  });

  it("drops events below the configured level, also in children", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run-1" }, { level: "warn", writer: { write: (line) => lines.push(line) } });
    const child = logger.child("transport");

    logger.info("ignored");
    child.debug("ignored");
    child.warn("fetch_attempt_failed");

    expect(lines.map((line) => JSON.parse(line).component)).toEqual(["transport"]);
  });

  it("parses level names", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("trace")).toBeUndefined();
  });
});

describe("MetricsRegistry", () => {
  it("summarises counters and timers into one log event", () => {
    const log = captureLogger();
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("pages_fetched", 3);
    metrics.incrementCounter("records_written", 2500);
    metrics.startTimer("page_fetch_ms")();

    metrics.logSummary(log.logger);

    const summary = log.events("metrics_summary")[0];
    expect(summary?.counters).toEqual({
      pages_fetched: 3,
      records_written: 2500,
      fetch_failures: 0,
      batch_discrepancies: 0,
      facet_entries_skipped: 0,
    });
    expect(summary?.timers).toMatchObject({ page_fetch_ms: { count: 1 }, throttle_ms: { count: 0 } });
  });
});

describe("run ids and exit codes", () => {
  it("prefixes run ids with the command", () => {
    expect(createRunId("harvest", new Date("2024-02-03T04:05:06.789Z"))).toMatch(
      /^harvest_2024-02-03T04-05-06-789Z_[a-z0-9]{1,6}$/,
    );
  });

  it("maps interruption to 130 and other failures to 1", () => {
    expect(exitCodeFor(new HarvestInterruptedError("out.json.part"))).toBe(EXIT_INTERRUPTED);
    expect(exitCodeFor(new CannotResumeError("no artifact"))).toBe(EXIT_FAILED);
    expect(exitCodeFor(new AlreadyExistsError("out.json"))).toBe(EXIT_FAILED);
    expect(exitCodeFor(new Error("boom"))).toBe(EXIT_FAILED);
    expect(new HarvestInterruptedError("out.json.part").message).toBe(
      "Interrupted. Progress is saved in out.json.part; run again with --resume to continue.",
    );
  });
});
