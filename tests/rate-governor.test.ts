/**
 * Rate Governor Tests
 *
 * The governor always waits the configured per-page delay and adds a pause when the
 * remaining-requests header drops below the threshold.
 */

import { describe, it, expect } from "vitest";
import { HttpHeadersLike } from "../src/core/fetch";
import { MetricsRegistry } from "../src/observability";
import { RateGovernor } from "../src/transport";
import { captureLogger, recordingSleep, testConfig } from "./helpers/context";

function headers(values: Record<string, string>): HttpHeadersLike {
  return { get: (name: string) => values[name] ?? null };
}

function governorFor() {
  const { sleep, waits } = recordingSleep();
  const log = captureLogger();
  const metrics = new MetricsRegistry();
  const governor = new RateGovernor({ config: testConfig(), logger: log.logger, metrics, sleep });
  return { governor, waits, log, metrics };
}

describe("RateGovernor", () => {
  it("waits only the configured delay while budget remains", async () => {
    const { governor, waits, log } = governorFor();

    await governor.throttle(headers({ "x-ratelimit-remaining-minute": "45" }), 6_000);

    expect(waits).toEqual([6_000]);
    expect(log.events("rate_limit_approaching")).toHaveLength(0);
  });

  it("adds a pause when the remaining budget is low", async () => {
    const { governor, waits, log } = governorFor();

    await governor.throttle(headers({ "x-ratelimit-remaining-minute": "5" }), 6_000);

    expect(waits).toEqual([6_000, 2_000]);
    expect(log.events("rate_limit_approaching")[0]).toMatchObject({ remaining: 5, pauseMs: 2_000 });
  });

  it("assumes the threshold value when the header is missing or unparsable", () => {
    const { governor } = governorFor();

    expect(governor.remaining(headers({}))).toBe(20);
    expect(governor.remaining(headers({ "x-ratelimit-remaining-minute": "soon" }))).toBe(20);
    expect(governor.remaining(headers({ "x-ratelimit-remaining-minute": "19" }))).toBe(19);
  });

  it("does not pause extra at exactly the threshold", async () => {
    const { governor, waits } = governorFor();

    await governor.throttle(headers({}), 6_000);

    expect(waits).toEqual([6_000]);
  });

  it("records throttle time", async () => {
    const { governor, metrics } = governorFor();

    await governor.throttle(headers({}), 0);

    expect(metrics.getTimerSummaries().throttle_ms.count).toBe(1);
  });
});
