/**
 * Transport Tests
 *
 * Covers request construction, payload validation and the retry policy:
 * - per-request URL parameters
 * - retryable versus fatal outcomes with linear backoff
 * - the per-page failure budget, timeouts and cancellation
 */

import { describe, it, expect } from "vitest";
import { AppConfig } from "../src/config";
import { ExhaustedRetriesError, FatalResponseError, HarvestInterruptedError } from "../src/core/errors";
import { FetchFn } from "../src/core/fetch";
import { MetricsRegistry } from "../src/observability";
import { buildFacetUrl, buildPageUrl, HttpTransport, parseFacetFields, parsePagePayload } from "../src/transport";
import { captureLogger, recordingSleep, testConfig } from "./helpers/context";
import { FakeArchiveApi, fakeResponse, makeRecords } from "./helpers/fakeApi";

const BASE_URL = "https://archive.test/search/query";
const PAGE_URL = `${BASE_URL}?rows=10&start=0&wt=json&q=*%3A*`;

function transportFor(fetchFn: FetchFn, overrides: Partial<AppConfig> = {}) {
  const { sleep, waits } = recordingSleep();
  const log = captureLogger();
  const metrics = new MetricsRegistry();
  const transport = new HttpTransport({ config: testConfig(overrides), logger: log.logger, metrics, fetchFn, sleep });
  return { transport, waits, log, metrics };
}

/** Replies with each scripted response in turn, then with a small valid page. */
function scripted(responses: Array<number | Error | string>): { fetchFn: FetchFn; calls: () => number } {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    const next = responses[calls];
    calls += 1;
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === "number") {
      return fakeResponse(next, "");
    }
    if (typeof next === "string") {
      return fakeResponse(200, next);
    }
    return fakeResponse(200, JSON.stringify({ response: { numFound: 1, docs: [{ id: "a" }] } }));
  };
  return { fetchFn, calls: () => calls };
}

describe("request construction", () => {
  it("builds page parameters in a fixed order", () => {
    const url = buildPageUrl(BASE_URL, {
      query: "*:*",
      rows: 1000,
      start: 2000,
      sort: "identifier.PROV_ACM.id asc",
    });
    const parsed = new URL(url);

    expect(parsed.origin + parsed.pathname).toBe(BASE_URL);
    expect([...parsed.searchParams.keys()]).toEqual(["rows", "start", "sort", "wt", "q"]);
    expect(parsed.searchParams.get("rows")).toBe("1000");
    expect(parsed.searchParams.get("start")).toBe("2000");
    expect(parsed.searchParams.get("sort")).toBe("identifier.PROV_ACM.id asc");
    expect(parsed.searchParams.get("wt")).toBe("json");
    expect(parsed.searchParams.get("q")).toBe("*:*");
  });

  it("adds a field list only when fields are requested", () => {
    const withFields = new URL(buildPageUrl(BASE_URL, { query: "x", rows: 5, start: 0, fields: ["id", "title"] }));
    const withoutFields = new URL(buildPageUrl(BASE_URL, { query: "x", rows: 5, start: 0 }));

    expect(withFields.searchParams.get("fl")).toBe("id,title");
    expect(withoutFields.searchParams.has("fl")).toBe(false);
    expect(withoutFields.searchParams.has("sort")).toBe(false);
  });

  it("never shares parameter state between calls", () => {
    const first = buildPageUrl(BASE_URL, { query: "a", rows: 10, start: 0 });
    buildPageUrl(BASE_URL, { query: "b", rows: 10, start: 50 });
    const again = buildPageUrl(BASE_URL, { query: "a", rows: 10, start: 0 });

    expect(again).toBe(first);
  });

  it("rejects a non-positive page size and a negative offset", () => {
    expect(() => buildPageUrl(BASE_URL, { query: "*:*", rows: 0, start: 0 })).toThrow("rows must be a positive integer");
    expect(() => buildPageUrl(BASE_URL, { query: "*:*", rows: 10, start: -1 })).toThrow(
      "start must be a non-negative integer",
    );
  });

  it("builds facet requests with repeated facet fields and no rows", () => {
    const parsed = new URL(buildFacetUrl(BASE_URL, { query: "*:*", facetFields: ["series_id", "is_part_of_series.id"] }));

    expect(parsed.searchParams.get("rows")).toBe("0");
    expect(parsed.searchParams.get("facet")).toBe("true");
    expect(parsed.searchParams.getAll("facet.field")).toEqual(["series_id", "is_part_of_series.id"]);
    expect(parsed.searchParams.get("facet.limit")).toBe("-1");
    expect(parsed.searchParams.get("facet.mincount")).toBe("1");
  });
});

describe("payload validation", () => {
  it("accepts a page payload", () => {
    const result = parsePagePayload({ response: { numFound: 3, docs: [{ id: "a" }] } });

    expect(result).toEqual({ ok: true, value: { numFound: 3, docs: [{ id: "a" }] } });
  });

  it("reports where a page payload is malformed", () => {
    const result = parsePagePayload({ response: { docs: [] } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toContain("response.numFound");
    }
  });

  it("reads facet fields", () => {
    const result = parseFacetFields({ facet_counts: { facet_fields: { series_id: ["1", 4] } } });

    expect(result).toEqual({ ok: true, value: { series_id: ["1", 4] } });
  });

  it("rejects a payload without facet counts", () => {
    expect(parseFacetFields({ response: {} }).ok).toBe(false);
  });
});

describe("HttpTransport retry policy", () => {
  it("returns the first successful attempt without waiting", async () => {
    const { fetchFn } = scripted([]);
    const { transport, waits } = transportFor(fetchFn);

    const response = await transport.fetch(PAGE_URL);

    expect(response.attempts).toBe(1);
    expect(response.payload).toEqual({ response: { numFound: 1, docs: [{ id: "a" }] } });
    expect(waits).toEqual([]);
  });

  it("backs off linearly on retryable failures", async () => {
    const { fetchFn, calls } = scripted([503, new Error("socket hang up")]);
    const { transport, waits, log, metrics } = transportFor(fetchFn);

    const response = await transport.fetch(PAGE_URL);

    expect(response.attempts).toBe(3);
    expect(calls()).toBe(3);
    expect(waits).toEqual([63_000, 126_000]);
    expect(metrics.getCounters().fetch_failures).toBe(2);
    expect(log.events("fetch_attempt_failed").map((line) => line.reason)).toEqual(["transport", "transport"]);
  });

  it("treats 429 as a rate-limit failure", async () => {
    const { fetchFn } = scripted([429]);
    const { transport, waits, log } = transportFor(fetchFn);

    const response = await transport.fetch(PAGE_URL);

    expect(response.attempts).toBe(2);
    expect(waits).toEqual([63_000]);
    expect(log.events("fetch_attempt_failed")[0]?.reason).toBe("rate_limit");
  });

  it("retries a body that is not JSON", async () => {
    const { fetchFn } = scripted(["<html>maintenance</html>"]);
    const { transport, waits } = transportFor(fetchFn);

    const response = await transport.fetch(PAGE_URL);

    expect(response.attempts).toBe(2);
    expect(waits).toEqual([63_000]);
  });

  it("gives up after the configured number of consecutive failures without a final wait", async () => {
    const { fetchFn, calls } = scripted([500, 500, 500, 500, 500, 500, 500]);
    const { transport, waits } = transportFor(fetchFn);

    const failure = transport.fetch(PAGE_URL);

    await expect(failure).rejects.toBeInstanceOf(ExhaustedRetriesError);
    await expect(failure).rejects.toThrow(`Failed to fetch ${PAGE_URL} after 6 consecutive attempts`);
    expect(calls()).toBe(6);
    expect(waits).toEqual([63_000, 126_000, 189_000, 252_000, 315_000]);
  });

  it("starts every call with a fresh failure budget", async () => {
    const { fetchFn, calls } = scripted([503, 503, 503]);
    const { transport } = transportFor(fetchFn, { maxConsecutiveFailures: 4 });

    await transport.fetch(PAGE_URL);
    const second = await transport.fetch(PAGE_URL);

    expect(second.attempts).toBe(1);
    expect(calls()).toBe(5);
  });

  it("fails at once on a client error", async () => {
    const { fetchFn, calls } = scripted([404]);
    const { transport, waits } = transportFor(fetchFn);

    await expect(transport.fetch(PAGE_URL)).rejects.toBeInstanceOf(FatalResponseError);
    expect(calls()).toBe(1);
    expect(waits).toEqual([]);
  });

  it("retries a request timeout status", async () => {
    const { fetchFn } = scripted([408]);
    const { transport } = transportFor(fetchFn);

    await expect(transport.fetch(PAGE_URL)).resolves.toMatchObject({ attempts: 2 });
  });

  it("aborts an attempt that outlives the request timeout", async () => {
    let calls = 0;
    const fetchFn: FetchFn = (_url, init) => {
      calls += 1;
      if (calls > 1) {
        return Promise.resolve(fakeResponse(200, JSON.stringify({ response: { numFound: 0, docs: [] } })));
      }
      return new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    };
    const { transport, log } = transportFor(fetchFn, { requestTimeoutMs: 20 });

    const response = await transport.fetch(PAGE_URL);

    expect(response.attempts).toBe(2);
    expect(log.events("fetch_attempt_failed")[0]?.reason).toBe("timeout");
  });

  it("stops without a request when the caller has already cancelled", async () => {
    const api = new FakeArchiveApi(() => makeRecords(3));
    const { transport } = transportFor(api.fetch);
    const controller = new AbortController();
    controller.abort();

    await expect(transport.fetch(PAGE_URL, controller.signal)).rejects.toBeInstanceOf(HarvestInterruptedError);
    expect(api.requests).toHaveLength(0);
  });
});
