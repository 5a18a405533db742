/**
 * CLI Tests
 *
 * Argument parsing plus whole commands run through runCli with an in-process API,
 * in-memory run ledger and captured stdout.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { parseCliArgs, runCli, VERSION } from "../src/cli";
import { loadConfig } from "../src/config";
import { OutputWriter, harvestTarget } from "../src/core/commands";
import { InMemoryRunStore } from "../src/store";
import { makeTempDir, recordingSleep, removeDir } from "./helpers/context";
import { FakeArchiveApi, makeRecords } from "./helpers/fakeApi";

const ENV = { BASE_URL: "https://archive.test/search/query", LOG_LEVEL: "error", STORE_PATH: ":memory:" };

function captureOutput(): OutputWriter & { text: () => string } {
  const chunks: string[] = [];
  return {
    write: (text: string) => {
      chunks.push(text);
    },
    text: () => chunks.join(""),
  };
}

describe("parseCliArgs", () => {
  it("reads harvest options", () => {
    const parsed = parseCliArgs([
      "harvest",
      "--rows",
      "500",
      "--compress",
      "--series-batches",
      "--series-from",
      "10",
      "--output",
      "records.json.gz",
    ]);

    expect(parsed).toMatchObject({
      command: "harvest",
      rows: 500,
      compress: true,
      resume: false,
      seriesBatches: true,
      iiif: false,
      seriesFrom: 10,
      seriesTo: undefined,
      includeRelated: false,
      output: "records.json.gz",
      compression: "auto",
      includeAgencies: true,
      limit: 20,
    });
  });

  it("reads stats and track options", () => {
    expect(parseCliArgs(["stats", "--input", "in.json", "--compression", "gzip", "--no-agencies"])).toMatchObject({
      command: "stats",
      input: "in.json",
      compression: "gzip",
      includeAgencies: false,
    });
    expect(parseCliArgs(["track", "--type", "agency"])).toMatchObject({ command: "track", type: "agency" });
  });

  it("falls back to help and version", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["harvest", "-h"])).toBe("help");
    expect(parseCliArgs(["--version"])).toBe("version");
  });

  it("rejects a page size below one", () => {
    expect(() => parseCliArgs(["harvest", "--rows", "0"])).toThrow("--rows must be a positive integer, got 0");
    expect(() => parseCliArgs(["harvest", "--rows", "-5"])).toThrow("--rows must be a positive integer, got -5");
    expect(parseCliArgs(["harvest", "--rows", "1"])).toMatchObject({ rows: 1 });
  });
});

describe("harvestTarget", () => {
  const config = loadConfig(undefined, {});

  it("names the default output after the configured compression", () => {
    expect(harvestTarget({ ...config, compression: "gzip" }, { compress: false })).toEqual({
      outputPath: "output.json.gz",
      compression: "gzip",
    });
    expect(harvestTarget(config, { compress: false })).toEqual({ outputPath: "output.json", compression: "none" });
  });

  it("lets --compress and --output override the configuration", () => {
    expect(harvestTarget(config, { compress: true })).toEqual({ outputPath: "output.json.gz", compression: "gzip" });
    expect(harvestTarget(config, { compress: true, outputPath: "records.json" })).toEqual({
      outputPath: "records.json",
      compression: "gzip",
    });
  });
});

describe("runCli", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("prints help and the version", async () => {
    const help = captureOutput();
    const version = captureOutput();

    expect(await runCli(["--help"], { stdout: help })).toBe(0);
    expect(await runCli(["--version"], { stdout: version })).toBe(0);
    expect(help.text().startsWith("Usage:\n  archive-harvest <command> [options]")).toBe(true);
    expect(help.text()).toContain(
      "  Agency records add to the overall year histogram but to no series or agency years.\n",
    );
    expect(version.text()).toBe(`archive-harvest ${VERSION}\n`);
  });

  it("harvests, then reports the run in status and refuses to overwrite", async () => {
    const api = new FakeArchiveApi(() => makeRecords(3));
    const store = new InMemoryRunStore();
    const { sleep } = recordingSleep();
    const output = path.join(dir, "records.json");
    const io = { env: ENV, fetchFn: api.fetch, sleep, createStore: () => store };

    const harvestCode = await runCli(["harvest", "--output", output, "--rows", "2"], { ...io, stdout: captureOutput() });

    expect(harvestCode).toBe(0);
    expect(JSON.parse(fs.readFileSync(output, "utf-8"))).toEqual(makeRecords(3));

    const status = captureOutput();
    expect(await runCli(["status"], { ...io, stdout: status })).toBe(0);
    const runs: unknown = JSON.parse(status.text());
    expect(runs).toMatchObject([{ command: "harvest", target: output, status: "completed", records: 3, pages: 2 }]);

    expect(await runCli(["harvest", "--output", output], { ...io, stdout: captureOutput() })).toBe(1);
    const failed = (await store.listRuns(10)).filter((run) => run.status === "failed");
    expect(failed).toHaveLength(1);
    expect(failed[0]?.error).toBe(`Output file already exists: ${output}`);
  });

  it("fails a resume with nothing to resume before any request", async () => {
    const api = new FakeArchiveApi(() => makeRecords(3));
    const { sleep } = recordingSleep();

    const code = await runCli(["harvest", "--resume", "--output", path.join(dir, "records.json")], {
      env: ENV,
      fetchFn: api.fetch,
      sleep,
      createStore: () => new InMemoryRunStore(),
      stdout: captureOutput(),
    });

    expect(code).toBe(1);
    expect(api.requests).toHaveLength(0);
  });

  it("prints stats for stdin as one JSON document", async () => {
    const stdout = captureOutput();
    const stdin = Readable.from([Buffer.from(JSON.stringify([{ category: "Item", series_id: "5" }]))]);

    const code = await runCli(["stats", "--no-agencies"], { env: ENV, stdin, stdout });

    expect(code).toBe(0);
    expect(stdout.text().endsWith("}\n")).toBe(true);
    expect(JSON.parse(stdout.text())).toMatchObject({
      overall: { categories: { Item: 1 }, objects: 1 },
      series: [{ id: "5", items: 1 }],
    });
    expect(JSON.parse(stdout.text())).not.toHaveProperty("agencies");
  });

  it("fails stats for a missing input file", async () => {
    const stdout = captureOutput();

    const code = await runCli(["stats", "--input", path.join(dir, "absent.json")], { env: ENV, stdout });

    expect(code).toBe(1);
    expect(stdout.text()).toBe("");
  });

  it("requires a category for track", async () => {
    const code = await runCli(["track"], {
      env: ENV,
      createStore: () => new InMemoryRunStore(),
      stdout: captureOutput(),
    });

    expect(code).toBe(1);
  });
});
