import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, loadConfig } from "../../src/config";
import { CommandContext, createApiClient } from "../../src/core/commands";
import { HarvestInterruptedError } from "../../src/core/errors";
import { FetchFn } from "../../src/core/fetch";
import { Sleeper } from "../../src/core/sleep";
import { Logger, LogWriter, MetricsRegistry } from "../../src/observability";
import { ApiClient } from "../../src/transport";

export type LogLine = Record<string, unknown>;

export interface CapturedLogger {
  logger: Logger;
  lines: LogLine[];
  events(msg: string): LogLine[];
}

export function captureLogger(): CapturedLogger {
  const lines: LogLine[] = [];
  const writer: LogWriter = {
    write(line: string): void {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === "object" && parsed !== null) {
        lines.push(Object.fromEntries(Object.entries(parsed)));
      }
    },
  };
  return {
    logger: new Logger({ component: "test", runId: "test-run" }, { level: "debug", writer }),
    lines,
    events: (msg) => lines.filter((line) => line.msg === msg),
  };
}

export interface RecordingSleep {
  sleep: Sleeper;
  waits: number[];
}

/** Records requested waits instead of sleeping; honours an aborted signal like the real sleeper. */
export function recordingSleep(): RecordingSleep {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms, signal) => {
      if (signal?.aborted) {
        throw new HarvestInterruptedError();
      }
      waits.push(ms);
    },
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig(undefined, {}), baseUrl: "https://archive.test/search/query", ...overrides };
}

export interface TestClient {
  client: ApiClient;
  metrics: MetricsRegistry;
  log: CapturedLogger;
  waits: number[];
  ctx: CommandContext;
}

export function testClient(config: AppConfig, fetchFn: FetchFn, signal?: AbortSignal): TestClient {
  const log = captureLogger();
  const metrics = new MetricsRegistry();
  const { sleep, waits } = recordingSleep();
  const ctx: CommandContext = { runId: "test-run", config, logger: log.logger, metrics, signal, fetchFn, sleep };
  return { client: createApiClient(ctx), metrics, log, waits, ctx };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "archive-harvest-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
