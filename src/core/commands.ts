import fs from "node:fs";
import { Readable } from "node:stream";
import { CompressionFlag, defaultOutputPath, resolveCompression } from "../artifact";
import { AppConfig, Compression } from "../config";
import { HarvestMode, HarvestSummary, runHarvest } from "../harvest";
import { Logger, MetricsRegistry } from "../observability";
import { SeriesPassOptions } from "../planner";
import { ProgressStore } from "../progress";
import { aggregateStream, renderReport } from "../stats";
import { RunCommand, RunStore } from "../store";
import { TrackSummary, TrackType, runTrack } from "../track";
import { ApiClient, HttpTransport, RateGovernor } from "../transport";
import { HarvestError, errorMessage } from "./errors";
import { FetchFn } from "./fetch";
import { Sleeper } from "./sleep";

export interface OutputWriter {
  write(text: string): void;
}

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  signal?: AbortSignal;
  fetchFn?: FetchFn;
  sleep?: Sleeper;
}

export interface HarvestCommandOptions {
  query?: string;
  rows?: number;
  sort?: string;
  outputPath?: string;
  resume: boolean;
  compress: boolean;
  seriesBatches?: SeriesPassOptions;
}

export interface StatsCommandOptions {
  inputPath?: string;
  compression: CompressionFlag;
  includeAgencies: boolean;
}

export function createApiClient(ctx: CommandContext): ApiClient {
  const transport = new HttpTransport({
    config: ctx.config,
    logger: ctx.logger.child("transport"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
  });
  const governor = new RateGovernor({
    config: ctx.config,
    logger: ctx.logger.child("rate_governor"),
    metrics: ctx.metrics,
    sleep: ctx.sleep,
  });
  return new ApiClient({ config: ctx.config, metrics: ctx.metrics, transport, governor });
}

/** `--compress` forces gzip; otherwise the configured compression also picks the default file name. */
export function harvestTarget(
  config: AppConfig,
  options: Pick<HarvestCommandOptions, "outputPath" | "compress">,
): { outputPath: string; compression: Compression } {
  const compression: Compression = options.compress ? "gzip" : config.compression;
  return { outputPath: options.outputPath ?? defaultOutputPath(compression === "gzip"), compression };
}

async function recordRun<T>(
  ctx: CommandContext,
  store: RunStore,
  command: RunCommand,
  target: string,
  work: () => Promise<T>,
  counts: (result: T) => { records?: number; pages?: number; bytes?: number },
): Promise<T> {
  await store.startRun({ runId: ctx.runId, command, target, startedAt: new Date().toISOString() });
  try {
    const result = await work();
    await store.finishRun(ctx.runId, { status: "completed", finishedAt: new Date().toISOString(), ...counts(result) });
    return result;
  } catch (error) {
    const interrupted = error instanceof HarvestError && error.code === "INTERRUPTED";
    await store.finishRun(ctx.runId, {
      status: interrupted ? "interrupted" : "failed",
      finishedAt: new Date().toISOString(),
      error: errorMessage(error),
    });
    throw error;
  }
}

export async function runHarvestCommand(
  ctx: CommandContext,
  store: RunStore,
  options: HarvestCommandOptions,
): Promise<HarvestSummary> {
  const config = ctx.config;
  const { outputPath, compression } = harvestTarget(config, options);
  const mode: HarvestMode = options.seriesBatches
    ? { kind: "series_batches", options: options.seriesBatches }
    : { kind: "query", query: options.query ?? config.query };

  ctx.logger.info("harvest_start", {
    outputPath,
    mode: mode.kind,
    query: mode.kind === "query" ? mode.query : undefined,
    resume: options.resume,
  });

  return recordRun(
    ctx,
    store,
    "harvest",
    outputPath,
    () =>
      runHarvest(
        {
          config,
          logger: ctx.logger,
          metrics: ctx.metrics,
          client: createApiClient(ctx),
          progressStore: new ProgressStore(ctx.logger.child("progress")),
          signal: ctx.signal,
        },
        {
          outputPath,
          resume: options.resume,
          compression,
          rows: options.rows ?? config.rows,
          sort: options.sort ?? config.sort,
          mode,
        },
      ),
    (summary) => ({ records: summary.totalRecords, pages: summary.pagesFetched, bytes: summary.cumulativeBytes }),
  );
}

export async function runTrackCommand(
  ctx: CommandContext,
  store: RunStore,
  options: { type: TrackType; outputPath?: string },
): Promise<TrackSummary> {
  return recordRun(
    ctx,
    store,
    "track",
    options.type,
    () => runTrack({ config: ctx.config, logger: ctx.logger, client: createApiClient(ctx), signal: ctx.signal }, options),
    (summary) => ({ records: summary.records }),
  );
}

export async function runStatsCommand(
  ctx: CommandContext,
  options: StatsCommandOptions,
  stdin: Readable,
  out: OutputWriter,
): Promise<void> {
  const { inputPath } = options;
  if (inputPath !== undefined && !fs.existsSync(inputPath)) {
    throw new Error(`The file '${inputPath}' does not exist.`);
  }

  const compression = resolveCompression(options.compression, inputPath);
  const source = inputPath !== undefined ? fs.createReadStream(inputPath) : stdin;
  ctx.logger.info("stats_start", { input: inputPath ?? "stdin", compression });

  const report = await aggregateStream(source, {
    compression,
    includeAgencies: options.includeAgencies,
    logger: ctx.logger,
  });
  out.write(`${renderReport(report)}\n`);
  ctx.logger.info("stats_complete", { objects: report.overall.objects, series: report.series.length });
}

export async function runStatusCommand(ctx: CommandContext, store: RunStore, limit: number, out: OutputWriter): Promise<void> {
  const runs = await store.listRuns(limit);
  ctx.logger.info("status_complete", { runs: runs.length });
  out.write(`${JSON.stringify(runs, null, 2)}\n`);
}
