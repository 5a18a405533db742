import fs from "node:fs";
import { JsonArrayWriter, countArtifactRecords, inProgressPath } from "../artifact";
import { AppConfig, Compression } from "../config";
import {
  AlreadyExistsError,
  CannotResumeError,
  ExhaustedRetriesError,
  HarvestInterruptedError,
  errorMessage,
} from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { SeriesPassOptions, planSeriesPasses } from "../planner";
import { HarvestPass, HarvestPlan, HarvestProgress, ProgressStore } from "../progress";
import { ApiClient, PageResult } from "../transport";
import { isDiscrepant } from "./discrepancy";
import { HarvestStateMachine } from "./stateMachine";

export type HarvestMode =
  | { kind: "query"; query: string }
  | { kind: "series_batches"; options: SeriesPassOptions };

export interface HarvestOptions {
  outputPath: string;
  resume: boolean;
  compression: Compression;
  rows: number;
  sort: string;
  mode: HarvestMode;
}

export interface HarvesterDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  client: ApiClient;
  progressStore: ProgressStore;
  signal?: AbortSignal;
}

export interface HarvestSummary {
  outputPath: string;
  pagesFetched: number;
  recordsFetched: number;
  totalRecords: number;
  cumulativeBytes: number;
  resumedFromRecord: number | null;
  discrepancies: number;
}

interface HarvestSession {
  writer: JsonArrayWriter;
  progress: HarvestProgress;
}

function initialProgress(plan: HarvestPlan, artifactBytes: number): HarvestProgress {
  return {
    version: 1,
    nextOffset: 0,
    cumulativeBytes: 0,
    knownTotal: null,
    passIndex: 0,
    passRecords: 0,
    recordsWritten: 0,
    artifactBytes,
    plan,
    updatedAt: new Date().toISOString(),
  };
}

function queryPlan(options: HarvestOptions, query: string): HarvestPlan {
  return {
    rows: options.rows,
    sort: options.sort,
    compression: options.compression,
    passes: [{ label: "query", query, estimate: null }],
  };
}

async function buildPlan(deps: HarvesterDeps, options: HarvestOptions): Promise<HarvestPlan> {
  if (options.mode.kind === "query") {
    return queryPlan(options, options.mode.query);
  }

  const { passes } = await planSeriesPasses(
    {
      client: deps.client,
      settings: deps.config.seriesBatches,
      rows: options.rows,
      logger: deps.logger.child("planner"),
      metrics: deps.metrics,
    },
    options.mode.options,
    deps.signal,
  );
  return { rows: options.rows, sort: options.sort, compression: options.compression, passes };
}

async function startFresh(deps: HarvesterDeps, options: HarvestOptions, partPath: string): Promise<HarvestSession> {
  const plan = await buildPlan(deps, options);
  if (fs.existsSync(partPath)) {
    deps.logger.warn("harvest_in_progress_artifact_replaced", { path: partPath });
  }

  const writer = JsonArrayWriter.create(partPath, plan.compression);
  const progress = initialProgress(plan, writer.artifactBytes);
  deps.progressStore.save(partPath, progress);
  deps.logger.info("harvest_artifact_created", { path: partPath, passes: plan.passes.length, compression: plan.compression });
  return { writer, progress };
}

type ResumePoint = { kind: "checkpoint"; progress: HarvestProgress } | { kind: "derive"; query: string };

function findResumePoint(deps: HarvesterDeps, options: HarvestOptions, partPath: string): ResumePoint {
  const stored = deps.progressStore.load(partPath);
  if (stored) {
    return { kind: "checkpoint", progress: stored };
  }
  if (options.mode.kind !== "query") {
    throw new CannotResumeError(`no usable checkpoint for ${partPath}; a series-batch harvest cannot be resumed without its plan`);
  }
  return { kind: "derive", query: options.mode.query };
}

async function countOrFail(partPath: string, compression: Compression): Promise<number> {
  try {
    return await countArtifactRecords(partPath, compression);
  } catch (error) {
    throw new CannotResumeError(`${partPath} does not hold a readable record sequence: ${errorMessage(error)}`);
  }
}

async function resumeSession(deps: HarvesterDeps, options: HarvestOptions, partPath: string): Promise<HarvestSession> {
  if (!fs.existsSync(partPath)) {
    throw new CannotResumeError(`no in-progress artifact at ${partPath}`);
  }

  const point = findResumePoint(deps, options, partPath);
  if (point.kind === "derive") {
    // Without a checkpoint the artifact itself is the only record of progress.
    const plan = queryPlan(options, point.query);
    const count = await countOrFail(partPath, plan.compression);
    const artifactBytes = fs.statSync(partPath).size;
    deps.logger.warn("harvest_checkpoint_missing_derived", { path: partPath, records: count });
    const progress: HarvestProgress = {
      ...initialProgress(plan, artifactBytes),
      nextOffset: count,
      passRecords: count,
      recordsWritten: count,
    };
    return { writer: JsonArrayWriter.reopen(partPath, plan.compression, progress), progress };
  }

  const { progress } = point;
  if (progress.plan.compression !== options.compression) {
    deps.logger.warn("harvest_resume_compression_from_checkpoint", { compression: progress.plan.compression });
  }

  let writer: JsonArrayWriter;
  try {
    writer = JsonArrayWriter.reopen(partPath, progress.plan.compression, progress);
  } catch (error) {
    throw new CannotResumeError(errorMessage(error));
  }

  const count = await countOrFail(partPath, progress.plan.compression);
  if (count !== progress.recordsWritten) {
    writer.close();
    throw new CannotResumeError(
      `${partPath} holds ${count} records but its checkpoint records ${progress.recordsWritten}`,
    );
  }
  return { writer, progress };
}

function advance(progress: HarvestProgress, page: PageResult, writer: JsonArrayWriter, passDone: boolean): HarvestProgress {
  const shared = {
    cumulativeBytes: progress.cumulativeBytes + page.byteLength,
    recordsWritten: writer.recordsWritten,
    artifactBytes: writer.artifactBytes,
    updatedAt: new Date().toISOString(),
  };
  if (passDone) {
    return { ...progress, ...shared, passIndex: progress.passIndex + 1, nextOffset: 0, passRecords: 0, knownTotal: null };
  }
  return {
    ...progress,
    ...shared,
    nextOffset: progress.nextOffset + page.docs.length,
    passRecords: progress.passRecords + page.docs.length,
    knownTotal: page.numFound,
  };
}

/**
 * Harvests every pass of the plan into `<output>.part`, checkpointing after each durable page
 * write, then closes the array and renames the artifact to `outputPath`.
 */
export async function runHarvest(deps: HarvesterDeps, options: HarvestOptions): Promise<HarvestSummary> {
  const { logger, metrics, client, progressStore, signal } = deps;
  const machine = new HarvestStateMachine();
  const outputPath = options.outputPath;
  const partPath = inProgressPath(outputPath);

  if (fs.existsSync(outputPath)) {
    throw new AlreadyExistsError(outputPath);
  }

  let session: HarvestSession;
  if (options.resume) {
    machine.transition("resuming");
    session = await resumeSession(deps, options, partPath);
    logger.info("harvest_resuming", {
      path: partPath,
      records: session.progress.recordsWritten,
      passIndex: session.progress.passIndex,
      offset: session.progress.nextOffset,
    });
  } else {
    session = await startFresh(deps, options, partPath);
  }
  machine.transition("paginating");

  const { writer } = session;
  const plan = session.progress.plan;
  const resumedFromRecord = options.resume ? session.progress.recordsWritten : null;
  const startedAt = Date.now();
  let progress = session.progress;
  let pagesFetched = 0;
  let recordsFetched = 0;
  let discrepancies = 0;

  try {
    while (progress.passIndex < plan.passes.length) {
      if (signal?.aborted) {
        throw new HarvestInterruptedError(partPath);
      }

      const pass: HarvestPass = plan.passes[progress.passIndex];
      const isLastPass = progress.passIndex === plan.passes.length - 1;
      if (progress.nextOffset === 0) {
        logger.info("harvest_pass_start", { pass: pass.label, query: pass.query, estimate: pass.estimate });
      }

      const fetchStartedAt = Date.now();
      const page = await client.fetchPage(
        { query: pass.query, rows: plan.rows, sort: plan.sort, start: progress.nextOffset },
        signal,
      );
      const fetchMs = Date.now() - fetchStartedAt;

      writer.appendRecords(page.docs);
      pagesFetched += 1;
      recordsFetched += page.docs.length;
      metrics.incrementCounter("records_written", page.docs.length);

      const reachedOffset = progress.nextOffset + page.docs.length;
      const passRecords = progress.passRecords + page.docs.length;
      const stalled = page.docs.length === 0 && reachedOffset < page.numFound;
      if (stalled) {
        logger.warn("harvest_empty_page_before_total", { pass: pass.label, offset: reachedOffset, total: page.numFound });
      }
      const passDone = stalled || reachedOffset >= page.numFound;

      if (passDone && pass.estimate !== null && isDiscrepant(pass.estimate, passRecords, deps.config.seriesBatches)) {
        discrepancies += 1;
        metrics.incrementCounter("batch_discrepancies", 1);
        logger.warn("harvest_batch_count_discrepancy", {
          pass: pass.label,
          estimate: pass.estimate,
          actual: passRecords,
        });
      }

      progress = advance(progress, page, writer, passDone);
      progressStore.save(partPath, progress);

      const elapsedSeconds = (Date.now() - startedAt) / 1000;
      logger.info("harvest_page_complete", {
        pass: pass.label,
        fetched: page.docs.length,
        offset: reachedOffset,
        total: page.numFound,
        fetchMs,
        rowsPerSecond: elapsedSeconds > 0 ? Number((recordsFetched / elapsedSeconds).toFixed(2)) : 0,
        bytes: page.byteLength,
        totalBytes: progress.cumulativeBytes,
      });
      if (passDone) {
        logger.info("harvest_pass_complete", { pass: pass.label, records: passRecords });
      }

      if (!(passDone && isLastPass)) {
        await client.throttle(page.headers, signal);
      }
    }
  } catch (error) {
    writer.close();
    if (error instanceof HarvestInterruptedError) {
      throw error.artifactPath ? error : new HarvestInterruptedError(partPath);
    }
    if (error instanceof ExhaustedRetriesError) {
      logger.error("harvest_stopped_resumable", { path: partPath, records: progress.recordsWritten });
    }
    throw error;
  }

  machine.transition("finalizing");
  if (fs.existsSync(outputPath)) {
    writer.close();
    throw new AlreadyExistsError(outputPath);
  }
  writer.finish();
  fs.renameSync(partPath, outputPath);
  progressStore.clear(partPath);
  machine.transition("complete");

  const summary: HarvestSummary = {
    outputPath,
    pagesFetched,
    recordsFetched,
    totalRecords: writer.recordsWritten,
    cumulativeBytes: progress.cumulativeBytes,
    resumedFromRecord,
    discrepancies,
  };
  logger.info("harvest_complete", { ...summary });
  return summary;
}
