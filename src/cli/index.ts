import { Readable } from "node:stream";
import { CompressionFlag, parseCompressionFlag } from "../artifact";
import { loadConfig } from "../config";
import {
  CommandContext,
  OutputWriter,
  runHarvestCommand,
  runStatsCommand,
  runStatusCommand,
  runTrackCommand,
} from "../core/commands";
import { EXIT_FAILED, EXIT_OK, HarvestError, errorMessage, exitCodeFor } from "../core/errors";
import { FetchFn } from "../core/fetch";
import { Sleeper } from "../core/sleep";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { SeriesPassOptions } from "../planner";
import { createStore, RunStore } from "../store";
import { TrackType, parseTrackType } from "../track";

export const VERSION = "0.8.0";

export type CommandName = "harvest" | "track" | "stats" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  query?: string;
  rows?: number;
  sort?: string;
  output?: string;
  resume: boolean;
  compress: boolean;
  seriesBatches: boolean;
  iiif: boolean;
  seriesFrom?: number;
  seriesTo?: number;
  includeRelated: boolean;
  type?: TrackType;
  input?: string;
  compression: CompressionFlag;
  includeAgencies: boolean;
  limit: number;
  debug: boolean;
}

export interface CliIo {
  stdout?: OutputWriter;
  stdin?: Readable;
  fetchFn?: FetchFn;
  sleep?: Sleeper;
  env?: NodeJS.ProcessEnv;
  createStore?: () => RunStore;
}

const HELP_TEXT = `
Usage:
  archive-harvest <command> [options]

Commands:
  harvest   Stream every matching record into a JSON array file
  track     Snapshot one record category (series, function, agency, consignment)
  stats     Aggregate statistics from a harvested JSON array
  status    List recent harvest and track runs

Options:
  --config <path>        Optional path to JSON config file
  --query <q>            Query for a plain harvest (default: *:*)
  --rows <n>             Records per request
  --sort <s>             Sort order for paging
  --output <path>        Output file (harvest default: output.json / output.json.gz)
  --resume               Continue an interrupted harvest from <output>.part
  --compress             Write gzip-compressed output
  --series-batches       Harvest functions/agencies, then series in batches, then related entities
  --iiif                 Restrict series batches to records with an IIIF manifest
  --series-from <n>      Lowest series id to harvest in series-batch mode
  --series-to <n>        Highest series id to harvest in series-batch mode
  --include-related      Harvest related entities even when a series range is given
  --type <type>          Record category for track
  --input <path>         Stats input file (default: stdin)
  --compression <mode>   Stats input compression: auto, gzip or none (default: auto)
  --no-agencies          Leave the agency listing out of the stats report
  --limit <n>            Number of runs listed by status (default: 20)
  --debug                Log debug events
  --version              Show the version number
  -h, --help             Show this help

Stats report:
  Agency records add to the overall year histogram but to no series or agency years.
  Records without a series count in the overall figures only.
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "harvest" || raw === "track" || raw === "stats" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

function positiveIntOption(argv: string[], name: string): number | undefined {
  const value = intOption(argv, name);
  if (value !== undefined && value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" | "version" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }
  if (argv.includes("--version")) {
    return "version";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    query: optionValue(argv, "--query"),
    rows: positiveIntOption(argv, "--rows"),
    sort: optionValue(argv, "--sort"),
    output: optionValue(argv, "--output"),
    resume: argv.includes("--resume"),
    compress: argv.includes("--compress"),
    seriesBatches: argv.includes("--series-batches"),
    iiif: argv.includes("--iiif"),
    seriesFrom: intOption(argv, "--series-from"),
    seriesTo: intOption(argv, "--series-to"),
    includeRelated: argv.includes("--include-related"),
    type: parseTrackType(optionValue(argv, "--type")),
    input: optionValue(argv, "--input"),
    compression: parseCompressionFlag(optionValue(argv, "--compression")) ?? "auto",
    includeAgencies: !argv.includes("--no-agencies"),
    limit: intOption(argv, "--limit") ?? 20,
    debug: argv.includes("--debug"),
  };
}

function seriesPassOptions(parsed: ParsedCliArgs): SeriesPassOptions | undefined {
  if (!parsed.seriesBatches) {
    return undefined;
  }
  return {
    iiifOnly: parsed.iiif,
    seriesFrom: parsed.seriesFrom,
    seriesTo: parsed.seriesTo,
    includeRelated: parsed.includeRelated,
  };
}

interface CommandStreams {
  stdout: OutputWriter;
  stdin: Readable;
}

async function dispatch(
  parsed: ParsedCliArgs,
  ctx: CommandContext,
  streams: CommandStreams,
  openStore: () => RunStore,
): Promise<void> {
  switch (parsed.command) {
    case "stats":
      await runStatsCommand(
        { ...ctx, logger: ctx.logger.child("stats") },
        { inputPath: parsed.input, compression: parsed.compression, includeAgencies: parsed.includeAgencies },
        streams.stdin,
        streams.stdout,
      );
      return;
    case "harvest":
    case "track":
    case "status": {
      const store = openStore();
      try {
        if (parsed.command === "harvest") {
          await runHarvestCommand({ ...ctx, logger: ctx.logger.child("harvest") }, store, {
            query: parsed.query,
            rows: parsed.rows,
            sort: parsed.sort,
            outputPath: parsed.output,
            resume: parsed.resume,
            compress: parsed.compress,
            seriesBatches: seriesPassOptions(parsed),
          });
        } else if (parsed.command === "track") {
          if (!parsed.type) {
            throw new Error("track requires --type series|function|agency|consignment");
          }
          await runTrackCommand({ ...ctx, logger: ctx.logger.child("track") }, store, {
            type: parsed.type,
            outputPath: parsed.output,
          });
        } else {
          await runStatusCommand({ ...ctx, logger: ctx.logger.child("status") }, store, parsed.limit, streams.stdout);
        }
      } finally {
        await store.close();
      }
      return;
    }
  }
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const stdout: OutputWriter = io.stdout ?? process.stdout;
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    stdout.write(`${HELP_TEXT.trim()}\n`);
    return EXIT_OK;
  }
  if (parsed === "version") {
    stdout.write(`archive-harvest ${VERSION}\n`);
    return EXIT_OK;
  }

  const config = loadConfig(parsed.configPath, io.env ?? process.env);
  const runId = createRunId(parsed.command);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId }, { level: parsed.debug ? "debug" : config.logLevel });
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("interrupt_received");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const ctx: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    signal: controller.signal,
    fetchFn: io.fetchFn,
    sleep: io.sleep,
  };

  logger.info("command_start", { command: parsed.command, resume: parsed.resume, debug: parsed.debug });

  try {
    await dispatch(
      parsed,
      ctx,
      { stdout, stdin: io.stdin ?? process.stdin },
      io.createStore ?? (() => createStore(config)),
    );
    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logger.error("command_failed", {
      command: parsed.command,
      code: error instanceof HarvestError ? error.code : undefined,
      error: errorMessage(error),
      exitCode,
    });
    process.stderr.write(`${exitCode === EXIT_FAILED ? "error" : "stopped"}: ${errorMessage(error)}\n`);
    return exitCode;
  } finally {
    process.removeListener("SIGINT", onSigint);
    metrics.logSummary(logger);
  }
}
