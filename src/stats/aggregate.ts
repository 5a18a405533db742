import { Readable } from "node:stream";
import { readJsonArray } from "../artifact";
import { Compression } from "../config";
import { Logger } from "../observability";
import { StatsAccumulator } from "./accumulator";
import { buildReport } from "./report";
import { StatsReport } from "./types";

export interface AggregateOptions {
  compression: Compression;
  includeAgencies: boolean;
  logger?: Logger;
  progressEvery?: number;
}

/** One forward pass over a JSON array of records, then the report. */
export async function aggregateStream(source: Readable, options: AggregateOptions): Promise<StatsReport> {
  const accumulator = new StatsAccumulator();
  const progressEvery = options.progressEvery ?? 10_000;

  await readJsonArray(source, { compression: options.compression }, (record) => {
    accumulator.add(record);
    if (accumulator.objects % progressEvery === 0) {
      options.logger?.info("stats_progress", { objects: accumulator.objects });
    }
  });

  options.logger?.info("stats_input_complete", { objects: accumulator.objects });
  return buildReport(accumulator, { includeAgencies: options.includeAgencies });
}
