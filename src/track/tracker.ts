import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { ApiClient, JsonRecord } from "../transport";

export type TrackType = "series" | "function" | "agency" | "consignment";

export const TRACK_TYPES: readonly TrackType[] = ["series", "function", "agency", "consignment"];

const TYPE_QUERIES: Record<TrackType, string> = {
  series: "category:(Series)",
  function: "category:(Function)",
  agency: "category:(Agency)",
  consignment: "category:(Consignment)",
};

const IDENTIFIER_FIELD = "identifier.PROV_ACM.id";

export function parseTrackType(raw: string | undefined): TrackType | undefined {
  return TRACK_TYPES.find((type) => type === raw);
}

export function pluralOf(type: TrackType): string {
  if (type === "series") {
    return "series";
  }
  if (type === "agency") {
    return "agencies";
  }
  return `${type}s`;
}

export function defaultTrackOutputPath(type: TrackType, today = new Date()): string {
  return `prov-${pluralOf(type)}-${today.toISOString().slice(0, 10)}.json`;
}

/** Gives every record the union of all keys, in sorted order, with `null` where a record lacks one. */
export function normaliseKeys(records: readonly JsonRecord[]): JsonRecord[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  const sortedKeys = [...keys].sort();
  return records.map((record) => {
    const normalised: JsonRecord = {};
    for (const key of sortedKeys) {
      normalised[key] = key in record ? record[key] : null;
    }
    return normalised;
  });
}

interface IdentifierSortKey {
  prefix: string;
  number: number;
  suffix: string;
}

/** `"VPRS 12/P3"` sorts as `("VPRS", 12, "P3")`; identifiers without a number sort after numbered ones. */
export function identifierSortKey(record: JsonRecord): IdentifierSortKey {
  const raw = record[IDENTIFIER_FIELD];
  const id = typeof raw === "string" ? raw : "";
  const spaceIndex = id.indexOf(" ");
  if (spaceIndex < 0) {
    return { prefix: id.toUpperCase(), number: Number.POSITIVE_INFINITY, suffix: "" };
  }

  const [numberPart, ...rest] = id.slice(spaceIndex + 1).split("/");
  const parsed = /^\s*[+-]?\d+\s*$/.test(numberPart) ? Number.parseInt(numberPart, 10) : Number.POSITIVE_INFINITY;
  return {
    prefix: id.slice(0, spaceIndex).toUpperCase(),
    number: parsed,
    suffix: rest.length > 0 ? rest[0].toUpperCase() : "",
  };
}

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function compareByIdentifier(a: JsonRecord, b: JsonRecord): number {
  const left = identifierSortKey(a);
  const right = identifierSortKey(b);
  const byPrefix = compareText(left.prefix, right.prefix);
  if (byPrefix !== 0) {
    return byPrefix;
  }
  if (left.number !== right.number) {
    return left.number < right.number ? -1 : 1;
  }
  return compareText(left.suffix, right.suffix);
}

export interface TrackDeps {
  config: AppConfig;
  logger: Logger;
  client: ApiClient;
  signal?: AbortSignal;
}

export interface TrackOptions {
  type: TrackType;
  outputPath?: string;
}

export interface TrackSummary {
  type: TrackType;
  outputPath: string;
  records: number;
}

/** Snapshot of one record category, written as sorted, key-normalised, pretty-printed JSON. */
export async function runTrack(deps: TrackDeps, options: TrackOptions): Promise<TrackSummary> {
  const { config, logger, client, signal } = deps;
  const query = TYPE_QUERIES[options.type];
  logger.info("track_fetch_start", { type: options.type, query });

  const records = await client.fetchAll({ query, rows: config.rows }, signal);
  logger.info("track_fetch_complete", { type: options.type, records: records.length });

  const output = normaliseKeys(records).sort(compareByIdentifier);
  const outputPath = options.outputPath ?? defaultTrackOutputPath(options.type);
  const tempPath = `${outputPath}.part`;
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(tempPath, `${JSON.stringify(output, null, 2)}\n`, "utf-8");
  fs.renameSync(tempPath, outputPath);

  logger.info("track_written", { type: options.type, outputPath, records: output.length });
  return { type: options.type, outputPath, records: output.length };
}
