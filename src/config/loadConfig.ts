import fs from "node:fs";
import path from "node:path";
import { parseLogLevel } from "../observability";
import { AppConfig, Compression, ConfigOverrides, configOverridesSchema } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://api.prov.vic.gov.au/search/query",
  userAgent: "archive-harvest/0.8 (+https://github.com/archive-harvest)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 60_000,
  maxConsecutiveFailures: 6,
  retryBaseWaitMs: 63_000,
  pageWaitMs: 6_000,
  rateLimitHeader: "x-ratelimit-remaining-minute",
  lowRemainingThreshold: 20,
  lowRemainingPauseMs: 2_000,
  rows: 1000,
  sort: "identifier.PROV_ACM.id asc",
  query: "*:*",
  compression: "none",
  seriesBatches: {
    maxRecordsPerBatch: 100_000,
    maxSeriesPerBatch: 50,
    seriesField: "series_id",
    parentField: "is_part_of_series.id",
    seriesTag: "VPRS",
    iiifFilter: "iiif-manifest:[* TO *]",
    metaQuery: "category:(Function OR Agency)",
    relatedQuery: "category:relatedEntity",
    discrepancyMinRecords: 10,
    discrepancyRatio: 0.05,
  },
  storePath: "data/harvest-runs.sqlite",
  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Config file is not valid JSON: ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = configOverridesSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toCompression(value: string | undefined, fallback: Compression): Compression {
  return value === "gzip" || value === "none" ? value : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    seriesBatches: {
      ...DEFAULT_CONFIG.seriesBatches,
      ...(fileConfig.seriesBatches ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxConsecutiveFailures: toInt(env.MAX_CONSECUTIVE_FAILURES, merged.maxConsecutiveFailures),
    retryBaseWaitMs: toInt(env.RETRY_BASE_WAIT_MS, merged.retryBaseWaitMs),
    pageWaitMs: toInt(env.PAGE_WAIT_MS, merged.pageWaitMs),
    rows: toInt(env.HARVEST_ROWS, merged.rows),
    query: env.HARVEST_QUERY ?? merged.query,
    sort: env.HARVEST_SORT ?? merged.sort,
    compression: toCompression(env.HARVEST_COMPRESSION, merged.compression),
    storePath: env.STORE_PATH ?? merged.storePath,
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? merged.logLevel,
  };
}

export { DEFAULT_CONFIG };
