import { z } from "zod";
import { LogLevel } from "../observability";

export type Compression = "none" | "gzip";

export interface SeriesBatchSettings {
  maxRecordsPerBatch: number;
  maxSeriesPerBatch: number;
  seriesField: string;
  parentField: string;
  seriesTag: string;
  iiifFilter: string;
  metaQuery: string;
  relatedQuery: string;
  discrepancyMinRecords: number;
  discrepancyRatio: number;
}

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxConsecutiveFailures: number;
  retryBaseWaitMs: number;
  pageWaitMs: number;
  rateLimitHeader: string;
  lowRemainingThreshold: number;
  lowRemainingPauseMs: number;
  rows: number;
  sort: string;
  query: string;
  compression: Compression;
  seriesBatches: SeriesBatchSettings;
  storePath: string;
  logLevel: LogLevel;
}

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const seriesBatchOverridesSchema = z
  .object({
    maxRecordsPerBatch: positiveInt,
    maxSeriesPerBatch: positiveInt,
    seriesField: z.string().min(1),
    parentField: z.string().min(1),
    seriesTag: z.string().regex(/^[A-Za-z]+$/, "series tag must be letters only"),
    iiifFilter: z.string().min(1),
    metaQuery: z.string().min(1),
    relatedQuery: z.string().min(1),
    discrepancyMinRecords: nonNegativeInt,
    discrepancyRatio: z.number().min(0),
  })
  .partial()
  .strict();

export const configOverridesSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: positiveInt,
    maxConsecutiveFailures: positiveInt,
    retryBaseWaitMs: nonNegativeInt,
    pageWaitMs: nonNegativeInt,
    rateLimitHeader: z.string().min(1),
    lowRemainingThreshold: nonNegativeInt,
    lowRemainingPauseMs: nonNegativeInt,
    rows: positiveInt,
    sort: z.string().min(1),
    query: z.string().min(1),
    compression: z.enum(["none", "gzip"]),
    seriesBatches: seriesBatchOverridesSchema,
    storePath: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;
