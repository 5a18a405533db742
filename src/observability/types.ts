export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  query?: string;
  offset?: number;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "records_written"
  | "fetch_failures"
  | "batch_discrepancies"
  | "facet_entries_skipped";

export type MetricTimerName = "page_fetch_ms" | "throttle_ms";
