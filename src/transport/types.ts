import { HttpHeadersLike } from "../core/fetch";

export type RetryableReason = "rate_limit" | "timeout" | "transport";

export type AttemptOutcome =
  | { kind: "ok"; payload: unknown; headers: HttpHeadersLike; byteLength: number }
  | { kind: "retryable"; reason: RetryableReason; message: string }
  | { kind: "fatal"; message: string };

export interface TransportResponse {
  payload: unknown;
  headers: HttpHeadersLike;
  byteLength: number;
  attempts: number;
}

export interface PageRequest {
  query: string;
  rows: number;
  start: number;
  sort?: string;
  fields?: readonly string[];
}

export interface FacetRequest {
  query: string;
  facetFields: readonly string[];
}

export type JsonRecord = Record<string, unknown>;

export interface PageResult {
  docs: JsonRecord[];
  numFound: number;
  byteLength: number;
  headers: HttpHeadersLike;
}
