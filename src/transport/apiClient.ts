import { AppConfig } from "../config";
import { FatalResponseError } from "../core/errors";
import { HttpHeadersLike } from "../core/fetch";
import { MetricsRegistry } from "../observability";
import { HttpTransport } from "./httpTransport";
import { parseFacetFields, parsePagePayload } from "./payloads";
import { RateGovernor } from "./rateGovernor";
import { buildFacetUrl, buildPageUrl } from "./requests";
import { FacetRequest, JsonRecord, PageRequest, PageResult } from "./types";

export interface FetchAllOptions {
  query: string;
  rows: number;
  sort?: string;
  fields?: readonly string[];
}

const NO_HEADERS: HttpHeadersLike = { get: () => null };

export interface ApiClientDeps {
  config: AppConfig;
  metrics: MetricsRegistry;
  transport: HttpTransport;
  governor: RateGovernor;
}

export class ApiClient {
  private readonly config: AppConfig;
  private readonly metrics: MetricsRegistry;
  private readonly transport: HttpTransport;
  private readonly governor: RateGovernor;

  constructor(deps: ApiClientDeps) {
    this.config = deps.config;
    this.metrics = deps.metrics;
    this.transport = deps.transport;
    this.governor = deps.governor;
  }

  async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<PageResult> {
    const url = buildPageUrl(this.config.baseUrl, request);
    const stopTimer = this.metrics.startTimer("page_fetch_ms");
    const response = await this.transport.fetch(url, signal);
    stopTimer();

    const parsed = parsePagePayload(response.payload);
    if (!parsed.ok) {
      throw new FatalResponseError(url, parsed.reason);
    }
    this.metrics.incrementCounter("pages_fetched", 1);
    return {
      docs: parsed.value.docs,
      numFound: parsed.value.numFound,
      byteLength: response.byteLength,
      headers: response.headers,
    };
  }

  async fetchFacets(request: FacetRequest, signal?: AbortSignal): Promise<{ fields: Record<string, unknown[]>; headers: HttpHeadersLike }> {
    const url = buildFacetUrl(this.config.baseUrl, request);
    const response = await this.transport.fetch(url, signal);
    const parsed = parseFacetFields(response.payload);
    if (!parsed.ok) {
      throw new FatalResponseError(url, parsed.reason);
    }
    return { fields: parsed.value, headers: response.headers };
  }

  /**
   * Pages through every record matching `options.query` and returns them in memory.
   * Only for bounded result sets; large harvests go through the streaming harvester.
   */
  async fetchAll(options: FetchAllOptions, signal?: AbortSignal): Promise<JsonRecord[]> {
    const records: JsonRecord[] = [];
    let start = 0;
    let total = Number.POSITIVE_INFINITY;

    while (start < total) {
      const page = await this.fetchPage({ ...options, start }, signal);
      total = page.numFound;
      records.push(...page.docs);
      start += page.docs.length;
      if (page.docs.length === 0) {
        break;
      }
      if (start < total) {
        await this.throttle(page.headers, signal);
      }
    }
    return records;
  }

  async throttle(headers: HttpHeadersLike, signal?: AbortSignal): Promise<void> {
    await this.governor.throttle(headers, this.config.pageWaitMs, signal);
  }

  /** The configured between-request wait, for callers that no longer hold the last response's headers. */
  async cooldown(signal?: AbortSignal): Promise<void> {
    await this.governor.throttle(NO_HEADERS, this.config.pageWaitMs, signal);
  }
}
