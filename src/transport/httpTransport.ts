import { AppConfig } from "../config";
import { ExhaustedRetriesError, FatalResponseError, HarvestInterruptedError, errorMessage } from "../core/errors";
import { FetchFn, HttpResponseLike, getFetchDispatcher, undiciFetch } from "../core/fetch";
import { Sleeper, sleep as defaultSleep } from "../core/sleep";
import { Logger, MetricsRegistry } from "../observability";
import { AttemptOutcome, TransportResponse } from "./types";

export interface HttpTransportDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  sleep?: Sleeper;
}

type RetryState =
  | { kind: "attempting"; attempt: number; failures: number }
  | { kind: "waiting"; attempt: number; failures: number; waitMs: number }
  | { kind: "succeeded"; response: TransportResponse }
  | { kind: "exhausted"; failures: number; lastFailure: string };

function isFatalStatus(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export class HttpTransport {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleeper;

  constructor(deps: HttpTransportDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fetchFn = deps.fetchFn ?? undiciFetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * GETs `url` until it succeeds or `maxConsecutiveFailures` attempts in a row have failed.
   * The failure budget belongs to this call only; the next call starts from zero.
   */
  async fetch(url: string, signal?: AbortSignal): Promise<TransportResponse> {
    const maxFailures = this.config.maxConsecutiveFailures;
    let state: RetryState = { kind: "attempting", attempt: 1, failures: 0 };

    while (state.kind === "attempting" || state.kind === "waiting") {
      if (state.kind === "waiting") {
        await this.sleep(state.waitMs, signal);
        this.logger.info("fetch_retrying", { url, attempt: state.attempt });
        state = { kind: "attempting", attempt: state.attempt, failures: state.failures };
        continue;
      }

      const { attempt, failures }: { attempt: number; failures: number } = state;
      this.logger.debug("fetch_attempt_start", { url, attempt });
      const outcome = await this.attempt(url, signal);

      switch (outcome.kind) {
        case "ok":
          state = {
            kind: "succeeded",
            response: {
              payload: outcome.payload,
              headers: outcome.headers,
              byteLength: outcome.byteLength,
              attempts: attempt,
            },
          };
          break;
        case "fatal":
          throw new FatalResponseError(url, outcome.message);
        case "retryable": {
          const failureCount: number = failures + 1;
          this.metrics.incrementCounter("fetch_failures", 1);
          if (failureCount >= maxFailures) {
            this.logger.error("fetch_retries_exhausted", {
              url,
              attempt,
              reason: outcome.reason,
              error: outcome.message,
            });
            state = { kind: "exhausted", failures: failureCount, lastFailure: outcome.message };
            break;
          }
          const waitMs = this.config.retryBaseWaitMs * failureCount;
          this.logger.warn("fetch_attempt_failed", {
            url,
            attempt,
            maxAttempts: maxFailures,
            reason: outcome.reason,
            error: outcome.message,
            waitMs,
          });
          state = { kind: "waiting", attempt: attempt + 1, failures: failureCount, waitMs };
          break;
        }
      }
    }

    if (state.kind === "exhausted") {
      throw new ExhaustedRetriesError(url, state.failures, state.lastFailure);
    }
    return state.response;
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    if (signal?.aborted) {
      throw new HarvestInterruptedError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: HttpResponseLike;
      let body: ArrayBuffer;
      try {
        response = await this.fetchFn(url, {
          method: "GET",
          headers: {
            "user-agent": this.config.userAgent,
            accept: "application/json",
          },
          dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
          signal: controller.signal,
        });
        body = await response.arrayBuffer();
      } catch (error) {
        if (signal?.aborted) {
          throw new HarvestInterruptedError();
        }
        if (timedOut) {
          return { kind: "retryable", reason: "timeout", message: `Request timed out after ${this.config.requestTimeoutMs}ms` };
        }
        return { kind: "retryable", reason: "transport", message: errorMessage(error) };
      }

      if (response.status === 429) {
        return { kind: "retryable", reason: "rate_limit", message: "HTTP 429 Too Many Requests" };
      }
      if (!response.ok) {
        const message = `HTTP ${response.status} ${response.statusText}`.trim();
        return isFatalStatus(response.status)
          ? { kind: "fatal", message }
          : { kind: "retryable", reason: "transport", message };
      }

      const text = Buffer.from(body).toString("utf-8");
      try {
        return { kind: "ok", payload: JSON.parse(text), headers: response.headers, byteLength: body.byteLength };
      } catch (error) {
        return { kind: "retryable", reason: "transport", message: `Invalid JSON body: ${errorMessage(error)}` };
      }
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
