import { AppConfig } from "../config";
import { HttpHeadersLike } from "../core/fetch";
import { Sleeper, sleep as defaultSleep } from "../core/sleep";
import { Logger, MetricsRegistry } from "../observability";

const DEFAULT_REMAINING = 20;

export interface RateGovernorDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: Sleeper;
}

export class RateGovernor {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly sleep: Sleeper;

  constructor(deps: RateGovernorDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  remaining(headers: HttpHeadersLike): number {
    const raw = headers.get(this.config.rateLimitHeader);
    const parsed = raw === null ? Number.NaN : Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : DEFAULT_REMAINING;
  }

  /** Always waits `configuredWaitMs`; adds a short pause when the per-minute budget runs low. */
  async throttle(headers: HttpHeadersLike, configuredWaitMs: number, signal?: AbortSignal): Promise<void> {
    const stopTimer = this.metrics.startTimer("throttle_ms");
    const remaining = this.remaining(headers);
    await this.sleep(configuredWaitMs, signal);
    if (remaining < this.config.lowRemainingThreshold) {
      this.logger.warn("rate_limit_approaching", { remaining, pauseMs: this.config.lowRemainingPauseMs });
      await this.sleep(this.config.lowRemainingPauseMs, signal);
    }
    stopTimer();
  }
}
