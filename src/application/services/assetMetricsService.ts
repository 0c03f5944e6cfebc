import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { Identifier } from "../../core/entities/asset";
import type { MetricOptions } from "../../core/entities/batchConfig";
import type {
  ComputationFailure,
  MetricFailure,
  MetricName,
  MetricResult,
} from "../../core/entities/metricResult";
import type { EvaluationWindow } from "../../core/entities/window";
import {
  computeBeta,
  computeLiquidity,
  computeMomentum,
  computeSharpe,
  resolvePeRatio,
} from "../../core/metrics/assetMetrics";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import type { MarketDataFetcher } from "./marketDataFetcher";

/**
 * Fetches and computes one metric at a time for one identifier. Every failure stops at the
 * metric that hit it: liquidity degrades to 0, the other metrics to null.
 */
export class AssetMetricsService {
  constructor(
    private readonly fetcher: MarketDataFetcher,
    private readonly window: EvaluationWindow,
    private readonly options: MetricOptions,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async liquidity(identifier: Identifier): Promise<number> {
    const series = await this.fetcher.history(identifier, this.window);
    if (series.isErr()) {
      this.report(identifier, "liquidity", {
        kind: "fetch_failure",
        error: series.error,
      });
      return 0;
    }

    return computeLiquidity(series.value);
  }

  async beta(identifier: Identifier): Promise<number | null> {
    const asset = await this.fetcher.history(identifier, this.window);
    if (asset.isErr()) {
      return this.fetchFailed(identifier, "beta", asset.error);
    }

    const benchmark = await this.fetcher.history(
      this.options.benchmark,
      this.window,
    );
    if (benchmark.isErr()) {
      return this.fetchFailed(identifier, "beta", benchmark.error);
    }

    return this.settle(
      identifier,
      "beta",
      computeBeta(asset.value, benchmark.value),
    );
  }

  async sharpe(identifier: Identifier): Promise<number | null> {
    const series = await this.fetcher.history(identifier, this.window);
    if (series.isErr()) {
      return this.fetchFailed(identifier, "sharpe", series.error);
    }

    return this.settle(
      identifier,
      "sharpe",
      computeSharpe(series.value, this.options.annualRiskFreeRate),
    );
  }

  async peRatio(identifier: Identifier): Promise<number | null> {
    const fundamentals = await this.fetcher.fundamentals(identifier);
    if (fundamentals.isErr()) {
      return this.fetchFailed(identifier, "pe_ratio", fundamentals.error);
    }

    return this.settle(identifier, "pe_ratio", resolvePeRatio(fundamentals.value));
  }

  async momentum(
    identifier: Identifier,
    window: EvaluationWindow = this.options.momentumWindow ?? this.window,
  ): Promise<number | null> {
    const series = await this.fetcher.history(identifier, window);
    if (series.isErr()) {
      return this.fetchFailed(identifier, "momentum", series.error);
    }

    return this.settle(identifier, "momentum", computeMomentum(series.value));
  }

  /**
   * Computes all five metrics in a fixed order, one provider call at a time.
   */
  async evaluateIdentifier(identifier: Identifier): Promise<MetricResult> {
    const liquidity = await this.liquidity(identifier);
    const beta = await this.beta(identifier);
    const sharpe = await this.sharpe(identifier);
    const peRatio = await this.peRatio(identifier);
    const momentum = await this.momentum(identifier);

    return { identifier, liquidity, beta, sharpe, peRatio, momentum };
  }

  private fetchFailed(
    identifier: Identifier,
    metric: MetricName,
    error: AppBoundaryError,
  ): null {
    this.report(identifier, metric, { kind: "fetch_failure", error });
    return null;
  }

  private settle(
    identifier: Identifier,
    metric: MetricName,
    computed: Result<number, ComputationFailure>,
  ): number | null {
    if (computed.isOk()) {
      return computed.value;
    }

    this.report(identifier, metric, {
      kind: "computation_failure",
      ...computed.error,
    });
    return null;
  }

  private report(
    identifier: Identifier,
    metric: MetricName,
    failure: MetricFailure,
  ): void {
    if (failure.kind === "fetch_failure") {
      this.logger.warn(
        {
          identifier,
          metric,
          failure: failure.kind,
          provider: failure.error.provider,
          code: failure.error.code,
          httpStatus: failure.error.httpStatus,
          reason: failure.error.message,
        },
        "Metric fetch failed; value degraded",
      );
      return;
    }

    this.logger.warn(
      {
        identifier,
        metric,
        failure: failure.kind,
        code: failure.reason,
        reason: failure.message,
      },
      "Metric could not be computed; value degraded",
    );
  }
}
