import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { Fundamentals, Identifier, PriceSeries } from "../entities/asset";
import type { BatchConfig } from "../entities/batchConfig";
import type { MetricResult } from "../entities/metricResult";
import type { EvaluationWindow } from "../entities/window";

export type HistoryRequest = {
  identifier: Identifier;
  window: EvaluationWindow;
};

export type FundamentalsRequest = {
  identifier: Identifier;
};

/**
 * Market-data boundary. Adapters return `err` for upstream faults instead of throwing.
 */
export interface MarketDataProviderPort {
  readonly name: string;
  fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceSeries, AppBoundaryError>>;
  fetchFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<Fundamentals, AppBoundaryError>>;
}

export interface BatchEvaluatorPort {
  evaluate(
    identifiers: readonly Identifier[],
    config: BatchConfig,
  ): Promise<MetricResult[]>;
}
