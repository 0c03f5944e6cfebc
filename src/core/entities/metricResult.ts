import type { AppBoundaryError } from "./appError";
import type { Identifier } from "./asset";

export type MetricName = "liquidity" | "beta" | "sharpe" | "pe_ratio" | "momentum";

/**
 * One exported row. `null` means the metric could not be computed; liquidity
 * falls back to 0 instead and is therefore never absent.
 */
export type MetricResult = {
  readonly identifier: Identifier;
  readonly liquidity: number;
  readonly beta: number | null;
  readonly sharpe: number | null;
  readonly peRatio: number | null;
  readonly momentum: number | null;
};

export type ComputationFailureReason =
  | "empty_series"
  | "empty_returns"
  | "undefined_statistic"
  | "zero_volatility"
  | "missing_value";

export type ComputationFailure = {
  reason: ComputationFailureReason;
  message: string;
};

export type MetricFailure =
  | { kind: "fetch_failure"; error: AppBoundaryError }
  | ({ kind: "computation_failure" } & ComputationFailure);

export type ResultSummary = {
  total: number;
  zeroLiquidity: number;
  absent: {
    beta: number;
    sharpe: number;
    peRatio: number;
    momentum: number;
  };
};

/**
 * Counts degraded values so a run can report how much of the universe was computable.
 */
export const summarizeResults = (results: readonly MetricResult[]): ResultSummary => {
  const summary: ResultSummary = {
    total: results.length,
    zeroLiquidity: 0,
    absent: { beta: 0, sharpe: 0, peRatio: 0, momentum: 0 },
  };

  for (const result of results) {
    if (result.liquidity === 0) {
      summary.zeroLiquidity += 1;
    }
    if (result.beta === null) {
      summary.absent.beta += 1;
    }
    if (result.sharpe === null) {
      summary.absent.sharpe += 1;
    }
    if (result.peRatio === null) {
      summary.absent.peRatio += 1;
    }
    if (result.momentum === null) {
      summary.absent.momentum += 1;
    }
  }

  return summary;
};
