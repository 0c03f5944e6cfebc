import type { EvaluationWindow } from "./window";

export type BatchConfig = {
  window: EvaluationWindow;
  batchSize: number;
  interRequestDelayMs: number;
  interBatchDelayMs: number;
};

export type MetricOptions = {
  benchmark: string;
  annualRiskFreeRate: number;
  /** Overrides the batch window for momentum only. */
  momentumWindow?: EvaluationWindow;
  /** Reuse fetched series and fundamentals across the metrics of one identifier. */
  shareFetches: boolean;
};

export const DEFAULT_BENCHMARK = "^BVSP";
export const DEFAULT_ANNUAL_RISK_FREE_RATE = 0.06;
export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Rejects configurations the batch loop cannot honor before any provider call is made.
 */
export const assertValidBatchConfig = (config: BatchConfig): void => {
  if (!Number.isInteger(config.batchSize) || config.batchSize <= 0) {
    throw new Error(
      `Batch size must be a positive integer, received ${config.batchSize}.`,
    );
  }

  const delays = {
    interRequestDelayMs: config.interRequestDelayMs,
    interBatchDelayMs: config.interBatchDelayMs,
  };

  for (const [name, value] of Object.entries(delays)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`${name} must be a non-negative duration, received ${value}.`);
    }
  }
};
