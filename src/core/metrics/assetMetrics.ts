import { err, ok, type Result } from "neverthrow";
import type { Fundamentals, PriceSeries } from "../entities/asset";
import {
  DEFAULT_ANNUAL_RISK_FREE_RATE,
  TRADING_DAYS_PER_YEAR,
} from "../entities/batchConfig";
import type {
  ComputationFailure,
  ComputationFailureReason,
} from "../entities/metricResult";
import {
  mean,
  percentChanges,
  sampleCovariance,
  sampleStandardDeviation,
  sampleVariance,
} from "./statistics";

export type AlignedClose = {
  timestamp: number;
  asset: number;
  benchmark: number;
};

const failure = (
  reason: ComputationFailureReason,
  message: string,
): Result<number, ComputationFailure> => err({ reason, message });

const finiteOrFailure = (
  value: number,
  label: string,
): Result<number, ComputationFailure> =>
  Number.isFinite(value)
    ? ok(value)
    : failure("undefined_statistic", `${label} evaluated to ${value}`);

/**
 * Dispersion at rounding-error scale: constant returns such as a geometric price path
 * leave a few ulps of spread that must still count as zero.
 */
const isNegligibleSpread = (
  spread: number,
  center: number,
  count: number,
): boolean => spread <= Number.EPSILON * Math.max(1, Math.abs(center)) * count;

const closes = (series: PriceSeries): number[] =>
  series.map((bar) => bar.close);

/**
 * Mean daily volume. Falls back to 0 rather than absent when nothing can be averaged.
 */
export const computeLiquidity = (series: PriceSeries): number => {
  const volumes = series
    .map((bar) => bar.volume)
    .filter((volume) => Number.isFinite(volume));
  return mean(volumes) ?? 0;
};

/**
 * Inner-joins closes on timestamp and orders the result ascending, so the caller's bar order is irrelevant.
 * A repeated timestamp keeps the last bar seen.
 */
export const alignCloses = (
  asset: PriceSeries,
  benchmark: PriceSeries,
): AlignedClose[] => {
  const benchmarkByTime = new Map<number, number>();
  for (const bar of benchmark) {
    benchmarkByTime.set(bar.timestamp.getTime(), bar.close);
  }

  const assetByTime = new Map<number, number>();
  for (const bar of asset) {
    assetByTime.set(bar.timestamp.getTime(), bar.close);
  }

  const aligned: AlignedClose[] = [];
  for (const [timestamp, assetClose] of assetByTime) {
    const benchmarkClose = benchmarkByTime.get(timestamp);
    if (benchmarkClose === undefined) {
      continue;
    }
    aligned.push({ timestamp, asset: assetClose, benchmark: benchmarkClose });
  }

  return aligned.sort((left, right) => left.timestamp - right.timestamp);
};

export const computeBeta = (
  asset: PriceSeries,
  benchmark: PriceSeries,
): Result<number, ComputationFailure> => {
  if (asset.length === 0 || benchmark.length === 0) {
    return failure("empty_series", "asset or benchmark series is empty");
  }

  const aligned = alignCloses(asset, benchmark);
  const assetReturns = percentChanges(aligned.map((row) => row.asset));
  const benchmarkReturns = percentChanges(aligned.map((row) => row.benchmark));

  if (assetReturns.length === 0 || benchmarkReturns.length === 0) {
    return failure(
      "empty_returns",
      `only ${aligned.length} aligned observation(s)`,
    );
  }

  const covariance = sampleCovariance(assetReturns, benchmarkReturns);
  const variance = sampleVariance(benchmarkReturns);
  if (covariance === null || variance === null) {
    return failure(
      "undefined_statistic",
      "at least two returns are needed for sample statistics",
    );
  }

  if (
    isNegligibleSpread(
      Math.sqrt(variance),
      mean(benchmarkReturns) ?? 0,
      benchmarkReturns.length,
    )
  ) {
    return failure("undefined_statistic", "benchmark returns have zero variance");
  }

  return finiteOrFailure(covariance / variance, "beta");
};

/**
 * Daily Sharpe ratio against an annual risk-free rate spread over 252 trading days.
 * Zero volatility is reported as a failure, so the metric becomes absent.
 */
export const computeSharpe = (
  series: PriceSeries,
  annualRiskFreeRate = DEFAULT_ANNUAL_RISK_FREE_RATE,
): Result<number, ComputationFailure> => {
  if (series.length === 0) {
    return failure("empty_series", "price series is empty");
  }

  const returns = percentChanges(closes(series));
  if (returns.length === 0) {
    return failure("empty_returns", "a single bar has no returns");
  }

  const averageReturn = mean(returns);
  const volatility = sampleStandardDeviation(returns);
  if (averageReturn === null || volatility === null) {
    return failure(
      "undefined_statistic",
      "at least two returns are needed for volatility",
    );
  }

  if (isNegligibleSpread(volatility, averageReturn, returns.length)) {
    return failure("zero_volatility", "returns have zero volatility");
  }

  return finiteOrFailure(
    (averageReturn - annualRiskFreeRate / TRADING_DAYS_PER_YEAR) / volatility,
    "sharpe",
  );
};

/**
 * Simple (non-compounded) sum of period returns.
 */
export const computeMomentum = (
  series: PriceSeries,
): Result<number, ComputationFailure> => {
  if (series.length === 0) {
    return failure("empty_series", "price series is empty");
  }

  const total = percentChanges(closes(series)).reduce(
    (acc, value) => acc + value,
    0,
  );
  return finiteOrFailure(total, "momentum");
};

export const resolvePeRatio = (
  fundamentals: Fundamentals,
): Result<number, ComputationFailure> => {
  if (fundamentals.trailingPe === null) {
    return failure("missing_value", "provider reported no trailing P/E");
  }
  return finiteOrFailure(fundamentals.trailingPe, "trailing P/E");
};
