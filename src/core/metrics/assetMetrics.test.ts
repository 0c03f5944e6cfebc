import { describe, expect, it } from "vitest";
import type { PriceSeries } from "../entities/asset";
import {
  alignCloses,
  computeBeta,
  computeLiquidity,
  computeMomentum,
  computeSharpe,
  resolvePeRatio,
} from "./assetMetrics";

const DAY = 86_400_000;
const origin = Date.UTC(2026, 0, 5);

const seriesFrom = (
  closes: number[],
  volumes: number[] = closes.map(() => 1_000),
  startDay = 0,
): PriceSeries =>
  closes.map((close, index) => ({
    timestamp: new Date(origin + (startDay + index) * DAY),
    open: close,
    high: close,
    low: close,
    close,
    volume: volumes[index] ?? 0,
  }));

describe("computeLiquidity", () => {
  it("averages the volume column", () => {
    expect(
      computeLiquidity(seriesFrom([1, 2, 3, 4], [1_000, 2_000, 3_000, 4_000])),
    ).toBe(2_500);
  });

  it("is exactly zero for an empty series", () => {
    expect(computeLiquidity([])).toBe(0);
  });

  it("ignores non-finite volumes", () => {
    expect(computeLiquidity(seriesFrom([1, 2], [Number.NaN, 600]))).toBe(600);
    expect(computeLiquidity(seriesFrom([1], [Number.NaN]))).toBe(0);
  });
});

describe("alignCloses", () => {
  it("keeps only timestamps present in both series, ascending", () => {
    const asset = seriesFrom([10, 11, 12], undefined, 0);
    const benchmark = seriesFrom([100, 101, 102], undefined, 1);

    expect(alignCloses([...asset].reverse(), benchmark)).toEqual([
      { timestamp: origin + DAY, asset: 11, benchmark: 100 },
      { timestamp: origin + 2 * DAY, asset: 12, benchmark: 101 },
    ]);
  });
});

describe("computeBeta", () => {
  const benchmark = seriesFrom([100, 110, 99, 108.9, 103.455]);
  // Each asset return is exactly twice the benchmark return.
  const asset = seriesFrom([100, 120, 96, 115.2, 103.68]);

  it("equals two when asset returns are twice the benchmark returns", () => {
    expect(computeBeta(asset, benchmark)._unsafeUnwrap()).toBeCloseTo(2, 10);
  });

  it("does not depend on the order bars are supplied in", () => {
    const forward = computeBeta(asset, benchmark)._unsafeUnwrap();
    const order = [3, 0, 4, 2, 1];
    const shuffledAsset = order.map((index) => asset[index]);
    const shuffledBenchmark = order.map((index) => benchmark[index]);

    expect(computeBeta(shuffledAsset, shuffledBenchmark)._unsafeUnwrap()).toBe(
      forward,
    );
  });

  it("fails when either raw series is empty", () => {
    expect(computeBeta([], benchmark)._unsafeUnwrapErr().reason).toBe(
      "empty_series",
    );
    expect(computeBeta(asset, [])._unsafeUnwrapErr().reason).toBe(
      "empty_series",
    );
  });

  it("fails when the aligned series has no returns", () => {
    const disjoint = seriesFrom([50, 51], undefined, 30);
    const single = seriesFrom([100]);

    expect(computeBeta(disjoint, benchmark)._unsafeUnwrapErr().reason).toBe(
      "empty_returns",
    );
    expect(computeBeta(single, benchmark)._unsafeUnwrapErr().reason).toBe(
      "empty_returns",
    );
  });

  it("fails when the benchmark has no variance", () => {
    const flat = seriesFrom([100, 100, 100]);

    expect(computeBeta(seriesFrom([1, 2, 3]), flat)._unsafeUnwrapErr()).toEqual(
      {
        reason: "undefined_statistic",
        message: "benchmark returns have zero variance",
      },
    );
  });

  it("treats a steadily compounding benchmark as having no variance", () => {
    const geometric = seriesFrom([100, 110, 121, 133.1, 146.41]);

    expect(
      computeBeta(seriesFrom([10, 12, 9, 11, 13]), geometric)._unsafeUnwrapErr(),
    ).toEqual({
      reason: "undefined_statistic",
      message: "benchmark returns have zero variance",
    });
  });
});

describe("computeSharpe", () => {
  it("divides excess mean return by sample volatility", () => {
    const result = computeSharpe(seriesFrom([100, 110, 143]), 0);

    expect(result._unsafeUnwrap()).toBeCloseTo(Math.SQRT2, 10);
  });

  it("subtracts the daily share of the annual risk-free rate", () => {
    const result = computeSharpe(seriesFrom([100, 110, 99, 118.8]));

    expect(result._unsafeUnwrap()).toBeCloseTo(0.4348770812560137, 10);
  });

  it("reports zero volatility as absent rather than a numeric sentinel", () => {
    const result = computeSharpe(seriesFrom([50, 50, 50, 50]));

    expect(result._unsafeUnwrapErr()).toEqual({
      reason: "zero_volatility",
      message: "returns have zero volatility",
    });
  });

  it("treats rounding-level spread in constant returns as zero volatility", () => {
    const result = computeSharpe(seriesFrom([100, 110, 121, 133.1, 146.41]));

    expect(result._unsafeUnwrapErr()).toEqual({
      reason: "zero_volatility",
      message: "returns have zero volatility",
    });
  });

  it("fails on series too short for a volatility estimate", () => {
    expect(computeSharpe([])._unsafeUnwrapErr().reason).toBe("empty_series");
    expect(computeSharpe(seriesFrom([10]))._unsafeUnwrapErr().reason).toBe(
      "empty_returns",
    );
    expect(computeSharpe(seriesFrom([10, 11]))._unsafeUnwrapErr().reason).toBe(
      "undefined_statistic",
    );
  });
});

describe("computeMomentum", () => {
  it("sums simple period returns without compounding", () => {
    expect(
      computeMomentum(seriesFrom([100, 110, 99, 118.8]))._unsafeUnwrap(),
    ).toBeCloseTo(0.2, 12);
  });

  it("is zero for a constant price series", () => {
    expect(computeMomentum(seriesFrom([42, 42, 42]))._unsafeUnwrap()).toBe(0);
  });

  it("fails for an empty series", () => {
    expect(computeMomentum([])._unsafeUnwrapErr().reason).toBe("empty_series");
  });

  it("fails when a zero close makes the sum non-finite", () => {
    expect(computeMomentum(seriesFrom([0, 5]))._unsafeUnwrapErr()).toEqual({
      reason: "undefined_statistic",
      message: "momentum evaluated to Infinity",
    });
  });
});

describe("resolvePeRatio", () => {
  it("passes through a published trailing P/E", () => {
    expect(
      resolvePeRatio({ identifier: "AAA", trailingPe: 12.5 })._unsafeUnwrap(),
    ).toBe(12.5);
  });

  it("fails when the provider has no trailing P/E", () => {
    expect(
      resolvePeRatio({ identifier: "AAA", trailingPe: null })._unsafeUnwrapErr()
        .reason,
    ).toBe("missing_value");
  });
});
