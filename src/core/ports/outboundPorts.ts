import type { Identifier } from "../entities/asset";
import type { MetricResult } from "../entities/metricResult";

export interface ClockPort {
  now(): Date;
}

/**
 * Pacing primitive for outbound request throttling; swapped for a recorder in tests.
 */
export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}

export interface TickerSourcePort {
  read(path: string): Promise<Identifier[]>;
}

export interface ResultSinkPort {
  write(path: string, results: readonly MetricResult[]): Promise<void>;
}
