import { ok, type Result } from "neverthrow";
import type {
  FundamentalsRequest,
  HistoryRequest,
  MarketDataProviderPort,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { Fundamentals, PriceSeries } from "../../../core/entities/asset";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { windowStart } from "../../../core/entities/window";
import { SystemClock } from "../../system/systemPorts";

const MS_IN_DAY = 86_400_000;
const MAX_WINDOW_DAYS = 365 * 5;

const seedOf = (identifier: string): number =>
  Array.from(identifier).reduce(
    (acc, char) => (acc * 31 + char.charCodeAt(0)) % 100_003,
    7,
  );

const isWeekend = (date: Date): boolean =>
  date.getUTCDay() === 0 || date.getUTCDay() === 6;

/**
 * Provides predictable weekday series so the batch loop can be exercised without a network.
 * Identifiers starting with '^' behave like indexes and publish no P/E.
 */
export class MockMarketDataProvider implements MarketDataProviderPort {
  readonly name = "mock";

  constructor(private readonly clock: ClockPort = new SystemClock()) {}

  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceSeries, AppBoundaryError>> {
    const now = this.clock.now();
    const today = new Date(Math.floor(now.getTime() / MS_IN_DAY) * MS_IN_DAY);
    const start =
      windowStart(request.window, today) ??
      new Date(today.getTime() - MAX_WINDOW_DAYS * MS_IN_DAY);

    const seed = seedOf(request.identifier);
    const basePrice = 10 + (seed % 90);
    const drift = ((seed % 7) - 3) / 10_000;
    const amplitude = 0.02 + (seed % 5) / 100;
    const baseVolume = 100_000 + (seed % 50) * 10_000;

    const series: PriceSeries = [];
    let index = 0;
    for (
      let time = start.getTime();
      time <= today.getTime();
      time += MS_IN_DAY
    ) {
      const timestamp = new Date(time);
      if (isWeekend(timestamp)) {
        continue;
      }

      const close =
        basePrice * (1 + drift * index + amplitude * Math.sin(index / 5 + seed));
      const open = close * (1 - amplitude / 10);
      series.push({
        timestamp,
        open,
        high: Math.max(open, close) * 1.01,
        low: Math.min(open, close) * 0.99,
        close,
        volume: baseVolume + (index % 5) * 1_000,
      });
      index += 1;
    }

    return ok(series);
  }

  async fetchFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<Fundamentals, AppBoundaryError>> {
    return ok({
      identifier: request.identifier,
      trailingPe: request.identifier.startsWith("^")
        ? null
        : 5 + (seedOf(request.identifier) % 250) / 10,
    });
  }
}
