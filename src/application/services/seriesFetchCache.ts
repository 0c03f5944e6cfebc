import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { Fundamentals, Identifier, PriceSeries } from "../../core/entities/asset";
import type { EvaluationWindow } from "../../core/entities/window";
import type { MarketDataFetcher } from "./marketDataFetcher";

/**
 * Memoises fetches across the metrics of a single identifier. Failed fetches are memoised too,
 * so every metric sharing a series sees the same outcome it would have seen from its own fetch.
 */
export class SeriesFetchCache implements MarketDataFetcher {
  private readonly histories = new Map<
    string,
    Promise<Result<PriceSeries, AppBoundaryError>>
  >();
  private readonly fundamentalsByIdentifier = new Map<
    Identifier,
    Promise<Result<Fundamentals, AppBoundaryError>>
  >();

  constructor(private readonly inner: MarketDataFetcher) {}

  history(
    identifier: Identifier,
    window: EvaluationWindow,
  ): Promise<Result<PriceSeries, AppBoundaryError>> {
    const key = `${identifier}|${window.descriptor}`;
    const cached = this.histories.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.inner.history(identifier, window);
    this.histories.set(key, pending);
    return pending;
  }

  fundamentals(
    identifier: Identifier,
  ): Promise<Result<Fundamentals, AppBoundaryError>> {
    const cached = this.fundamentalsByIdentifier.get(identifier);
    if (cached) {
      return cached;
    }

    const pending = this.inner.fundamentals(identifier);
    this.fundamentalsByIdentifier.set(identifier, pending);
    return pending;
  }
}
