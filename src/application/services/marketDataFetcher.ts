import { err, type Result } from "neverthrow";
import type { AppBoundaryError, BoundarySource } from "../../core/entities/appError";
import type { Fundamentals, Identifier, PriceSeries } from "../../core/entities/asset";
import type { EvaluationWindow } from "../../core/entities/window";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";

/**
 * Fetch seam used by metric computations; lets a pass share fetched data without the metrics knowing.
 */
export interface MarketDataFetcher {
  history(
    identifier: Identifier,
    window: EvaluationWindow,
  ): Promise<Result<PriceSeries, AppBoundaryError>>;
  fundamentals(
    identifier: Identifier,
  ): Promise<Result<Fundamentals, AppBoundaryError>>;
}

/**
 * Calls the provider on every request and converts a thrown adapter error into a boundary error,
 * so one misbehaving adapter call can only degrade the metric that made it.
 */
export class DirectMarketDataFetcher implements MarketDataFetcher {
  constructor(private readonly provider: MarketDataProviderPort) {}

  history(
    identifier: Identifier,
    window: EvaluationWindow,
  ): Promise<Result<PriceSeries, AppBoundaryError>> {
    return this.guard("prices", () =>
      this.provider.fetchHistory({ identifier, window }),
    );
  }

  fundamentals(
    identifier: Identifier,
  ): Promise<Result<Fundamentals, AppBoundaryError>> {
    return this.guard("fundamentals", () =>
      this.provider.fetchFundamentals({ identifier }),
    );
  }

  private async guard<T>(
    source: BoundarySource,
    call: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    try {
      return await call();
    } catch (error) {
      return err({
        source,
        code: "provider_error",
        provider: this.provider.name,
        message: error instanceof Error ? error.message : String(error),
        retryable: false,
        cause: error,
      });
    }
  }
}
