import type { Identifier } from "../../core/entities/asset";
import {
  assertValidBatchConfig,
  type BatchConfig,
  type MetricOptions,
} from "../../core/entities/batchConfig";
import {
  summarizeResults,
  type MetricResult,
} from "../../core/entities/metricResult";
import type {
  BatchEvaluatorPort,
  MarketDataProviderPort,
} from "../../core/ports/inboundPorts";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import { AssetMetricsService } from "./assetMetricsService";
import {
  DirectMarketDataFetcher,
  type MarketDataFetcher,
} from "./marketDataFetcher";
import { SeriesFetchCache } from "./seriesFetchCache";

/**
 * Splits items into consecutive chunks of `size`; only the last chunk may be shorter.
 */
export const partitionIntoBatches = <T>(
  items: readonly T[],
  size: number,
): T[][] => {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
};

/**
 * Runs the paced batch loop: identifiers strictly one after another, a fixed pause after each
 * identifier and another after each batch. A run never fails because of a single identifier.
 */
export class BatchAssetEvaluator implements BatchEvaluatorPort {
  constructor(
    private readonly provider: MarketDataProviderPort,
    private readonly sleeper: SleeperPort,
    private readonly options: MetricOptions,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async evaluate(
    identifiers: readonly Identifier[],
    config: BatchConfig,
  ): Promise<MetricResult[]> {
    assertValidBatchConfig(config);

    const usable = identifiers.filter((identifier) => {
      if (identifier.trim().length > 0) {
        return true;
      }
      this.logger.warn("Skipping empty identifier");
      return false;
    });

    const batches = partitionIntoBatches(usable, config.batchSize);

    this.logger.info(
      {
        provider: this.provider.name,
        identifiers: usable.length,
        batches: batches.length,
        batchSize: config.batchSize,
        window: config.window.descriptor,
        benchmark: this.options.benchmark,
        shareFetches: this.options.shareFetches,
      },
      "Evaluation started",
    );

    const results: MetricResult[] = [];

    for (const [index, batch] of batches.entries()) {
      this.logger.info(
        { batch: index + 1, totalBatches: batches.length, size: batch.length },
        `Processing batch ${index + 1} of ${batches.length}`,
      );

      for (const identifier of batch) {
        const metrics = new AssetMetricsService(
          this.createFetcher(),
          config.window,
          this.options,
          this.logger,
        );
        const result = await metrics.evaluateIdentifier(identifier);
        this.logger.debug({ ...result }, `Evaluated ${identifier}`);
        results.push(result);

        await this.sleeper.sleep(config.interRequestDelayMs);
      }

      this.logger.debug(
        { delayMs: config.interBatchDelayMs },
        "Pausing between batches to avoid rate limiting",
      );
      await this.sleeper.sleep(config.interBatchDelayMs);
    }

    this.logger.info(
      { summary: summarizeResults(results) },
      "Evaluation finished",
    );

    return results;
  }

  /**
   * Built once per identifier: shared fetches, including a failed benchmark fetch,
   * never outlive the identifier that made them.
   */
  private createFetcher(): MarketDataFetcher {
    const direct = new DirectMarketDataFetcher(this.provider);
    return this.options.shareFetches ? new SeriesFetchCache(direct) : direct;
  }
}
