import { BatchAssetEvaluator } from "../services/batchAssetEvaluator";
import type {
  BatchConfig,
  MetricOptions,
} from "../../core/entities/batchConfig";
import { parseWindow, type EvaluationWindow } from "../../core/entities/window";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { env, marketDataProvider, type AppEnv } from "../../shared/config/env";
import { logger, type Logger } from "../../shared/logger/logger";
import { CsvResultSink } from "../../infra/io/csvResultSink";
import { TickerFileSource } from "../../infra/io/tickerFileSource";
import { AlphaVantageMarketDataProvider } from "../../infra/providers/alphavantage/alphaVantageMarketDataProvider";
import { MockMarketDataProvider } from "../../infra/providers/mocks/mockMarketDataProvider";
import { YahooMarketDataProvider } from "../../infra/providers/yahoo/yahooMarketDataProvider";
import { SystemClock, TimerSleeper } from "../../infra/system/systemPorts";

export type EvaluationOverrides = {
  window?: string;
  momentumWindow?: string;
  batchSize?: number;
  requestDelayMs?: number;
  batchDelayMs?: number;
  benchmark?: string;
  riskFreeRate?: number;
  shareFetches?: boolean;
};

export type EvaluationSettings = {
  config: BatchConfig;
  options: MetricOptions;
};

const resolveWindow = (descriptor: string): EvaluationWindow => {
  const parsed = parseWindow(descriptor);
  if (parsed.isErr()) {
    throw new Error(parsed.error.message);
  }
  return parsed.value;
};

/**
 * Merges command-line overrides over environment defaults into one validated run configuration.
 */
export const resolveEvaluationSettings = (
  appEnv: AppEnv = env,
  overrides: EvaluationOverrides = {},
): EvaluationSettings => {
  const momentumDescriptor =
    overrides.momentumWindow ?? appEnv.EVAL_MOMENTUM_WINDOW;

  return {
    config: {
      window: resolveWindow(overrides.window ?? appEnv.EVAL_WINDOW),
      batchSize: overrides.batchSize ?? appEnv.EVAL_BATCH_SIZE,
      interRequestDelayMs:
        overrides.requestDelayMs ?? appEnv.EVAL_REQUEST_DELAY_MS,
      interBatchDelayMs: overrides.batchDelayMs ?? appEnv.EVAL_BATCH_DELAY_MS,
    },
    options: {
      benchmark: overrides.benchmark ?? appEnv.EVAL_BENCHMARK,
      annualRiskFreeRate: overrides.riskFreeRate ?? appEnv.EVAL_RISK_FREE_RATE,
      momentumWindow:
        momentumDescriptor === undefined
          ? undefined
          : resolveWindow(momentumDescriptor),
      shareFetches: overrides.shareFetches ?? appEnv.EVAL_SHARE_FETCHES,
    },
  };
};

/**
 * Resolves the configured market-data adapter while preserving a mock fallback for local development.
 */
export const createMarketDataProvider = (
  appEnv: AppEnv = env,
): MarketDataProviderPort => {
  const clock = new SystemClock();
  const providerName = marketDataProvider(appEnv);

  if (providerName === "alphavantage") {
    return new AlphaVantageMarketDataProvider(
      appEnv.ALPHA_VANTAGE_BASE_URL,
      appEnv.ALPHA_VANTAGE_API_KEY,
      appEnv.ALPHA_VANTAGE_TIMEOUT_MS,
      undefined,
      clock,
    );
  }

  if (providerName === "yahoo") {
    return new YahooMarketDataProvider(
      appEnv.YAHOO_BASE_URL,
      appEnv.YAHOO_TIMEOUT_MS,
      undefined,
      clock,
    );
  }

  return new MockMarketDataProvider(clock);
};

export type RuntimeDependencies = {
  appEnv?: AppEnv;
  provider?: MarketDataProviderPort;
  sleeper?: SleeperPort;
  logger?: Logger;
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = (
  settings: EvaluationSettings,
  dependencies: RuntimeDependencies = {},
) => {
  const appEnv = dependencies.appEnv ?? env;
  const provider = dependencies.provider ?? createMarketDataProvider(appEnv);
  const sleeper = dependencies.sleeper ?? new TimerSleeper();

  const evaluator = new BatchAssetEvaluator(
    provider,
    sleeper,
    settings.options,
    dependencies.logger ?? logger,
  );

  return {
    provider,
    evaluator,
    settings,
    tickerSource: new TickerFileSource(),
    resultSink: new CsvResultSink(),
  };
};
