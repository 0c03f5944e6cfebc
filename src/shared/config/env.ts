import "dotenv/config";
import { z } from "zod";
import {
  DEFAULT_ANNUAL_RISK_FREE_RATE,
  DEFAULT_BENCHMARK,
} from "../../core/entities/batchConfig";

const supportedMarketDataProviders = ["mock", "alphavantage", "yahoo"] as const;

export type MarketDataProviderName =
  (typeof supportedMarketDataProviders)[number];

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  MARKET_DATA_PROVIDER: z.enum(supportedMarketDataProviders).default("mock"),
  ALPHA_VANTAGE_BASE_URL: z.string().url().default("https://www.alphavantage.co"),
  ALPHA_VANTAGE_API_KEY: z.string().default(""),
  ALPHA_VANTAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  YAHOO_BASE_URL: z
    .string()
    .url()
    .default("https://query1.finance.yahoo.com"),
  YAHOO_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  EVAL_WINDOW: z.string().min(1).default("6mo"),
  EVAL_MOMENTUM_WINDOW: z.string().min(1).optional(),
  EVAL_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  EVAL_REQUEST_DELAY_MS: z.coerce.number().nonnegative().default(500),
  EVAL_BATCH_DELAY_MS: z.coerce.number().nonnegative().default(5_000),
  EVAL_BENCHMARK: z.string().min(1).default(DEFAULT_BENCHMARK),
  EVAL_RISK_FREE_RATE: z.coerce
    .number()
    .finite()
    .default(DEFAULT_ANNUAL_RISK_FREE_RATE),
  EVAL_SHARE_FETCHES: booleanFlag,
  EVAL_INPUT_PATH: z.string().optional(),
  EVAL_OUTPUT_PATH: z.string().min(1).default("selected_assets.csv"),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses an arbitrary env source so tests can validate configuration without touching `process.env`.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv =>
  envSchema.parse(source);

export const env: AppEnv = parseEnv(process.env);

/**
 * Resolves the configured market-data adapter so runtime wiring remains declarative and testable.
 */
export const marketDataProvider = (
  appEnv: AppEnv = env,
): MarketDataProviderName => appEnv.MARKET_DATA_PROVIDER;
