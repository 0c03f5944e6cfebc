import { Command } from "commander";
import { z } from "zod";
import {
  createRuntime,
  resolveEvaluationSettings,
  type RuntimeDependencies,
} from "../application/bootstrap/runtimeFactory";
import {
  summarizeResults,
  type MetricResult,
} from "../core/entities/metricResult";
import { env, marketDataProvider } from "../shared/config/env";
import { logger as defaultLogger } from "../shared/logger/logger";

const overrideOptionsSchema = z.object({
  window: z.string().min(1).optional(),
  momentumWindow: z.string().min(1).optional(),
  batchSize: z.coerce.number().int().positive().optional(),
  requestDelayMs: z.coerce.number().nonnegative().optional(),
  batchDelayMs: z.coerce.number().nonnegative().optional(),
  benchmark: z.string().min(1).optional(),
  riskFreeRate: z.coerce.number().finite().optional(),
  shareFetches: z.boolean().optional(),
});

const evaluateOptionsSchema = overrideOptionsSchema.extend({
  input: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
});

const inspectOptionsSchema = overrideOptionsSchema.extend({
  symbol: z.string().trim().min(1),
  prettify: z.boolean().optional(),
});

const formatNumber = (value: number | null, digits: number): string =>
  value === null ? "absent" : value.toFixed(digits);

/**
 * Formats one identifier's metrics into a compact terminal report for manual inspection.
 */
export const formatMetricReport = (result: MetricResult): string => {
  const lines: string[] = [];

  lines.push(`Metrics for ${result.identifier}`);
  lines.push(`Liquidity (avg volume): ${result.liquidity.toFixed(2)}`);
  lines.push(`Beta: ${formatNumber(result.beta, 4)}`);
  lines.push(`Sharpe ratio: ${formatNumber(result.sharpe, 4)}`);
  lines.push(`P/E ratio: ${formatNumber(result.peRatio, 2)}`);
  lines.push(
    `Momentum: ${result.momentum === null ? "absent" : `${(result.momentum * 100).toFixed(2)}%`}`,
  );

  return lines.join("\n");
};

const addOverrideOptions = (command: Command): Command =>
  command
    .option("--window <descriptor>", "History window, e.g. 6mo, 1y, ytd, max")
    .option("--momentum-window <descriptor>", "Window used for momentum only")
    .option("--batch-size <n>", "Identifiers per batch")
    .option("--request-delay-ms <ms>", "Pause after each identifier")
    .option("--batch-delay-ms <ms>", "Pause after each batch")
    .option("--benchmark <symbol>", "Benchmark index used for beta")
    .option("--risk-free-rate <rate>", "Annual risk-free rate for Sharpe")
    .option(
      "--share-fetches",
      "Reuse fetched series across metrics within the run",
    );

/**
 * Defines a single command surface so every run uses the same pacing and degradation policies.
 */
export const buildCli = (dependencies: RuntimeDependencies = {}) => {
  const appEnv = dependencies.appEnv ?? env;
  const logger = dependencies.logger ?? defaultLogger;

  const cli = new Command();
  cli.name("asset-screener").description("Per-asset indicator batch evaluator");

  addOverrideOptions(
    cli
      .command("evaluate")
      .description("Evaluate every ticker in a file and export the metrics as CSV")
      .option("--input <path>", "Ticker list, one symbol per line")
      .option("--output <path>", "CSV output path"),
  ).action(async (rawOptions: unknown) => {
    const opts = evaluateOptionsSchema.parse(rawOptions);
    const inputPath = opts.input ?? appEnv.EVAL_INPUT_PATH;
    if (!inputPath) {
      throw new Error(
        "A ticker file is required: pass --input or set EVAL_INPUT_PATH.",
      );
    }
    const outputPath = opts.output ?? appEnv.EVAL_OUTPUT_PATH;

    const settings = resolveEvaluationSettings(appEnv, opts);
    const runtime = createRuntime(settings, dependencies);

    const identifiers = await runtime.tickerSource.read(inputPath);
    logger.info(
      { inputPath, identifiers: identifiers.length },
      "Loaded ticker list",
    );

    const results = await runtime.evaluator.evaluate(
      identifiers,
      settings.config,
    );
    await runtime.resultSink.write(outputPath, results);

    logger.info(
      { outputPath, summary: summarizeResults(results) },
      `Selected assets saved to '${outputPath}'`,
    );
  });

  addOverrideOptions(
    cli
      .command("inspect")
      .description("Evaluate a single ticker without pacing delays")
      .requiredOption("--symbol <symbol>", "Ticker symbol")
      .option("--prettify", "Render a human-friendly report"),
  ).action(async (rawOptions: unknown) => {
    const opts = inspectOptionsSchema.parse(rawOptions);
    const settings = resolveEvaluationSettings(appEnv, opts);
    const runtime = createRuntime(settings, dependencies);

    const [result] = await runtime.evaluator.evaluate([opts.symbol], {
      ...settings.config,
      batchSize: 1,
      interRequestDelayMs: 0,
      interBatchDelayMs: 0,
    });

    if (!result) {
      logger.info({ symbol: opts.symbol }, "No result produced");
      return;
    }

    if (opts.prettify) {
      console.log(formatMetricReport(result));
    } else {
      logger.info({ result }, "Metric result");
    }
  });

  cli
    .command("status")
    .description("Report the resolved configuration")
    .action(() => {
      const settings = resolveEvaluationSettings(appEnv);

      logger.info(
        {
          provider: marketDataProvider(appEnv),
          alphaVantageBaseUrl: appEnv.ALPHA_VANTAGE_BASE_URL,
          alphaVantageApiKeyConfigured:
            appEnv.ALPHA_VANTAGE_API_KEY.trim().length > 0,
          yahooBaseUrl: appEnv.YAHOO_BASE_URL,
          window: settings.config.window.descriptor,
          momentumWindow: settings.options.momentumWindow?.descriptor,
          batchSize: settings.config.batchSize,
          requestDelayMs: settings.config.interRequestDelayMs,
          batchDelayMs: settings.config.interBatchDelayMs,
          benchmark: settings.options.benchmark,
          riskFreeRate: settings.options.annualRiskFreeRate,
          shareFetches: settings.options.shareFetches,
          inputPath: appEnv.EVAL_INPUT_PATH,
          outputPath: appEnv.EVAL_OUTPUT_PATH,
        },
        "Runtime status",
      );

      if (
        marketDataProvider(appEnv) === "alphavantage" &&
        settings.options.benchmark.startsWith("^")
      ) {
        logger.warn(
          { benchmark: settings.options.benchmark },
          "Alpha Vantage serves no index series; beta will be absent for every identifier",
        );
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
