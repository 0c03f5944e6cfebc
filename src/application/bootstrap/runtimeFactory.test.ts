import { describe, expect, it } from "vitest";
import {
  DEFAULT_ANNUAL_RISK_FREE_RATE,
  DEFAULT_BENCHMARK,
} from "../../core/entities/batchConfig";
import { parseEnv } from "../../shared/config/env";
import {
  FakeMarketDataProvider,
  RecordingSleeper,
  silentLogger,
} from "../../__tests__/support/fakeMarketData";
import {
  createMarketDataProvider,
  createRuntime,
  resolveEvaluationSettings,
} from "./runtimeFactory";

describe("parseEnv", () => {
  it("applies evaluation defaults", () => {
    const appEnv = parseEnv({});

    expect(appEnv.MARKET_DATA_PROVIDER).toBe("mock");
    expect(appEnv.EVAL_WINDOW).toBe("6mo");
    expect(appEnv.EVAL_BATCH_SIZE).toBe(100);
    expect(appEnv.EVAL_REQUEST_DELAY_MS).toBe(500);
    expect(appEnv.EVAL_BATCH_DELAY_MS).toBe(5_000);
    expect(appEnv.EVAL_BENCHMARK).toBe("^BVSP");
    expect(appEnv.EVAL_BENCHMARK).toBe(DEFAULT_BENCHMARK);
    expect(appEnv.EVAL_RISK_FREE_RATE).toBe(0.06);
    expect(appEnv.EVAL_RISK_FREE_RATE).toBe(DEFAULT_ANNUAL_RISK_FREE_RATE);
    expect(appEnv.EVAL_SHARE_FETCHES).toBe(false);
    expect(appEnv.EVAL_OUTPUT_PATH).toBe("selected_assets.csv");
  });

  it("coerces numeric and boolean variables", () => {
    const appEnv = parseEnv({
      EVAL_BATCH_SIZE: "25",
      EVAL_RISK_FREE_RATE: "0.1075",
      EVAL_SHARE_FETCHES: "yes",
    });

    expect(appEnv.EVAL_BATCH_SIZE).toBe(25);
    expect(appEnv.EVAL_RISK_FREE_RATE).toBe(0.1075);
    expect(appEnv.EVAL_SHARE_FETCHES).toBe(true);
  });

  it("rejects a non-positive batch size and unknown providers", () => {
    expect(() => parseEnv({ EVAL_BATCH_SIZE: "0" })).toThrow();
    expect(() => parseEnv({ MARKET_DATA_PROVIDER: "bloomberg" })).toThrow();
  });
});

describe("resolveEvaluationSettings", () => {
  it("lets overrides win over environment values", () => {
    const settings = resolveEvaluationSettings(
      parseEnv({ EVAL_WINDOW: "1y", EVAL_BATCH_SIZE: "50" }),
      { batchSize: 5, momentumWindow: "3mo", shareFetches: true },
    );

    expect(settings.config.window.descriptor).toBe("1y");
    expect(settings.config.batchSize).toBe(5);
    expect(settings.config.interRequestDelayMs).toBe(500);
    expect(settings.options.momentumWindow?.descriptor).toBe("3mo");
    expect(settings.options.shareFetches).toBe(true);
  });

  it("leaves the momentum window unset unless configured", () => {
    expect(
      resolveEvaluationSettings(parseEnv({})).options.momentumWindow,
    ).toBeUndefined();
  });

  it("throws on an unparseable window", () => {
    expect(() =>
      resolveEvaluationSettings(parseEnv({}), { window: "soon" }),
    ).toThrow("Invalid window 'soon': expected <amount><unit>, 'ytd' or 'max'.");
  });
});

describe("createMarketDataProvider", () => {
  it("selects the adapter named by MARKET_DATA_PROVIDER", () => {
    expect(createMarketDataProvider(parseEnv({})).name).toBe("mock");
    expect(
      createMarketDataProvider(parseEnv({ MARKET_DATA_PROVIDER: "yahoo" })).name,
    ).toBe("yahoo");
    expect(
      createMarketDataProvider(
        parseEnv({
          MARKET_DATA_PROVIDER: "alphavantage",
          ALPHA_VANTAGE_API_KEY: "test-key",
        }),
      ).name,
    ).toBe("alphavantage");
  });

  it("refuses Alpha Vantage without an API key", () => {
    expect(() =>
      createMarketDataProvider(
        parseEnv({ MARKET_DATA_PROVIDER: "alphavantage" }),
      ),
    ).toThrow(
      "ALPHA_VANTAGE_API_KEY is required when the Alpha Vantage market data provider is enabled.",
    );
  });
});

describe("createRuntime", () => {
  it("wires injected dependencies into the evaluator", async () => {
    const appEnv = parseEnv({});
    const provider = new FakeMarketDataProvider();
    const sleeper = new RecordingSleeper();
    const settings = resolveEvaluationSettings(appEnv, {
      requestDelayMs: 1,
      batchDelayMs: 2,
    });

    const runtime = createRuntime(settings, {
      appEnv,
      provider,
      sleeper,
      logger: silentLogger,
    });
    await runtime.evaluator.evaluate(["AAA"], settings.config);

    expect(runtime.provider).toBe(provider);
    expect(sleeper.sleeps).toEqual([1, 2]);
    expect(provider.calls).toHaveLength(6);
  });
});
