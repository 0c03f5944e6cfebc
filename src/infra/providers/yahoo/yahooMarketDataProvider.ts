import type {
  FundamentalsRequest,
  HistoryRequest,
  MarketDataProviderPort,
} from "../../../core/ports/inboundPorts";
import type {
  AppBoundaryError,
  BoundarySource,
} from "../../../core/entities/appError";
import type { Fundamentals, PriceSeries } from "../../../core/entities/asset";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { windowStart } from "../../../core/entities/window";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { SystemClock } from "../../system/systemPorts";
import { fromHttpError, parseNumericValue } from "../utils/boundaryErrors";
import { toTradingDay } from "../utils/dateUtils";

const PROVIDER = "yahoo";

const DEFAULT_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "application/json,*/*",
};

type YahooError = {
  code?: string;
  description?: string;
} | null;

type YahooQuote = {
  open?: Array<number | null>;
  high?: Array<number | null>;
  low?: Array<number | null>;
  close?: Array<number | null>;
  volume?: Array<number | null>;
};

type YahooChartResponse = {
  chart?: {
    result?: Array<{
      meta?: { symbol?: string; gmtoffset?: number };
      timestamp?: number[];
      indicators?: { quote?: YahooQuote[] };
    }> | null;
    error?: YahooError;
  };
};

type YahooQuoteSummaryResponse = {
  quoteSummary?: {
    result?: Array<{
      summaryDetail?: {
        trailingPE?: { raw?: number; fmt?: string };
      };
    }> | null;
    error?: YahooError;
  };
};

const fromYahooError = (
  source: BoundarySource,
  error: NonNullable<YahooError>,
): AppBoundaryError => {
  const description = error.description?.trim() || "Yahoo Finance returned an error.";
  const notFound = /not found|no data/i.test(`${error.code ?? ""} ${description}`);
  return {
    source,
    code: notFound ? "not_found" : "provider_error",
    provider: PROVIDER,
    message: description,
    retryable: false,
  };
};

const malformed = (
  source: BoundarySource,
  message: string,
): AppBoundaryError => ({
  source,
  code: "malformed_response",
  provider: PROVIDER,
  message,
  retryable: false,
});

/**
 * Adapts the unofficial Yahoo Finance chart and quote-summary endpoints to the market-data port.
 * No key is required; indexes such as ^BVSP are available here.
 */
export class YahooMarketDataProvider implements MarketDataProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
    private readonly clock: ClockPort = new SystemClock(),
  ) {}

  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceSeries, AppBoundaryError>> {
    const now = this.clock.now();
    const start = windowStart(request.window, now);

    const response = await this.httpClient.getJson<YahooChartResponse>({
      url: new URL(
        `/v8/finance/chart/${encodeURIComponent(request.identifier)}`,
        this.baseUrl,
      ).toString(),
      query: {
        period1: start === null ? 0 : Math.floor(start.getTime() / 1000),
        period2: Math.floor(now.getTime() / 1000),
        interval: "1d",
        events: "history",
      },
      headers: DEFAULT_HEADERS,
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(fromHttpError("prices", PROVIDER, response.error));
    }

    const chart = response.value?.chart;
    if (!chart) {
      return err(malformed("prices", "Chart payload had no 'chart' section."));
    }

    if (chart.error) {
      return err(fromYahooError("prices", chart.error));
    }

    const result = chart.result?.at(0);
    if (!result) {
      return err(malformed("prices", "Chart payload had no result."));
    }

    const timestamps = result.timestamp ?? [];
    const quote = result.indicators?.quote?.at(0);
    if (timestamps.length > 0 && !quote) {
      return err(malformed("prices", "Chart payload had timestamps without quotes."));
    }

    const gmtOffset = result.meta?.gmtoffset ?? 0;
    const series: PriceSeries = [];

    timestamps.forEach((epochSeconds, index) => {
      const open = parseNumericValue(quote?.open?.[index]);
      const high = parseNumericValue(quote?.high?.[index]);
      const low = parseNumericValue(quote?.low?.[index]);
      const close = parseNumericValue(quote?.close?.[index]);
      const volume = parseNumericValue(quote?.volume?.[index]);

      if (
        open === null ||
        high === null ||
        low === null ||
        close === null ||
        volume === null
      ) {
        return;
      }

      series.push({
        timestamp: toTradingDay(epochSeconds, gmtOffset),
        open,
        high,
        low,
        close,
        volume,
      });
    });

    return ok(
      series.sort(
        (left, right) => left.timestamp.getTime() - right.timestamp.getTime(),
      ),
    );
  }

  async fetchFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<Fundamentals, AppBoundaryError>> {
    const response = await this.httpClient.getJson<YahooQuoteSummaryResponse>({
      url: new URL(
        `/v10/finance/quoteSummary/${encodeURIComponent(request.identifier)}`,
        this.baseUrl,
      ).toString(),
      query: { modules: "summaryDetail" },
      headers: DEFAULT_HEADERS,
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(fromHttpError("fundamentals", PROVIDER, response.error));
    }

    const summary = response.value?.quoteSummary;
    if (!summary) {
      return err(
        malformed("fundamentals", "Quote summary payload had no 'quoteSummary' section."),
      );
    }

    if (summary.error) {
      return err(fromYahooError("fundamentals", summary.error));
    }

    const detail = summary.result?.at(0)?.summaryDetail;
    return ok({
      identifier: request.identifier,
      trailingPe: parseNumericValue(detail?.trailingPE?.raw),
    });
  }
}
