import type {
  FundamentalsRequest,
  HistoryRequest,
  MarketDataProviderPort,
} from "../../../core/ports/inboundPorts";
import type {
  AppBoundaryError,
  BoundarySource,
} from "../../../core/entities/appError";
import type { Fundamentals, PriceBar, PriceSeries } from "../../../core/entities/asset";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { windowStart } from "../../../core/entities/window";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { SystemClock } from "../../system/systemPorts";
import { fromHttpError, parseNumericValue } from "../utils/boundaryErrors";
import { daysBetween, fromIsoDate } from "../utils/dateUtils";

const PROVIDER = "alphavantage";

// Compact payloads carry the latest 100 trading days, roughly 140 calendar days.
const COMPACT_WINDOW_DAYS = 140;

type AlphaVantageNotice = {
  Information?: string;
  Note?: string;
  "Error Message"?: string;
};

type AlphaVantageDailyBar = {
  "1. open"?: string;
  "2. high"?: string;
  "3. low"?: string;
  "4. close"?: string;
  "5. volume"?: string;
};

type AlphaVantageDailyResponse = AlphaVantageNotice & {
  "Time Series (Daily)"?: Record<string, AlphaVantageDailyBar>;
};

type AlphaVantageOverviewResponse = AlphaVantageNotice & {
  Symbol?: string;
  TrailingPE?: string;
  PERatio?: string;
};

/**
 * Maps Alpha Vantage's in-body notices (which arrive with HTTP 200) to boundary errors.
 */
const noticeToError = (
  source: BoundarySource,
  payload: AlphaVantageNotice,
): AppBoundaryError | null => {
  const note = payload.Note?.trim() || payload.Information?.trim();
  if (note) {
    const isRateLimit = /rate|frequency|limit|calls per minute/i.test(note);
    return {
      source,
      code: isRateLimit ? "rate_limited" : "provider_error",
      provider: PROVIDER,
      message: note,
      retryable: isRateLimit,
    };
  }

  const errorMessage = payload["Error Message"]?.trim();
  if (errorMessage) {
    const isAuthError = /api key|unauthorized|authentication/i.test(
      errorMessage,
    );
    return {
      source,
      code: isAuthError ? "auth_invalid" : "not_found",
      provider: PROVIDER,
      message: errorMessage,
      retryable: false,
    };
  }

  return null;
};

const toPriceBar = (date: string, raw: AlphaVantageDailyBar): PriceBar | null => {
  const timestamp = fromIsoDate(date);
  const open = parseNumericValue(raw["1. open"]);
  const high = parseNumericValue(raw["2. high"]);
  const low = parseNumericValue(raw["3. low"]);
  const close = parseNumericValue(raw["4. close"]);
  const volume = parseNumericValue(raw["5. volume"]);

  if (
    timestamp === null ||
    open === null ||
    high === null ||
    low === null ||
    close === null ||
    volume === null
  ) {
    return null;
  }

  return { timestamp, open, high, low, close, volume };
};

/**
 * Adapts Alpha Vantage daily series and company overview payloads to the market-data port.
 */
export class AlphaVantageMarketDataProvider implements MarketDataProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "ALPHA_VANTAGE_API_KEY is required when the Alpha Vantage market data provider is enabled.",
      );
    }
  }

  private queryUrl(): string {
    return new URL("/query", this.baseUrl).toString();
  }

  async fetchHistory(
    request: HistoryRequest,
  ): Promise<Result<PriceSeries, AppBoundaryError>> {
    const now = this.clock.now();
    const start = windowStart(request.window, now);
    const outputSize =
      start !== null && daysBetween(start, now) <= COMPACT_WINDOW_DAYS
        ? "compact"
        : "full";

    const response = await this.httpClient.getJson<AlphaVantageDailyResponse>({
      url: this.queryUrl(),
      query: {
        function: "TIME_SERIES_DAILY",
        symbol: request.identifier,
        outputsize: outputSize,
        apikey: this.apiKey,
      },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(fromHttpError("prices", PROVIDER, response.error));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err({
        source: "prices",
        code: "malformed_response",
        provider: PROVIDER,
        message: "Daily series payload was not an object.",
        retryable: false,
      });
    }

    const notice = noticeToError("prices", payload);
    if (notice) {
      return err(notice);
    }

    const rawSeries = payload["Time Series (Daily)"];
    if (!rawSeries || typeof rawSeries !== "object") {
      return err({
        source: "prices",
        code: "malformed_response",
        provider: PROVIDER,
        message: "Daily series payload had no 'Time Series (Daily)' section.",
        retryable: false,
      });
    }

    const series: PriceSeries = [];
    for (const [date, raw] of Object.entries(rawSeries)) {
      const bar = toPriceBar(date, raw);
      if (!bar) {
        continue;
      }
      if (start !== null && bar.timestamp.getTime() < start.getTime()) {
        continue;
      }
      series.push(bar);
    }

    return ok(
      series.sort(
        (left, right) => left.timestamp.getTime() - right.timestamp.getTime(),
      ),
    );
  }

  async fetchFundamentals(
    request: FundamentalsRequest,
  ): Promise<Result<Fundamentals, AppBoundaryError>> {
    const response =
      await this.httpClient.getJson<AlphaVantageOverviewResponse>({
        url: this.queryUrl(),
        query: {
          function: "OVERVIEW",
          symbol: request.identifier,
          apikey: this.apiKey,
        },
        timeoutMs: this.timeoutMs,
      });

    if (response.isErr()) {
      return err(fromHttpError("fundamentals", PROVIDER, response.error));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err({
        source: "fundamentals",
        code: "malformed_response",
        provider: PROVIDER,
        message: "Overview payload was not an object.",
        retryable: false,
      });
    }

    const notice = noticeToError("fundamentals", payload);
    if (notice) {
      return err(notice);
    }

    return ok({
      identifier: request.identifier,
      trailingPe:
        parseNumericValue(payload.TrailingPE) ??
        parseNumericValue(payload.PERatio),
    });
  }
}
