/**
 * Ticker symbol as supplied by the caller. Only emptiness is checked.
 */
export type Identifier = string;

export type PriceBar = {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/**
 * Daily bars ordered by timestamp ascending. Empty when the provider had no data.
 */
export type PriceSeries = PriceBar[];

export type Fundamentals = {
  identifier: Identifier;
  trailingPe: number | null;
};
