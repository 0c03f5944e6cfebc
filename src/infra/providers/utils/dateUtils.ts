/**
 * Shared date utilities for provider adapters.
 */

const MS_IN_DAY = 86_400_000;

/**
 * Parses a provider date-only string as UTC midnight; returns null for anything else.
 */
export const fromIsoDate = (value: string): Date | null => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

/**
 * Truncates a bar timestamp to the exchange-local trading date, expressed as UTC midnight,
 * so series from exchanges in different time zones join on the same calendar day.
 */
export const toTradingDay = (epochSeconds: number, gmtOffsetSeconds = 0): Date => {
  const localMs = (epochSeconds + gmtOffsetSeconds) * 1000;
  return new Date(Math.floor(localMs / MS_IN_DAY) * MS_IN_DAY);
};

export const daysBetween = (from: Date, to: Date): number =>
  (to.getTime() - from.getTime()) / MS_IN_DAY;
