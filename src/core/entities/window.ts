import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "./appError";

export type WindowUnit = "day" | "week" | "month" | "year";

/**
 * Historical span requested from a provider, parsed from descriptors such as `6mo`, `1 year` or `ytd`.
 */
export type EvaluationWindow =
  | { kind: "relative"; amount: number; unit: WindowUnit; descriptor: string }
  | { kind: "ytd"; descriptor: "ytd" }
  | { kind: "max"; descriptor: "max" };

const MS_IN_DAY = 86_400_000;

const unitAliases: Record<string, WindowUnit> = {
  d: "day",
  day: "day",
  days: "day",
  w: "week",
  wk: "week",
  wks: "week",
  week: "week",
  weeks: "week",
  mo: "month",
  mos: "month",
  month: "month",
  months: "month",
  y: "year",
  yr: "year",
  yrs: "year",
  year: "year",
  years: "year",
};

const unitSuffix: Record<WindowUnit, string> = {
  day: "d",
  week: "wk",
  month: "mo",
  year: "y",
};

const invalidWindow = (raw: string, reason: string): AppBoundaryError => ({
  source: "config",
  code: "config_invalid",
  provider: "window",
  message: `Invalid window '${raw}': ${reason}.`,
  retryable: false,
});

export const parseWindow = (
  raw: string,
): Result<EvaluationWindow, AppBoundaryError> => {
  const normalized = raw.trim().toLowerCase();

  if (normalized === "ytd") {
    return ok({ kind: "ytd", descriptor: "ytd" });
  }

  if (normalized === "max") {
    return ok({ kind: "max", descriptor: "max" });
  }

  const match = /^(\d+)\s*([a-z]+)$/.exec(normalized);
  if (!match) {
    return err(
      invalidWindow(raw, "expected <amount><unit>, 'ytd' or 'max'"),
    );
  }

  const [, amountText = "", unitText = ""] = match;
  const unit = unitAliases[unitText];
  if (!unit) {
    return err(invalidWindow(raw, `unknown unit '${unitText}'`));
  }

  const amount = Number.parseInt(amountText, 10);
  if (amount <= 0) {
    return err(invalidWindow(raw, "amount must be positive"));
  }

  return ok({
    kind: "relative",
    amount,
    unit,
    descriptor: `${amount}${unitSuffix[unit]}`,
  });
};

/**
 * Steps back whole calendar months, clamping the day to the end of a shorter target month
 * (31 Aug minus six months is 28 Feb, not 3 Mar).
 */
const monthsBefore = (now: Date, months: number): Date => {
  const target = now.getUTCFullYear() * 12 + now.getUTCMonth() - months;
  const year = Math.floor(target / 12);
  const month = target - year * 12;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

  return new Date(
    Date.UTC(
      year,
      month,
      Math.min(now.getUTCDate(), lastDay),
      now.getUTCHours(),
      now.getUTCMinutes(),
      now.getUTCSeconds(),
      now.getUTCMilliseconds(),
    ),
  );
};

/**
 * Resolves the inclusive start of a window relative to `now`; `null` means unbounded history.
 */
export const windowStart = (window: EvaluationWindow, now: Date): Date | null => {
  switch (window.kind) {
    case "max":
      return null;
    case "ytd":
      return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
    case "relative": {
      if (window.unit === "day") {
        return new Date(now.getTime() - window.amount * MS_IN_DAY);
      }
      if (window.unit === "week") {
        return new Date(now.getTime() - window.amount * 7 * MS_IN_DAY);
      }
      const months =
        window.unit === "month" ? window.amount : window.amount * 12;
      return monthsBefore(now, months);
    }
  }
};
