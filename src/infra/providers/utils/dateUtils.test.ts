import { describe, expect, it } from "vitest";
import { daysBetween, fromIsoDate, toTradingDay } from "./dateUtils";

describe("dateUtils", () => {
  it("parses date-only strings as UTC midnight", () => {
    expect(fromIsoDate("2026-02-26")?.toISOString()).toBe(
      "2026-02-26T00:00:00.000Z",
    );
    expect(fromIsoDate("26/02/2026")).toBeNull();
    expect(fromIsoDate("2026-13-45")).toBeNull();
  });

  it("maps a bar to its exchange-local trading day", () => {
    // 2026-02-27T02:00:00Z is still the 26th in UTC-3.
    expect(toTradingDay(1772157600, -10_800).toISOString()).toBe(
      "2026-02-26T00:00:00.000Z",
    );
    expect(toTradingDay(1772157600).toISOString()).toBe(
      "2026-02-27T00:00:00.000Z",
    );
  });

  it("measures whole and fractional days", () => {
    expect(
      daysBetween(new Date("2026-01-01T00:00:00Z"), new Date("2026-01-31T12:00:00Z")),
    ).toBe(30.5);
  });
});
