import { describe, it, expect } from "vitest";
import type { RawSummary } from "@/types/summary";
import { buildQuote, buildSummaryPage, mergeFragments } from "../builder";
import { MalformedSummaryError, SummaryPageNotFoundError } from "../errors";

const header: RawSummary = {
  name: "Apple Inc.",
  symbol: "AAPL",
  exchange: "NasdaqGS",
  currency: "USD",
  close: "189.84",
  change: "+1.23",
  percent_change: "(+0.65%)",
};

const table: RawSummary = {
  previous_close: "188.61",
  open: "188.90",
  bid: "189.50 x 800",
  ask: "189.90 x 1000",
  days_range: "187.12 - 190.30",
  fifty_two_week_range: "164.08 - 199.62",
  volume: "52,345,678",
  avg_volume: "58,901,234",
  market_cap: "2.91T",
  beta_five_year_monthly: "1.29",
  pe_ratio_ttm: "29.45",
  eps_ttm: "6.44",
  earnings_date: "Jul 27, 2026 - Jul 31, 2026",
  forward_dividend_yield: "0.96 (0.51%)",
  exdividend_date: "May 10, 2026",
  one_year_target_est: "205.50",
};

describe("builder", () => {
  describe("mergeFragments", () => {
    it("keeps header values for overlapping keys", () => {
      const merged = mergeFragments({ close: "10" }, { close: "99", open: "9" });
      expect(merged).toEqual({ close: "10", open: "9" });
    });
  });

  describe("buildQuote", () => {
    it("builds the nested quote from the header", () => {
      expect(buildQuote("AAPL", header)).toEqual({
        symbol: "AAPL",
        name: "Apple Inc.",
        exchange: "NasdaqGS",
        currency: "USD",
        close: 189.84,
        change: 1.23,
        percentChange: 0.65,
        afterHoursClose: null,
        afterHoursChange: null,
        afterHoursPercentChange: null,
      });
    });

    it("falls back to the symbol when the name is missing", () => {
      const quote = buildQuote("AAPL", { close: "1" });
      expect(quote.name).toBe("AAPL");
      expect(quote.exchange).toBeNull();
    });
  });

  describe("buildSummaryPage", () => {
    it("resolves every field from the merged fragments", () => {
      const page = buildSummaryPage("aapl", header, table);

      expect(page).toMatchObject({
        symbol: "AAPL",
        name: "Apple Inc.",
        open: 188.9,
        low: 187.12,
        high: 190.3,
        close: 189.84,
        change: 1.23,
        percentChange: 0.65,
        previousClose: 188.61,
        bidPrice: 189.5,
        bidSize: 800,
        askPrice: 189.9,
        askSize: 1000,
        fiftyTwoWeekLow: 164.08,
        fiftyTwoWeekHigh: 199.62,
        volume: 52_345_678,
        averageVolume: 58_901_234,
        marketCap: 2_910_000_000_000,
        betaFiveYearMonthly: 1.29,
        peRatioTtm: 29.45,
        epsTtm: 6.44,
        earningsDate: "2026-07-27",
        forwardDividendYield: 0.96,
        forwardDividendYieldPercentage: 0.51,
        exDividendDate: "2026-05-10",
        oneYearTargetEst: 205.5,
      });
      expect(page.quote.symbol).toBe("AAPL");
      expect(page.quote.currency).toBe("USD");
    });

    it("prefers header values over table values", () => {
      const page = buildSummaryPage("AAPL", header, { ...table, close: "1.00" });
      expect(page.close).toBe(189.84);
    });

    it("sets null for missing and unparsable fields", () => {
      const page = buildSummaryPage("SPY", { name: "SPDR S&P 500" }, { open: "500.10", pe_ratio_ttm: "N/A" });

      expect(page.open).toBe(500.1);
      expect(page.peRatioTtm).toBeNull();
      expect(page.bidPrice).toBeNull();
      expect(page.bidSize).toBeNull();
      expect(page.earningsDate).toBeNull();
    });

    it("is deterministic for identical input", () => {
      expect(buildSummaryPage("AAPL", header, table)).toEqual(buildSummaryPage("AAPL", header, table));
    });

    it("throws MalformedSummaryError when the header is missing", () => {
      expect(() => buildSummaryPage("AAPL", null, table)).toThrow(MalformedSummaryError);
    });

    it("throws MalformedSummaryError when the table is empty", () => {
      expect(() => buildSummaryPage("AAPL", header, {})).toThrow(MalformedSummaryError);
    });

    it("reports missing fragments as page not found", () => {
      expect(() => buildSummaryPage("AAPL", undefined, undefined)).toThrow(SummaryPageNotFoundError);
    });

    it("rejects an empty symbol", () => {
      expect(() => buildSummaryPage("  ", header, table)).toThrow("symbol is empty.");
    });
  });
});
