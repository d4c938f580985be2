/**
 * ヘッダー + サマリーテーブル → SummaryPage
 */

import type { Quote, RawSummary, SummaryPage } from "@/types/summary";
import { cleanNumber, cleanSymbol } from "./cleaners";
import { MalformedSummaryError } from "./errors";
import { applyRule, DATE_FIELD_RULES, NUMERIC_FIELD_RULES } from "./fieldRules";

function hasEntries(fragment: RawSummary | null | undefined): fragment is RawSummary {
  return !!fragment && Object.keys(fragment).length > 0;
}

function text(raw: string | undefined): string | null {
  const t = raw?.trim();
  return t ? t : null;
}

/**
 * 2層マージ。同じキーはヘッダー側を優先する
 */
export function mergeFragments(header: RawSummary, table: RawSummary): RawSummary {
  return { ...table, ...header };
}

/** ヘッダー生データからクオートを組み立てる */
export function buildQuote(symbol: string, header: RawSummary): Quote {
  const num = (key: string) => {
    const raw = header[key];
    return raw === undefined ? null : cleanNumber(raw);
  };

  return {
    symbol,
    name: text(header.name) ?? symbol,
    exchange: text(header.exchange),
    currency: text(header.currency),
    close: num("close"),
    change: num("change"),
    percentChange: num("percent_change"),
    afterHoursClose: num("after_hours_close"),
    afterHoursChange: num("after_hours_change"),
    afterHoursPercentChange: num("after_hours_percent_change"),
  };
}

/**
 * 1銘柄分の SummaryPage を作成
 * ヘッダー・テーブルどちらかが欠けていれば MalformedSummaryError
 */
export function buildSummaryPage(
  symbol: string,
  header: RawSummary | null | undefined,
  table: RawSummary | null | undefined
): SummaryPage {
  const sym = cleanSymbol(symbol);
  if (!sym) {
    throw new MalformedSummaryError("symbol is empty.");
  }
  if (!hasEntries(header) || !hasEntries(table)) {
    throw new MalformedSummaryError(`${sym} summary data is incomplete.`);
  }

  const merged = mergeFragments(header, table);
  const quote = buildQuote(sym, header);
  const num = (field: keyof typeof NUMERIC_FIELD_RULES) => applyRule(NUMERIC_FIELD_RULES[field], merged);
  const date = (field: keyof typeof DATE_FIELD_RULES) => applyRule(DATE_FIELD_RULES[field], merged);

  return {
    symbol: sym,
    name: quote.name,
    quote,

    open: num("open"),
    high: num("high"),
    low: num("low"),
    close: num("close"),
    change: num("change"),
    percentChange: num("percentChange"),
    previousClose: num("previousClose"),

    bidPrice: num("bidPrice"),
    bidSize: num("bidSize"),
    askPrice: num("askPrice"),
    askSize: num("askSize"),

    fiftyTwoWeekLow: num("fiftyTwoWeekLow"),
    fiftyTwoWeekHigh: num("fiftyTwoWeekHigh"),

    volume: num("volume"),
    averageVolume: num("averageVolume"),
    marketCap: num("marketCap"),

    betaFiveYearMonthly: num("betaFiveYearMonthly"),
    peRatioTtm: num("peRatioTtm"),
    epsTtm: num("epsTtm"),

    earningsDate: date("earningsDate"),

    forwardDividendYield: num("forwardDividendYield"),
    forwardDividendYieldPercentage: num("forwardDividendYieldPercentage"),
    exDividendDate: date("exDividendDate"),

    oneYearTargetEst: num("oneYearTargetEst"),
  };
}
