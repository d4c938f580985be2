/**
 * フィールド解決テーブル
 *
 * target（SummaryPage のキー）→ source（マージ済み生データのキー）+ extractor。
 * 1つの生データから2項目を作るもの（"low - high", "price x size"）もここで固定する。
 */

import type { DateField, NumericField } from "@/types/summary";
import {
  cleanDate,
  cleanInteger,
  cleanNumber,
  DASH,
  segmentOf,
  SPACE,
  TIMES,
  type Extractor,
} from "./cleaners";

export interface FieldRule<T> {
  source: string;
  extract: Extractor<T>;
}

export const NUMERIC_FIELD_RULES: Record<NumericField, FieldRule<number>> = {
  open: { source: "open", extract: cleanNumber },
  low: { source: "days_range", extract: segmentOf(DASH, 0, cleanNumber) },
  high: { source: "days_range", extract: segmentOf(DASH, 1, cleanNumber) },
  close: { source: "close", extract: cleanNumber },
  change: { source: "change", extract: cleanNumber },
  percentChange: { source: "percent_change", extract: cleanNumber },
  previousClose: { source: "previous_close", extract: cleanNumber },
  bidPrice: { source: "bid", extract: segmentOf(TIMES, 0, cleanNumber) },
  bidSize: { source: "bid", extract: segmentOf(TIMES, 1, cleanInteger) },
  askPrice: { source: "ask", extract: segmentOf(TIMES, 0, cleanNumber) },
  askSize: { source: "ask", extract: segmentOf(TIMES, 1, cleanInteger) },
  fiftyTwoWeekLow: { source: "fifty_two_week_range", extract: segmentOf(DASH, 0, cleanNumber) },
  fiftyTwoWeekHigh: { source: "fifty_two_week_range", extract: segmentOf(DASH, 1, cleanNumber) },
  volume: { source: "volume", extract: cleanInteger },
  averageVolume: { source: "avg_volume", extract: cleanInteger },
  marketCap: { source: "market_cap", extract: cleanInteger },
  betaFiveYearMonthly: { source: "beta_five_year_monthly", extract: cleanNumber },
  peRatioTtm: { source: "pe_ratio_ttm", extract: cleanNumber },
  epsTtm: { source: "eps_ttm", extract: cleanNumber },
  forwardDividendYield: { source: "forward_dividend_yield", extract: segmentOf(SPACE, 0, cleanNumber) },
  forwardDividendYieldPercentage: {
    source: "forward_dividend_yield",
    extract: segmentOf(SPACE, 1, cleanNumber),
  },
  oneYearTargetEst: { source: "one_year_target_est", extract: cleanNumber },
};

export const DATE_FIELD_RULES: Record<DateField, FieldRule<string>> = {
  // 決算日は "Jul 27, 2026 - Jul 31, 2026" のように幅がある場合は開始日
  earningsDate: { source: "earnings_date", extract: segmentOf(DASH, 0, cleanDate) },
  exDividendDate: { source: "exdividend_date", extract: cleanDate },
};

/** ラベル表記ゆれ吸収: 小文字化して英数字以外を除去 */
export function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/** サマリーテーブルのラベル → 生データキー */
export const TABLE_LABELS: Record<string, string> = {
  previousclose: "previous_close",
  open: "open",
  bid: "bid",
  ask: "ask",
  daysrange: "days_range",
  "52weekrange": "fifty_two_week_range",
  volume: "volume",
  avgvolume: "avg_volume",
  marketcap: "market_cap",
  marketcapintraday: "market_cap",
  beta5ymonthly: "beta_five_year_monthly",
  peratiottm: "pe_ratio_ttm",
  epsttm: "eps_ttm",
  earningsdate: "earnings_date",
  forwarddividendyield: "forward_dividend_yield",
  exdividenddate: "exdividend_date",
  "1ytargetest": "one_year_target_est",
};

export function applyRule<T>(rule: FieldRule<T>, merged: Record<string, string>): T | null {
  const raw = merged[rule.source];
  return raw === undefined ? null : rule.extract(raw);
}
