/** Yahoo Finance の quoteType（ファジー検索のフィルタに使用） */
export type AssetType =
  | "EQUITY"
  | "ETF"
  | "MUTUALFUND"
  | "INDEX"
  | "CURRENCY"
  | "CRYPTOCURRENCY"
  | "FUTURE"
  | "OPTION"
  | "MONEYMARKET";

export const ASSET_TYPES: readonly AssetType[] = [
  "EQUITY",
  "ETF",
  "MUTUALFUND",
  "INDEX",
  "CURRENCY",
  "CRYPTOCURRENCY",
  "FUTURE",
  "OPTION",
  "MONEYMARKET",
];

/** ファジー検索で確定したシンボル */
export interface ResolvedSymbol {
  symbol: string;
  name: string;
  exchange: string | null;
  assetType: AssetType | null;
}

/** パース直後の生データ（キー → ページ上の文字列） */
export type RawSummary = Record<string, string>;

/** クオートヘッダー部分（銘柄名・現在値・前日比） */
export interface Quote {
  symbol: string;
  name: string;
  exchange: string | null;
  currency: string | null;
  close: number | null;
  change: number | null;
  percentChange: number | null;
  afterHoursClose: number | null;          // 時間外取引（取引時間中は null）
  afterHoursChange: number | null;
  afterHoursPercentChange: number | null;
}

export const NUMERIC_FIELDS = [
  "open",
  "high",
  "low",
  "close",
  "change",
  "percentChange",
  "previousClose",
  "bidPrice",
  "bidSize",
  "askPrice",
  "askSize",
  "fiftyTwoWeekLow",
  "fiftyTwoWeekHigh",
  "volume",
  "averageVolume",
  "marketCap",
  "betaFiveYearMonthly",
  "peRatioTtm",
  "epsTtm",
  "forwardDividendYield",
  "forwardDividendYieldPercentage",
  "oneYearTargetEst",
] as const;

export type NumericField = (typeof NUMERIC_FIELDS)[number];

export const DATE_FIELDS = ["earningsDate", "exDividendDate"] as const;

export type DateField = (typeof DATE_FIELDS)[number];

/**
 * サマリーページ1銘柄分のデータ
 * 値が見つからない / 資産タイプ的に存在しない項目は null
 */
export type SummaryPage = {
  symbol: string;
  name: string;
  quote: Quote;
} & Record<NumericField, number | null> &
  Record<DateField, string | null>; // yyyy-MM-dd

/** テーブル列（symbol はインデックス、quote は除外） */
export type SummaryColumn = "name" | NumericField | DateField;

export type SummaryCell = string | number | null;

/** SummaryPageGroup の表形式ビュー（1行 = 1銘柄、symbol昇順） */
export interface SummaryTable {
  index: string[];
  columns: SummaryColumn[];
  rows: SummaryCell[][];
}
