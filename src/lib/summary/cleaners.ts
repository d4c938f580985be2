/**
 * サマリーページの値クリーナー
 *
 * いずれも純粋関数。解釈できない入力は null を返し、例外は投げない。
 */

import { parseSummaryDate } from "@/lib/utils/date";

export type Extractor<T> = (raw: string) => T | null;

/** 値なしを表すプレースホルダー */
const PLACEHOLDERS = new Set(["", "N/A", "NA", "--", "-", "∞"]);

const MAGNITUDE: Record<string, number> = {
  k: 1e3,
  K: 1e3,
  M: 1e6,
  B: 1e9,
  T: 1e12,
};

function isPlaceholder(raw: string): boolean {
  return PLACEHOLDERS.has(raw.trim());
}

/** "AAPL " → "AAPL", "goog" → "GOOG" */
export function cleanSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * 数値に変換
 * @example cleanNumber("$1,234.50") // 1234.5
 * @example cleanNumber("(+0.52%)") // 0.52
 * @example cleanNumber("2.91T") // 2910000000000
 * @example cleanNumber("N/A") // null
 */
export function cleanNumber(raw: string): number | null {
  if (isPlaceholder(raw)) return null;

  let text = raw.trim().replace(/[$%,()\s]/g, "").replace(/^\+/, "");
  if (!text) return null;

  let multiplier = 1;
  const suffix = text.slice(-1);
  if (suffix in MAGNITUDE) {
    multiplier = MAGNITUDE[suffix];
    text = text.slice(0, -1);
  }

  // Number("") は 0 になるので弾く
  if (!text) return null;
  const value = Number(text);
  if (!Number.isFinite(value)) return null;

  // 浮動小数の誤差を避けるため桁上げ後に丸める
  return multiplier === 1 ? value : Math.round(value * multiplier);
}

/** 株数・出来高など整数の項目 */
export function cleanInteger(raw: string): number | null {
  const value = cleanNumber(raw);
  return value === null ? null : Math.round(value);
}

export function cleanDate(raw: string): string | null {
  if (isPlaceholder(raw)) return null;
  return parseSummaryDate(raw);
}

function segment(raw: string, separator: RegExp, index: 0 | 1): string | null {
  const parts = raw.trim().split(separator);
  if (parts.length < index + 1) return null;
  return parts[index];
}

/** 区切り文字で分割し、指定位置の値を extractor で変換する extractor を作る */
export function segmentOf<T>(separator: RegExp, index: 0 | 1, extract: Extractor<T>): Extractor<T> {
  return (raw) => {
    const part = segment(raw, separator, index);
    return part === null ? null : extract(part);
  };
}

/** "low - high" 形式 */
export const DASH = /\s+-\s+/;
/** "price x size" 形式 */
export const TIMES = /\s+x\s+/;
/** "0.96 (0.52%)" 形式 */
export const SPACE = /\s+/;
