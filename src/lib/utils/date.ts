import { format, isValid, parse, parseISO } from "date-fns";

/** サマリーテーブルに出てくる日付の書式（"Jul 27, 2026" / "2026-07-27"） */
const SUMMARY_DATE_FORMATS = ["MMM d, yyyy", "MMMM d, yyyy", "yyyy-MM-dd"];

/**
 * 日付を YYYY-MM-DD 形式にフォーマット
 */
export function formatDate(date: Date | string): string {
  const d = typeof date === "string" ? parseISO(date) : date;
  return format(d, "yyyy-MM-dd");
}

/**
 * ページ上の日付文字列を YYYY-MM-DD に変換
 * 解釈できなければ null
 */
export function parseSummaryDate(raw: string): string | null {
  const text = raw.trim();
  if (!text) return null;

  for (const fmt of SUMMARY_DATE_FORMATS) {
    const d = parse(text, fmt, new Date(2000, 0, 1));
    if (isValid(d)) return formatDate(d);
  }
  return null;
}
