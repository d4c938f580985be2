/**
 * SummaryTable → CSV 文字列
 */

import type { SummaryCell, SummaryTable } from "@/types/summary";

function quoteCell(value: SummaryCell): string {
  if (value === null) return "";
  if (typeof value === "number") return String(value);
  // ダブルクォートはエスケープ
  return `"${value.replace(/"/g, '""')}"`;
}

/** 1行目ヘッダー（symbol + 各列）、以降1銘柄1行 */
export function generateSummaryCsv(table: SummaryTable): string {
  const header = ["symbol", ...table.columns].map((c) => `"${c}"`).join(",");
  const rows = table.rows.map((row, i) => [quoteCell(table.index[i]), ...row.map(quoteCell)].join(","));
  return [header, ...rows].join("\n");
}
