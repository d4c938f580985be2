/**
 * クオートページのHTMLパース（cheerio）
 *
 * - div#quote-header-info → 銘柄名・現在値・前日比・時間外
 * - div#quote-summary     → サマリーテーブル（ラベル / 値の2列）
 */

import * as cheerio from "cheerio";
import type { RawSummary } from "@/types/summary";
import { normalizeLabel, TABLE_LABELS } from "@/lib/summary/fieldRules";

/** ヘッダーの fin-streamer data-field → 生データキー */
const HEADER_FIELDS: Record<string, string> = {
  regularMarketPrice: "close",
  regularMarketChange: "change",
  regularMarketChangePercent: "percent_change",
  postMarketPrice: "after_hours_close",
  postMarketChange: "after_hours_change",
  postMarketChangePercent: "after_hours_percent_change",
};

export function loadSummaryDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/**
 * クオートヘッダーをパース
 * ヘッダー要素がなければ null
 */
export function parseQuoteHeader($: cheerio.CheerioAPI): RawSummary | null {
  const header = $("div#quote-header-info").first();
  if (!header.length) return null;

  const result: RawSummary = {};

  // "Apple Inc. (AAPL)"
  const title = header.find("h1").first().text().trim();
  if (title) {
    const m = title.match(/^(.*?)\s*\(([^()]+)\)$/);
    result.name = m ? m[1] : title;
    if (m) result.symbol = m[2];
  }

  // "NasdaqGS - NasdaqGS Real Time Price. Currency in USD"
  header.find("span").each((_, span) => {
    const text = $(span).text().trim();
    const m = text.match(/^(.+?)\s+-\s+.*Currency in ([A-Z]{3})/);
    if (m && result.exchange === undefined) {
      result.exchange = m[1];
      result.currency = m[2];
    }
  });

  header.find("fin-streamer[data-field]").each((_, el) => {
    const field = $(el).attr("data-field");
    if (!field || !Object.hasOwn(HEADER_FIELDS, field)) return;
    const key = HEADER_FIELDS[field];
    const value = ($(el).attr("value") ?? $(el).text()).trim();
    if (value && result[key] === undefined) {
      result[key] = value;
    }
  });

  return Object.keys(result).length > 0 ? result : null;
}

/**
 * サマリーテーブルをパース
 * テーブルがなければ null、既知のラベルのみ取り込む
 */
export function parseSummaryTable($: cheerio.CheerioAPI): RawSummary | null {
  const summary = $("div#quote-summary").first();
  if (!summary.length) return null;

  const result: RawSummary = {};

  summary.find("tr").each((_, tr) => {
    const tds = $(tr).find("td");
    if (tds.length < 2) return;

    const label = normalizeLabel(tds.eq(0).text());
    if (!Object.hasOwn(TABLE_LABELS, label)) return;
    const key = TABLE_LABELS[label];
    if (result[key] !== undefined) return;

    result[key] = tds.eq(1).text().trim();
  });

  return Object.keys(result).length > 0 ? result : null;
}
