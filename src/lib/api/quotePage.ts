/**
 * Yahoo Finance クオートページ取得
 *
 * URL: https://finance.yahoo.com/quote/XXXX?p=XXXX
 * - HTTP 200 → 本文を返す
 * - それ以外 / 通信エラー / タイムアウト → ok: false（例外は投げない）
 */

import { DEFAULT_USER_AGENT } from "@/lib/config/scraperConfig";

const YAHOO_QUOTE_URL = "https://finance.yahoo.com/quote/";
const DEFAULT_TIMEOUT_MS = 10_000;

export interface RequestOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export interface PageResponse {
  ok: boolean;
  status: number;
  body: string;
}

export function buildQuoteUrl(symbol: string): string {
  const key = encodeURIComponent(symbol);
  return `${YAHOO_QUOTE_URL}${key}?p=${key}`;
}

/**
 * ページを取得
 * @param url クオートページURL
 */
export async function fetchQuotePage(url: string, opts: RequestOptions = {}): Promise<PageResponse> {
  try {
    const res = await fetch(url, {
      headers: {
        "User-Agent": opts.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!res.ok) {
      console.error(`[quotePage] HTTP ${res.status} for ${url}`);
      return { ok: false, status: res.status, body: "" };
    }

    return { ok: true, status: res.status, body: await res.text() };
  } catch (err) {
    console.error(`[quotePage] Error fetching ${url}:`, err instanceof Error ? err.message : err);
    return { ok: false, status: 0, body: "" };
  }
}
