/**
 * サマリーページ取得（単一銘柄 / バッチ）
 *
 * バッチは2パス構成:
 *   1. シンボル解決（useFuzzySearch 時のみ）
 *   2. ページ取得
 * withThreads=true ならパスごとに RequestQueue(threadCount) を作って並列実行する。
 * 2パス目は1パス目が全件終わってから始まる。
 */

import type { SummaryPage } from "@/types/summary";
import { lookupSymbol, type LookupFilters } from "@/lib/api/yahooFinance";
import { buildQuoteUrl, fetchQuotePage, type RequestOptions } from "@/lib/api/quotePage";
import { loadSummaryDocument, parseQuoteHeader, parseSummaryTable } from "@/lib/api/summaryParser";
import { getScraperConfig } from "@/lib/config/scraperConfig";
import { RequestQueue } from "@/lib/utils/requestQueue";
import { createProgress } from "@/lib/utils/progress";
import { buildSummaryPage } from "./builder";
import { cleanSymbol } from "./cleaners";
import { SummaryPageNotFoundError } from "./errors";
import { SummaryPageGroup } from "./summaryPageGroup";

export interface SummaryPageOptions extends RequestOptions {
  /** 取得前にあいまい検索でシンボルを確定する */
  useFuzzySearch?: boolean;
  /** true ならページが見つからないとき null を返す（false なら例外） */
  pageNotFoundOk?: boolean;
  lookup?: LookupFilters;
}

export interface SummaryPagesOptions extends SummaryPageOptions {
  withThreads?: boolean;
  threadCount?: number;
  progressBar?: boolean;
}

function notFound(symbol: string, pageNotFoundOk: boolean): null {
  if (pageNotFoundOk) return null;
  throw new SummaryPageNotFoundError(`${symbol} summary page not found.`);
}

/**
 * 単一銘柄のサマリーページを取得
 * @param symbol ティッカー or 会社名（useFuzzySearch 時）
 */
export async function getSummaryPage(
  symbol: string,
  opts: SummaryPageOptions = {}
): Promise<SummaryPage | null> {
  const { useFuzzySearch = true, pageNotFoundOk = false, lookup, ...request } = opts;
  const config = getScraperConfig();

  let target = symbol;
  if (useFuzzySearch) {
    const resolved = await lookupSymbol(symbol, { firstMatch: true, ...lookup });
    if (resolved) target = resolved.symbol;
  }
  target = cleanSymbol(target);

  const url = buildQuoteUrl(target);
  const res = await fetchQuotePage(url, {
    timeoutMs: request.timeoutMs ?? config.timeoutMs,
    userAgent: request.userAgent ?? config.userAgent,
  });
  if (!res.ok) return notFound(target, pageNotFoundOk);

  const $ = loadSummaryDocument(res.body);
  const header = parseQuoteHeader($);
  const table = parseSummaryTable($);

  try {
    return buildSummaryPage(target, header, table);
  } catch (err) {
    if (err instanceof SummaryPageNotFoundError) return notFound(target, pageNotFoundOk);
    throw err;
  }
}

/**
 * 1パス分の処理を実行し、完了順に onResult へ渡す
 *
 * 並列時: 最初に失敗したタスクのエラーを、残りのタスクが終わるのを待ってから投げる。
 * 失敗以降の結果は onResult に渡さない。
 */
async function runPass<T, R>(
  items: T[],
  work: (item: T) => Promise<R>,
  onResult: (result: R) => void,
  concurrency: number | null
): Promise<void> {
  if (concurrency === null) {
    for (const item of items) {
      onResult(await work(item));
    }
    return;
  }

  const queue = new RequestQueue(concurrency);
  const errors: unknown[] = [];

  await Promise.all(
    items.map((item) =>
      queue.add(() => work(item)).then(
        (result) => {
          if (errors.length === 0) onResult(result);
        },
        (error: unknown) => {
          errors.push(error);
        }
      )
    )
  );

  if (errors.length > 0) throw errors[0];
}

/**
 * 複数銘柄のサマリーページを取得
 * 1件も取れなければ null（空の SummaryPageGroup は返さない）
 */
export async function getSummaryPages(
  symbols: string[],
  opts: SummaryPagesOptions = {}
): Promise<SummaryPageGroup | null> {
  const config = getScraperConfig();
  const {
    useFuzzySearch = true,
    pageNotFoundOk = true,
    withThreads = false,
    threadCount = config.threadCount,
    progressBar = true,
    lookup,
    ...request
  } = opts;

  if (!Number.isInteger(threadCount) || threadCount < 1) {
    throw new RangeError(`threadCount must be an integer >= 1 (got ${threadCount})`);
  }
  const concurrency = withThreads ? threadCount : null;

  let targets = [...new Set(symbols)];

  if (useFuzzySearch) {
    const resolved = new Set<string>();
    const progress = createProgress(progressBar, targets.length, "Validating symbols...");

    await runPass(
      targets,
      (symbol) => lookupSymbol(symbol, { firstMatch: true, ...lookup }),
      (result) => {
        if (result) resolved.add(result.symbol);
        progress.advance();
      },
      concurrency
    );
    progress.done();

    const dropped = targets.length - resolved.size;
    if (dropped > 0) {
      console.warn(`[summary] ${dropped} 件はシンボル解決できず or 重複のため除外`);
    }
    targets = [...resolved];
  }

  const pages = new SummaryPageGroup();
  const progress = createProgress(progressBar, targets.length, "Downloading summary data...");

  await runPass(
    targets,
    (symbol) => getSummaryPage(symbol, { ...request, useFuzzySearch: false, pageNotFoundOk }),
    (page) => {
      if (page) pages.append(page);
      progress.advance();
    },
    concurrency
  );
  progress.done();

  return pages.length > 0 ? pages : null;
}
