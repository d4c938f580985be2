#!/usr/bin/env npx tsx
// ============================================================
// サマリーページ一括取得スクリプト
//
// Yahoo Finance のクオートページをスクレイピングして一覧表示 / CSV / JSON 出力
//
// 使い方:
//   npx tsx scripts/fetch-summary.ts AAPL TSLA "Beyond Meat"   # 逐次取得
//   npx tsx scripts/fetch-summary.ts AAPL TSLA --threads       # 並列取得
//   npx tsx scripts/fetch-summary.ts --file tickers.txt        # 1行1銘柄のファイル
//   npx tsx scripts/fetch-summary.ts AAPL --thread-count 10    # 同時実行数
//   npx tsx scripts/fetch-summary.ts AAPL --no-fuzzy           # あいまい検索なし
//   npx tsx scripts/fetch-summary.ts AAPL --strict             # 見つからない銘柄でエラー終了
//   npx tsx scripts/fetch-summary.ts AAPL --csv out.csv        # CSV 出力
//   npx tsx scripts/fetch-summary.ts AAPL --json               # JSON を標準出力
//   npx tsx scripts/fetch-summary.ts AAPL --quiet              # 進捗表示なし
// ============================================================

import dotenv from "dotenv";
dotenv.config({ path: ".env.local" });

import { readFileSync, writeFileSync } from "fs";
import { getArgs, getPositionalArgs, hasFlag, parseFlag, parseIntFlag } from "@/lib/utils/cli";
import { getScraperConfig } from "@/lib/config/scraperConfig";
import { getSummaryPages } from "@/lib/summary/summaryPages";
import { generateSummaryCsv } from "@/lib/utils/csvExport";
import { formatChange, formatPrice, formatVolume } from "@/lib/utils/format";

// ── Args ──────────────────────────────────────────────────

const args = getArgs();
const VALUE_FLAGS = ["--file", "--thread-count", "--csv"];

const withThreads = hasFlag(args, "--threads");
const threadCount = parseIntFlag(args, "--thread-count", getScraperConfig().threadCount);
const useFuzzySearch = !hasFlag(args, "--no-fuzzy");
const pageNotFoundOk = !hasFlag(args, "--strict");
const quiet = hasFlag(args, "--quiet");
const asJson = hasFlag(args, "--json");
const csvPath = parseFlag(args, "--csv");
const filePath = parseFlag(args, "--file");

// ── Load symbols ──────────────────────────────────────────

function loadSymbols(): string[] {
  const symbols = getPositionalArgs(args, VALUE_FLAGS);
  if (filePath) {
    const lines = readFileSync(filePath, "utf-8")
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith("#"));
    symbols.push(...lines);
  }
  return symbols;
}

// ── Main ──────────────────────────────────────────────────

async function main() {
  const symbols = loadSymbols();
  if (symbols.length === 0) {
    console.error("銘柄を指定してください（例: npx tsx scripts/fetch-summary.ts AAPL TSLA）");
    process.exit(1);
  }

  const startTime = Date.now();
  const pages = await getSummaryPages(symbols, {
    useFuzzySearch,
    pageNotFoundOk,
    withThreads,
    threadCount,
    progressBar: !quiet && !asJson,
  });
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

  if (!pages) {
    console.error(`\n取得できた銘柄はありません (${elapsed}秒)`);
    process.exit(1);
  }

  pages.sort();

  if (asJson) {
    console.log(JSON.stringify(pages, null, 2));
  } else {
    console.log(`\n完了 (${elapsed}秒) ${pages.length}/${symbols.length}件`);
    for (const page of pages) {
      console.log(
        `  ${page.symbol.padEnd(8)} ${formatPrice(page.close, page.quote.currency).padStart(12)} ` +
          `${formatChange(page.percentChange).padStart(8)}  vol ${formatVolume(page.volume).padStart(7)}  ` +
          `cap ${formatVolume(page.marketCap).padStart(7)}  ${page.name}`
      );
    }
  }

  if (csvPath) {
    const table = pages.toTable();
    if (table) {
      writeFileSync(csvPath, generateSummaryCsv(table), "utf-8");
      if (!asJson) console.log(`\nCSV出力: ${csvPath}`);
    }
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
