import YahooFinance from "yahoo-finance2";
import { ASSET_TYPES, type AssetType, type ResolvedSymbol } from "@/types/summary";

const yf = new YahooFinance();

export interface LookupFilters {
  /** 対象とする quoteType（未指定なら全種） */
  assetTypes?: readonly AssetType[];
  /** 対象とする取引所コード（"NMS", "NYQ" など。未指定なら全取引所） */
  exchanges?: readonly string[];
}

export interface LookupOptions extends LookupFilters {
  /** true なら最初の候補のみ採用 */
  firstMatch?: boolean;
}

function readString(obj: object, key: string): string | null {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" && value !== "" ? value : null;
}

function toAssetType(value: string | null): AssetType | null {
  if (!value) return null;
  const upper = value.toUpperCase();
  return ASSET_TYPES.find((t) => t === upper) ?? null;
}

/**
 * 銘柄を検索（ティッカー / 会社名のあいまい検索）
 */
export async function searchSymbols(query: string, filters: LookupFilters = {}): Promise<ResolvedSymbol[]> {
  const q = query.trim();
  if (!q) return [];

  const result = await yf.search(q, { newsCount: 0 });
  const matches: ResolvedSymbol[] = [];

  for (const quote of result.quotes) {
    const symbol = readString(quote, "symbol");
    if (!symbol) continue;

    const assetType = toAssetType(readString(quote, "quoteType"));
    const exchange = readString(quote, "exchange");

    if (filters.assetTypes && (!assetType || !filters.assetTypes.includes(assetType))) continue;
    if (filters.exchanges && (!exchange || !filters.exchanges.includes(exchange))) continue;

    matches.push({
      symbol,
      name: readString(quote, "shortname") ?? readString(quote, "longname") ?? symbol,
      exchange,
      assetType,
    });
  }

  return matches;
}

/**
 * クエリを正規のシンボルに解決
 * 見つからなければ null
 */
export async function lookupSymbol(query: string, opts: LookupOptions = {}): Promise<ResolvedSymbol | null> {
  const { firstMatch = true, ...filters } = opts;
  const matches = await searchSymbols(query, filters);
  if (matches.length === 0) return null;

  if (!firstMatch) {
    // ティッカー完全一致を優先し、なければ先頭
    const upper = query.trim().toUpperCase();
    return matches.find((m) => m.symbol === upper) ?? matches[0];
  }
  return matches[0];
}
