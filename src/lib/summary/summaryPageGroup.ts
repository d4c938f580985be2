/**
 * 複数銘柄の SummaryPage をまとめるコレクション
 */

import {
  DATE_FIELDS,
  NUMERIC_FIELDS,
  type SummaryColumn,
  type SummaryPage,
  type SummaryTable,
} from "@/types/summary";
import { InvalidAppendError } from "./errors";

/** テーブル列順（symbol はインデックス、quote は除外） */
export const SUMMARY_COLUMNS: readonly SummaryColumn[] = ["name", ...NUMERIC_FIELDS, ...DATE_FIELDS];

/** シンボル昇順の比較関数 */
export function compareBySymbol(a: SummaryPage, b: SummaryPage): number {
  if (a.symbol < b.symbol) return -1;
  if (a.symbol > b.symbol) return 1;
  return 0;
}

function isNullableNumber(value: unknown): boolean {
  return value === null || typeof value === "number";
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === "string";
}

/** 実行時の型チェック（JSON由来の値などを弾く） */
export function isSummaryPage(value: unknown): value is SummaryPage {
  if (typeof value !== "object" || value === null) return false;

  const symbol: unknown = Reflect.get(value, "symbol");
  const name: unknown = Reflect.get(value, "name");
  const quote: unknown = Reflect.get(value, "quote");
  if (typeof symbol !== "string" || symbol === "") return false;
  if (typeof name !== "string") return false;
  if (typeof quote !== "object" || quote === null) return false;

  return (
    NUMERIC_FIELDS.every((f) => isNullableNumber(Reflect.get(value, f))) &&
    DATE_FIELDS.every((f) => isNullableString(Reflect.get(value, f)))
  );
}

export class SummaryPageGroup implements Iterable<SummaryPage> {
  private items: SummaryPage[] = [];

  /** SummaryPage 以外は InvalidAppendError */
  append(page: unknown): void {
    if (!isSummaryPage(page)) {
      throw new InvalidAppendError();
    }
    this.items.push(page);
  }

  get length(): number {
    return this.items.length;
  }

  get pages(): readonly SummaryPage[] {
    return this.items;
  }

  get symbols(): string[] {
    return this.items.map((p) => p.symbol);
  }

  /** シンボル昇順に並べ替え（破壊的） */
  sort(): void {
    this.items.sort(compareBySymbol);
  }

  [Symbol.iterator](): Iterator<SummaryPage> {
    return this.items[Symbol.iterator]();
  }

  /**
   * 表形式に変換（1行 = 1銘柄、symbol昇順）
   * 空なら null
   */
  toTable(): SummaryTable | null {
    if (this.items.length === 0) return null;

    const sorted = [...this.items].sort(compareBySymbol);
    return {
      index: sorted.map((p) => p.symbol),
      columns: [...SUMMARY_COLUMNS],
      rows: sorted.map((p) => SUMMARY_COLUMNS.map((c) => p[c])),
    };
  }

  toJSON(): { pages: SummaryPage[] } {
    return { pages: [...this.items] };
  }
}
