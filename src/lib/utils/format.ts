/**
 * 価格を通貨形式にフォーマット
 */
export function formatPrice(value: number | null, currency: string | null = "USD"): string {
  if (value === null) return "－";
  try {
    return new Intl.NumberFormat("en-US", {
      style: "currency",
      currency: currency ?? "USD",
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    }).format(value);
  } catch {
    // 不明な通貨コード
    return value.toFixed(2);
  }
}

/**
 * 変動率をフォーマット（+/-付き）
 */
export function formatChange(value: number | null): string {
  if (value === null) return "－";
  const sign = value >= 0 ? "+" : "";
  return `${sign}${value.toFixed(2)}%`;
}

/**
 * 大きな数値を短縮表示（例: 1.2M, 3.5B, 2.9T）
 */
export function formatVolume(value: number | null): string {
  if (value === null) return "－";
  if (value >= 1_000_000_000_000) {
    return `${(value / 1_000_000_000_000).toFixed(1)}T`;
  }
  if (value >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(1)}B`;
  }
  if (value >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(1)}M`;
  }
  if (value >= 1_000) {
    return `${(value / 1_000).toFixed(1)}K`;
  }
  return value.toString();
}
