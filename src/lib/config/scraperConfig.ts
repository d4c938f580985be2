// ============================================================
// スクレイパー設定
// 環境変数（.env.local）で上書き可能
// ============================================================

export interface ScraperConfig {
  threadCount: number;   // 並列取得時の同時実行数
  timeoutMs: number;     // 1リクエストのタイムアウト
  userAgent: string;
}

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const DEFAULT_CONFIG: ScraperConfig = {
  threadCount: 5,
  timeoutMs: 10_000,
  userAgent: DEFAULT_USER_AGENT,
};

function readPositiveInt(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.warn(`[Config] ${name}=${raw} は不正な値。デフォルト ${fallback} を使用`);
    return fallback;
  }
  return parsed;
}

/** 設定を読み込む（環境変数があればマージ） */
export function getScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return {
    threadCount: readPositiveInt("SUMMARY_THREAD_COUNT", DEFAULT_CONFIG.threadCount, env),
    timeoutMs: readPositiveInt("SUMMARY_TIMEOUT_MS", DEFAULT_CONFIG.timeoutMs, env),
    userAgent: env.SUMMARY_USER_AGENT || DEFAULT_CONFIG.userAgent,
  };
}
