/**
 * CLI utilities - 共通ユーティリティ関数
 */

/**
 * CLIフラグの値を取得
 * @example parseFlag(['--csv', 'out.csv'], '--csv') // 'out.csv'
 * @example parseFlag(['--csv=out.csv'], '--csv') // 'out.csv'
 */
export function parseFlag(args: string[], flag: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    // --flag=value 形式
    if (arg.startsWith(`${flag}=`)) {
      return arg.slice(flag.length + 1);
    }
    // --flag value 形式
    if (arg === flag && i + 1 < args.length && !args[i + 1].startsWith("-")) {
      return args[i + 1];
    }
  }
  return undefined;
}

/**
 * フラグの存在確認
 * @example hasFlag(['--threads', '--quiet'], '--threads') // true
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.some((arg) => arg === flag || arg.startsWith(`${flag}=`));
}

/**
 * process.argv から引数を取得（node と script パスを除く）
 */
export function getArgs(): string[] {
  return process.argv.slice(2);
}

/**
 * フラグの数値を取得
 * @example parseIntFlag(['--thread-count', '10'], '--thread-count', 5) // 10
 * @example parseIntFlag([], '--thread-count', 5) // 5 (default)
 */
export function parseIntFlag(args: string[], flag: string, defaultValue: number): number {
  const value = parseFlag(args, flag);
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * 位置引数をすべて取得（値を取るフラグの値は除く）
 * @example getPositionalArgs(['AAPL', '--csv', 'out.csv', 'Tesla'], ['--csv']) // ['AAPL', 'Tesla']
 */
export function getPositionalArgs(args: string[], valueFlags: string[] = []): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("-")) {
      // "--flag value" 形式なら値もスキップ
      if (valueFlags.includes(arg) && i + 1 < args.length && !args[i + 1].startsWith("-")) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}
