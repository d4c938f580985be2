/**
 * 進捗表示（"\r  label 12/40 (30%)" 形式）
 */

export interface ProgressReporter {
  advance(): void;
  done(): void;
}

const NOOP_PROGRESS: ProgressReporter = {
  advance() {},
  done() {},
};

export interface ProgressStream {
  write(chunk: string): unknown;
}

/**
 * 進捗レポーターを作成
 * enabled=false なら何もしないレポーターを返す
 */
export function createProgress(
  enabled: boolean,
  total: number,
  label: string,
  stream: ProgressStream = process.stdout
): ProgressReporter {
  if (!enabled) return NOOP_PROGRESS;

  let count = 0;
  const render = () => {
    const pct = total > 0 ? Math.round((count / total) * 100) : 100;
    stream.write(`\r  ${label} ${count}/${total} (${pct}%)`);
  };

  render();
  return {
    advance() {
      count++;
      render();
    },
    done() {
      stream.write("\n");
    },
  };
}
