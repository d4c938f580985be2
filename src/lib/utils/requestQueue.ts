/**
 * 同時実行数制限付きリクエストキュー
 * バッチ取得の1パスごとに生成し、パス終了で破棄する（使い回さない）。
 */

type Task<T> = () => Promise<T>;

export class RequestQueue {
  private readonly concurrency: number;
  private running = 0;
  private queue: (() => void)[] = [];

  constructor(concurrency = 5) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1 (got ${concurrency})`);
    }
    this.concurrency = concurrency;
  }

  /** 実行中のタスク数 */
  get active(): number {
    return this.running;
  }

  /** 待機中のタスク数 */
  get pending(): number {
    return this.queue.length;
  }

  add<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        // 同期的に throw するタスクも reject に回す
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.run();
          });
      });
      this.run();
    });
  }

  private run() {
    while (this.running < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;
      this.running++;
      next();
    }
  }
}
