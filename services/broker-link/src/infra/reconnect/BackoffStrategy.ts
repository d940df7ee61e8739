/**
 * BackoffStrategy の設定
 */
export interface BackoffOptions {
  /** 初回の遅延（ミリ秒） */
  baseDelayMs?: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs?: number;
}

/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * 再接続時の遅延を指数関数的に増加させる戦略を実装する。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(options?: BackoffOptions) {
    this.baseDelayMs = options?.baseDelayMs ?? 1000; // 1秒
    this.maxDelayMs = options?.maxDelayMs ?? 30000; // 30秒
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const delay = Math.min(this.baseDelayMs * 2 ** this.attempt, this.maxDelayMs);
    this.attempt += 1;
    return delay;
  }

  /**
   * バックオフカウンターをリセットする。
   * プールの構築が終わるたびに（成功・失敗とも）呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
