/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * DedupGate でティックを落とした理由
 */
export type TickDropReason = 'stale' | 'not_subscribed' | 'queue_full';

/**
 * メトリクス収集インターフェース
 *
 * 責務: 接続・購読・配信のメトリクスの収集と公開を抽象化
 */
export interface MetricsCollector {
  /**
   * ソケットから受信したティック数をカウント
   * @param symbol 銘柄コード（2330 など）
   */
  incrementReceived(symbol: string): void;

  /**
   * 戦略層に配信したティック数をカウント
   * @param symbol 銘柄コード
   */
  incrementDelivered(symbol: string): void;

  /**
   * 配信せずに捨てたティック数をカウント
   */
  incrementDropped(reason: TickDropReason): void;

  /**
   * エラー数をカウント
   * @param errorType エラー種別（malformed_message, capacity_exceeded, publish_error など）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続（プール再構築）の実行回数をカウント
   */
  incrementReconnect(): void;

  /**
   * 再ログインの試行をカウント
   */
  incrementReloginAttempt(result: 'success' | 'failure'): void;

  /**
   * 現在の購読数を記録
   */
  setSubscriptions(count: number): void;

  /**
   * 生存フラグを記録（1: alive, 0: dead）
   */
  setAlive(alive: boolean): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
