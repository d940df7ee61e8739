import { Mutex } from '@/application/concurrency/Mutex';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { errorMessage } from '@/domain/errors';
import type { MarketTick } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type TickHandler = (tick: MarketTick) => void | Promise<void>;

interface DedupEntry {
  readonly mutex: Mutex;
  lastSeen: number | null;
}

/**
 * アプリケーション層: 銘柄ごとの単調タイムスタンプフィルタ
 *
 * 責務: 複数ソケット・複数チャンネルから順不同で届くティックのうち、
 * 直前に配信したものより新しいものだけを戦略層に渡す。
 * 同時刻・過去時刻のティックは黙って捨てる。
 *
 * エントリ（ロックと最終時刻）は購読確定時に open、購読解除確定時に close される。
 */
export class DedupGate {
  private readonly entries = new Map<string, DedupEntry>();
  private handler: TickHandler | null = null;
  private readonly logger: Logger;

  constructor(
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'DedupGate' });
  }

  /**
   * 配信先のハンドラを設定する。
   */
  setHandler(handler: TickHandler): void {
    this.handler = handler;
  }

  /**
   * 銘柄のエントリを作成する。既にあれば最終時刻を保ったまま何もしない。
   */
  open(symbol: string): void {
    if (!this.entries.has(symbol)) {
      this.entries.set(symbol, { mutex: new Mutex(), lastSeen: null });
    }
  }

  /**
   * 銘柄のエントリを破棄する。
   */
  close(symbol: string): void {
    this.entries.delete(symbol);
  }

  /**
   * エントリのある銘柄の一覧
   */
  symbols(): string[] {
    return [...this.entries.keys()];
  }

  isOpen(symbol: string): boolean {
    return this.entries.has(symbol);
  }

  /**
   * 最後に配信したティックの時刻。未配信またはエントリがなければ null
   */
  lastSeen(symbol: string): number | null {
    return this.entries.get(symbol)?.lastSeen ?? null;
  }

  /**
   * ティックを受け取り、配信条件を満たせばハンドラに渡す。
   * @returns 配信した場合は true
   */
  async offer(tick: MarketTick): Promise<boolean> {
    const entry = this.entries.get(tick.symbol);
    if (!entry) {
      this.metricsCollector?.incrementDropped('not_subscribed');
      return false;
    }

    return await entry.mutex.runExclusive(async () => {
      // 待機中に購読解除された場合は配信しない
      if (this.entries.get(tick.symbol) !== entry) {
        this.metricsCollector?.incrementDropped('not_subscribed');
        return false;
      }
      if (entry.lastSeen !== null && tick.time <= entry.lastSeen) {
        this.metricsCollector?.incrementDropped('stale');
        return false;
      }

      entry.lastSeen = tick.time;
      this.metricsCollector?.incrementDelivered(tick.symbol);

      if (this.handler) {
        try {
          await this.handler(tick);
        } catch (error) {
          this.logger.error('tick handler failed', { symbol: tick.symbol, time: tick.time, error: errorMessage(error) });
        }
      }
      return true;
    });
  }
}
