import type { MarketTick } from '@/domain/types';

/**
 * 配信済みティックの出力先（インフラ層で実装される）。
 */
export interface TickPublisher {
  /**
   * DedupGate を通過したティックを配信する。
   */
  publish(tick: MarketTick): Promise<void>;

  close(): Promise<void>;
}
