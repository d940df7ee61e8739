import type { MarketDataSocket } from '@/application/interfaces/MarketDataSocket';

/**
 * プール内のマーケットデータソケット 1 本分
 */
export interface SocketSlot {
  readonly index: number;
  /** このソケットに割り当て済みの購読数（未確定分を含む） */
  subscriptionCount: number;
  readonly socket: MarketDataSocket;
}

/**
 * 購読にソケットを割り当てる側のインターフェイス（ConnectionPool が実装）
 */
export interface SlotProvider {
  assignSlot(symbol: string): SocketSlot;
  releaseSlot(index: number): void;
  slotAt(index: number): SocketSlot | undefined;
}

/**
 * プール再構築時に購読をやり直す側のインターフェイス（SubscriptionRegistry が実装）
 */
export interface SymbolSubscriber {
  subscribe(symbol: string): boolean;
  waitForAck(symbol: string, timeoutMs: number): Promise<boolean>;
  reset(): void;
  /** 再購読が終わった後、記録に戻らなかった銘柄の重複排除エントリを閉じる */
  closeStaleEntries(): void;
}
