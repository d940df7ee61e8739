import type { MarketDataChannel } from '@/domain/types';

/**
 * マーケットデータソケットが発火するイベントとリスナーの対応表
 */
export interface MarketDataSocketEvents {
  /** 接続が確立された */
  connect: () => void;
  /** 接続が切れた（計画的な切断でも発火しうる） */
  disconnect: (code: number, reason: string) => void;
  /** ソケットでエラーが発生した */
  error: (error: Error) => void;
  /** テキストメッセージを受信した */
  message: (raw: string) => void;
}

export type MarketDataSocketEvent = keyof MarketDataSocketEvents;

/**
 * アプリケーション層: マーケットデータ用 WebSocket の共通インターフェイス
 *
 * 責務: ゲートウェイ SDK が提供するリアルタイム行情ソケットを抽象化する。
 * 1 本のソケットで複数銘柄を購読でき、購読ごとにチャンネル ID が払い出される。
 */
export interface MarketDataSocket {
  /**
   * イベントリスナーを登録する。
   */
  on<E extends MarketDataSocketEvent>(event: E, listener: MarketDataSocketEvents[E]): void;

  /**
   * 接続を確立する。接続確認（open）まで待ってから解決される。
   */
  connect(): Promise<void>;

  /**
   * 接続を閉じる。
   */
  disconnect(): void;

  /**
   * 購読リクエストを送信する。応答は message イベントの subscribed で届く。
   */
  subscribe(params: { channel: MarketDataChannel; symbol: string }): void;

  /**
   * 購読解除リクエストを送信する。応答は message イベントの unsubscribed で届く。
   */
  unsubscribe(params: { id: string }): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;
}
