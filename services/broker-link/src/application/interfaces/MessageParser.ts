import type { InboundMessage } from '@/domain/types';

/**
 * メッセージパーサーのインターフェイス（インフラ層で実装される）。
 */
export interface MessageParser {
  /**
   * ソケットから受信した生テキストを InboundMessage に変換する。
   * @param raw 受信した生データ
   * @returns パース済みメッセージ。pong や不正なメッセージの場合は null
   */
  parse(raw: string): InboundMessage | null;
}
