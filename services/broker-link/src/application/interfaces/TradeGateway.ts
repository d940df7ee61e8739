import type {
  Account,
  Credentials,
  FilledReport,
  OrderRequest,
  OrderResult,
  Quote,
} from '@/domain/types';
import type { MarketDataSocket } from './MarketDataSocket';

/**
 * ゲートウェイ呼び出しの応答。
 * SDK は失敗を例外ではなく isSuccess=false で返すことがある。
 */
export interface GatewayResponse<T> {
  isSuccess: boolean;
  message?: string;
  data?: T;
}

export type TradeEventCallback = (code: string, message: string) => void;
export type OrderCallback = (code: string, order: OrderResult | null) => void;
export type FilledCallback = (code: string, filled: FilledReport | null) => void;

/**
 * アプリケーション層: 取引ゲートウェイ（ベンダー SDK）の接続ハンドル
 *
 * 責務: 1 回の接続で得られるセッションハンドルの契約を定義する（実装はインフラ層）。
 * 再ログイン時はハンドルごと作り直す。
 */
export interface TradeGatewayClient {
  login(credentials: Credentials): Promise<GatewayResponse<Account[]>>;

  logout(): Promise<void>;

  /**
   * 取引接続のイベント（300/301 は接続異常）を受け取るコールバックを設定する。
   */
  setEventCallback(callback: TradeEventCallback): void;

  setOrderCallback(callback: OrderCallback): void;

  setOrderChangedCallback(callback: OrderCallback): void;

  setFilledCallback(callback: FilledCallback): void;

  /**
   * 新しいマーケットデータソケットを生成する（未接続の状態で返す）。
   */
  openRealtimeFeed(): MarketDataSocket;

  placeOrder(account: Account, order: OrderRequest): Promise<GatewayResponse<OrderResult>>;

  getOrderResults(account: Account): Promise<GatewayResponse<OrderResult[]>>;

  getQuote(symbol: string): Promise<GatewayResponse<Quote>>;

  /**
   * 取引セッションの死活確認に使う軽量な読み取り専用呼び出し（信用枠照会）。
   * @param account 照会対象の口座
   * @param symbol 照会に使う銘柄
   */
  probe(account: Account | null, symbol: string): Promise<GatewayResponse<unknown>>;
}

/**
 * ゲートウェイへ接続してハンドルを得るファクトリ。
 * 接続できない場合は GatewayConnectionError を投げる。
 * @param gatewayAddress 接続先（未指定なら既定値）
 */
export type TradeGatewayFactory = (gatewayAddress?: string) => Promise<TradeGatewayClient>;
