/**
 * ドメイン層: ブローカー接続で扱う型定義（DTO 的な型のみ）
 *
 * 注意: 売買判断やポジション計算のロジックは持たない。
 * ここにあるのは「接続・購読・配信」を説明するための型だけ。
 */

/**
 * ログインに使う認証情報。ログイン成功後は再ログイン用にのみ保持する。
 */
export interface Credentials {
  /** 身分証番号などのログイン ID */
  readonly personalId: string;
  /** 取引パスワード */
  readonly password: string;
  /** 電子証明書ファイルのパス */
  readonly certPath: string;
  /** 電子証明書のパスワード */
  readonly certPassword: string;
  /** 接続先ゲートウェイのアドレス（未指定ならブリッジの既定値） */
  readonly gatewayAddress?: string;
}

/**
 * ログイン応答に含まれる口座情報。
 */
export interface Account {
  accountNo: string;
  branchNo?: string;
  name?: string;
  accountType?: string;
}

/**
 * 取引セッションの状態。
 *
 * logged_out → logging_in → active → relogging_in → active | dead
 */
export type SessionState = 'logged_out' | 'logging_in' | 'active' | 'relogging_in' | 'dead';

/**
 * 購読 1 件分の記録。
 * channelId はゲートウェイの subscribed 応答を受けるまで null。
 */
export interface SubscriptionRecord {
  readonly symbol: string;
  readonly slotIndex: number;
  channelId: string | null;
  /** unsubscribe を送ったがまだ unsubscribed 応答が来ていない */
  pendingRemoval: boolean;
}

/**
 * 再接続処理の共有状態。
 */
export interface ReconnectState {
  marketDataConnected: boolean;
  reloginInProgress: boolean;
}

/**
 * 戦略層に渡す 1 件分の気配・約定データ。
 */
export interface MarketTick {
  symbol: string;
  /** ゲートウェイが付与するタイムスタンプ（銘柄ごとに単調増加を期待する） */
  time: number;
  bid: number;
  ask: number;
  /** 連続取引（ザラバ）中のデータかどうか */
  isContinuous: boolean;
  id?: string;
  price?: number;
  size?: number;
  volume?: number;
}

/**
 * マーケットデータソケットから受信するメッセージ（パース済み）。
 */
export type InboundMessage =
  | { event: 'subscribed'; data: { symbol: string; id: string; channel?: string } }
  | { event: 'unsubscribed'; data: { symbol: string; id?: string } }
  | { event: 'data'; data: MarketTick }
  | { event: 'error'; data: { message: string; code?: string } };

/**
 * 購読コマンドで指定するチャンネル。
 */
export type MarketDataChannel = 'trades' | 'books' | 'aggregates';

export type OrderSide = 'buy' | 'sell';
export type PriceType = 'limit' | 'market';
export type TimeInForce = 'ROD' | 'IOC' | 'FOK';
export type OrderType = 'stock' | 'day_trade' | 'margin' | 'short';

/**
 * 発注リクエスト。業務ルールは持たず、ゲートウェイへそのまま渡す。
 */
export interface OrderRequest {
  side: OrderSide;
  symbol: string;
  quantity: number;
  /** 成行の場合は null */
  price: number | null;
  priceType: PriceType;
  timeInForce: TimeInForce;
  orderType: OrderType;
  /** 戦略側で注文を識別するための任意ラベル */
  userDef?: string;
}

export interface OrderResult {
  orderNo: string;
  symbol: string;
  side: OrderSide;
  status: string;
  quantity: number;
  filledQty: number;
  price: number | null;
  userDef?: string;
}

/**
 * 約定通知。
 */
export interface FilledReport {
  accountNo: string;
  symbol: string;
  filledQty: number;
  filledPrice: number;
  orderNo?: string;
  userDef?: string;
}

export interface Quote {
  symbol: string;
  previousClose: number;
  lastPrice?: number;
  bid?: number;
  ask?: number;
}
