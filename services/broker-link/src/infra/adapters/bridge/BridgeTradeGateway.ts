import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataSocket } from '@/application/interfaces/MarketDataSocket';
import type {
  FilledCallback,
  GatewayResponse,
  OrderCallback,
  TradeEventCallback,
  TradeGatewayClient,
  TradeGatewayFactory,
} from '@/application/interfaces/TradeGateway';
import { errorMessage, GatewayConnectionError } from '@/domain/errors';
import type {
  Account,
  Credentials,
  FilledReport,
  OrderRequest,
  OrderResult,
  Quote,
} from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BridgeMarketDataSocket, errorCode } from './BridgeMarketDataSocket';

type JsonObject = Record<string, unknown>;
type Guard<T> = (value: unknown) => value is T;

/**
 * BridgeTradeGateway の初期化オプション
 */
export interface BridgeTradeGatewayOptions {
  /** 接続先ゲートウェイのアドレス（ブリッジに転送する） */
  gatewayAddress?: string;
  /** HTTP クライアント（テストで差し替える） */
  fetch?: typeof fetch;
  /** マーケットデータソケットの ping 間隔 */
  pingIntervalMs?: number;
  /** HTTP リクエスト 1 回あたりの上限（ミリ秒） */
  requestTimeoutMs?: number;
  /** WebSocket のハンドシェイクの上限（ミリ秒） */
  handshakeTimeoutMs?: number;
  logger?: Logger;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAccount(value: unknown): value is Account {
  return isObject(value) && typeof value.accountNo === 'string';
}

function isAccountList(value: unknown): value is Account[] {
  return Array.isArray(value) && value.every(isAccount);
}

function isOrderResult(value: unknown): value is OrderResult {
  return (
    isObject(value) &&
    typeof value.orderNo === 'string' &&
    typeof value.symbol === 'string' &&
    (value.side === 'buy' || value.side === 'sell') &&
    typeof value.status === 'string' &&
    typeof value.quantity === 'number' &&
    typeof value.filledQty === 'number' &&
    (typeof value.price === 'number' || value.price === null)
  );
}

function isOrderResultList(value: unknown): value is OrderResult[] {
  return Array.isArray(value) && value.every(isOrderResult);
}

function isFilledReport(value: unknown): value is FilledReport {
  return (
    isObject(value) &&
    typeof value.accountNo === 'string' &&
    typeof value.symbol === 'string' &&
    typeof value.filledQty === 'number' &&
    typeof value.filledPrice === 'number'
  );
}

function isQuote(value: unknown): value is Quote {
  return isObject(value) && typeof value.symbol === 'string' && typeof value.previousClose === 'number';
}

function isUnknown(value: unknown): value is unknown {
  return value !== undefined;
}

/**
 * ブリッジの応答 JSON を GatewayResponse に変換する。data が期待する形でなければ捨てる。
 */
export function toGatewayResponse<T>(body: unknown, guard: Guard<T>): GatewayResponse<T> {
  if (!isObject(body) || typeof body.isSuccess !== 'boolean') {
    return { isSuccess: false, message: 'unexpected response from bridge' };
  }
  return {
    isSuccess: body.isSuccess,
    message: typeof body.message === 'string' ? body.message : undefined,
    data: guard(body.data) ? body.data : undefined,
  };
}

/**
 * インフラ層: ゲートウェイブリッジ経由の TradeGatewayClient 実装
 *
 * 責務: ベンダー SDK をホストするブリッジプロセスと HTTP (fetch) と WebSocket (ws) で通信する。
 * - HTTP: セッション、発注、照会
 * - /events: 取引接続のイベント・注文・約定のコールバック
 * - /marketdata: マーケットデータソケット（BridgeMarketDataSocket）
 */
export class BridgeTradeGateway implements TradeGatewayClient {
  private sessionId: string | null = null;
  private eventStream: WebSocket | null = null;
  private eventCallback: TradeEventCallback = () => {};
  private orderCallback: OrderCallback = () => {};
  private orderChangedCallback: OrderCallback = () => {};
  private filledCallback: FilledCallback = () => {};
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly logger: Logger;

  private constructor(
    private readonly baseUrl: string,
    private readonly options: BridgeTradeGatewayOptions
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'BridgeTradeGateway' });
  }

  /**
   * ブリッジに接続し、ゲートウェイに到達できることを確認してハンドルを返す。
   * @throws {GatewayConnectionError} ブリッジまたはゲートウェイに接続できない場合（code にエラーコード）
   */
  static async connect(baseUrl: string, options: BridgeTradeGatewayOptions = {}): Promise<BridgeTradeGateway> {
    const gateway = new BridgeTradeGateway(baseUrl.replace(/\/+$/, ''), options);
    const query = options.gatewayAddress ? `?gateway=${encodeURIComponent(options.gatewayAddress)}` : '';

    let body: unknown;
    try {
      body = await gateway.request('GET', `/health${query}`);
    } catch (error) {
      throw new GatewayConnectionError(`bridge unreachable: ${errorMessage(error)}`, errorCode(error), {
        cause: error,
      });
    }

    if (!isObject(body) || body.ok !== true) {
      const message = isObject(body) && typeof body.message === 'string' ? body.message : 'gateway unavailable';
      const code = isObject(body) && typeof body.code === 'string' ? body.code : undefined;
      throw new GatewayConnectionError(message, code);
    }
    return gateway;
  }

  async login(credentials: Credentials): Promise<GatewayResponse<Account[]>> {
    const body = await this.request('POST', '/session', {
      personalId: credentials.personalId,
      password: credentials.password,
      certPath: credentials.certPath,
      certPassword: credentials.certPassword,
      gatewayAddress: credentials.gatewayAddress,
    });

    const response = toGatewayResponse(body, isAccountList);
    if (response.isSuccess && isObject(body) && typeof body.sessionId === 'string') {
      this.sessionId = body.sessionId;
      this.openEventStream(body.sessionId);
    } else if (response.isSuccess) {
      return { isSuccess: false, message: 'bridge returned no session id' };
    }
    return response;
  }

  async logout(): Promise<void> {
    const stream = this.eventStream;
    this.eventStream = null;
    if (stream) {
      stream.removeAllListeners();
      stream.on('error', (error) => {
        this.logger.debug('trade event stream closed with error', { error: error.message });
      });
      stream.close();
    }

    if (this.sessionId === null) {
      return;
    }
    try {
      await this.request('DELETE', '/session');
    } finally {
      this.sessionId = null;
    }
  }

  setEventCallback(callback: TradeEventCallback): void {
    this.eventCallback = callback;
  }

  setOrderCallback(callback: OrderCallback): void {
    this.orderCallback = callback;
  }

  setOrderChangedCallback(callback: OrderCallback): void {
    this.orderChangedCallback = callback;
  }

  setFilledCallback(callback: FilledCallback): void {
    this.filledCallback = callback;
  }

  openRealtimeFeed(): MarketDataSocket {
    const url = `${this.wsBaseUrl()}/marketdata?session=${encodeURIComponent(this.sessionId ?? '')}`;
    return new BridgeMarketDataSocket(url, {
      pingIntervalMs: this.options.pingIntervalMs,
      handshakeTimeoutMs: this.handshakeTimeoutMs,
      logger: this.logger,
    });
  }

  async placeOrder(account: Account, order: OrderRequest): Promise<GatewayResponse<OrderResult>> {
    const body = await this.request('POST', '/orders', { accountNo: account.accountNo, ...order });
    return toGatewayResponse(body, isOrderResult);
  }

  async getOrderResults(account: Account): Promise<GatewayResponse<OrderResult[]>> {
    const body = await this.request('GET', `/orders?account=${encodeURIComponent(account.accountNo)}`);
    return toGatewayResponse(body, isOrderResultList);
  }

  async getQuote(symbol: string): Promise<GatewayResponse<Quote>> {
    const body = await this.request('GET', `/quotes/${encodeURIComponent(symbol)}`);
    return toGatewayResponse(body, isQuote);
  }

  async probe(account: Account | null, symbol: string): Promise<GatewayResponse<unknown>> {
    if (!account) {
      return { isSuccess: false, message: 'no account selected' };
    }
    const path = `/accounts/${encodeURIComponent(account.accountNo)}/margin-quota?symbol=${encodeURIComponent(symbol)}`;
    const body = await this.request('GET', path);
    return toGatewayResponse(body, isUnknown);
  }

  private async request(method: string, path: string, payload?: object): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.sessionId !== null) {
      headers['X-Session-Id'] = this.sessionId;
    }

    this.logger.debug('bridge request', { method, path });
    const fetchImpl = this.fetchImpl;
    const response = await fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: payload ? JSON.stringify(payload) : undefined,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });

    const text = await response.text();
    if (!response.ok) {
      this.logger.warn('bridge request failed', { method, path, status: response.status });
    }
    try {
      return text === '' ? null : JSON.parse(text);
    } catch {
      return { isSuccess: false, message: `HTTP ${response.status}: ${text.slice(0, 200)}` };
    }
  }

  private wsBaseUrl(): string {
    return this.baseUrl.replace(/^http/, 'ws');
  }

  private openEventStream(sessionId: string): void {
    const stream = new WebSocket(`${this.wsBaseUrl()}/events?session=${encodeURIComponent(sessionId)}`, {
      handshakeTimeout: this.handshakeTimeoutMs,
    });
    this.eventStream = stream;

    stream.on('message', (data) => this.dispatchEvent(data.toString()));
    stream.on('error', (error) => {
      this.logger.error('trade event stream error', { error: error.message });
    });
    stream.on('close', (code) => {
      if (this.eventStream !== stream) {
        return;
      }
      // イベントストリームが切れたら取引接続の異常として扱う
      this.eventStream = null;
      this.eventCallback('301', `trade event stream closed (${code})`);
    });
  }

  private dispatchEvent(raw: string): void {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.logger.warn('invalid trade event dropped', { raw });
      return;
    }
    if (!isObject(message) || typeof message.code !== 'string') {
      this.logger.warn('trade event without code dropped', { raw });
      return;
    }

    const code = message.code;
    switch (message.type) {
      case 'event':
        this.eventCallback(code, typeof message.message === 'string' ? message.message : '');
        return;
      case 'order':
        this.orderCallback(code, isOrderResult(message.data) ? message.data : null);
        return;
      case 'order_changed':
        this.orderChangedCallback(code, isOrderResult(message.data) ? message.data : null);
        return;
      case 'filled':
        this.filledCallback(code, isFilledReport(message.data) ? message.data : null);
        return;
      default:
        this.logger.debug('unknown trade event type', { type: message.type });
    }
  }
}

/**
 * ブリッジ URL を束縛した TradeGatewayFactory を作る。
 */
export function createBridgeGatewayFactory(
  bridgeUrl: string,
  options: Omit<BridgeTradeGatewayOptions, 'gatewayAddress'> = {}
): TradeGatewayFactory {
  return (gatewayAddress) => BridgeTradeGateway.connect(bridgeUrl, { ...options, gatewayAddress });
}
