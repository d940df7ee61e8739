import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import type {
  MarketDataSocket,
  MarketDataSocketEvent,
  MarketDataSocketEvents,
} from '@/application/interfaces/MarketDataSocket';
import { errorMessage, GatewayConnectionError, TransientNetworkError } from '@/domain/errors';
import type { MarketDataChannel } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

type ListenerMap = { [E in MarketDataSocketEvent]: Array<MarketDataSocketEvents[E]> };

/**
 * BridgeMarketDataSocket の初期化オプション
 */
export interface BridgeMarketDataSocketOptions {
  /** アプリケーションレベルの ping 間隔（ミリ秒） */
  pingIntervalMs?: number;
  /** ハンドシェイクの上限（ミリ秒）。超えたら connect() は reject する */
  handshakeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * エラーからネットワークエラーコードを取り出す。
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  // AbortSignal.timeout() による中断
  if ('name' in error && error.name === 'TimeoutError') {
    return 'ETIMEDOUT';
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return errorCode(error.cause);
  }
  return undefined;
}

/**
 * インフラ層: ブリッジの /marketdata ストリームを使った MarketDataSocket 実装
 *
 * 責務: ws による接続管理、購読コマンドの送信、受信テキストの中継。
 * メッセージの解釈はしない（MarketDataMessageParser の担当）。
 */
export class BridgeMarketDataSocket implements MarketDataSocket {
  private ws: WebSocket | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private listeners: ListenerMap = { connect: [], disconnect: [], error: [], message: [] };
  private readonly pingIntervalMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly logger: Logger;

  /**
   * @param url 接続先（ws://host/marketdata?session=...）
   * @param options オプション
   */
  constructor(
    private readonly url: string,
    options?: BridgeMarketDataSocketOptions
  ) {
    this.pingIntervalMs = options?.pingIntervalMs ?? 30_000;
    this.handshakeTimeoutMs = options?.handshakeTimeoutMs ?? 10_000;
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'BridgeMarketDataSocket' });
  }

  on<E extends MarketDataSocketEvent>(event: E, listener: MarketDataSocketEvents[E]): void {
    this.listeners[event].push(listener);
  }

  removeAllListeners(): void {
    this.listeners = { connect: [], disconnect: [], error: [], message: [] };
  }

  /**
   * 接続を確立する。open を受けてから解決し、open 前のエラーで reject する。
   */
  connect(): Promise<void> {
    if (this.ws) {
      return Promise.reject(new GatewayConnectionError('market data socket is already connected'));
    }

    return new Promise<void>((resolve, reject) => {
      let opened = false;
      const ws = new WebSocket(this.url, { handshakeTimeout: this.handshakeTimeoutMs });
      this.ws = ws;

      ws.on('open', () => {
        opened = true;
        this.startPing();
        for (const listener of this.listeners.connect) {
          listener();
        }
        resolve();
      });

      ws.on('message', (data) => {
        const raw = data.toString();
        for (const listener of this.listeners.message) {
          listener(raw);
        }
      });

      ws.on('close', (code, reason) => {
        this.stopPing();
        if (this.ws === ws) {
          this.ws = null;
        }
        if (!opened) {
          // error を伴わずに閉じた場合も connect() を決着させる（reject 済みなら無視される）
          reject(new GatewayConnectionError(`market data socket closed before open (${code})`));
          return;
        }
        for (const listener of this.listeners.disconnect) {
          listener(code, reason.toString());
        }
      });

      ws.on('error', (error) => {
        if (!opened) {
          this.ws = null;
          reject(
            new GatewayConnectionError(`market data socket connection failed: ${error.message}`, errorCode(error), {
              cause: error,
            })
          );
          return;
        }
        for (const listener of this.listeners.error) {
          listener(error);
        }
      });
    });
  }

  disconnect(): void {
    this.stopPing();
    const ws = this.ws;
    this.ws = null;
    if (ws) {
      ws.close();
    }
  }

  subscribe(params: { channel: MarketDataChannel; symbol: string }): void {
    this.send({ event: 'subscribe', data: params });
  }

  unsubscribe(params: { id: string }): void {
    this.send({ event: 'unsubscribe', data: params });
  }

  private send(command: object): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new TransientNetworkError('market data socket is not open');
    }
    ws.send(JSON.stringify(command));
  }

  private startPing(): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      try {
        this.send({ event: 'ping' });
      } catch (error) {
        this.logger.debug('ping skipped', { error: errorMessage(error) });
      }
    }, this.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}
