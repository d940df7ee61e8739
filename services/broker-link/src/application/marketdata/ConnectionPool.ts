import { delay } from '@/application/concurrency/delay';
import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataSocket } from '@/application/interfaces/MarketDataSocket';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { LivenessFlag } from '@/application/liveness/LivenessFlag';
import {
  CapacityExceededError,
  errorMessage,
  PoolUnavailableError,
  SessionUnavailableError,
} from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy, type BackoffOptions } from '@/infra/reconnect/BackoffStrategy';
import type { SlotProvider, SocketSlot, SymbolSubscriber } from './SocketSlot';

/**
 * ソケットから届くイベントの受け口
 */
export interface SlotEventHandlers {
  onMessage(raw: string, slotIndex: number): void;
  onDisconnect(code: number, reason: string, slotIndex: number): void;
  onError?(error: Error, slotIndex: number): void;
}

/**
 * ConnectionPool の設定
 */
export interface ConnectionPoolOptions {
  /** ソケット本数（1〜5） */
  size?: number;
  /** 1 本あたりの購読上限 */
  slotCapacity?: number;
  /** ソケットを順に開くときの間隔（ゲートウェイのスロットリング対策） */
  slotOpenStaggerMs?: number;
  /** プール構築のリトライ回数（初回を除く） */
  maxOpenRetry?: number;
  backoff?: BackoffOptions;
  /** 再購読 1 銘柄あたりのリトライ回数（初回を除く） */
  replayRetry?: number;
  /** 再購読の送信間隔 */
  replaySpacingMs?: number;
  /** 再購読で subscribed 応答を待つ上限 */
  ackTimeoutMs?: number;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

export const MIN_POOL_SIZE = 1;
export const MAX_POOL_SIZE = 5;
export const DEFAULT_SLOT_CAPACITY = 200;

/**
 * プールのソケット本数を 1〜5 に丸める。
 */
export function clampPoolSize(size: number): number {
  return Math.max(MIN_POOL_SIZE, Math.min(MAX_POOL_SIZE, Math.trunc(size)));
}

/**
 * アプリケーション層: マーケットデータソケットのプール
 *
 * 責務:
 * - N 本のソケットの構築と破棄（構築失敗時は指数バックオフで全体をやり直す）
 * - 新規購読の負荷分散（購読数が最小のソケット、同数なら添字の小さい方）
 * - 再構築時の購読の再送（Replay）
 */
export class ConnectionPool implements SlotProvider {
  private slotList: SocketSlot[] = [];
  private handlers: SlotEventHandlers | null = null;
  private subscriber: SymbolSubscriber | null = null;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly poolSize: number;
  private readonly slotCapacity: number;
  private readonly slotOpenStaggerMs: number;
  private readonly maxOpenRetry: number;
  private readonly backoff: BackoffStrategy;
  private readonly replayRetry: number;
  private readonly replaySpacingMs: number;
  private readonly ackTimeoutMs: number;

  /**
   * @param socketFactory 新しいソケットを生成する関数（取引セッションから得る）
   * @param liveness プロセスの生存フラグ（構築失敗が上限に達したら落とす）
   * @param options 設定
   */
  constructor(
    private readonly socketFactory: () => MarketDataSocket,
    private readonly liveness: LivenessFlag,
    options?: ConnectionPoolOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'ConnectionPool' });
    this.metricsCollector = options?.metricsCollector;
    this.poolSize = clampPoolSize(options?.size ?? 2);
    this.slotCapacity = options?.slotCapacity ?? DEFAULT_SLOT_CAPACITY;
    this.slotOpenStaggerMs = options?.slotOpenStaggerMs ?? 200;
    this.maxOpenRetry = options?.maxOpenRetry ?? 5;
    this.backoff = new BackoffStrategy(options?.backoff);
    this.replayRetry = options?.replayRetry ?? 3;
    this.replaySpacingMs = options?.replaySpacingMs ?? 100;
    this.ackTimeoutMs = options?.ackTimeoutMs ?? 2000;
  }

  /**
   * ソケットのイベントハンドラを設定する。
   * 既存ソケットのリスナーは呼び出し時にここを参照するので、後から差し替えても反映される。
   */
  setHandlers(handlers: SlotEventHandlers): void {
    this.handlers = handlers;
  }

  /**
   * 再構築時に購読をやり直す相手を設定する。
   */
  setSubscriber(subscriber: SymbolSubscriber): void {
    this.subscriber = subscriber;
  }

  size(): number {
    return this.poolSize;
  }

  isOpen(): boolean {
    return this.slotList.length > 0;
  }

  /**
   * 現在のソケット一覧のスナップショット
   */
  slots(): ReadonlyArray<Readonly<SocketSlot>> {
    return this.slotList.map((slot) => ({ ...slot }));
  }

  slotAt(index: number): SocketSlot | undefined {
    return this.slotList.find((slot) => slot.index === index);
  }

  /**
   * n 本のソケットを開く。
   * どれか 1 本でも失敗したらプール全体を作り直す。リトライ上限を超えたら生存フラグを落として投げる。
   * @throws {PoolUnavailableError} 構築できなかった場合
   */
  async open(n: number = this.poolSize): Promise<void> {
    const size = clampPoolSize(n);
    try {
      await this.openWithRetry(size);
    } finally {
      this.backoff.reset();
    }
  }

  /**
   * 購読数が最小のソケットを選び、1 枠予約する。同数なら添字の小さい方。
   * @throws {PoolUnavailableError} ソケットが 1 本も開いていない場合
   * @throws {CapacityExceededError} 最小の購読数が上限に達している場合
   */
  assignSlot(symbol: string): SocketSlot {
    if (this.slotList.length === 0) {
      throw new PoolUnavailableError('no market data socket is open');
    }

    let target = this.slotList[0];
    for (const slot of this.slotList) {
      if (slot.subscriptionCount < target.subscriptionCount) {
        target = slot;
      }
    }

    if (target.subscriptionCount >= this.slotCapacity) {
      throw new CapacityExceededError(symbol, this.slotCapacity);
    }

    target.subscriptionCount += 1;
    return target;
  }

  /**
   * 予約済みの枠を 1 つ返す。
   */
  releaseSlot(index: number): void {
    const slot = this.slotAt(index);
    if (slot && slot.subscriptionCount > 0) {
      slot.subscriptionCount -= 1;
    }
  }

  /**
   * すべてのソケットを切断し、プールと購読記録を空にする。何度呼んでもよい。
   */
  closeAll(): void {
    const slots = this.slotList;
    this.slotList = [];

    for (const slot of slots) {
      // 計画的な切断で再接続が走らないよう、先にリスナーを外す
      slot.socket.removeAllListeners();
      try {
        slot.socket.disconnect();
      } catch (error) {
        this.logger.warn('socket disconnect failed', { slot: slot.index, error: errorMessage(error) });
      }
    }

    this.subscriber?.reset();

    if (slots.length > 0) {
      this.logger.info('market data pool closed', { closed: slots.length });
    }
  }

  /**
   * プールを作り直し、preserveList の銘柄を順に購読し直す。
   * @throws {PoolUnavailableError} プールを開けなかった場合
   */
  async rebuild(preserveList: readonly string[]): Promise<void> {
    this.logger.info('rebuilding market data pool', { symbols: preserveList.length });
    this.metricsCollector?.incrementReconnect();

    this.closeAll();
    await this.open();

    const failed: string[] = [];
    for (const symbol of preserveList) {
      if (!(await this.replay(symbol))) {
        failed.push(symbol);
      }
    }
    this.subscriber?.closeStaleEntries();

    if (failed.length > 0) {
      this.logger.error('some symbols could not be resubscribed', { failed });
    } else {
      this.logger.info('market data pool rebuilt', { symbols: preserveList.length });
    }
  }

  private async openWithRetry(size: number): Promise<void> {
    for (let attempt = 0; attempt <= this.maxOpenRetry; attempt++) {
      try {
        await this.openOnce(size);
        this.logger.info('market data pool opened', { size, attempt });
        return;
      } catch (error) {
        this.closeAll();
        if (error instanceof SessionUnavailableError) {
          // セッションがなければ何度やっても開けない
          this.liveness.markDead('market data pool unavailable: no trade session');
          throw new PoolUnavailableError('cannot open market data pool without a trade session', {
            cause: error,
          });
        }
        this.metricsCollector?.incrementError('pool_open');
        this.logger.warn('market data pool build failed', {
          attempt,
          maxRetry: this.maxOpenRetry,
          error: errorMessage(error),
        });
        if (attempt < this.maxOpenRetry) {
          await delay(this.backoff.getNextDelay());
        }
      }
    }

    this.liveness.markDead('market data pool unavailable: retries exhausted');
    throw new PoolUnavailableError(`market data pool could not be opened after ${this.maxOpenRetry + 1} attempts`);
  }

  private async openOnce(size: number): Promise<void> {
    this.closeAll();

    for (let i = 0; i < size; i++) {
      if (i > 0) {
        await delay(this.slotOpenStaggerMs);
      }

      const socket = this.socketFactory();
      const slot: SocketSlot = { index: i, subscriptionCount: 0, socket };
      this.slotList.push(slot);

      socket.on('message', (raw) => this.handlers?.onMessage(raw, slot.index));
      socket.on('error', (error) => {
        this.logger.error('market data socket error', { slot: slot.index, error: error.message });
        this.handlers?.onError?.(error, slot.index);
      });

      this.logger.debug('opening market data socket', { slot: i + 1, size });
      await socket.connect();

      // 接続確認が取れてから切断を監視する（接続失敗はこのメソッドの例外で扱う）
      socket.on('disconnect', (code, reason) => {
        this.logger.warn('market data socket disconnected', { slot: slot.index, code, reason });
        this.handlers?.onDisconnect(code, reason, slot.index);
      });
    }
  }

  private async replay(symbol: string): Promise<boolean> {
    const subscriber = this.subscriber;
    if (!subscriber) {
      this.logger.error('no subscriber attached, cannot replay', { symbol });
      return false;
    }

    for (let attempt = 0; attempt <= this.replayRetry; attempt++) {
      if (subscriber.subscribe(symbol)) {
        const acked = await subscriber.waitForAck(symbol, this.ackTimeoutMs);
        if (!acked) {
          this.logger.warn('no subscription ack within timeout', { symbol, timeoutMs: this.ackTimeoutMs });
        }
        await delay(this.replaySpacingMs);
        return true;
      }

      this.logger.warn('resubscribe failed', { symbol, attempt, maxRetry: this.replayRetry });
      await delay(this.replaySpacingMs);
    }
    return false;
  }
}
