import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { BrokerLinkError, errorMessage } from '@/domain/errors';
import type { MarketDataChannel, SubscriptionRecord } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { DedupGate } from './DedupGate';
import type { SlotProvider, SocketSlot, SymbolSubscriber } from './SocketSlot';

interface AckWaiter {
  resolve: (acked: boolean) => void;
  timer: NodeJS.Timeout;
}

/**
 * アプリケーション層: 購読レジストリ
 *
 * 責務: 銘柄 → (ソケット番号, チャンネル ID) の対応を一意に管理する。
 * 記録を書き換えるのはこのクラスだけ。ゲートウェイの応答は受信メッセージ内の銘柄で突き合わせる。
 *
 * 購読解除は unsubscribed 応答を受けてから記録を消す。
 * 応答前に同じ銘柄の subscribe が二重に送られるのを防ぐため。
 */
export class SubscriptionRegistry implements SymbolSubscriber {
  private readonly records = new Map<string, SubscriptionRecord>();
  private readonly ackWaiters = new Map<string, AckWaiter[]>();
  private readonly logger: Logger;

  /**
   * @param pool ソケットの割り当て元
   * @param dedupGate 購読確定・解除に合わせてエントリを開閉する重複排除ゲート
   * @param channel 購読するチャンネル
   */
  constructor(
    private readonly pool: SlotProvider,
    private readonly dedupGate: DedupGate,
    private readonly channel: MarketDataChannel = 'trades',
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'SubscriptionRegistry' });
  }

  /**
   * 銘柄を購読する。既に購読中なら何もしない。
   * @returns 購読中（または購読リクエストを送信できた）なら true
   */
  subscribe(symbol: string): boolean {
    const existing = this.records.get(symbol);
    if (existing) {
      if (!existing.pendingRemoval) {
        this.logger.info('symbol already subscribed', { symbol });
        return true;
      }
      if (existing.channelId === null) {
        // 解除リクエストはまだ送っていないので取り消すだけでよい
        existing.pendingRemoval = false;
        this.logger.info('pending unsubscribe cancelled', { symbol });
        return true;
      }
      this.logger.warn('unsubscribe in flight, subscribe ignored', { symbol });
      return false;
    }

    let slot: SocketSlot;
    try {
      slot = this.pool.assignSlot(symbol);
    } catch (error) {
      this.logFailure('subscribe rejected', symbol, error);
      return false;
    }

    // 応答が同期的に返ってきても突き合わせられるよう、送信前に記録する
    this.records.set(symbol, { symbol, slotIndex: slot.index, channelId: null, pendingRemoval: false });
    try {
      slot.socket.subscribe({ channel: this.channel, symbol });
    } catch (error) {
      this.records.delete(symbol);
      this.pool.releaseSlot(slot.index);
      this.logFailure('subscribe request failed', symbol, error);
      return false;
    }

    this.logger.debug('subscribe requested', { symbol, slot: slot.index });
    this.metricsCollector?.setSubscriptions(this.records.size);
    return true;
  }

  /**
   * subscribed 応答を受けてチャンネル ID を記録する。
   */
  onAck(symbol: string, channelId: string): void {
    const record = this.records.get(symbol);
    if (!record) {
      this.logger.warn('subscription ack for unknown symbol', { symbol, channelId });
      return;
    }

    record.channelId = channelId;
    this.dedupGate.open(symbol);
    this.resolveWaiters(symbol, true);
    this.logger.debug('subscription confirmed', { symbol, channelId, slot: record.slotIndex });

    if (record.pendingRemoval) {
      this.sendUnsubscribe(record, channelId);
    }
  }

  /**
   * 購読解除を要求する。記録は unsubscribed 応答を受けるまで残す。
   * @returns 解除リクエストを受け付けた場合は true
   */
  unsubscribe(symbol: string): boolean {
    const record = this.records.get(symbol);
    if (!record) {
      this.logger.warn('symbol is not subscribed', { symbol });
      return false;
    }
    if (record.pendingRemoval) {
      this.logger.info('unsubscribe already pending', { symbol });
      return true;
    }

    record.pendingRemoval = true;
    if (record.channelId === null) {
      this.logger.debug('unsubscribe deferred until subscription ack', { symbol });
      return true;
    }
    return this.sendUnsubscribe(record, record.channelId);
  }

  /**
   * unsubscribed 応答を受けて記録を削除する。
   */
  onUnsubscribed(symbol: string): void {
    const record = this.records.get(symbol);
    if (!record) {
      this.logger.warn('unsubscribe confirmation for unknown symbol', { symbol });
      return;
    }

    this.records.delete(symbol);
    this.pool.releaseSlot(record.slotIndex);
    this.dedupGate.close(symbol);
    this.resolveWaiters(symbol, false);
    this.metricsCollector?.setSubscriptions(this.records.size);
    this.logger.info('subscription removed', { symbol });
  }

  /**
   * subscribed 応答を待つ。既に確定済みなら即座に true。
   * @returns 時間内に確定した場合は true
   */
  waitForAck(symbol: string, timeoutMs: number): Promise<boolean> {
    const record = this.records.get(symbol);
    if (!record) {
      return Promise.resolve(false);
    }
    if (record.channelId !== null) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: AckWaiter = {
        resolve,
        timer: setTimeout(() => {
          this.removeWaiter(symbol, waiter);
          resolve(false);
        }, timeoutMs),
      };
      const waiters = this.ackWaiters.get(symbol) ?? [];
      waiters.push(waiter);
      this.ackWaiters.set(symbol, waiters);
    });
  }

  /**
   * 再購読対象の銘柄一覧（解除待ちの銘柄は含めない）
   */
  symbols(): string[] {
    return [...this.records.values()].filter((record) => !record.pendingRemoval).map((record) => record.symbol);
  }

  get(symbol: string): Readonly<SubscriptionRecord> | undefined {
    const record = this.records.get(symbol);
    return record ? { ...record } : undefined;
  }

  has(symbol: string): boolean {
    return this.records.has(symbol);
  }

  size(): number {
    return this.records.size;
  }

  /**
   * すべての記録を消す（プール再構築時）。
   * DedupGate のエントリは残し、再接続後に古いティックが再送されても弾けるようにする。
   * 再購読されなかった銘柄のエントリは closeStaleEntries() で閉じる。
   */
  reset(): void {
    for (const symbol of [...this.ackWaiters.keys()]) {
      this.resolveWaiters(symbol, false);
    }
    if (this.records.size > 0) {
      this.logger.debug('subscription records cleared', { cleared: this.records.size });
    }
    this.records.clear();
    this.metricsCollector?.setSubscriptions(0);
  }

  /**
   * 記録にない銘柄の重複排除エントリを閉じる（再構築の再購読が終わった後）。
   * 解除待ちで再購読しなかった銘柄や、再購読に失敗した銘柄が対象。
   */
  closeStaleEntries(): void {
    const stale = this.dedupGate.symbols().filter((symbol) => !this.records.has(symbol));
    for (const symbol of stale) {
      this.dedupGate.close(symbol);
    }
    if (stale.length > 0) {
      this.logger.info('dedup entries closed for dropped symbols', { symbols: stale });
    }
  }

  private sendUnsubscribe(record: SubscriptionRecord, channelId: string): boolean {
    const slot = this.pool.slotAt(record.slotIndex);
    if (!slot) {
      record.pendingRemoval = false;
      this.logger.error('socket for subscription is not open', { symbol: record.symbol, slot: record.slotIndex });
      return false;
    }

    try {
      slot.socket.unsubscribe({ id: channelId });
    } catch (error) {
      // 呼び出し側が再試行できるよう解除待ちを取り消す
      record.pendingRemoval = false;
      this.logFailure('unsubscribe request failed', record.symbol, error);
      return false;
    }

    this.logger.debug('unsubscribe requested', { symbol: record.symbol, channelId });
    return true;
  }

  private resolveWaiters(symbol: string, acked: boolean): void {
    const waiters = this.ackWaiters.get(symbol);
    if (!waiters) {
      return;
    }
    this.ackWaiters.delete(symbol);
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(acked);
    }
  }

  private removeWaiter(symbol: string, waiter: AckWaiter): void {
    const remaining = (this.ackWaiters.get(symbol) ?? []).filter((w) => w !== waiter);
    if (remaining.length > 0) {
      this.ackWaiters.set(symbol, remaining);
    } else {
      this.ackWaiters.delete(symbol);
    }
  }

  private logFailure(msg: string, symbol: string, error: unknown): void {
    const kind = error instanceof BrokerLinkError ? error.kind : 'subscription_error';
    this.metricsCollector?.incrementError(kind);
    this.logger.error(msg, { symbol, kind, error: errorMessage(error) });
  }
}
