import type { BoundedTaskQueue } from '@/application/concurrency/BoundedTaskQueue';
import type { Logger } from '@/application/interfaces/Logger';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { DedupGate } from '@/application/marketdata/DedupGate';
import type { SubscriptionRegistry } from '@/application/marketdata/SubscriptionRegistry';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * プレゼンテーション層: マーケットデータソケットの受信ハンドラ
 *
 * 責務: 受信メッセージを振り分ける
 * - subscribed / unsubscribed は受信コールバック内でレジストリに反映する（順序を保つため）
 * - data はタスクキューに積み、DedupGate に委譲する
 * - error はログに記録する
 */
export class MarketDataMessageHandler {
  private readonly logger: Logger;

  constructor(
    private readonly parser: MessageParser,
    private readonly registry: SubscriptionRegistry,
    private readonly dedupGate: DedupGate,
    private readonly queue: BoundedTaskQueue,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'MarketDataMessageHandler' });
  }

  /**
   * ソケットから受信した生テキストを処理する。
   * @param raw 受信した生データ
   * @param slotIndex 受信したソケットの番号
   */
  handleMessage(raw: string, slotIndex: number): void {
    const message = this.parser.parse(raw);
    if (!message) {
      return;
    }

    switch (message.event) {
      case 'subscribed':
        this.registry.onAck(message.data.symbol, message.data.id);
        return;

      case 'unsubscribed':
        this.registry.onUnsubscribed(message.data.symbol);
        return;

      case 'data': {
        const tick = message.data;
        this.metricsCollector?.incrementReceived(tick.symbol);
        this.queue.enqueue(async () => {
          await this.dedupGate.offer(tick);
        });
        return;
      }

      case 'error':
        this.metricsCollector?.incrementError('gateway_error');
        this.logger.error('market data gateway error', {
          slot: slotIndex,
          code: message.data.code,
          message: message.data.message,
        });
        return;
    }
  }
}
