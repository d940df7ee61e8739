import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickPublisher } from '@/application/interfaces/TickPublisher';
import type { MarketTick } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/** 配信済みティックを書き込む Stream 名 */
export const TICK_STREAM = 'md:tick';

/**
 * インフラ層: Redis Stream への書き込み実装
 *
 * 責務: DedupGate を通過した MarketTick を Redis Stream に XADD する。
 */
export class StreamRepository implements TickPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redisUrl: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'StreamRepository' });
  }

  /**
   * ティックを Redis Stream に配信する。
   * @throws Redis への書き込みに失敗した場合
   */
  async publish(tick: MarketTick): Promise<void> {
    try {
      await this.redis.xadd(
        TICK_STREAM,
        '*',
        'symbol',
        tick.symbol,
        'ts',
        tick.time.toString(),
        'data',
        JSON.stringify(tick)
      );
    } catch (error) {
      this.metricsCollector?.incrementError('publish_error');
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
    this.logger.info('redis connection closed');
  }
}
