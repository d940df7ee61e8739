import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { errorMessage } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type QueuedTask = () => Promise<void>;

/**
 * 上限付きタスクキュー（ワーカー 1 本）
 *
 * 責務: 受信メッセージの処理を受信ループから切り離す。
 * キューが満杯のときは enqueue が false を返して拒否する（呼び出し側はブロックしない）。
 */
export class BoundedTaskQueue {
  private readonly tasks: QueuedTask[] = [];
  private running: Promise<void> | null = null;
  private closed = false;
  private readonly logger: Logger;

  /**
   * @param capacity キューに積めるタスク数の上限
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly capacity: number,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer: ${capacity}`);
    }
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'BoundedTaskQueue' });
  }

  /**
   * タスクを積む。
   * @returns 受け付けた場合は true。満杯またはクローズ済みなら false
   */
  enqueue(task: QueuedTask): boolean {
    if (this.closed) {
      this.logger.warn('task rejected: queue closed');
      return false;
    }
    if (this.tasks.length >= this.capacity) {
      this.logger.warn('task rejected: queue full', { capacity: this.capacity });
      this.metricsCollector?.incrementDropped('queue_full');
      return false;
    }

    this.tasks.push(task);
    if (!this.running) {
      // 受信コールバックの中でタスクを実行しないよう、ワーカーは次のマイクロタスクで起動する
      this.running = Promise.resolve().then(() => this.drain());
    }
    return true;
  }

  /**
   * 待機中のタスク数
   */
  size(): number {
    return this.tasks.length;
  }

  /**
   * 受付を止め、ワーカーが空になるのを timeoutMs まで待つ。
   * 時間内に終わらなかったタスクは破棄する。
   * @returns 時間内に処理し切れた場合は true
   */
  async close(timeoutMs = 5000): Promise<boolean> {
    this.closed = true;
    if (!this.running) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const drained = await Promise.race([this.running.then(() => true as const), timeout]);
    clearTimeout(timer);

    if (!drained) {
      this.logger.warn('queue did not drain in time, discarding tasks', {
        timeoutMs,
        discarded: this.tasks.length,
      });
      this.tasks.length = 0;
    }
    return drained;
  }

  private async drain(): Promise<void> {
    try {
      let task = this.tasks.shift();
      while (task) {
        try {
          await task();
        } catch (error) {
          this.logger.error('queued task failed', { error: errorMessage(error) });
        }
        task = this.tasks.shift();
      }
    } finally {
      this.running = null;
    }
  }
}
