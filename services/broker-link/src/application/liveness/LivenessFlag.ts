import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { errorMessage } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type LivenessListener = (reason: string) => void;

/**
 * プロセス全体の生存フラグ
 *
 * 回復不能な状態（再ログイン上限、致命的な接続エラー、プール構築失敗）で false に落ちる。
 * 一度 false になったら戻らない。プロセス側は onDead で検知して終了処理に入る。
 */
export class LivenessFlag {
  private alive = true;
  private deathReason: string | null = null;
  private readonly listeners: LivenessListener[] = [];
  private readonly logger: Logger;

  constructor(
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'LivenessFlag' });
    this.metricsCollector?.setAlive(true);
  }

  isAlive(): boolean {
    return this.alive;
  }

  reason(): string | null {
    return this.deathReason;
  }

  /**
   * 生存フラグを落とす。2 回目以降の呼び出しは無視する。
   */
  markDead(reason: string): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.deathReason = reason;
    this.metricsCollector?.setAlive(false);
    this.logger.error('process marked not alive', { reason });

    for (const listener of this.listeners) {
      try {
        listener(reason);
      } catch (error) {
        this.logger.error('liveness listener failed', { error: errorMessage(error) });
      }
    }
  }

  onDead(listener: LivenessListener): void {
    this.listeners.push(listener);
  }
}
