import { withTimeout } from '@/application/concurrency/delay';
import { Mutex } from '@/application/concurrency/Mutex';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { LivenessFlag } from '@/application/liveness/LivenessFlag';
import type { ConnectionPool } from '@/application/marketdata/ConnectionPool';
import type { SubscriptionRegistry } from '@/application/marketdata/SubscriptionRegistry';
import type { ProbeResult, SessionManager } from '@/application/session/SessionManager';
import { BrokerLinkError, errorMessage, TransientNetworkError } from '@/domain/errors';
import type { ReconnectState } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * ReconnectionCoordinator の設定
 */
export interface ReconnectionCoordinatorOptions {
  /** セッションの死活確認を待つ上限。超えたら確認失敗として再構築に進む */
  probeTimeoutMs?: number;
}

/**
 * アプリケーション層: 再接続の調停
 *
 * 責務: 取引接続・マーケットデータ接続の切断通知を受け、
 * セッションの死活確認 → 必要なら再ログイン → プール再構築 を 1 回だけ実行する。
 *
 * 切断通知はソケットの本数分まとめて届くことがある。
 * 通知は到着時に marketDataConnected を落とし、ミューテックス内で
 * 先行する回復が完了済み（marketDataConnected が true に戻っている）なら何もしない。
 */
export class ReconnectionCoordinator {
  private readonly mutex = new Mutex();
  private readonly reconnectState: ReconnectState = {
    marketDataConnected: false,
    reloginInProgress: false,
  };
  private stopped = false;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly session: SessionManager,
    private readonly pool: ConnectionPool,
    private readonly registry: SubscriptionRegistry,
    private readonly liveness: LivenessFlag,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector,
    options?: ReconnectionCoordinatorOptions
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'ReconnectionCoordinator' });
    this.probeTimeoutMs = options?.probeTimeoutMs ?? 10_000;
  }

  /**
   * 初回のプール構築。切断通知と競合しないようミューテックス内で行う。
   * @returns 構築できた場合は true
   */
  async connect(): Promise<boolean> {
    return await this.mutex.runExclusive(async () => {
      if (this.stopped) {
        return false;
      }
      try {
        await this.pool.open();
      } catch (error) {
        this.logFailure('initial market data pool open failed', error);
        return false;
      }
      this.markConnected();
      return true;
    });
  }

  /**
   * 切断通知を受け取る。例外は投げない。
   * @param code 切断コード（取引接続なら 300/301、ソケットならクローズコード）
   * @param message 切断理由
   */
  async onDisconnect(code: string | number, message: string): Promise<void> {
    if (this.stopped) {
      this.logger.debug('disconnect ignored after stop', { code, message });
      return;
    }
    this.reconnectState.marketDataConnected = false;
    this.logger.warn('disconnect signal received', { code, message });

    try {
      await this.mutex.runExclusive(() => this.recover(code));
    } catch (error) {
      this.logFailure('recovery failed', error);
    }
  }

  /**
   * マーケットデータ接続が確立済みであることを記録する。
   */
  markConnected(): void {
    this.reconnectState.marketDataConnected = true;
  }

  state(): ReconnectState {
    return { ...this.reconnectState };
  }

  /**
   * 以降の切断通知を無視する（計画的な終了時）。
   */
  stop(): void {
    this.stopped = true;
  }

  private async recover(code: string | number): Promise<void> {
    if (this.stopped) {
      return;
    }
    if (this.reconnectState.marketDataConnected) {
      this.logger.debug('already recovered by a previous signal', { code });
      return;
    }
    if (this.reconnectState.reloginInProgress) {
      this.logger.debug('re-login in progress, signal ignored', { code });
      return;
    }

    const snapshot = this.registry.symbols();
    this.logger.info('recovering market data connection', { code, symbols: snapshot.length });

    try {
      if ((await this.probeSession()) === 'dead') {
        this.logger.warn('trade session is dead, re-logging in');
        this.reconnectState.reloginInProgress = true;
        try {
          await this.session.reLogin();
        } finally {
          this.reconnectState.reloginInProgress = false;
        }
      }
    } catch (error) {
      this.logFailure('session probe failed, rebuilding anyway', error);
    } finally {
      await this.rebuild(snapshot);
    }
  }

  private async probeSession(): Promise<ProbeResult> {
    return await withTimeout(
      this.session.probe(),
      this.probeTimeoutMs,
      () => new TransientNetworkError(`session probe timed out after ${this.probeTimeoutMs}ms`, 'ETIMEDOUT')
    );
  }

  private async rebuild(snapshot: readonly string[]): Promise<void> {
    if (!this.liveness.isAlive()) {
      this.logger.error('process is not alive, pool rebuild skipped', { reason: this.liveness.reason() });
      return;
    }
    if (this.stopped) {
      return;
    }

    try {
      await this.pool.rebuild(snapshot);
    } catch (error) {
      this.logFailure('market data pool rebuild failed', error);
      return;
    }
    this.markConnected();
    this.logger.info('market data connection recovered', { symbols: this.registry.size() });
  }

  private logFailure(msg: string, error: unknown): void {
    const kind = error instanceof BrokerLinkError ? error.kind : 'reconnect_error';
    this.metricsCollector?.incrementError(kind);
    this.logger.error(msg, { kind, error: errorMessage(error) });
  }
}
