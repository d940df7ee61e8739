import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector, TickDropReason } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly deliveredCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly reloginCounter: Counter;
  private readonly subscriptionGauge: Gauge;
  private readonly aliveGauge: Gauge;

  constructor() {
    this.register = new Registry();

    this.receivedCounter = new Counter({
      name: 'broker_ticks_received_total',
      help: 'Total number of market data ticks received from sockets',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.deliveredCounter = new Counter({
      name: 'broker_ticks_delivered_total',
      help: 'Total number of ticks delivered to the strategy handler',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    // 古いティック・未購読・キュー満杯で捨てた数
    this.droppedCounter = new Counter({
      name: 'broker_ticks_dropped_total',
      help: 'Total number of ticks dropped before delivery',
      labelNames: ['reason'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'broker_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'broker_reconnects_total',
      help: 'Total number of market data pool rebuilds',
      registers: [this.register],
    });

    this.reloginCounter = new Counter({
      name: 'broker_relogin_attempts_total',
      help: 'Total number of trade session re-login attempts',
      labelNames: ['result'],
      registers: [this.register],
    });

    this.subscriptionGauge = new Gauge({
      name: 'broker_subscriptions',
      help: 'Number of tracked market data subscriptions',
      registers: [this.register],
    });

    this.aliveGauge = new Gauge({
      name: 'broker_alive',
      help: '1 while recovery may still be attempted, 0 after a fatal condition',
      registers: [this.register],
    });
  }

  incrementReceived(symbol: string): void {
    this.receivedCounter.inc({ symbol });
  }

  incrementDelivered(symbol: string): void {
    this.deliveredCounter.inc({ symbol });
  }

  incrementDropped(reason: TickDropReason): void {
    this.droppedCounter.inc({ reason });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  incrementReloginAttempt(result: 'success' | 'failure'): void {
    this.reloginCounter.inc({ result });
  }

  setSubscriptions(count: number): void {
    this.subscriptionGauge.set(count);
  }

  setAlive(alive: boolean): void {
    this.aliveGauge.set(alive ? 1 : 0);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
