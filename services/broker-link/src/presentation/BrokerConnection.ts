import { BoundedTaskQueue } from '@/application/concurrency/BoundedTaskQueue';
import type { Logger } from '@/application/interfaces/Logger';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type {
  FilledCallback,
  GatewayResponse,
  OrderCallback,
  TradeGatewayFactory,
} from '@/application/interfaces/TradeGateway';
import { LivenessFlag } from '@/application/liveness/LivenessFlag';
import { ConnectionPool, type ConnectionPoolOptions } from '@/application/marketdata/ConnectionPool';
import { DedupGate, type TickHandler } from '@/application/marketdata/DedupGate';
import { SubscriptionRegistry } from '@/application/marketdata/SubscriptionRegistry';
import { ReconnectionCoordinator, type ReconnectionCoordinatorOptions } from '@/application/reconnect/ReconnectionCoordinator';
import { SessionManager, type SessionManagerOptions } from '@/application/session/SessionManager';
import { errorMessage } from '@/domain/errors';
import type {
  Account,
  Credentials,
  MarketDataChannel,
  OrderRequest,
  OrderResult,
  Quote,
  ReconnectState,
} from '@/domain/types';
import { MarketDataMessageParser } from '@/infra/adapters/bridge/MarketDataMessageParser';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MarketDataMessageHandler } from '@/presentation/marketdata/MarketDataMessageHandler';

/**
 * BrokerConnection の初期化オプション
 */
export interface BrokerConnectionOptions {
  /** ゲートウェイへ接続してハンドルを得るファクトリ */
  gatewayFactory: TradeGatewayFactory;
  pool?: Omit<ConnectionPoolOptions, 'logger' | 'metricsCollector'>;
  session?: Omit<SessionManagerOptions, 'logger' | 'metricsCollector'>;
  reconnect?: ReconnectionCoordinatorOptions;
  /** 購読するチャンネル */
  channel?: MarketDataChannel;
  /** 受信タスクキューの上限 */
  taskQueueCapacity?: number;
  /** terminate 時にタスクキューの処理完了を待つ上限 */
  drainTimeoutMs?: number;
  parser?: MessageParser;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * ブローカー接続のファサード
 *
 * 戦略層はこのクラスだけを使う。
 * 例外は外に出さず、真偽値・null・生存フラグで結果を返す。
 */
export class BrokerConnection {
  readonly liveness: LivenessFlag;
  private readonly session: SessionManager;
  private readonly pool: ConnectionPool;
  private readonly registry: SubscriptionRegistry;
  private readonly dedupGate: DedupGate;
  private readonly queue: BoundedTaskQueue;
  private readonly coordinator: ReconnectionCoordinator;
  private readonly handler: MarketDataMessageHandler;
  private readonly drainTimeoutMs: number;
  private terminated = false;
  private readonly logger: Logger;

  constructor(options: BrokerConnectionOptions) {
    const baseLogger = options.logger ?? LoggerFactory.create();
    const metricsCollector = options.metricsCollector;
    this.logger = baseLogger.child({ component: 'BrokerConnection' });
    this.drainTimeoutMs = options.drainTimeoutMs ?? 5000;

    this.liveness = new LivenessFlag(baseLogger, metricsCollector);
    this.session = new SessionManager(options.gatewayFactory, this.liveness, {
      ...options.session,
      logger: baseLogger,
      metricsCollector,
    });
    this.dedupGate = new DedupGate(baseLogger, metricsCollector);
    this.pool = new ConnectionPool(() => this.session.openRealtimeFeed(), this.liveness, {
      ...options.pool,
      logger: baseLogger,
      metricsCollector,
    });
    this.registry = new SubscriptionRegistry(
      this.pool,
      this.dedupGate,
      options.channel ?? 'trades',
      baseLogger,
      metricsCollector
    );
    this.pool.setSubscriber(this.registry);
    this.queue = new BoundedTaskQueue(options.taskQueueCapacity ?? 10_000, baseLogger, metricsCollector);
    this.coordinator = new ReconnectionCoordinator(
      this.session,
      this.pool,
      this.registry,
      this.liveness,
      baseLogger,
      metricsCollector,
      options.reconnect
    );
    this.handler = new MarketDataMessageHandler(
      options.parser ?? new MarketDataMessageParser(baseLogger, metricsCollector),
      this.registry,
      this.dedupGate,
      this.queue,
      baseLogger,
      metricsCollector
    );

    this.pool.setHandlers({
      onMessage: (raw, slotIndex) => this.handler.handleMessage(raw, slotIndex),
      onDisconnect: (code, reason) => this.signalDisconnect(code, reason),
    });
    this.session.setDisconnectHook((code, message) => this.signalDisconnect(code, message));
  }

  /**
   * ログインしてマーケットデータ接続プールを開く。
   * プールを開けなかった場合は生存フラグが落ちる（戻り値はログイン結果）。
   * @returns ログインに成功した場合は true
   */
  async login(credentials: Credentials): Promise<boolean> {
    if (this.rejectAfterTerminate('login')) {
      return false;
    }
    if (!(await this.session.login(credentials))) {
      return false;
    }
    if (!(await this.coordinator.connect())) {
      this.logger.error('logged in but market data pool is unavailable');
    }
    return true;
  }

  /**
   * 銘柄を購読する。
   * @returns 購読中（または購読リクエストを送信できた）なら true
   */
  subscribe(symbol: string): boolean {
    if (this.rejectAfterTerminate('subscribe') || !this.requireSession('subscribe')) {
      return false;
    }
    return this.registry.subscribe(symbol);
  }

  /**
   * 購読を解除する。記録はゲートウェイの unsubscribed 応答で消える。
   */
  unsubscribe(symbol: string): boolean {
    if (this.rejectAfterTerminate('unsubscribe') || !this.requireSession('unsubscribe')) {
      return false;
    }
    return this.registry.unsubscribe(symbol);
  }

  /**
   * 購読中の銘柄一覧（解除待ちは含まない）
   */
  subscriptions(): string[] {
    return this.registry.symbols();
  }

  setMessageHandler(handler: TickHandler): void {
    this.dedupGate.setHandler(handler);
  }

  setOrderFilledHandler(handler: FilledCallback): void {
    this.session.setTradeHandlers({ onFilled: handler });
  }

  setOrderHandler(handler: OrderCallback): void {
    this.session.setTradeHandlers({ onOrder: handler });
  }

  setOrderChangedHandler(handler: OrderCallback): void {
    this.session.setTradeHandlers({ onOrderChanged: handler });
  }

  isLoggedIn(): boolean {
    return !this.terminated && this.session.isLoggedIn();
  }

  isAlive(): boolean {
    return this.liveness.isAlive();
  }

  get activeAccount(): Account | null {
    return this.session.activeAccount;
  }

  setActiveAccount(accountNo: string): boolean {
    if (this.rejectAfterTerminate('setActiveAccount')) {
      return false;
    }
    return this.session.setActiveAccount(accountNo);
  }

  reconnectState(): ReconnectState {
    return this.coordinator.state();
  }

  async placeOrder(order: OrderRequest): Promise<GatewayResponse<OrderResult> | null> {
    const account = this.requireAccount('placeOrder');
    const gateway = this.session.gateway();
    if (!account || !gateway) {
      return null;
    }
    try {
      return await gateway.placeOrder(account, order);
    } catch (error) {
      this.logger.error('place order failed', { symbol: order.symbol, error: errorMessage(error) });
      return null;
    }
  }

  async getOrderResults(): Promise<GatewayResponse<OrderResult[]> | null> {
    const account = this.requireAccount('getOrderResults');
    const gateway = this.session.gateway();
    if (!account || !gateway) {
      return null;
    }
    try {
      return await gateway.getOrderResults(account);
    } catch (error) {
      this.logger.error('get order results failed', { error: errorMessage(error) });
      return null;
    }
  }

  async getQuote(symbol: string): Promise<GatewayResponse<Quote> | null> {
    const gateway = this.session.gateway();
    if (this.rejectAfterTerminate('getQuote') || !this.requireSession('getQuote') || !gateway) {
      return null;
    }
    try {
      return await gateway.getQuote(symbol);
    } catch (error) {
      this.logger.error('get quote failed', { symbol, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * 接続をすべて閉じる。途中の手順が失敗しても残りの手順は実行する。
   * 以降のメソッド呼び出しはエラーログを出して失敗値を返す。
   */
  async terminate(): Promise<void> {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    this.logger.info('terminating broker connection');

    const steps: Array<[string, () => unknown]> = [
      ['stop reconnection', () => this.coordinator.stop()],
      ['close session', () => this.session.close()],
      ['drain task queue', () => this.queue.close(this.drainTimeoutMs)],
      ['close market data pool', () => this.pool.closeAll()],
      ['logout', () => this.session.logout()],
      ['clear credentials', () => this.session.clearCredentials()],
    ];
    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        this.logger.error('terminate step failed', { step: name, error: errorMessage(error) });
      }
    }

    this.logger.info('broker connection terminated');
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  private signalDisconnect(code: string | number, message: string): void {
    this.coordinator.onDisconnect(code, message).catch((error: unknown) => {
      this.logger.error('disconnect handling failed', { code, error: errorMessage(error) });
    });
  }

  private rejectAfterTerminate(operation: string): boolean {
    if (this.terminated) {
      this.logger.error('broker connection is terminated', { operation });
    }
    return this.terminated;
  }

  private requireSession(operation: string): boolean {
    if (!this.session.isLoggedIn()) {
      this.logger.error('login first', { operation });
      return false;
    }
    return true;
  }

  private requireAccount(operation: string): Account | null {
    if (this.rejectAfterTerminate(operation) || !this.requireSession(operation)) {
      return null;
    }
    const account = this.session.activeAccount;
    if (!account) {
      this.logger.error('select an account first', { operation });
    }
    return account;
  }
}
