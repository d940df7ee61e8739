import { delay } from '@/application/concurrency/delay';
import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataSocket } from '@/application/interfaces/MarketDataSocket';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type {
  FilledCallback,
  OrderCallback,
  TradeGatewayClient,
  TradeGatewayFactory,
} from '@/application/interfaces/TradeGateway';
import type { LivenessFlag } from '@/application/liveness/LivenessFlag';
import {
  AuthenticationError,
  classifyConnectionError,
  DEFAULT_TRANSIENT_CODES,
  errorMessage,
  SessionUnavailableError,
} from '@/domain/errors';
import type { Account, Credentials, SessionState } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * 取引接続のイベントコードのうち、接続異常を表すもの
 */
export const TRADE_DISCONNECT_CODES: readonly string[] = ['300', '301'];

/**
 * 取引接続の切断を通知する先（ReconnectionCoordinator.onDisconnect）
 */
export type TradeDisconnectHook = (code: string, message: string) => void;

/**
 * 戦略層が設定する取引コールバック
 */
export interface TradeHandlers {
  onOrder?: OrderCallback;
  onOrderChanged?: OrderCallback;
  onFilled?: FilledCallback;
}

/**
 * SessionManager の設定
 */
export interface SessionManagerOptions {
  /** 再ログインのリトライ回数（初回を除く） */
  maxRetry?: number;
  /** 再ログインの試行間隔 */
  retryDelayMs?: number;
  /** 一時的とみなすネットワークエラーコード */
  transientCodes?: readonly string[];
  /** 死活確認（信用枠照会）に使う銘柄 */
  probeSymbol?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * 死活確認の結果
 */
export type ProbeResult = 'alive' | 'dead';

/**
 * アプリケーション層: 取引セッション管理
 *
 * 責務: 認証済みセッション（ゲートウェイハンドル）を 1 つだけ保持し、
 * ログイン・ログアウト・上限付き再ログイン・口座選択を担当する。
 *
 * 状態遷移: logged_out → logging_in → active → relogging_in → active | dead
 */
export class SessionManager {
  private client: TradeGatewayClient | null = null;
  private credentials: Credentials | null = null;
  private accountList: Account[] = [];
  private active: Account | null = null;
  private activeAccountNo: string | null = null;
  private currentState: SessionState = 'logged_out';
  private tradeHandlers: TradeHandlers = {};
  private disconnectHook: TradeDisconnectHook | null = null;
  private closed = false;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly maxRetry: number;
  private readonly retryDelayMs: number;
  private readonly transientCodes: readonly string[];
  private readonly probeSymbol: string;

  /**
   * @param connect ゲートウェイへ接続してハンドルを得るファクトリ
   * @param liveness プロセスの生存フラグ
   * @param options 設定
   */
  constructor(
    private readonly connect: TradeGatewayFactory,
    private readonly liveness: LivenessFlag,
    options?: SessionManagerOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'SessionManager' });
    this.metricsCollector = options?.metricsCollector;
    this.maxRetry = options?.maxRetry ?? 20;
    this.retryDelayMs = options?.retryDelayMs ?? 5000;
    this.transientCodes = options?.transientCodes ?? DEFAULT_TRANSIENT_CODES;
    this.probeSymbol = options?.probeSymbol ?? '2330';
  }

  get state(): SessionState {
    return this.currentState;
  }

  get activeAccount(): Account | null {
    return this.active;
  }

  get accounts(): readonly Account[] {
    return this.accountList;
  }

  isLoggedIn(): boolean {
    return this.client !== null;
  }

  /**
   * 取引接続の切断（イベントコード 300/301）を通知する先を設定する。
   */
  setDisconnectHook(hook: TradeDisconnectHook): void {
    this.disconnectHook = hook;
  }

  /**
   * 取引コールバックを設定する。現在のセッションにも即座に反映し、再ログイン後も引き継ぐ。
   */
  setTradeHandlers(handlers: TradeHandlers): void {
    this.tradeHandlers = { ...this.tradeHandlers, ...handlers };
    if (this.client) {
      this.registerCallbacks(this.client);
    }
  }

  /**
   * ログインする。失敗してもリトライはしない（呼び出し側が判断する）。
   * @returns ログインに成功した場合は true
   */
  async login(credentials: Credentials): Promise<boolean> {
    if (this.closed) {
      this.logger.error('session manager is closed, login refused');
      return false;
    }
    await this.logout();
    this.credentials = null;
    this.currentState = 'logging_in';

    this.logger.info('connecting to trade gateway', { gatewayAddress: credentials.gatewayAddress ?? null });
    try {
      const client = await this.connect(credentials.gatewayAddress);
      if (await this.authenticate(client, credentials)) {
        if (this.closed) {
          return await this.abandonLogin();
        }
        this.credentials = credentials;
        this.currentState = 'active';
        return true;
      }
    } catch (error) {
      this.logger.error('trade gateway login failed', { error: errorMessage(error) });
    }

    this.currentState = 'logged_out';
    return false;
  }

  /**
   * 保存済みの認証情報で再ログインする（ReconnectionCoordinator からのみ呼ばれる）。
   * 最大 maxRetry + 1 回試行し、一時的でない接続エラーか上限到達で生存フラグを落とす。
   * 成功時は直前に選択していた口座を選び直す。
   * @returns 再ログインに成功した場合は true
   */
  async reLogin(): Promise<boolean> {
    const credentials = this.credentials;
    if (!credentials) {
      this.logger.error('re-login requested without stored credentials');
      this.markDead('re-login without credentials');
      return false;
    }

    this.currentState = 'relogging_in';

    for (let attempt = 0; attempt <= this.maxRetry; attempt++) {
      if (this.closed) {
        return await this.abandonLogin();
      }
      if (!this.liveness.isAlive()) {
        this.currentState = 'dead';
        return false;
      }
      this.logger.info('re-login attempt', { attempt, maxRetry: this.maxRetry });
      await this.logout();
      this.currentState = 'relogging_in';

      let client: TradeGatewayClient;
      try {
        client = await this.connect(credentials.gatewayAddress);
      } catch (error) {
        this.metricsCollector?.incrementReloginAttempt('failure');
        const failure = classifyConnectionError(error, this.transientCodes);
        if (failure.kind === 'fatal_connection') {
          this.logger.error('non-recoverable trade gateway connection error', {
            kind: failure.kind,
            error: failure.message,
          });
          this.markDead(`fatal connection error: ${failure.message}`);
          return false;
        }
        this.logger.warn('transient trade gateway connection error', {
          attempt,
          kind: failure.kind,
          code: failure.code ?? null,
          error: failure.message,
        });
        await this.waitBeforeRetry(attempt);
        continue;
      }
      if (this.closed) {
        await this.discard(client);
        return await this.abandonLogin();
      }

      try {
        if (await this.authenticate(client, credentials)) {
          if (this.closed) {
            return await this.abandonLogin();
          }
          this.metricsCollector?.incrementReloginAttempt('success');
          if (this.activeAccountNo !== null) {
            this.setActiveAccount(this.activeAccountNo);
          }
          this.currentState = 'active';
          return true;
        }
      } catch (error) {
        this.logger.error('re-login raised, will retry', { attempt, error: errorMessage(error) });
        await this.discard(client);
      }

      this.metricsCollector?.incrementReloginAttempt('failure');
      await this.waitBeforeRetry(attempt);
    }

    this.logger.error('re-login retries exhausted', { attempts: this.maxRetry + 1 });
    this.markDead('re-login retries exhausted');
    return false;
  }

  /**
   * ログアウトする。ゲートウェイ呼び出しが失敗してもハンドルは必ず破棄する。
   */
  async logout(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.accountList = [];
    this.active = null;
    if (this.currentState !== 'dead') {
      this.currentState = 'logged_out';
    }
    if (!client) {
      return;
    }

    try {
      // 古いハンドルから切断イベントが届いても再接続が走らないようにする
      client.setEventCallback(() => {});
      await client.logout();
      this.logger.info('logged out');
    } catch (error) {
      this.logger.warn('logout failed, session handle discarded', { error: errorMessage(error) });
    }
  }

  /**
   * 口座番号で取引口座を選択する。再ログイン後も同じ口座を選び直す。
   * @returns 口座が見つかった場合は true
   */
  setActiveAccount(accountNo: string): boolean {
    if (!this.client) {
      this.logger.warn('login before selecting an account', { accountNo });
      return false;
    }

    const account = this.accountList.find((candidate) => candidate.accountNo === accountNo);
    if (!account) {
      this.logger.warn('account not found', { accountNo });
      return false;
    }

    this.active = account;
    this.activeAccountNo = accountNo;
    this.logger.debug('active account selected', { accountNo });
    return true;
  }

  /**
   * セッションの死活確認。ハンドルがない、または応答が Login Error ならセッションは死んでいる。
   * @throws ゲートウェイ呼び出しが例外を投げた場合はそのまま伝播する
   */
  async probe(): Promise<ProbeResult> {
    const client = this.client;
    if (!client) {
      return 'dead';
    }

    const response = await client.probe(this.active, this.probeSymbol);
    this.logger.debug('trade session probe', { isSuccess: response.isSuccess, message: response.message });
    if (!response.isSuccess && (response.message ?? '').includes('Login Error')) {
      return 'dead';
    }
    return 'alive';
  }

  /**
   * 現在のセッションから新しいマーケットデータソケットを得る。
   * @throws {SessionUnavailableError} セッションがない場合
   */
  openRealtimeFeed(): MarketDataSocket {
    if (!this.client) {
      throw new SessionUnavailableError('login before opening a market data socket');
    }
    return this.client.openRealtimeFeed();
  }

  /**
   * 現在のゲートウェイハンドル。ない場合は null
   */
  gateway(): TradeGatewayClient | null {
    return this.client;
  }

  /**
   * 以降のログイン・再ログインを止める（終了処理用）。
   * 実行中の再ログインは次の区切りで中断し、その時点で得たハンドルはログアウトする。
   */
  close(): void {
    this.closed = true;
  }

  /**
   * 保存済みの認証情報を破棄する（終了処理用）。
   */
  clearCredentials(): void {
    this.credentials = null;
    this.activeAccountNo = null;
  }

  private async authenticate(client: TradeGatewayClient, credentials: Credentials): Promise<boolean> {
    this.registerCallbacks(client);

    this.logger.info('logging in');
    const response = await client.login(credentials);
    if (!response.isSuccess) {
      const rejection = new AuthenticationError(response.message ?? 'login rejected');
      this.logger.warn('login rejected', { kind: rejection.kind, message: rejection.message });
      await this.discard(client);
      return false;
    }

    this.client = client;
    this.accountList = response.data ?? [];
    this.active = null;
    this.logger.info('login succeeded', { accounts: this.accountList.map((account) => account.accountNo) });
    return true;
  }

  private async abandonLogin(): Promise<false> {
    this.logger.info('login cancelled, session manager is closed');
    await this.logout();
    return false;
  }

  private async discard(client: TradeGatewayClient): Promise<void> {
    try {
      client.setEventCallback(() => {});
      await client.logout();
    } catch (error) {
      this.logger.debug('discarding gateway handle failed', { error: errorMessage(error) });
    }
  }

  private registerCallbacks(client: TradeGatewayClient): void {
    client.setEventCallback((code, message) => this.handleTradeEvent(client, code, message));
    client.setOrderCallback(this.tradeHandlers.onOrder ?? ((code) => this.logger.debug('order event', { code })));
    client.setOrderChangedCallback(
      this.tradeHandlers.onOrderChanged ?? ((code) => this.logger.debug('order changed event', { code }))
    );
    client.setFilledCallback(this.tradeHandlers.onFilled ?? ((code) => this.logger.debug('filled event', { code })));
  }

  private handleTradeEvent(client: TradeGatewayClient, code: string, message: string): void {
    if (!TRADE_DISCONNECT_CODES.includes(code)) {
      this.logger.debug('trade event', { code, message });
      return;
    }
    if (client !== this.client) {
      return;
    }

    this.logger.warn('trade connection lost, logging out', { code, message });
    this.logout().then(
      () => this.disconnectHook?.(code, message),
      (error: unknown) => this.logger.error('logout after trade disconnect failed', { error: errorMessage(error) })
    );
  }

  private async waitBeforeRetry(attempt: number): Promise<void> {
    if (attempt < this.maxRetry) {
      await delay(this.retryDelayMs);
    }
  }

  private markDead(reason: string): void {
    this.currentState = 'dead';
    this.liveness.markDead(reason);
  }
}
