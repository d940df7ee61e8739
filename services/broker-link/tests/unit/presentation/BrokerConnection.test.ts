import { FakeTradeGateway, TEST_CREDENTIALS } from '@test/unit/helpers/mocks/FakeTradeGateway';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MarketTick, OrderRequest } from '@/domain/types';
import { GatewayConnectionError } from '@/domain/errors';
import { BrokerConnection, type BrokerConnectionOptions } from '@/presentation/BrokerConnection';

const ORDER: OrderRequest = {
  side: 'buy',
  symbol: '2330',
  quantity: 1000,
  price: 580,
  priceType: 'limit',
  timeInForce: 'ROD',
  orderType: 'stock',
};

/**
 * 単体テスト: BrokerConnection
 *
 * テスト用ゲートウェイで、ログイン → 購読 → 配信 → 再接続 → 終了 の流れを検証する。
 */
describe('BrokerConnection', () => {
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let gateways: FakeTradeGateway[];

  const createConnection = (options: Partial<BrokerConnectionOptions> = {}): BrokerConnection =>
    new BrokerConnection({
      gatewayFactory: async () => {
        const gateway = new FakeTradeGateway();
        gateways.push(gateway);
        return gateway;
      },
      pool: { size: 2 },
      logger: loggerMock,
      metricsCollector: metricsMock,
      ...options,
    });

  const login = async (connection: BrokerConnection): Promise<boolean> => {
    const logging = connection.login(TEST_CREDENTIALS);
    await vi.runAllTimersAsync();
    return await logging;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    gateways = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('各コンポーネントは component 付きの子ロガーに書く', () => {
    createConnection();

    expect(loggerMock.bindings).toEqual(
      expect.arrayContaining([
        { component: 'BrokerConnection' },
        { component: 'SessionManager' },
        { component: 'ConnectionPool' },
        { component: 'SubscriptionRegistry' },
        { component: 'ReconnectionCoordinator' },
        { component: 'MarketDataMessageHandler' },
      ])
    );
  });

  describe('login()', () => {
    it('ログインしてマーケットデータのプールを開く', async () => {
      const connection = createConnection();

      await expect(login(connection)).resolves.toBe(true);

      expect(connection.isLoggedIn()).toBe(true);
      expect(connection.isAlive()).toBe(true);
      expect(gateways[0].openSockets()).toHaveLength(2);
      expect(connection.reconnectState()).toEqual({ marketDataConnected: true, reloginInProgress: false });
    });

    it('ログインが拒否されたら false を返し、プールは開かない', async () => {
      const connection = createConnection({
        gatewayFactory: async () => {
          const gateway = new FakeTradeGateway();
          gateway.login.mockResolvedValue({ isSuccess: false, message: 'Login Error: invalid password' });
          gateways.push(gateway);
          return gateway;
        },
      });

      await expect(login(connection)).resolves.toBe(false);

      expect(gateways[0].sockets).toHaveLength(0);
    });

    it('プールを開けなければ生存フラグを落とす（ログイン自体は成功）', async () => {
      const connection = createConnection({
        gatewayFactory: async () => {
          const gateway = new FakeTradeGateway();
          gateway.socketOptions = { connectError: new Error('connection refused') };
          gateways.push(gateway);
          return gateway;
        },
        pool: { size: 2, maxOpenRetry: 1 },
      });

      await expect(login(connection)).resolves.toBe(true);

      expect(connection.isAlive()).toBe(false);
      expect(connection.liveness.reason()).toBe('market data pool unavailable: retries exhausted');
      expect(loggerMock.error).toHaveBeenCalledWith('logged in but market data pool is unavailable');
    });
  });

  describe('subscribe() / unsubscribe()', () => {
    it('ログイン前は false を返す', () => {
      const connection = createConnection();

      expect(connection.subscribe('2330')).toBe(false);
      expect(loggerMock.error).toHaveBeenCalledWith('login first', { operation: 'subscribe' });
    });

    it('購読して応答を受けたら一覧に載り、解除すると消える', async () => {
      const connection = createConnection();
      await login(connection);

      expect(connection.subscribe('2330')).toBe(true);
      expect(connection.subscribe('2317')).toBe(true);
      expect(connection.subscriptions()).toEqual(['2330', '2317']);

      expect(connection.unsubscribe('2330')).toBe(true);
      expect(connection.subscriptions()).toEqual(['2317']);
      expect(gateways[0].openSockets()[0].unsubscribeCalls).toHaveLength(1);
    });
  });

  describe('ティックの配信', () => {
    it('時刻が進んだティックだけをハンドラに渡す', async () => {
      const connection = createConnection();
      const received: MarketTick[] = [];
      connection.setMessageHandler((t) => {
        received.push(t);
      });
      await login(connection);
      connection.subscribe('2330');
      const [socket] = gateways[0].openSockets();

      socket.emitMessage({ event: 'data', data: { symbol: '2330', time: 100, bid: 580, ask: 581 } });
      socket.emitMessage({ event: 'data', data: { symbol: '2330', time: 100, bid: 580, ask: 581 } });
      socket.emitMessage({ event: 'data', data: { symbol: '2330', time: 99, bid: 579, ask: 580 } });
      socket.emitMessage({ event: 'data', data: { symbol: '2330', time: 101, bid: 581, ask: 582 } });
      await connection.terminate();

      expect(received.map((t) => t.time)).toEqual([100, 101]);
    });
  });

  describe('再接続', () => {
    it('ソケットが切れたらプールを作り直し、購読を復元する', async () => {
      const connection = createConnection();
      await login(connection);
      connection.subscribe('2330');
      connection.subscribe('2317');
      const before = gateways[0].openSockets();

      before[1].emitDisconnect();
      expect(connection.reconnectState().marketDataConnected).toBe(false);
      await vi.runAllTimersAsync();

      await vi.waitFor(() => expect(connection.reconnectState().marketDataConnected).toBe(true));
      const after = gateways[0].openSockets();
      expect(after).toHaveLength(2);
      expect(after.some((socket) => before.includes(socket))).toBe(false);
      expect(connection.subscriptions()).toEqual(['2330', '2317']);
      expect(metricsMock.incrementReconnect).toHaveBeenCalledTimes(1);
    });

    it('取引接続が切れたら再ログインしてからプールを作り直す', async () => {
      const connection = createConnection();
      await login(connection);
      connection.setActiveAccount('2222222');
      connection.subscribe('2330');

      gateways[0].emitEvent('301', 'trade connection closed');
      await vi.waitFor(() => expect(gateways).toHaveLength(2));
      await vi.runAllTimersAsync();

      await vi.waitFor(() => expect(connection.reconnectState().marketDataConnected).toBe(true));
      expect(connection.isLoggedIn()).toBe(true);
      expect(connection.activeAccount?.accountNo).toBe('2222222');
      expect(gateways[1].openSockets()).toHaveLength(2);
      expect(connection.subscriptions()).toEqual(['2330']);
    });
  });

  describe('発注と照会', () => {
    it('口座を選ぶ前の発注は null を返す', async () => {
      const connection = createConnection();
      await login(connection);

      await expect(connection.placeOrder(ORDER)).resolves.toBeNull();
      expect(loggerMock.error).toHaveBeenCalledWith('select an account first', { operation: 'placeOrder' });
    });

    it('選んだ口座で発注する', async () => {
      const connection = createConnection();
      await login(connection);
      connection.setActiveAccount('1111111');

      const response = await connection.placeOrder(ORDER);

      expect(response?.data?.orderNo).toBe('ord-1');
      expect(gateways[0].placeOrder).toHaveBeenCalledWith(connection.activeAccount, ORDER);
    });

    it('ゲートウェイの例外はログに記録して null を返す', async () => {
      const connection = createConnection();
      await login(connection);
      connection.setActiveAccount('1111111');
      gateways[0].placeOrder.mockRejectedValue(new Error('bridge down'));

      await expect(connection.placeOrder(ORDER)).resolves.toBeNull();
      expect(loggerMock.error).toHaveBeenCalledWith('place order failed', { symbol: '2330', error: 'bridge down' });
    });

    it('気配の照会は口座を選ばなくてもできる', async () => {
      const connection = createConnection();
      await login(connection);

      await expect(connection.getQuote('2330')).resolves.toEqual({
        isSuccess: true,
        data: { symbol: '2330', previousClose: 100 },
      });
    });

    it('約定ハンドラは取引ゲートウェイに登録される', async () => {
      const connection = createConnection();
      const onFilled = vi.fn();
      connection.setOrderFilledHandler(onFilled);
      await login(connection);

      expect(gateways[0].filledCallback).toBe(onFilled);
    });
  });

  describe('terminate()', () => {
    it('プールを閉じてログアウトし、以降の呼び出しは失敗値を返す', async () => {
      const connection = createConnection();
      await login(connection);
      connection.subscribe('2330');
      const sockets = gateways[0].openSockets();

      await connection.terminate();

      expect(connection.isTerminated()).toBe(true);
      expect(connection.isLoggedIn()).toBe(false);
      expect(sockets.map((socket) => socket.disconnectCount)).toEqual([1, 1]);
      expect(gateways[0].logout).toHaveBeenCalledTimes(1);
      expect(connection.subscribe('2317')).toBe(false);
      expect(loggerMock.error).toHaveBeenCalledWith('broker connection is terminated', { operation: 'subscribe' });
      await expect(connection.login(TEST_CREDENTIALS)).resolves.toBe(false);
      await expect(connection.getQuote('2330')).resolves.toBeNull();
      expect(gateways).toHaveLength(1);
    });

    it('終了後に届いた切断通知では再接続しない', async () => {
      const connection = createConnection();
      await login(connection);

      await connection.terminate();
      loggerMock.clear();
      gateways[0].emitEvent('300', 'trade connection lost');
      await vi.runAllTimersAsync();

      expect(metricsMock.incrementReconnect).not.toHaveBeenCalled();
      expect(gateways).toHaveLength(1);
      expect(loggerMock.warn).not.toHaveBeenCalled();
    });

    it('再ログインのリトライ待ちの間に終了したら新しいセッションを作らない', async () => {
      let factoryCalls = 0;
      const connection = createConnection({
        gatewayFactory: async () => {
          factoryCalls += 1;
          if (factoryCalls === 2) {
            throw new GatewayConnectionError('connection refused', 'ECONNREFUSED');
          }
          const gateway = new FakeTradeGateway();
          gateways.push(gateway);
          return gateway;
        },
      });
      await login(connection);
      connection.subscribe('2330');

      gateways[0].emitEvent('301', 'trade connection closed');
      await vi.waitFor(() => expect(factoryCalls).toBe(2));
      await connection.terminate();
      await vi.runAllTimersAsync();

      expect(factoryCalls).toBe(2);
      expect(gateways).toHaveLength(1);
      expect(connection.isLoggedIn()).toBe(false);
      expect(connection.isAlive()).toBe(true);
      expect(loggerMock.info).toHaveBeenCalledWith('login cancelled, session manager is closed');
    });

    it('2 回呼んでも 1 回しか実行しない', async () => {
      const connection = createConnection();
      await login(connection);

      await connection.terminate();
      await connection.terminate();

      expect(gateways[0].logout).toHaveBeenCalledTimes(1);
    });
  });
});
