import { FakeTradeGateway, TEST_CREDENTIALS } from '@test/unit/helpers/mocks/FakeTradeGateway';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BrokerConnection } from '@/presentation/BrokerConnection';
import { type StartupResult, startBrokerLink } from '@/presentation/startBrokerLink';

/**
 * 単体テスト: startBrokerLink
 *
 * 起動の各段階の失敗が、呼び出し側の終了処理に正しく渡ることを検証する。
 */
describe('startBrokerLink', () => {
  let loggerMock: LoggerMock;
  let gateways: FakeTradeGateway[];

  const createConnection = (prepare: (gateway: FakeTradeGateway) => void = () => {}): BrokerConnection =>
    new BrokerConnection({
      gatewayFactory: async () => {
        const gateway = new FakeTradeGateway();
        prepare(gateway);
        gateways.push(gateway);
        return gateway;
      },
      pool: { size: 2, maxOpenRetry: 1 },
      logger: loggerMock,
    });

  const config = { credentials: TEST_CREDENTIALS, accountNo: '1111111', symbols: ['2330', '2317'] };

  beforeEach(() => {
    vi.useFakeTimers();
    loggerMock = new LoggerMock();
    gateways = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('ログイン・口座選択・購読が済めば started を返す', async () => {
    const connection = createConnection();

    const starting = startBrokerLink(connection, config);
    await vi.runAllTimersAsync();

    await expect(starting).resolves.toBe('started');
    expect(connection.subscriptions()).toEqual(['2330', '2317']);
  });

  it('プールを開けず生存フラグが落ちたら not_alive を返し、購読しない', async () => {
    const connection = createConnection((gateway) => {
      gateway.socketOptions = { connectError: new Error('connection refused') };
    });

    const starting = startBrokerLink(connection, config);
    await vi.runAllTimersAsync();

    await expect(starting).resolves.toBe('not_alive');
    expect(connection.isAlive()).toBe(false);
    expect(connection.subscriptions()).toEqual([]);
  });

  it('ログインが拒否されたら例外を投げる', async () => {
    const connection = createConnection((gateway) => {
      gateway.login.mockResolvedValue({ isSuccess: false, message: 'Login Error: invalid password' });
    });

    const starting = startBrokerLink(connection, config);
    const assertion = expect(starting).rejects.toThrow('login failed');
    await vi.runAllTimersAsync();

    await assertion;
  });

  it('口座が見つからなければ例外を投げ、購読しない', async () => {
    const connection = createConnection();

    const starting = startBrokerLink(connection, { ...config, accountNo: '9999999' });
    const assertion = expect(starting).rejects.toThrow('account not found: 9999999');
    await vi.runAllTimersAsync();

    await assertion;
    expect(connection.subscriptions()).toEqual([]);
  });
});
