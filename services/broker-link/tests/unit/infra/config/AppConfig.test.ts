import { describe, expect, it } from 'vitest';
import { loadConfig, requireEnv } from '@/infra/config/AppConfig';

const REQUIRED = {
  BROKER_PERSONAL_ID: 'A123456789',
  BROKER_PASSWORD: 'test-secret',
  BROKER_CERT_PATH: '/tmp/test-cert.pfx',
  BROKER_CERT_PASSWORD: 'test-cert-secret',
  BROKER_ACCOUNT_NO: '1111111',
};

describe('AppConfig', () => {
  describe('requireEnv()', () => {
    it('設定済みの値を返す', () => {
      expect(requireEnv({ KEY: 'value' }, 'KEY')).toBe('value');
    });

    it('未設定または空文字ならエラーを投げる', () => {
      expect(() => requireEnv({}, 'KEY')).toThrow('Missing required environment variable: KEY');
      expect(() => requireEnv({ KEY: '' }, 'KEY')).toThrow('Missing required environment variable: KEY');
    });
  });

  describe('loadConfig()', () => {
    it('必須項目だけなら既定値で埋める', () => {
      const config = loadConfig(REQUIRED);

      expect(config).toEqual({
        credentials: {
          personalId: 'A123456789',
          password: 'test-secret',
          certPath: '/tmp/test-cert.pfx',
          certPassword: 'test-cert-secret',
          gatewayAddress: undefined,
        },
        accountNo: '1111111',
        bridgeUrl: 'http://127.0.0.1:8080',
        poolSize: 2,
        symbols: [],
        reloginMaxRetry: 20,
        reloginDelayMs: 5000,
        taskQueueCapacity: 10000,
        redisUrl: undefined,
        metricsPort: undefined,
      });
    });

    it('任意項目を読み込む', () => {
      const config = loadConfig({
        ...REQUIRED,
        BROKER_GATEWAY_ADDRESS: 'gw.test.local:9000',
        BRIDGE_URL: 'http://bridge.test:9090',
        MARKETDATA_POOL_SIZE: '3',
        SYMBOLS: ' 2330, 2317 ,,2454 ',
        RELOGIN_MAX_RETRY: '5',
        RELOGIN_DELAY_MS: '1000',
        TASK_QUEUE_CAPACITY: '500',
        REDIS_URL: 'redis://localhost:6379/0',
        METRICS_PORT: '9464',
      });

      expect(config.credentials.gatewayAddress).toBe('gw.test.local:9000');
      expect(config.bridgeUrl).toBe('http://bridge.test:9090');
      expect(config.poolSize).toBe(3);
      expect(config.symbols).toEqual(['2330', '2317', '2454']);
      expect(config.reloginMaxRetry).toBe(5);
      expect(config.reloginDelayMs).toBe(1000);
      expect(config.taskQueueCapacity).toBe(500);
      expect(config.redisUrl).toBe('redis://localhost:6379/0');
      expect(config.metricsPort).toBe(9464);
    });

    it('プールの本数は 1〜5 に丸める', () => {
      expect(loadConfig({ ...REQUIRED, MARKETDATA_POOL_SIZE: '9' }).poolSize).toBe(5);
      expect(loadConfig({ ...REQUIRED, MARKETDATA_POOL_SIZE: '0' }).poolSize).toBe(1);
    });

    it('空白だけの任意項目は未設定として扱う', () => {
      const config = loadConfig({ ...REQUIRED, REDIS_URL: '   ', METRICS_PORT: '' });

      expect(config.redisUrl).toBeUndefined();
      expect(config.metricsPort).toBeUndefined();
    });

    it('数値項目が整数でなければエラーを投げる', () => {
      expect(() => loadConfig({ ...REQUIRED, RELOGIN_DELAY_MS: '5s' })).toThrow(
        'Environment variable RELOGIN_DELAY_MS must be an integer: 5s'
      );
    });

    it('必須項目が欠けていればエラーを投げる', () => {
      const { BROKER_ACCOUNT_NO: _omitted, ...rest } = REQUIRED;

      expect(() => loadConfig(rest)).toThrow('Missing required environment variable: BROKER_ACCOUNT_NO');
    });
  });
});
