import { clampPoolSize } from '@/application/marketdata/ConnectionPool';
import type { Credentials } from '@/domain/types';

/**
 * 起動時設定
 */
export interface AppConfig {
  credentials: Credentials;
  accountNo: string;
  bridgeUrl: string;
  poolSize: number;
  symbols: string[];
  reloginMaxRetry: number;
  reloginDelayMs: number;
  taskQueueCapacity: number;
  redisUrl?: string;
  metricsPort?: number;
}

type Env = Record<string, string | undefined>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {Error} 環境変数が未設定の場合
 */
export function requireEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function intEnv(env: Env, key: string, fallback: number): number {
  const value = optionalEnv(env, key);
  if (value === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Environment variable ${key} must be an integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * 環境変数から設定を読み込む。
 * @param env 環境変数（通常は process.env）
 * @throws {Error} 必須項目の欠落、または数値項目が整数でない場合
 */
export function loadConfig(env: Env): AppConfig {
  const metricsPort = optionalEnv(env, 'METRICS_PORT') === undefined ? undefined : intEnv(env, 'METRICS_PORT', 0);

  return {
    credentials: {
      personalId: requireEnv(env, 'BROKER_PERSONAL_ID'),
      password: requireEnv(env, 'BROKER_PASSWORD'),
      certPath: requireEnv(env, 'BROKER_CERT_PATH'),
      certPassword: requireEnv(env, 'BROKER_CERT_PASSWORD'),
      gatewayAddress: optionalEnv(env, 'BROKER_GATEWAY_ADDRESS'),
    },
    accountNo: requireEnv(env, 'BROKER_ACCOUNT_NO'),
    bridgeUrl: optionalEnv(env, 'BRIDGE_URL') ?? 'http://127.0.0.1:8080',
    poolSize: clampPoolSize(intEnv(env, 'MARKETDATA_POOL_SIZE', 2)),
    symbols: (optionalEnv(env, 'SYMBOLS') ?? '')
      .split(',')
      .map((symbol) => symbol.trim())
      .filter(Boolean),
    reloginMaxRetry: intEnv(env, 'RELOGIN_MAX_RETRY', 20),
    reloginDelayMs: intEnv(env, 'RELOGIN_DELAY_MS', 5000),
    taskQueueCapacity: intEnv(env, 'TASK_QUEUE_CAPACITY', 10_000),
    redisUrl: optionalEnv(env, 'REDIS_URL'),
    metricsPort,
  };
}
