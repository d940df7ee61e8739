import 'dotenv/config';
import process from 'node:process';
import type { TickPublisher } from '@/application/interfaces/TickPublisher';
import { errorMessage } from '@/domain/errors';
import { createBridgeGatewayFactory } from '@/infra/adapters/bridge/BridgeTradeGateway';
import { loadConfig } from '@/infra/config/AppConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { StreamRepository } from '@/infra/redis/StreamRepository';
import { BrokerConnection } from '@/presentation/BrokerConnection';
import { startBrokerLink } from '@/presentation/startBrokerLink';

/**
 * エントリーポイント: 起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成とログイン・購読
 * - SIGINT/SIGTERM と生存フラグの監視による終了処理
 *
 * 注意: 再接続や重複排除のロジックは持たず、配線するだけにする。
 */
async function bootstrap(): Promise<void> {
  const logger = LoggerFactory.create();
  const config = loadConfig(process.env);
  const metricsCollector = new PrometheusMetricsCollector();

  const connection = new BrokerConnection({
    gatewayFactory: createBridgeGatewayFactory(config.bridgeUrl, { logger }),
    pool: { size: config.poolSize },
    session: { maxRetry: config.reloginMaxRetry, retryDelayMs: config.reloginDelayMs },
    taskQueueCapacity: config.taskQueueCapacity,
    logger,
    metricsCollector,
  });

  // REDIS_URL が未設定なら配信先なしで起動する（ログのみ）
  const publisher: TickPublisher | null = config.redisUrl
    ? new StreamRepository(config.redisUrl, logger, metricsCollector)
    : null;
  connection.setMessageHandler(async (tick) => {
    if (!publisher) {
      logger.debug('tick', { symbol: tick.symbol, time: tick.time, bid: tick.bid, ask: tick.ask });
      return;
    }
    try {
      await publisher.publish(tick);
    } catch (error) {
      logger.error('tick publish failed', { symbol: tick.symbol, error: errorMessage(error) });
    }
  });
  connection.setOrderFilledHandler((code, filled) => {
    logger.info('order filled', { code, filled });
  });

  const metricsServer =
    config.metricsPort === undefined
      ? null
      : new MetricsServer(metricsCollector, config.metricsPort, logger, () => connection.isAlive());
  metricsServer?.start();

  let shuttingDown = false;
  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('shutting down broker link', { reason });

    await connection.terminate();
    try {
      await publisher?.close();
      await metricsServer?.stop();
    } catch (error) {
      logger.error('shutdown cleanup failed', { error: errorMessage(error) });
    }
    process.exit(exitCode);
  };

  const shutdownOrExit = (reason: string, exitCode: number): void => {
    shutdown(reason, exitCode).catch((error: unknown) => {
      logger.error('shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', (signal) => shutdownOrExit(signal, 0));
  process.on('SIGTERM', (signal) => shutdownOrExit(signal, 0));

  // 再ログイン上限などで生存フラグが落ちたら終了する（外部の監視で再起動させる）
  connection.liveness.onDead((reason) => shutdownOrExit(`not alive: ${reason}`, 1));

  // ここから先の失敗は終了処理を通してから終了する
  try {
    // not_alive なら onDead 側で終了処理が進んでいる
    if ((await startBrokerLink(connection, config)) === 'not_alive') {
      return;
    }
  } catch (error) {
    logger.error('failed to start broker link', { error: errorMessage(error) });
    await shutdown('bootstrap failed', 1);
    return;
  }
  logger.info('broker link started', { symbols: config.symbols.length, poolSize: config.poolSize });
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('failed to bootstrap broker link', { error: errorMessage(error) });
  process.exit(1);
});
