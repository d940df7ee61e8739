export { BrokerConnection, type BrokerConnectionOptions } from '@/presentation/BrokerConnection';
export { createBridgeGatewayFactory, BridgeTradeGateway } from '@/infra/adapters/bridge/BridgeTradeGateway';
export { loadConfig, type AppConfig } from '@/infra/config/AppConfig';
export { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
export { StreamRepository } from '@/infra/redis/StreamRepository';
export type { TickHandler } from '@/application/marketdata/DedupGate';
export type { Logger } from '@/application/interfaces/Logger';
export type { MarketDataSocket } from '@/application/interfaces/MarketDataSocket';
export type {
  GatewayResponse,
  TradeGatewayClient,
  TradeGatewayFactory,
} from '@/application/interfaces/TradeGateway';
export * from '@/domain/errors';
export type * from '@/domain/types';
