import type { Logger } from '@/application/interfaces/Logger';
import type { MessageParser } from '@/application/interfaces/MessageParser';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { MalformedMessageError } from '@/domain/errors';
import type { InboundMessage, MarketTick } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

type JsonObject = Record<string, unknown>;

/** 制御用のフレーム。パース対象外 */
const IGNORED_EVENTS = new Set(['pong', 'heartbeat', 'authenticated']);

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * インフラ層: ブリッジのマーケットデータメッセージのパース処理
 *
 * 責務: ソケットから受信した JSON テキスト → InboundMessage への変換。
 * 不正なメッセージは MalformedMessageError として記録し、null を返して捨てる。
 */
export class MarketDataMessageParser implements MessageParser {
  private readonly logger: Logger;

  constructor(
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'MarketDataMessageParser' });
  }

  parse(raw: string): InboundMessage | null {
    try {
      return this.parseOrThrow(raw);
    } catch (error) {
      if (error instanceof MalformedMessageError) {
        this.metricsCollector?.incrementError(error.kind);
        this.logger.warn('malformed market data message dropped', { reason: error.message, raw: error.raw });
        return null;
      }
      throw error;
    }
  }

  private parseOrThrow(raw: string): InboundMessage | null {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      throw new MalformedMessageError('invalid JSON', raw);
    }

    if (!isObject(message) || typeof message.event !== 'string') {
      throw new MalformedMessageError('missing event field', raw);
    }
    if (IGNORED_EVENTS.has(message.event)) {
      return null;
    }

    const data = isObject(message.data) ? message.data : null;

    switch (message.event) {
      case 'subscribed': {
        if (!data || typeof data.symbol !== 'string' || !isChannelId(data.id)) {
          throw new MalformedMessageError('subscribed message without symbol or id', raw);
        }
        return {
          event: 'subscribed',
          data: {
            symbol: data.symbol,
            id: String(data.id),
            channel: typeof data.channel === 'string' ? data.channel : undefined,
          },
        };
      }

      case 'unsubscribed': {
        if (!data || typeof data.symbol !== 'string') {
          throw new MalformedMessageError('unsubscribed message without symbol', raw);
        }
        return {
          event: 'unsubscribed',
          data: { symbol: data.symbol, id: isChannelId(data.id) ? String(data.id) : undefined },
        };
      }

      case 'data': {
        if (!data) {
          throw new MalformedMessageError('data message without payload', raw);
        }
        return { event: 'data', data: this.toTick(data, raw) };
      }

      case 'error': {
        const errorMessage = data && typeof data.message === 'string' ? data.message : 'unknown gateway error';
        const code = data && (typeof data.code === 'string' || typeof data.code === 'number') ? String(data.code) : undefined;
        return { event: 'error', data: { message: errorMessage, code } };
      }

      default:
        this.logger.debug('unknown market data event ignored', { event: message.event });
        return null;
    }
  }

  private toTick(data: JsonObject, raw: string): MarketTick {
    if (typeof data.symbol !== 'string' || data.symbol === '') {
      throw new MalformedMessageError('tick without symbol', raw);
    }

    const time = typeof data.time === 'string' && data.time.trim() !== '' ? Number(data.time) : data.time;
    if (typeof time !== 'number' || !Number.isFinite(time)) {
      throw new MalformedMessageError('tick without numeric time', raw);
    }
    if (typeof data.bid !== 'number' || typeof data.ask !== 'number') {
      throw new MalformedMessageError('tick without bid or ask', raw);
    }

    return {
      symbol: data.symbol,
      time,
      bid: data.bid,
      ask: data.ask,
      isContinuous: Boolean(data.isContinuous),
      id: typeof data.id === 'string' ? data.id : undefined,
      price: optionalNumber(data.price),
      size: optionalNumber(data.size),
      volume: optionalNumber(data.volume),
    };
  }
}

function isChannelId(value: unknown): value is string | number {
  return (typeof value === 'string' && value !== '') || typeof value === 'number';
}
