import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * PinoLogger の初期化オプション
 */
export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
  /** すべてのログに付与する基本コンテキスト */
  base?: Record<string, unknown>;
}

/**
 * pino を使用したロガー実装
 *
 * 環境変数 `LOG_LEVEL` でログレベルを制御。
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  /**
   * @param options ロガー設定
   * @param instance 既存の pino インスタンス（child() から渡される。指定時は options を無視）
   */
  constructor(options?: PinoLoggerOptions, instance?: pino.Logger) {
    if (instance) {
      this.pinoLogger = instance;
      return;
    }

    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const isDevelopment = process.env.NODE_ENV !== 'production';
    const usePretty = options?.pretty ?? isDevelopment;

    if (usePretty) {
      // 開発環境: pino-pretty を使用して人間可読形式で出力
      this.pinoLogger = pino({
        level,
        base: options?.base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      });
    } else {
      this.pinoLogger = pino({ level, base: options?.base });
    }
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(undefined, this.pinoLogger.child(bindings));
  }
}
