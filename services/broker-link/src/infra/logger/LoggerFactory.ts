import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * 環境変数に基づいてロガーインスタンスを生成する。
 * シングルトンで、プロセス全体で同じロガーを共有する。
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  /**
   * ロガーインスタンスを取得または作成
   *
   * 環境変数:
   * - `LOG_LEVEL`: ログレベル（debug, info, warn, error）。デフォルトは `info`
   * - `NODE_ENV`: 環境（production の場合は JSON 形式、それ以外は pretty 形式）
   */
  static create(): Logger {
    if (LoggerFactory.instance === null) {
      const level = process.env.LOG_LEVEL;
      const pretty = process.env.NODE_ENV !== 'production';

      LoggerFactory.instance = new PinoLogger({ level, pretty, base: { service: 'broker-link' } });
    }

    return LoggerFactory.instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
