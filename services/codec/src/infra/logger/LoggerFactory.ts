import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * ユースケースにロガーが渡されなかった場合の既定値を供給する。
 * プロセス内で 1 つのインスタンスを共有する。
 *
 * 環境変数:
 * - `LOG_LEVEL`: ログレベル（debug, info, warn, error）。デフォルトは `info`
 * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static create(env: NodeJS.ProcessEnv = process.env): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger({
        level: env.LOG_LEVEL ?? 'info',
        pretty: env.NODE_ENV !== 'production',
        base: { service: 'market-record-codec' },
      });
    }

    return LoggerFactory.instance;
  }

  /**
   * インスタンスを破棄する（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
