import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
  /** 全ログに付与するコンテキスト */
  base?: Record<string, unknown>;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 形式で出力する。
 * 子ロガーも同じクラスで包むため、`child()` を何段重ねても Logger として扱える。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions, instance?: pino.Logger) {
    this.pinoLogger = instance ?? createPino(options);
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

function createPino(options?: PinoLoggerOptions): pino.Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
  const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';
  const base = options?.base ? { base: options.base } : {};

  if (usePretty) {
    return pino({
      level,
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level, ...base });
}
