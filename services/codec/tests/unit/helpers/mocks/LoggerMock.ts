import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogMethod = (msg: string, meta?: object) => void;

/**
 * テスト用ロガーモック
 *
 * child() は自分自身を返すので、子ロガー経由の出力もこのモックで検証できる。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogMethod> = vi.fn<LogMethod>();
  info: Mock<LogMethod> = vi.fn<LogMethod>();
  warn: Mock<LogMethod> = vi.fn<LogMethod>();
  error: Mock<LogMethod> = vi.fn<LogMethod>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);
}
