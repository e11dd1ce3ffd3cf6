import { CODEC_ERROR_CODES, CodecError } from './CodecError';

/**
 * 値がレイアウトの表現範囲を超えている（マグニチュード、スケール、時刻）。
 */
export class EncodingRangeError extends CodecError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(CODEC_ERROR_CODES.ENCODING_RANGE, message, 'error', metadata);
  }
}

/**
 * デコード対象のバイト列の長さ、または内容が不正。
 */
export class MalformedInputError extends CodecError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(CODEC_ERROR_CODES.MALFORMED_INPUT, message, 'error', metadata);
  }
}

/**
 * ソースから必要なバイト数を読み切れなかった。
 */
export class TruncatedInputError extends CodecError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
    context?: string
  ) {
    const where = context ? ` (${context})` : '';
    super(
      CODEC_ERROR_CODES.TRUNCATED_INPUT,
      `Input ended early${where}: expected ${expected} bytes, received ${received}`,
      'warning',
      { expected, received, context }
    );
  }
}

export class UnknownCodeError extends CodecError {
  constructor(
    public readonly domain: string,
    public readonly value: number | string
  ) {
    super(CODEC_ERROR_CODES.UNKNOWN_CODE, `Unknown ${domain} code: ${String(value)}`, 'error', {
      domain,
      value,
    });
  }
}

/**
 * レコードの構造が壊れている（センチネル不一致、方向バイト不一致など）。
 */
export class MalformedRecordError extends CodecError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(CODEC_ERROR_CODES.MALFORMED_RECORD, message, 'error', metadata);
  }
}

/**
 * 外部ドメインのメッセージ型とレコードの相互変換に失敗した。
 */
export class ConversionError extends CodecError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(CODEC_ERROR_CODES.CONVERSION, message, 'error', metadata);
  }
}

export class ShortWriteError extends CodecError {
  constructor(
    public readonly expected: number,
    public readonly written: number
  ) {
    super(
      CODEC_ERROR_CODES.SHORT_WRITE,
      `Sink accepted ${written} of ${expected} bytes`,
      'error',
      { expected, written }
    );
  }
}

/**
 * 設定値の検証に失敗した。問題点はすべて `validationErrors` にまとめて返す。
 */
export class ConfigValidationError extends CodecError {
  constructor(
    message: string,
    public readonly validationErrors: string[]
  ) {
    super(CODEC_ERROR_CODES.CONFIG_VALIDATION, message, 'critical', { validationErrors });
  }
}
