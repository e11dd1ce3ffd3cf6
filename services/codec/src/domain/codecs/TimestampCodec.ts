import { EncodingRangeError, MalformedInputError } from '@/domain/errors';
import type { TimePoint } from '@/domain/types';
import { type PrimitiveCodec, viewOf } from './PrimitiveCodec';

export type TimestampUnit = 'millisecond' | 'second';

/**
 * タイムスタンプのワイヤ表現。
 * 版ごとに 6 バイト・ミリ秒と 8 バイト・秒の両方が使われてきたため、
 * グローバルなモードではなくフィールドごとの設定として持つ。
 */
export interface TimestampLayout {
  readonly unit: TimestampUnit;
  readonly width: 6 | 8;
}

export const MILLIS_6: TimestampLayout = Object.freeze({ unit: 'millisecond', width: 6 });
export const SECONDS_8: TimestampLayout = Object.freeze({ unit: 'second', width: 8 });

const UNIT_MS: Record<TimestampUnit, number> = {
  millisecond: 1,
  second: 1000,
};

const UINT32_SPAN = 2 ** 32;
const MAX_SIX_BYTE = 2 ** 48 - 1;

/**
 * エポック時刻を big-endian の符号なし整数として読み書きする。
 * 入力はエポックミリ秒で、設定された単位に切り捨ててから書き込む。
 */
export class TimestampCodec implements PrimitiveCodec<TimePoint> {
  readonly width: number;

  constructor(public readonly layout: TimestampLayout) {
    this.width = layout.width;
  }

  encode(instant: TimePoint): Uint8Array {
    if (!Number.isFinite(instant) || instant < 0) {
      throw new EncodingRangeError(`Timestamp must be a non-negative finite number: ${instant}`, {
        instant,
      });
    }
    // デコード結果はミリ秒の number なので、どのレイアウトでもその範囲に収める
    if (instant > Number.MAX_SAFE_INTEGER) {
      throw new EncodingRangeError(`Timestamp ${instant} exceeds the millisecond range`, {
        instant,
      });
    }

    const count = Math.floor(instant / UNIT_MS[this.layout.unit]);
    const bytes = new Uint8Array(this.width);
    const view = viewOf(bytes);

    if (this.layout.width === 6) {
      if (count > MAX_SIX_BYTE) {
        throw new EncodingRangeError(`Timestamp ${instant} exceeds the 6-byte span`, { instant });
      }
      view.setUint16(0, Math.floor(count / UINT32_SPAN));
      view.setUint32(2, count % UINT32_SPAN);
    } else {
      view.setBigUint64(0, BigInt(count));
    }

    return bytes;
  }

  decode(bytes: Uint8Array): TimePoint {
    if (bytes.length !== this.width) {
      throw new MalformedInputError(
        `Timestamp span must be ${this.width} bytes, received ${bytes.length}`,
        { width: this.width, length: bytes.length }
      );
    }

    const view = viewOf(bytes);
    const count =
      this.layout.width === 6
        ? view.getUint16(0) * UINT32_SPAN + view.getUint32(2)
        : view.getBigUint64(0);

    const instant = BigInt(count) * BigInt(UNIT_MS[this.layout.unit]);
    if (instant > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MalformedInputError(`Timestamp ${instant} exceeds the millisecond range`, {
        value: instant.toString(),
      });
    }
    return Number(instant);
  }
}
