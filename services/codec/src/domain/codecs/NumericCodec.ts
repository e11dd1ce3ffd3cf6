/**
 * 10 進数の固定長バイナリ表現
 *
 * Layout:
 *   Offset  Size  Field
 *   ------  ----  -----------
 *   0       1     sign (bit 7) | scale (bits 0-6)
 *   1       4/9   magnitude (big-endian, unsigned)
 *
 * 10 バイト版の magnitude は 9 バイトの枠に u64 を右詰めで格納する（byte 1 は常に 0）。
 */
import { EncodingRangeError, MalformedInputError } from '@/domain/errors';
import type { DecimalValue } from '@/domain/types';
import { type PrimitiveCodec, viewOf } from './PrimitiveCodec';

export type NumericWidth = 5 | 10;

const SIGN_BIT = 0x80;
const SCALE_MASK = 0x7f;
export const MAX_SCALE = SCALE_MASK;

const MAX_MAGNITUDE: Record<NumericWidth, bigint> = {
  5: 0xffff_ffffn,
  10: 0xffff_ffff_ffff_ffffn,
};

export class NumericCodec implements PrimitiveCodec<DecimalValue> {
  constructor(public readonly width: NumericWidth) {}

  encode(value: DecimalValue): Uint8Array {
    if (!Number.isInteger(value.scale) || value.scale < 0 || value.scale > MAX_SCALE) {
      throw new EncodingRangeError(`Scale ${value.scale} is outside 0-${MAX_SCALE}`, {
        scale: value.scale,
      });
    }
    if (value.magnitude < 0n || value.magnitude > MAX_MAGNITUDE[this.width]) {
      throw new EncodingRangeError(
        `Magnitude ${value.magnitude} does not fit the ${this.width}-byte layout`,
        { magnitude: value.magnitude.toString(), width: this.width }
      );
    }

    const bytes = new Uint8Array(this.width);
    const view = viewOf(bytes);
    view.setUint8(0, mergeSignedScale(value.scale, value.negative));

    if (this.width === 5) {
      view.setUint32(1, Number(value.magnitude));
    } else {
      // byte 1 はゼロのまま
      view.setBigUint64(2, value.magnitude);
    }

    return bytes;
  }

  decode(bytes: Uint8Array): DecimalValue {
    if (bytes.length !== this.width) {
      throw new MalformedInputError(
        `Numeric span must be ${this.width} bytes, received ${bytes.length}`,
        { width: this.width, length: bytes.length }
      );
    }

    const view = viewOf(bytes);
    const { scale, negative } = splitSignedScale(view.getUint8(0));

    if (this.width === 5) {
      return { negative, magnitude: BigInt(view.getUint32(1)), scale };
    }

    if (view.getUint8(1) !== 0) {
      throw new MalformedInputError('Numeric magnitude exceeds the 64-bit range', {
        width: this.width,
      });
    }
    return { negative, magnitude: view.getBigUint64(2), scale };
  }
}

/**
 * 符号とスケールを 1 バイトにまとめる。
 */
export function mergeSignedScale(scale: number, negative: boolean): number {
  return negative ? (scale & SCALE_MASK) | SIGN_BIT : scale & SCALE_MASK;
}

export function splitSignedScale(signedScale: number): { scale: number; negative: boolean } {
  return {
    scale: signedScale & SCALE_MASK,
    negative: (signedScale & SIGN_BIT) !== 0,
  };
}

/** 価格・数量向け（u32） */
export const NUMERIC_5 = new NumericCodec(5);
/** 出来高・資金調達率向け（u64） */
export const NUMERIC_10 = new NumericCodec(10);
