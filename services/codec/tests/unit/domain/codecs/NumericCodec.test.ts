import { describe, expect, it } from 'vitest';
import {
  NUMERIC_5,
  NUMERIC_10,
  mergeSignedScale,
  splitSignedScale,
} from '@/domain/codecs/NumericCodec';
import { decimalFromString } from '@/domain/decimal/DecimalValue';
import { EncodingRangeError, MalformedInputError } from '@/domain/errors';

/**
 * 単体テスト: NumericCodec
 *
 * - 符号・スケールバイトと big-endian の magnitude
 * - 幅ごとの表現範囲
 * - 不正なバイト列の検出
 */
describe('NumericCodec', () => {
  describe('5 バイト版', () => {
    it('1234.5678 をスケール 4 と u32 の magnitude で書き込む', () => {
      const bytes = NUMERIC_5.encode(decimalFromString('1234.5678'));

      expect([...bytes]).toEqual([0x04, 0x00, 0xbc, 0x61, 0x4e]);
    });

    it('整数 1280 はスケール 0 で書き込む', () => {
      expect([...NUMERIC_5.encode(decimalFromString('1280'))]).toEqual([0, 0, 0, 5, 0]);
    });

    it('512.001 はスケール 3 で書き込む', () => {
      expect([...NUMERIC_5.encode(decimalFromString('512.001'))]).toEqual([3, 0, 7, 208, 1]);
    });

    it('負数は先頭バイトの最上位ビットを立てる', () => {
      const bytes = NUMERIC_5.encode(decimalFromString('-10240000.12'));

      expect([...bytes]).toEqual([0x82, 61, 9, 0, 12]);
      expect(NUMERIC_5.decode(bytes)).toEqual({
        negative: true,
        magnitude: 1024000012n,
        scale: 2,
      });
    });

    it('u32 の最大値はエンコードでき、それを超えると EncodingRangeError', () => {
      const max = { negative: false, magnitude: 0xffff_ffffn, scale: 0 };
      expect(NUMERIC_5.decode(NUMERIC_5.encode(max))).toEqual(max);

      expect(() => NUMERIC_5.encode({ ...max, magnitude: 0x1_0000_0000n })).toThrow(
        EncodingRangeError
      );
    });
  });

  describe('10 バイト版', () => {
    it('byte 1 をゼロのまま u64 を右詰めで書き込む', () => {
      const value = { negative: false, magnitude: 0xffff_ffff_ffff_ffffn, scale: 8 };
      const bytes = NUMERIC_10.encode(value);

      expect([...bytes]).toEqual([8, 0, 255, 255, 255, 255, 255, 255, 255, 255]);
      expect(NUMERIC_10.decode(bytes)).toEqual(value);
    });

    it('u64 を超える magnitude は EncodingRangeError', () => {
      expect(() =>
        NUMERIC_10.encode({ negative: false, magnitude: 0x1_0000_0000_0000_0000n, scale: 0 })
      ).toThrow(EncodingRangeError);
    });

    it('byte 1 がゼロでないバイト列は MalformedInputError', () => {
      const bytes = NUMERIC_10.encode(decimalFromString('1'));
      bytes[1] = 1;

      expect(() => NUMERIC_10.decode(bytes)).toThrow(MalformedInputError);
    });
  });

  describe('入力検証', () => {
    it('スケールが 0〜127 の整数でなければ EncodingRangeError', () => {
      expect(() => NUMERIC_5.encode({ negative: false, magnitude: 1n, scale: 128 })).toThrow(
        EncodingRangeError
      );
      expect(() => NUMERIC_5.encode({ negative: false, magnitude: 1n, scale: 1.5 })).toThrow(
        EncodingRangeError
      );
    });

    it('負の magnitude は EncodingRangeError', () => {
      expect(() => NUMERIC_10.encode({ negative: false, magnitude: -1n, scale: 0 })).toThrow(
        EncodingRangeError
      );
    });

    it('幅と異なる長さのバイト列は MalformedInputError', () => {
      expect(() => NUMERIC_5.decode(new Uint8Array(4))).toThrow(MalformedInputError);
      expect(() => NUMERIC_10.decode(new Uint8Array(11))).toThrow(MalformedInputError);
    });
  });

  describe('符号とスケールの 1 バイト表現', () => {
    it('スケール 127 の負数は 0xff になる', () => {
      expect(mergeSignedScale(127, true)).toBe(0xff);
      expect(splitSignedScale(0xff)).toEqual({ scale: 127, negative: true });
    });

    it('正数は最上位ビットを立てない', () => {
      expect(mergeSignedScale(4, false)).toBe(0x04);
      expect(splitSignedScale(0x04)).toEqual({ scale: 4, negative: false });
    });
  });
});
