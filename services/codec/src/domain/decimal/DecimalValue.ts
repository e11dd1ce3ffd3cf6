import Decimal from 'decimal.js';
import { MalformedInputError } from '@/domain/errors';
import type { DecimalValue } from '@/domain/types';

/**
 * 変換専用の Decimal コンストラクタ。
 * グローバル設定を汚さないよう clone し、指数表記に切り替わらない範囲を広く取る。
 */
const CodecDecimal = Decimal.clone({
  precision: 64,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -200,
  toExpPos: 200,
});

const PLAIN_DECIMAL = /^[+-]?\d+(?:\.(\d+))?$/;

export const ZERO_DECIMAL: DecimalValue = Object.freeze({
  negative: false,
  magnitude: 0n,
  scale: 0,
});

/**
 * 10 進数文字列を DecimalValue に変換する。
 *
 * `"512.000"` のように末尾ゼロを含む表記はそのスケール（3）を保持する。
 * 指数表記は正規化した小数桁数をスケールとする。
 */
export function decimalFromString(text: string): DecimalValue {
  const trimmed = text.trim();
  let parsed: Decimal;
  try {
    parsed = new CodecDecimal(trimmed);
  } catch {
    throw new MalformedInputError(`Not a decimal number: "${text}"`, { text });
  }
  if (!parsed.isFinite()) {
    throw new MalformedInputError(`Not a finite decimal number: "${text}"`, { text });
  }

  const plain = PLAIN_DECIMAL.exec(trimmed);
  const scale = plain ? (plain[1]?.length ?? 0) : parsed.decimalPlaces();
  return fromDecimal(parsed, scale);
}

/**
 * JavaScript の number を DecimalValue に変換する。
 * 2 進浮動小数の誤差を持ち込まないよう、number の最短 10 進表記を基準にする。
 */
export function decimalFromNumber(value: number): DecimalValue {
  if (!Number.isFinite(value)) {
    throw new MalformedInputError(`Not a finite number: ${value}`, { value });
  }
  const parsed = new CodecDecimal(value);
  return fromDecimal(parsed, parsed.decimalPlaces());
}

export function decimalToString(value: DecimalValue): string {
  const digits = value.magnitude.toString().padStart(value.scale + 1, '0');
  const integerPart = digits.slice(0, digits.length - value.scale);
  const fractionPart = digits.slice(digits.length - value.scale);
  const unsigned = value.scale > 0 ? `${integerPart}.${fractionPart}` : integerPart;
  return value.negative && value.magnitude !== 0n ? `-${unsigned}` : unsigned;
}

export function decimalToNumber(value: DecimalValue): number {
  return new CodecDecimal(decimalToString(value)).toNumber();
}

/**
 * 数値として比較する（スケールの違いは無視）。
 * @returns a < b なら -1、等しければ 0、a > b なら 1
 */
export function compareDecimal(a: DecimalValue, b: DecimalValue): -1 | 0 | 1 {
  const scale = Math.max(a.scale, b.scale);
  const left = signedUnscaled(a) * 10n ** BigInt(scale - a.scale);
  const right = signedUnscaled(b) * 10n ** BigInt(scale - b.scale);
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function decimalEquals(a: DecimalValue, b: DecimalValue): boolean {
  return compareDecimal(a, b) === 0;
}

/**
 * 符号・magnitude・スケールがすべて一致する（同じバイト列にエンコードされる）か。
 * `decimalEquals` と違い、`1` と `1.00` は区別する。
 */
export function decimalIdentical(a: DecimalValue, b: DecimalValue): boolean {
  return a.negative === b.negative && a.magnitude === b.magnitude && a.scale === b.scale;
}

export function isZeroDecimal(value: DecimalValue): boolean {
  return value.magnitude === 0n;
}

function signedUnscaled(value: DecimalValue): bigint {
  return value.negative ? -value.magnitude : value.magnitude;
}

function fromDecimal(parsed: Decimal, scale: number): DecimalValue {
  const unscaled = parsed.abs().times(new CodecDecimal(10).pow(scale));
  return {
    negative: parsed.isNegative(),
    magnitude: BigInt(unscaled.toFixed(0)),
    scale,
  };
}
