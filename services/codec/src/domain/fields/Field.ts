import type { PrimitiveCodec } from '@/domain/codecs/PrimitiveCodec';
import { ShortWriteError, TruncatedInputError } from '@/domain/errors';
import type { ByteSink } from '@/domain/io/ByteSink';
import type { ByteSource } from '@/domain/io/ByteSource';

export type FieldKind = 'decimal' | 'timestamp' | 'enum' | 'levels' | 'changes';

/**
 * 固定長フィールド。
 *
 * `serialize` は値を完全にエンコードしてからシンクへ書き込むため、
 * エンコードに失敗した場合シンクには何も書かれない。
 */
export interface FieldCodec<T> {
  readonly name: string;
  readonly kind: FieldKind;
  readonly width: number;
  serialize(value: T, sink: ByteSink): void;
  deserialize(source: ByteSource): T;
}

/**
 * プリミティブコーデック 1 つをそのままフィールドとして使う。
 */
export class PrimitiveField<T> implements FieldCodec<T> {
  readonly width: number;

  constructor(
    public readonly name: string,
    public readonly kind: FieldKind,
    private readonly codec: PrimitiveCodec<T>
  ) {
    this.width = codec.width;
  }

  serialize(value: T, sink: ByteSink): void {
    writeExact(sink, this.codec.encode(value), this.width, this.name);
  }

  deserialize(source: ByteSource): T {
    return this.codec.decode(readExact(source, this.width, this.name));
  }
}

/**
 * `width` バイトちょうどを書き込む。
 * エンコード結果の長さ違いはコーデックの実装誤りなので `Error` とする。
 */
export function writeExact(sink: ByteSink, bytes: Uint8Array, width: number, name: string): void {
  if (bytes.length !== width) {
    throw new Error(`Field "${name}" encoded ${bytes.length} bytes, expected ${width}`);
  }
  const written = sink.write(bytes);
  if (written < width) {
    throw new ShortWriteError(width, written);
  }
}

/**
 * `width` バイトちょうどを読み出す。ソースが短い読み出しを返しても埋まるまで繰り返す。
 */
export function readExact(source: ByteSource, width: number, context?: string): Uint8Array {
  const buffer = new Uint8Array(width);
  let filled = 0;
  while (filled < width) {
    const count = source.read(buffer.subarray(filled));
    if (count === 0) {
      throw new TruncatedInputError(width, filled, context);
    }
    filled += count;
  }
  return buffer;
}
