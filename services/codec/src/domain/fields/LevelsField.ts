import { INFO_TYPE } from '@/domain/codecs/EnumCodec';
import { NUMERIC_10 } from '@/domain/codecs/NumericCodec';
import { EncodingRangeError, MalformedRecordError } from '@/domain/errors';
import type { ByteSink } from '@/domain/io/ByteSink';
import type { ByteSource } from '@/domain/io/ByteSource';
import type { BookSide, OrderBookLevel } from '@/domain/types';
import { type FieldCodec, readExact, writeExact } from './Field';

const LEVEL_WIDTH = NUMERIC_10.width * 2;

/**
 * 板の片側を固定段数で読み書きする。
 *
 * Layout:
 *   Offset        Size  Field
 *   ------        ----  -----------
 *   0             1     方向（InfoType）
 *   1 + 20·i      10    price
 *   11 + 20·i     10    quantity
 *
 * 段数が `depth` に満たない場合、残りのスロットはゼロで埋める。
 * 全バイトがゼロのスロットは空きとして扱うため、空きの後ろに段が続くことはない。
 */
export class LevelsField implements FieldCodec<OrderBookLevel[]> {
  readonly kind = 'levels';
  readonly width: number;
  private readonly direction: number;

  constructor(
    public readonly name: string,
    public readonly side: BookSide,
    public readonly depth: number
  ) {
    this.width = 1 + depth * LEVEL_WIDTH;
    this.direction = INFO_TYPE.encodeByte(side);
  }

  serialize(levels: OrderBookLevel[], sink: ByteSink): void {
    if (levels.length > this.depth) {
      throw new EncodingRangeError(
        `${this.side} has ${levels.length} levels, the layout holds ${this.depth}`,
        { side: this.side, levels: levels.length, depth: this.depth }
      );
    }

    const bytes = new Uint8Array(this.width);
    bytes[0] = this.direction;
    levels.forEach((level, index) => {
      const offset = 1 + index * LEVEL_WIDTH;
      bytes.set(NUMERIC_10.encode(level.price), offset);
      bytes.set(NUMERIC_10.encode(level.quantity), offset + NUMERIC_10.width);
      if (isBlank(bytes.subarray(offset, offset + LEVEL_WIDTH))) {
        throw new EncodingRangeError(`${this.side} level ${index} is indistinguishable from padding`, {
          side: this.side,
          index,
        });
      }
    });

    writeExact(sink, bytes, this.width, this.name);
  }

  deserialize(source: ByteSource): OrderBookLevel[] {
    const bytes = readExact(source, this.width, this.name);
    if (bytes[0] !== this.direction) {
      throw new MalformedRecordError(`Direction byte ${bytes[0]} does not match ${this.side}`, {
        side: this.side,
        direction: bytes[0],
      });
    }

    const levels: OrderBookLevel[] = [];
    let padding = false;
    for (let index = 0; index < this.depth; index++) {
      const offset = 1 + index * LEVEL_WIDTH;
      const slot = bytes.subarray(offset, offset + LEVEL_WIDTH);
      if (isBlank(slot)) {
        padding = true;
        continue;
      }
      if (padding) {
        throw new MalformedRecordError(`${this.side} level ${index} follows padding`, {
          side: this.side,
          index,
        });
      }
      levels.push({
        price: NUMERIC_10.decode(slot.subarray(0, NUMERIC_10.width)),
        quantity: NUMERIC_10.decode(slot.subarray(NUMERIC_10.width)),
      });
    }
    return levels;
  }
}

export function isBlank(bytes: Uint8Array): boolean {
  return bytes.every((byte) => byte === 0);
}
