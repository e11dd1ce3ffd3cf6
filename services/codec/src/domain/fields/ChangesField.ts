import { CHANGE_ACTION, INFO_TYPE } from '@/domain/codecs/EnumCodec';
import { NUMERIC_10 } from '@/domain/codecs/NumericCodec';
import { EncodingRangeError, MalformedRecordError } from '@/domain/errors';
import type { ByteSink } from '@/domain/io/ByteSink';
import type { ByteSource } from '@/domain/io/ByteSource';
import type { BookSide, LevelChange } from '@/domain/types';
import { type FieldCodec, readExact, writeExact } from './Field';
import { isBlank } from './LevelsField';

const ENTRY_WIDTH = 1 + NUMERIC_10.width * 2;

/**
 * 板差分の片側。方向バイトの後に `capacity` 個の (action, price, quantity) が続く。
 * action 0 のスロットは空きで、後続もすべて空きでなければならない。
 */
export class ChangesField implements FieldCodec<LevelChange[]> {
  readonly kind = 'changes';
  readonly width: number;
  private readonly direction: number;

  constructor(
    public readonly name: string,
    public readonly side: BookSide,
    public readonly capacity: number
  ) {
    this.width = 1 + capacity * ENTRY_WIDTH;
    this.direction = INFO_TYPE.encodeByte(side);
  }

  serialize(changes: LevelChange[], sink: ByteSink): void {
    if (changes.length > this.capacity) {
      throw new EncodingRangeError(
        `${this.side} has ${changes.length} changes, the layout holds ${this.capacity}`,
        { side: this.side, changes: changes.length, capacity: this.capacity }
      );
    }

    const bytes = new Uint8Array(this.width);
    bytes[0] = this.direction;
    changes.forEach((change, index) => {
      const offset = 1 + index * ENTRY_WIDTH;
      bytes[offset] = CHANGE_ACTION.encodeByte(change.action);
      bytes.set(NUMERIC_10.encode(change.price), offset + 1);
      bytes.set(NUMERIC_10.encode(change.quantity), offset + 1 + NUMERIC_10.width);
    });

    writeExact(sink, bytes, this.width, this.name);
  }

  deserialize(source: ByteSource): LevelChange[] {
    const bytes = readExact(source, this.width, this.name);
    if (bytes[0] !== this.direction) {
      throw new MalformedRecordError(`Direction byte ${bytes[0]} does not match ${this.side}`, {
        side: this.side,
        direction: bytes[0],
      });
    }

    const changes: LevelChange[] = [];
    let padding = false;
    for (let index = 0; index < this.capacity; index++) {
      const offset = 1 + index * ENTRY_WIDTH;
      const entry = bytes.subarray(offset, offset + ENTRY_WIDTH);
      const [action] = entry;
      if (action === 0 || action === undefined) {
        if (!isBlank(entry)) {
          throw new MalformedRecordError(`${this.side} change ${index} is an empty slot with data`, {
            side: this.side,
            index,
          });
        }
        padding = true;
        continue;
      }
      if (padding) {
        throw new MalformedRecordError(`${this.side} change ${index} follows padding`, {
          side: this.side,
          index,
        });
      }
      changes.push({
        action: CHANGE_ACTION.decodeByte(action),
        price: NUMERIC_10.decode(entry.subarray(1, 1 + NUMERIC_10.width)),
        quantity: NUMERIC_10.decode(entry.subarray(1 + NUMERIC_10.width)),
      });
    }
    return changes;
  }
}
