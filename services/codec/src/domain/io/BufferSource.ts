import type { ByteSource } from './ByteSource';

/**
 * `Uint8Array` を先頭から順に読み出すソース。
 */
export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(buffer: Uint8Array): number {
    const count = Math.min(buffer.length, this.remaining);
    buffer.set(this.bytes.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }
}
