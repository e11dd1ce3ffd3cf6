import type { ByteSink } from './ByteSink';

/**
 * メモリ上に書き込みを蓄積するシンク。容量が足りなくなると倍々に拡張する。
 */
export class BufferSink implements ByteSink {
  private buffer: Uint8Array;
  private length = 0;

  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  write(bytes: Uint8Array): number {
    this.ensureCapacity(this.length + bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
    return bytes.length;
  }

  get byteLength(): number {
    return this.length;
  }

  /** 書き込まれたバイト列のコピーを返す */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  clear(): void {
    this.length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) {
      return;
    }
    let capacity = this.buffer.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }
}
