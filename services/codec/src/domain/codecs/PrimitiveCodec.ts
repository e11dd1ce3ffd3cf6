/**
 * 固定長のプリミティブコーデック。
 * `encode` は常に `width` バイトを返し、`decode` は `width` バイト以外を受け付けない。
 */
export interface PrimitiveCodec<T> {
  readonly width: number;
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
