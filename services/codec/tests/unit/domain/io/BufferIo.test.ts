import { describe, expect, it } from 'vitest';
import { BufferSink } from '@/domain/io/BufferSink';
import { BufferSource } from '@/domain/io/BufferSource';

describe('BufferSink', () => {
  it('初期容量を超えても書き込んだ順に蓄積する', () => {
    const sink = new BufferSink(2);

    expect(sink.write(Uint8Array.of(1, 2, 3))).toBe(3);
    expect(sink.write(Uint8Array.of(4, 5))).toBe(2);

    expect([...sink.toBytes()]).toEqual([1, 2, 3, 4, 5]);
    expect(sink.byteLength).toBe(5);
  });

  it('clear で空に戻る', () => {
    const sink = new BufferSink();
    sink.write(Uint8Array.of(9));
    sink.clear();

    expect(sink.toBytes()).toHaveLength(0);
  });
});

describe('BufferSource', () => {
  it('位置と残りバイト数を追跡する', () => {
    const source = new BufferSource(Uint8Array.of(1, 2, 3, 4, 5));
    const buffer = new Uint8Array(3);

    expect(source.read(buffer)).toBe(3);
    expect([...buffer]).toEqual([1, 2, 3]);
    expect(source.position).toBe(3);
    expect(source.remaining).toBe(2);
  });

  it('終端では短い読み出しの後に 0 を返す', () => {
    const source = new BufferSource(Uint8Array.of(1, 2));
    const buffer = new Uint8Array(4);

    expect(source.read(buffer)).toBe(2);
    expect(source.read(buffer)).toBe(0);
  });
});
