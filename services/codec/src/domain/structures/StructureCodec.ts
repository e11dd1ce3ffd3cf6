import { MalformedInputError, MalformedRecordError } from '@/domain/errors';
import type { FieldCodec } from '@/domain/fields/Field';
import { readExact, writeExact } from '@/domain/fields/Field';
import { BufferSink } from '@/domain/io/BufferSink';
import { BufferSource } from '@/domain/io/BufferSource';
import type { ByteSink } from '@/domain/io/ByteSink';
import type { ByteSource } from '@/domain/io/ByteSource';
import type { RecordKind } from '@/domain/types';

/** レコードの全プロパティに対応するフィールド */
export type FieldMap<R> = { readonly [K in keyof R]: FieldCodec<R[K]> };

export const SENTINEL = 0x00;

/**
 * レコード種別ごとのフィールド列とその直後のセンチネル 1 バイト。
 * レコード長は各フィールド幅の和 + 1 で固定。
 */
export class StructureCodec<R extends object> {
  readonly byteLength: number;

  constructor(
    public readonly kind: RecordKind,
    private readonly fields: FieldMap<R>,
    private readonly order: ReadonlyArray<keyof R>
  ) {
    const declared = Object.keys(fields).sort();
    const ordered = order.map(String).sort();
    if (declared.length !== ordered.length || declared.some((key, i) => key !== ordered[i])) {
      throw new Error(`${kind}: field order [${ordered.join(', ')}] does not match the layout`);
    }

    this.byteLength = order.reduce((total, key) => total + fields[key].width, 1);
  }

  /** フィールド名と幅を並び順に返す */
  get layout(): Array<{ name: string; width: number }> {
    return this.order.map((key) => ({ name: this.fields[key].name, width: this.fields[key].width }));
  }

  serialize(record: R, sink: ByteSink): void {
    for (const key of this.order) {
      writeField(this.fields, key, record, sink);
    }
    writeExact(sink, Uint8Array.of(SENTINEL), 1, 'sentinel');
  }

  deserialize(source: ByteSource): R {
    const partial: Partial<R> = {};
    for (const key of this.order) {
      readInto(partial, key, this.fields[key], source);
    }

    const [sentinel] = readExact(source, 1, 'sentinel');
    if (sentinel !== SENTINEL) {
      throw new MalformedRecordError(`${this.kind} record ends with ${sentinel}, not the sentinel`, {
        kind: this.kind,
        sentinel,
      });
    }

    if (!hasAllFields(partial, this.order)) {
      throw new Error(`${this.kind}: decoded record is missing fields`);
    }
    return partial;
  }

  encode(record: R): Uint8Array {
    const sink = new BufferSink(this.byteLength);
    this.serialize(record, sink);
    return sink.toBytes();
  }

  /**
   * ちょうど 1 レコード分のバイト列をデコードする。余りがあれば `MalformedInputError`。
   */
  decode(bytes: Uint8Array): R {
    const source = new BufferSource(bytes);
    const record = this.deserialize(source);
    if (source.remaining > 0) {
      throw new MalformedInputError(
        `${this.kind} record is ${this.byteLength} bytes, received ${bytes.length}`,
        { kind: this.kind, length: bytes.length }
      );
    }
    return record;
  }
}

function writeField<R, K extends keyof R>(
  fields: FieldMap<R>,
  key: K,
  record: R,
  sink: ByteSink
): void {
  fields[key].serialize(record[key], sink);
}

function readInto<R, K extends keyof R>(
  out: Partial<R>,
  key: K,
  field: FieldCodec<R[K]>,
  source: ByteSource
): void {
  out[key] = field.deserialize(source);
}

function hasAllFields<R>(partial: Partial<R>, keys: ReadonlyArray<keyof R>): partial is R {
  return keys.every((key) => partial[key] !== undefined);
}
