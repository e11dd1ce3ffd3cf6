import { describe, expect, it } from 'vitest';
import { NUMERIC_5 } from '@/domain/codecs/NumericCodec';
import { PrimitiveField } from '@/domain/fields/Field';
import { StructureCodec } from '@/domain/structures/StructureCodec';
import type { DecimalValue } from '@/domain/types';
import { dec } from '@test/unit/helpers/fixtures/records';

interface Pair {
  left: DecimalValue;
  right: DecimalValue;
}

const fields = {
  left: new PrimitiveField('left', 'decimal', NUMERIC_5),
  right: new PrimitiveField('right', 'decimal', NUMERIC_5),
};

describe('StructureCodec', () => {
  it('フィールドは並び順のとおりに書き込む', () => {
    const codec = new StructureCodec<Pair>('bbo', fields, ['right', 'left']);
    const bytes = codec.encode({ left: dec('1'), right: dec('2') });

    expect([...bytes]).toEqual([0, 0, 0, 0, 2, 0, 0, 0, 0, 1, 0]);
    expect(codec.decode(bytes)).toEqual({ left: dec('1'), right: dec('2') });
  });

  it('並び順がフィールドを網羅していなければ Error', () => {
    expect(() => new StructureCodec<Pair>('bbo', fields, ['left'])).toThrow(
      'bbo: field order [left] does not match the layout'
    );
  });

  it('並び順に重複があれば Error', () => {
    expect(() => new StructureCodec<Pair>('bbo', fields, ['left', 'left'])).toThrow(Error);
  });
});
