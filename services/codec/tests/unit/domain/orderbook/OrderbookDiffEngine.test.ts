import { beforeEach, describe, expect, it } from 'vitest';
import { ZERO_DECIMAL } from '@/domain/decimal/DecimalValue';
import { MalformedInputError } from '@/domain/errors';
import { OrderbookDiffEngine } from '@/domain/orderbook/OrderbookDiffEngine';
import { createOrderbookDiffStructure } from '@/domain/structures/recordStructures';
import type { OrderBookSnapshot } from '@/domain/types';
import { change, dec, header, level } from '@test/unit/helpers/fixtures/records';

describe('OrderbookDiffEngine', () => {
  let engine: OrderbookDiffEngine;

  const prev: OrderBookSnapshot = {
    asks: [level('100', '1'), level('101', '2')],
    bids: [level('99', '1'), level('98', '2')],
  };

  beforeEach(() => {
    engine = new OrderbookDiffEngine();
  });

  describe('diff', () => {
    it('同じスナップショット同士の差分は空', () => {
      const diff = engine.diff(prev, prev);

      expect(diff).toEqual({ asks: [], bids: [] });
      expect(engine.isEmpty(diff)).toBe(true);
    });

    it('数量の変化は update、新しい価格は insert', () => {
      const next: OrderBookSnapshot = {
        asks: [level('100', '1'), level('101', '3'), level('102', '1')],
        bids: prev.bids,
      };

      expect(engine.diff(prev, next).asks).toEqual([
        change('update', '101', '3'),
        change('insert', '102', '1'),
      ]);
    });

    it('数量ゼロになった段は数量ゼロの remove', () => {
      const next: OrderBookSnapshot = {
        asks: prev.asks,
        bids: [level('99', '0'), level('98', '2')],
      };

      expect(engine.diff(prev, next).bids).toEqual([
        { action: 'remove', price: dec('99'), quantity: ZERO_DECIMAL },
      ]);
    });

    it('next から消えた段は remove', () => {
      const next: OrderBookSnapshot = { asks: [level('101', '2')], bids: [] };

      expect(engine.diff(prev, next)).toEqual({
        asks: [{ action: 'remove', price: dec('100'), quantity: ZERO_DECIMAL }],
        bids: [
          { action: 'remove', price: dec('99'), quantity: ZERO_DECIMAL },
          { action: 'remove', price: dec('98'), quantity: ZERO_DECIMAL },
        ],
      });
    });

    it('next にのみある数量ゼロの段は無視する', () => {
      const next: OrderBookSnapshot = { asks: [...prev.asks, level('105', '0')], bids: prev.bids };

      expect(engine.diff(prev, next).asks).toEqual([]);
    });

    it('bids は価格降順で走査する', () => {
      const next: OrderBookSnapshot = {
        asks: prev.asks,
        bids: [level('100', '5'), level('98', '2')],
      };

      expect(engine.diff(prev, next).bids).toEqual([
        change('insert', '100', '5'),
        { action: 'remove', price: dec('99'), quantity: ZERO_DECIMAL },
      ]);
    });

    it('価格は数値で照合し、表記（スケール）だけの違いは update にする', () => {
      const next: OrderBookSnapshot = {
        asks: [level('100.0', '1.00'), level('101', '2')],
        bids: prev.bids,
      };

      expect(engine.diff(prev, next).asks).toEqual([change('update', '100.0', '1.00')]);
    });

    it('並び順が崩れた入力は MalformedInputError', () => {
      const unordered: OrderBookSnapshot = {
        asks: [level('101', '1'), level('100', '1')],
        bids: [],
      };

      expect(() => engine.diff(prev, unordered)).toThrow(MalformedInputError);
    });

    it('価格が重複した入力は MalformedInputError', () => {
      const duplicated: OrderBookSnapshot = {
        asks: [],
        bids: [level('99', '1'), level('99', '2')],
      };

      expect(() => engine.diff(duplicated, prev)).toThrow(MalformedInputError);
    });
  });

  describe('apply', () => {
    it('apply(prev, diff(prev, next)) は数量ゼロの段を除いた next と一致する', () => {
      const next: OrderBookSnapshot = {
        asks: [level('101', '3'), level('102', '1'), level('103', '0')],
        bids: [level('99.5', '4'), level('99', '0'), level('98', '2')],
      };

      expect(engine.apply(prev, engine.diff(prev, next))).toEqual({
        asks: [level('101', '3'), level('102', '1')],
        bids: [level('99.5', '4'), level('98', '2')],
      });
    });

    it('スケールの異なる価格の update は next の表記どおりに復元する', () => {
      const before: OrderBookSnapshot = { asks: [level('100', '1')], bids: [] };
      const after: OrderBookSnapshot = { asks: [level('100.0', '2')], bids: [] };

      const restored = engine.apply(before, engine.diff(before, after));

      expect(restored).toEqual(after);
      expect(restored.asks[0]?.price).toEqual({ negative: false, magnitude: 1000n, scale: 1 });
    });

    it('数量のスケールだけが変わった段も next の表記どおりに復元する', () => {
      const before: OrderBookSnapshot = { asks: [level('100', '1')], bids: [] };
      const after: OrderBookSnapshot = { asks: [level('100', '1.00')], bids: [] };

      expect(engine.apply(before, engine.diff(before, after))).toEqual(after);
    });

    it('空の差分は元のスナップショットを返す', () => {
      expect(engine.apply(prev, { asks: [], bids: [] })).toEqual(prev);
    });

    it('入力のスナップショットを変更しない', () => {
      const before = structuredClone(prev);
      engine.apply(prev, { asks: [change('insert', '100.5', '1')], bids: [] });

      expect(prev).toEqual(before);
    });

    it('存在しない段への remove は MalformedInputError', () => {
      expect(() =>
        engine.apply(prev, {
          asks: [{ action: 'remove', price: dec('150'), quantity: ZERO_DECIMAL }],
          bids: [],
        })
      ).toThrow('Cannot remove asks level 150: not in the snapshot');
    });

    it('既存の段への insert は MalformedInputError', () => {
      expect(() =>
        engine.apply(prev, { asks: [change('insert', '100', '5')], bids: [] })
      ).toThrow(MalformedInputError);
    });
  });

  describe('差分レコード', () => {
    it('差分を OrderbookDiff レコードとして往復させ、適用できる', () => {
      const next: OrderBookSnapshot = {
        asks: [level('100', '1.5')],
        bids: [level('99', '1'), level('97', '1')],
      };
      const structure = createOrderbookDiffStructure();
      const record = { ...header({ messageType: 'l2_event' }), ...engine.diff(prev, next) };

      const decoded = structure.decode(structure.encode(record));

      expect(engine.apply(prev, { asks: decoded.asks, bids: decoded.bids })).toEqual(next);
    });
  });
});
