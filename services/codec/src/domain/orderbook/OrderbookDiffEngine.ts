import {
  ZERO_DECIMAL,
  compareDecimal,
  decimalIdentical,
  decimalToString,
  isZeroDecimal,
} from '@/domain/decimal/DecimalValue';
import { MalformedInputError } from '@/domain/errors';
import type {
  BookSide,
  DecimalValue,
  LevelChange,
  OrderBookDiff,
  OrderBookLevel,
  OrderBookSnapshot,
} from '@/domain/types';

type PriceOrder = (a: DecimalValue, b: DecimalValue) => number;

/** asks は価格昇順、bids は価格降順 */
const SIDE_ORDER: Record<BookSide, PriceOrder> = {
  asks: (a, b) => compareDecimal(a, b),
  bids: (a, b) => compareDecimal(b, a),
};

const SIDES: readonly BookSide[] = ['asks', 'bids'];

/**
 * ドメイン層: 板スナップショット間の差分計算と適用
 *
 * どちらも片側ごとのマージ走査で O(n + m)。
 * 入力の各側は価格順に並び、価格が一意であること（違反時は `MalformedInputError`）。
 */
export class OrderbookDiffEngine {
  /**
   * `prev` から `next` への最小の変更集合を求める。
   * - next にのみ存在: insert（数量ゼロなら無視）
   * - 両方に存在し価格または数量の表記（スケール）が異なる: update
   * - prev にのみ存在、または next の数量がゼロ: remove（数量はゼロで記録）
   */
  diff(prev: OrderBookSnapshot, next: OrderBookSnapshot): OrderBookDiff {
    return {
      asks: this.diffSide('asks', prev.asks, next.asks),
      bids: this.diffSide('bids', prev.bids, next.bids),
    };
  }

  /**
   * 差分をスナップショットに適用した新しいスナップショットを返す（入力は変更しない）。
   * `apply(prev, diff(prev, next))` は数量ゼロの段を除いた `next` と一致する。
   */
  apply(snapshot: OrderBookSnapshot, diff: OrderBookDiff): OrderBookSnapshot {
    const result: OrderBookSnapshot = { asks: [], bids: [] };
    for (const side of SIDES) {
      result[side] = this.applySide(side, snapshot[side], diff[side]);
    }
    return result;
  }

  isEmpty(diff: OrderBookDiff): boolean {
    return diff.asks.length === 0 && diff.bids.length === 0;
  }

  private diffSide(side: BookSide, prev: OrderBookLevel[], next: OrderBookLevel[]): LevelChange[] {
    const order = SIDE_ORDER[side];
    assertOrdered(side, prev, order, 'previous snapshot');
    assertOrdered(side, next, order, 'next snapshot');

    const changes: LevelChange[] = [];
    const insert = (level: OrderBookLevel): void => {
      if (!isZeroDecimal(level.quantity)) {
        changes.push({ action: 'insert', price: level.price, quantity: level.quantity });
      }
    };
    const remove = (level: OrderBookLevel): void => {
      changes.push({ action: 'remove', price: level.price, quantity: ZERO_DECIMAL });
    };

    let i = 0;
    let j = 0;
    while (i < prev.length && j < next.length) {
      const before = prev[i];
      const after = next[j];
      if (before === undefined || after === undefined) {
        break;
      }
      const position = order(before.price, after.price);
      if (position < 0) {
        remove(before);
        i++;
      } else if (position > 0) {
        insert(after);
        j++;
      } else {
        if (isZeroDecimal(after.quantity)) {
          remove(before);
        } else if (!sameLevel(before, after)) {
          changes.push({ action: 'update', price: after.price, quantity: after.quantity });
        }
        i++;
        j++;
      }
    }
    prev.slice(i).forEach(remove);
    next.slice(j).forEach(insert);

    return changes;
  }

  private applySide(side: BookSide, levels: OrderBookLevel[], changes: LevelChange[]): OrderBookLevel[] {
    const order = SIDE_ORDER[side];
    assertOrdered(side, levels, order, 'snapshot');
    assertOrdered(side, changes, order, 'diff');

    const result: OrderBookLevel[] = [];
    const place = (change: LevelChange): void => {
      if (change.action !== 'insert') {
        throw new MalformedInputError(
          `Cannot ${change.action} ${side} level ${decimalToString(change.price)}: not in the snapshot`,
          { side, action: change.action, price: decimalToString(change.price) }
        );
      }
      result.push({ price: change.price, quantity: change.quantity });
    };

    let i = 0;
    let j = 0;
    while (i < levels.length && j < changes.length) {
      const level = levels[i];
      const change = changes[j];
      if (level === undefined || change === undefined) {
        break;
      }
      const position = order(level.price, change.price);
      if (position < 0) {
        result.push(level);
        i++;
      } else if (position > 0) {
        place(change);
        j++;
      } else {
        if (change.action === 'insert') {
          throw new MalformedInputError(
            `Cannot insert ${side} level ${decimalToString(change.price)}: already in the snapshot`,
            { side, price: decimalToString(change.price) }
          );
        }
        if (change.action === 'update') {
          result.push({ price: change.price, quantity: change.quantity });
        }
        i++;
        j++;
      }
    }
    result.push(...levels.slice(i));
    changes.slice(j).forEach(place);

    return result.filter((level) => !isZeroDecimal(level.quantity));
  }
}

/**
 * 価格の照合は数値で行うが、エンコード結果が変わる表記の違いは update として残す。
 */
function sameLevel(before: OrderBookLevel, after: OrderBookLevel): boolean {
  return decimalIdentical(before.price, after.price) && decimalIdentical(before.quantity, after.quantity);
}

function assertOrdered(
  side: BookSide,
  entries: ReadonlyArray<{ price: DecimalValue }>,
  order: PriceOrder,
  label: string
): void {
  for (let index = 1; index < entries.length; index++) {
    const previous = entries[index - 1];
    const current = entries[index];
    if (previous && current && order(previous.price, current.price) >= 0) {
      throw new MalformedInputError(
        `${label} ${side} are not strictly ordered at index ${index} (${decimalToString(current.price)})`,
        { side, index }
      );
    }
  }
}
