import type { ByteSink } from '@/domain/io/ByteSink';
import type { TaggedRecord } from '@/domain/types';
import type { RecordStructures } from './recordStructures';

/**
 * 種別タグに対応する構造体でレコードを書き込む。
 * @returns 書き込んだバイト数（レコード長）
 */
export function serializeTagged(
  structures: RecordStructures,
  tagged: TaggedRecord,
  sink: ByteSink
): number {
  switch (tagged.kind) {
    case 'bbo':
      structures.bbo.serialize(tagged.record, sink);
      return structures.bbo.byteLength;
    case 'kline':
      structures.kline.serialize(tagged.record, sink);
      return structures.kline.byteLength;
    case 'orderbook':
      structures.orderbook.serialize(tagged.record, sink);
      return structures.orderbook.byteLength;
    case 'trade':
      structures.trade.serialize(tagged.record, sink);
      return structures.trade.byteLength;
    case 'funding_rate':
      structures.funding_rate.serialize(tagged.record, sink);
      return structures.funding_rate.byteLength;
    case 'orderbook_diff':
      structures.orderbook_diff.serialize(tagged.record, sink);
      return structures.orderbook_diff.byteLength;
  }
}
