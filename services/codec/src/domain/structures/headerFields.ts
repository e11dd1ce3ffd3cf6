import { EXCHANGE, MARKET_TYPE, MESSAGE_TYPE, SYMBOL } from '@/domain/codecs/EnumCodec';
import { TimestampCodec } from '@/domain/codecs/TimestampCodec';
import type { CodecConfig } from '@/domain/config/CodecConfig';
import { PrimitiveField } from '@/domain/fields/Field';
import type { RecordHeader } from '@/domain/types';
import type { FieldMap } from './StructureCodec';

/**
 * 共通ヘッダ（既定 16 バイト）
 *
 * Layout:
 *   Offset  Size  Field
 *   ------  ----  -----------------
 *   0       6     exchangeTimestamp
 *   6       6     receivedTimestamp
 *   12      1     exchange
 *   13      1     marketType
 *   14      1     messageType
 *   15      1     symbol
 */
export function headerFields(config: CodecConfig): FieldMap<RecordHeader> {
  const timestamp = new TimestampCodec(config.eventTimestamp);
  return {
    exchangeTimestamp: new PrimitiveField('exchangeTimestamp', 'timestamp', timestamp),
    receivedTimestamp: new PrimitiveField('receivedTimestamp', 'timestamp', timestamp),
    exchange: new PrimitiveField('exchange', 'enum', EXCHANGE),
    marketType: new PrimitiveField('marketType', 'enum', MARKET_TYPE),
    messageType: new PrimitiveField('messageType', 'enum', MESSAGE_TYPE),
    symbol: new PrimitiveField('symbol', 'enum', SYMBOL),
  };
}

export const HEADER_ORDER = [
  'exchangeTimestamp',
  'receivedTimestamp',
  'exchange',
  'marketType',
  'messageType',
  'symbol',
] as const satisfies ReadonlyArray<keyof RecordHeader>;
