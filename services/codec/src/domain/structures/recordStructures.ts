import { PERIOD, TRADE_SIDE } from '@/domain/codecs/EnumCodec';
import { NUMERIC_5, NUMERIC_10 } from '@/domain/codecs/NumericCodec';
import { TimestampCodec } from '@/domain/codecs/TimestampCodec';
import {
  type CodecConfig,
  DEFAULT_CODEC_CONFIG,
  MAX_ORDERBOOK_DEPTH,
  MIN_ORDERBOOK_DEPTH,
} from '@/domain/config/CodecConfig';
import { ConfigValidationError } from '@/domain/errors';
import { ChangesField } from '@/domain/fields/ChangesField';
import { PrimitiveField } from '@/domain/fields/Field';
import { LevelsField } from '@/domain/fields/LevelsField';
import type {
  BboRecord,
  FundingRateRecord,
  KlineRecord,
  OrderbookDiffRecord,
  OrderbookRecord,
  RecordByKind,
  RecordKind,
  TradeRecord,
} from '@/domain/types';
import { HEADER_ORDER, headerFields } from './headerFields';
import { StructureCodec } from './StructureCodec';

/** Bbo: ヘッダ + ask/bid の価格・数量（各 5 バイト） */
export function createBboStructure(config: CodecConfig = DEFAULT_CODEC_CONFIG): StructureCodec<BboRecord> {
  return new StructureCodec<BboRecord>(
    'bbo',
    {
      ...headerFields(config),
      askPrice: new PrimitiveField('askPrice', 'decimal', NUMERIC_5),
      askQuantity: new PrimitiveField('askQuantity', 'decimal', NUMERIC_5),
      bidPrice: new PrimitiveField('bidPrice', 'decimal', NUMERIC_5),
      bidQuantity: new PrimitiveField('bidQuantity', 'decimal', NUMERIC_5),
    },
    [...HEADER_ORDER, 'askPrice', 'askQuantity', 'bidPrice', 'bidQuantity']
  );
}

/** Kline: OHLC は 5 バイト、出来高のみ 10 バイト */
export function createKlineStructure(
  config: CodecConfig = DEFAULT_CODEC_CONFIG
): StructureCodec<KlineRecord> {
  return new StructureCodec<KlineRecord>(
    'kline',
    {
      ...headerFields(config),
      period: new PrimitiveField('period', 'enum', PERIOD),
      open: new PrimitiveField('open', 'decimal', NUMERIC_5),
      high: new PrimitiveField('high', 'decimal', NUMERIC_5),
      low: new PrimitiveField('low', 'decimal', NUMERIC_5),
      close: new PrimitiveField('close', 'decimal', NUMERIC_5),
      volume: new PrimitiveField('volume', 'decimal', NUMERIC_10),
    },
    [...HEADER_ORDER, 'period', 'open', 'high', 'low', 'close', 'volume']
  );
}

export function createTradeStructure(
  config: CodecConfig = DEFAULT_CODEC_CONFIG
): StructureCodec<TradeRecord> {
  return new StructureCodec<TradeRecord>(
    'trade',
    {
      ...headerFields(config),
      side: new PrimitiveField('side', 'enum', TRADE_SIDE),
      price: new PrimitiveField('price', 'decimal', NUMERIC_10),
      quantity: new PrimitiveField('quantity', 'decimal', NUMERIC_10),
    },
    [...HEADER_ORDER, 'side', 'price', 'quantity']
  );
}

/** FundingRate: fundingTime は予定時刻のレイアウト（既定 8 バイト・秒）を使う */
export function createFundingRateStructure(
  config: CodecConfig = DEFAULT_CODEC_CONFIG
): StructureCodec<FundingRateRecord> {
  return new StructureCodec<FundingRateRecord>(
    'funding_rate',
    {
      ...headerFields(config),
      fundingRate: new PrimitiveField('fundingRate', 'decimal', NUMERIC_10),
      fundingTime: new PrimitiveField(
        'fundingTime',
        'timestamp',
        new TimestampCodec(config.scheduleTimestamp)
      ),
      estimatedRate: new PrimitiveField('estimatedRate', 'decimal', NUMERIC_10),
    },
    [...HEADER_ORDER, 'fundingRate', 'fundingTime', 'estimatedRate']
  );
}

export function createOrderbookStructure(
  config: CodecConfig = DEFAULT_CODEC_CONFIG
): StructureCodec<OrderbookRecord> {
  assertDepth(config.orderbookDepth);
  return new StructureCodec<OrderbookRecord>(
    'orderbook',
    {
      ...headerFields(config),
      asks: new LevelsField('asks', 'asks', config.orderbookDepth),
      bids: new LevelsField('bids', 'bids', config.orderbookDepth),
    },
    [...HEADER_ORDER, 'asks', 'bids']
  );
}

/** 差分の片側容量は段数の 2 倍（全段の削除と挿入が同時に起きうるため） */
export function createOrderbookDiffStructure(
  config: CodecConfig = DEFAULT_CODEC_CONFIG
): StructureCodec<OrderbookDiffRecord> {
  assertDepth(config.orderbookDepth);
  const capacity = config.orderbookDepth * 2;
  return new StructureCodec<OrderbookDiffRecord>(
    'orderbook_diff',
    {
      ...headerFields(config),
      asks: new ChangesField('asks', 'asks', capacity),
      bids: new ChangesField('bids', 'bids', capacity),
    },
    [...HEADER_ORDER, 'asks', 'bids']
  );
}

export type RecordStructures = { readonly [K in RecordKind]: StructureCodec<RecordByKind[K]> };

/**
 * 設定からすべてのレコード種別の構造体を組み立てる。
 */
export function createStructures(config: CodecConfig = DEFAULT_CODEC_CONFIG): RecordStructures {
  return {
    bbo: createBboStructure(config),
    kline: createKlineStructure(config),
    orderbook: createOrderbookStructure(config),
    trade: createTradeStructure(config),
    funding_rate: createFundingRateStructure(config),
    orderbook_diff: createOrderbookDiffStructure(config),
  };
}

function assertDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < MIN_ORDERBOOK_DEPTH || depth > MAX_ORDERBOOK_DEPTH) {
    throw new ConfigValidationError('Invalid orderbook depth', [
      `orderbookDepth must be an integer between ${MIN_ORDERBOOK_DEPTH} and ${MAX_ORDERBOOK_DEPTH}, got ${depth}`,
    ]);
  }
}
