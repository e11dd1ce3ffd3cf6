/**
 * ドメイン層: コーデックが扱う値とレコードの型定義（DTO 的な型のみ）
 *
 * レコードはプレーンなオブジェクト。変換・検証のロジックは codecs / structures 側に置く。
 */
import type {
  ChangeAction,
  Exchange,
  MarketType,
  MessageType,
  Period,
  SymbolPair,
  TradeSide,
} from './enums/tables';

/**
 * 符号付き 10 進数。値 = (-1)^negative × magnitude × 10^-scale
 */
export interface DecimalValue {
  readonly negative: boolean;
  /** スケールを除いた絶対値（非負） */
  readonly magnitude: bigint;
  /** 小数点以下の桁数（0〜127） */
  readonly scale: number;
}

/** エポックミリ秒 */
export type TimePoint = number;

/** 板の 1 段（価格と数量） */
export interface OrderBookLevel {
  price: DecimalValue;
  quantity: DecimalValue;
}

/**
 * 板のスナップショット。asks は価格昇順、bids は価格降順で、価格は一意。
 */
export interface OrderBookSnapshot {
  asks: OrderBookLevel[];
  bids: OrderBookLevel[];
}

export type BookSide = 'asks' | 'bids';

export interface LevelChange {
  action: ChangeAction;
  price: DecimalValue;
  /** remove の場合はゼロ */
  quantity: DecimalValue;
}

export interface OrderBookDiff {
  asks: LevelChange[];
  bids: LevelChange[];
}

/**
 * すべてのレコード種別が先頭に持つ共通ヘッダ。
 */
export interface RecordHeader {
  /** 取引所側のタイムスタンプ */
  exchangeTimestamp: TimePoint;
  /** 受信時刻 */
  receivedTimestamp: TimePoint;
  exchange: Exchange;
  marketType: MarketType;
  messageType: MessageType;
  symbol: SymbolPair;
}

export interface BboRecord extends RecordHeader {
  askPrice: DecimalValue;
  askQuantity: DecimalValue;
  bidPrice: DecimalValue;
  bidQuantity: DecimalValue;
}

export interface KlineRecord extends RecordHeader {
  period: Period;
  open: DecimalValue;
  high: DecimalValue;
  low: DecimalValue;
  close: DecimalValue;
  volume: DecimalValue;
}

export interface TradeRecord extends RecordHeader {
  side: TradeSide;
  price: DecimalValue;
  quantity: DecimalValue;
}

export interface FundingRateRecord extends RecordHeader {
  fundingRate: DecimalValue;
  fundingTime: TimePoint;
  estimatedRate: DecimalValue;
}

export interface OrderbookRecord extends RecordHeader {
  asks: OrderBookLevel[];
  bids: OrderBookLevel[];
}

export interface OrderbookDiffRecord extends RecordHeader {
  asks: LevelChange[];
  bids: LevelChange[];
}

export type RecordKind = 'bbo' | 'kline' | 'orderbook' | 'trade' | 'funding_rate' | 'orderbook_diff';

/**
 * レコード種別とレコード型の対応。
 */
export interface RecordByKind {
  bbo: BboRecord;
  kline: KlineRecord;
  orderbook: OrderbookRecord;
  trade: TradeRecord;
  funding_rate: FundingRateRecord;
  orderbook_diff: OrderbookDiffRecord;
}

/**
 * 種別タグ付きのレコード。`kind` で判別すると `record` の型が決まる。
 */
export type TaggedRecord<K extends RecordKind = RecordKind> = {
  [P in K]: { kind: P; record: RecordByKind[P] };
}[K];
