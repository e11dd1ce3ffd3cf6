/**
 * 収集系が配信する正規化済みメッセージの形式。
 *
 * 取引所固有の形式を統一したフォーマットで、数値は number または 10 進文字列。
 * 精度を落とさずに扱いたい場合は文字列で渡す。
 */
export type DecimalInput = number | string;

/** [価格, 数量] */
export type NormalizedLevel = [DecimalInput, DecimalInput];

export interface NormalizedBbo {
  ask: DecimalInput;
  ask_size: DecimalInput;
  bid: DecimalInput;
  bid_size: DecimalInput;
}

export interface NormalizedKline {
  /** 1m, 5m, 30m, 1h */
  period: string;
  open: DecimalInput;
  high: DecimalInput;
  low: DecimalInput;
  close: DecimalInput;
  volume: DecimalInput;
}

export interface NormalizedOrderbook {
  is_snapshot: boolean;
  asks: NormalizedLevel[];
  bids: NormalizedLevel[];
}

export interface NormalizedTrade {
  price: DecimalInput;
  size: DecimalInput;
  /** 'buy' または 'sell'（大文字小文字は問わない） */
  side: string;
}

export interface NormalizedFundingRate {
  rate: DecimalInput;
  /** 次回資金調達時刻（エポックミリ秒） */
  funding_time: number;
  estimated_rate: DecimalInput;
}

interface NormalizedMessageBase<TType extends string, TData> {
  type: TType;
  /** 取引所名（例: 'binance'） */
  exchange: string;
  /** 市場種別（例: 'spot', 'linear_swap'）。省略時は 'unknown' */
  market_type?: string;
  /** 取引ペア（例: 'BTC_USDT', 'btc/usdt'） */
  symbol: string;
  /** 取引所側のタイムスタンプ（エポックミリ秒） */
  ts: number;
  /** 受信時刻（エポックミリ秒）。省略時は変換時の時計を使う */
  received_ts?: number;
  data: TData;
}

export type NormalizedMessage =
  | NormalizedMessageBase<'bbo', NormalizedBbo>
  | NormalizedMessageBase<'kline', NormalizedKline>
  | NormalizedMessageBase<'orderbook', NormalizedOrderbook>
  | NormalizedMessageBase<'trade', NormalizedTrade>
  | NormalizedMessageBase<'funding_rate', NormalizedFundingRate>;

export type NormalizedMessageType = NormalizedMessage['type'];
