/**
 * ドメイン層: 1 バイトに対応付ける閉じた列挙値の表
 *
 * 値はワイヤ上のコードそのもの。既存の利用者と相互運用するため変更しないこと。
 */

export const EXCHANGE_CODES = {
  crypto: 1,
  ftx: 2,
  binance: 3,
  huobi: 8,
  kucoin: 10,
  okx: 11,
} as const;

export type Exchange = keyof typeof EXCHANGE_CODES;

export const MARKET_TYPE_CODES = {
  unknown: 0,
  spot: 1,
  linear_future: 2,
  inverse_future: 3,
  linear_swap: 4,
  inverse_swap: 5,
  european_option: 6,
  quanto_future: 7,
  quanto_swap: 8,
} as const;

export type MarketType = keyof typeof MARKET_TYPE_CODES;

export const MESSAGE_TYPE_CODES = {
  other: 0,
  trade: 1,
  bbo: 2,
  l2_topk: 3,
  l2_snapshot: 4,
  l2_event: 5,
  l3_snapshot: 6,
  l3_event: 7,
  ticker: 8,
  candlestick: 9,
  open_interest: 10,
  funding_rate: 11,
  long_short_ratio: 12,
  taker_volume: 13,
} as const;

export type MessageType = keyof typeof MESSAGE_TYPE_CODES;

/** 板の方向 */
export const INFO_TYPE_CODES = {
  asks: 1,
  bids: 2,
} as const;

export type InfoType = keyof typeof INFO_TYPE_CODES;

/** K 線の期間 */
export const PERIOD_CODES = {
  '1m': 1,
  '5m': 2,
  '30m': 3,
  '1h': 4,
} as const;

export type Period = keyof typeof PERIOD_CODES;

/** 統一ペア表記（base/quote） */
export const SYMBOL_CODES = {
  'BTC/USDT': 1,
  'BTC/USD': 2,
  'USDT/USD': 3,
  'ETH/USDT': 4,
  'ETH/USD': 5,
} as const;

export type SymbolPair = keyof typeof SYMBOL_CODES;

export const TRADE_SIDE_CODES = {
  buy: 1,
  sell: 2,
} as const;

export type TradeSide = keyof typeof TRADE_SIDE_CODES;

/** 差分エントリの種別。0 は空きスロットとして予約済み。 */
export const CHANGE_ACTION_CODES = {
  insert: 1,
  update: 2,
  remove: 3,
} as const;

export type ChangeAction = keyof typeof CHANGE_ACTION_CODES;
