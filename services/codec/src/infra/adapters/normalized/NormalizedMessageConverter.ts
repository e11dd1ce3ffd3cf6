import type { RecordConverter } from '@/application/interfaces/RecordConverter';
import { EXCHANGE, MARKET_TYPE, PERIOD, SYMBOL, TRADE_SIDE } from '@/domain/codecs/EnumCodec';
import { decimalFromNumber, decimalFromString, decimalToString } from '@/domain/decimal/DecimalValue';
import type { MessageType } from '@/domain/enums/tables';
import { CodecError, ConversionError } from '@/domain/errors';
import type { DecimalValue, OrderBookLevel, RecordHeader, TaggedRecord } from '@/domain/types';
import type {
  DecimalInput,
  NormalizedLevel,
  NormalizedMessage,
  NormalizedMessageType,
} from './messages/NormalizedMessage';

/** 正規化メッセージが対応するレコード種別 */
export type NormalizedRecord = TaggedRecord<'bbo' | 'kline' | 'orderbook' | 'trade' | 'funding_rate'>;

const MESSAGE_TYPES: Record<Exclude<NormalizedMessageType, 'orderbook'>, MessageType> = {
  bbo: 'bbo',
  kline: 'candlestick',
  trade: 'trade',
  funding_rate: 'funding_rate',
};

/**
 * インフラ層: 正規化メッセージ ⇔ レコードの変換
 *
 * 責務: 文字列の取引所名・ペア表記・数値を列挙値と DecimalValue に写す。
 * 写せない値は `ConversionError` として報告する。
 */
export class NormalizedMessageConverter implements RecordConverter<NormalizedMessage, NormalizedRecord> {
  /**
   * @param clock `received_ts` を持たないメッセージの受信時刻
   */
  constructor(private readonly clock: () => number = Date.now) {}

  toRecord(message: NormalizedMessage): NormalizedRecord {
    switch (message.type) {
      case 'bbo': {
        const { data } = message;
        return {
          kind: 'bbo',
          record: {
            ...this.toHeader(message, MESSAGE_TYPES.bbo),
            askPrice: toDecimal('ask', data.ask),
            askQuantity: toDecimal('ask_size', data.ask_size),
            bidPrice: toDecimal('bid', data.bid),
            bidQuantity: toDecimal('bid_size', data.bid_size),
          },
        };
      }

      case 'kline': {
        const { data } = message;
        return {
          kind: 'kline',
          record: {
            ...this.toHeader(message, MESSAGE_TYPES.kline),
            period: convert('period', data.period, () => PERIOD.parseText(data.period)),
            open: toDecimal('open', data.open),
            high: toDecimal('high', data.high),
            low: toDecimal('low', data.low),
            close: toDecimal('close', data.close),
            volume: toDecimal('volume', data.volume),
          },
        };
      }

      case 'orderbook': {
        const { data } = message;
        return {
          kind: 'orderbook',
          record: {
            ...this.toHeader(message, data.is_snapshot ? 'l2_snapshot' : 'l2_event'),
            asks: data.asks.map((level, index) => toLevel(`asks[${index}]`, level)),
            bids: data.bids.map((level, index) => toLevel(`bids[${index}]`, level)),
          },
        };
      }

      case 'trade': {
        const { data } = message;
        return {
          kind: 'trade',
          record: {
            ...this.toHeader(message, MESSAGE_TYPES.trade),
            side: convert('side', data.side, () => TRADE_SIDE.parseText(data.side)),
            price: toDecimal('price', data.price),
            quantity: toDecimal('size', data.size),
          },
        };
      }

      case 'funding_rate': {
        const { data } = message;
        return {
          kind: 'funding_rate',
          record: {
            ...this.toHeader(message, MESSAGE_TYPES.funding_rate),
            fundingRate: toDecimal('rate', data.rate),
            fundingTime: toTimestamp('funding_time', data.funding_time),
            estimatedRate: toDecimal('estimated_rate', data.estimated_rate),
          },
        };
      }
    }
  }

  fromRecord(tagged: NormalizedRecord): NormalizedMessage {
    switch (tagged.kind) {
      case 'bbo': {
        const { record } = tagged;
        return {
          type: 'bbo',
          ...fromHeader(record),
          data: {
            ask: decimalToString(record.askPrice),
            ask_size: decimalToString(record.askQuantity),
            bid: decimalToString(record.bidPrice),
            bid_size: decimalToString(record.bidQuantity),
          },
        };
      }

      case 'kline': {
        const { record } = tagged;
        return {
          type: 'kline',
          ...fromHeader(record),
          data: {
            period: record.period,
            open: decimalToString(record.open),
            high: decimalToString(record.high),
            low: decimalToString(record.low),
            close: decimalToString(record.close),
            volume: decimalToString(record.volume),
          },
        };
      }

      case 'orderbook': {
        const { record } = tagged;
        return {
          type: 'orderbook',
          ...fromHeader(record),
          data: {
            is_snapshot: record.messageType !== 'l2_event',
            asks: record.asks.map(fromLevel),
            bids: record.bids.map(fromLevel),
          },
        };
      }

      case 'trade': {
        const { record } = tagged;
        return {
          type: 'trade',
          ...fromHeader(record),
          data: {
            price: decimalToString(record.price),
            size: decimalToString(record.quantity),
            side: record.side,
          },
        };
      }

      case 'funding_rate': {
        const { record } = tagged;
        return {
          type: 'funding_rate',
          ...fromHeader(record),
          data: {
            rate: decimalToString(record.fundingRate),
            funding_time: record.fundingTime,
            estimated_rate: decimalToString(record.estimatedRate),
          },
        };
      }
    }
  }

  private toHeader(message: NormalizedMessage, messageType: MessageType): RecordHeader {
    const marketType = message.market_type ?? 'unknown';
    return {
      exchangeTimestamp: toTimestamp('ts', message.ts),
      receivedTimestamp: toTimestamp('received_ts', message.received_ts ?? this.clock()),
      exchange: convert('exchange', message.exchange, () => EXCHANGE.parseText(message.exchange)),
      marketType: convert('market_type', marketType, () => MARKET_TYPE.parseText(marketType)),
      messageType,
      symbol: convert('symbol', message.symbol, () => SYMBOL.parseText(unifySymbol(message.symbol))),
    };
  }
}

/**
 * 'BTC_USDT' や 'btc-usdt' を統一表記 'btc/usdt' に揃える（大文字小文字は parseText 側で吸収）。
 */
export function unifySymbol(symbol: string): string {
  return symbol.trim().replace(/[_-]/g, '/');
}

function fromHeader(record: RecordHeader) {
  return {
    exchange: record.exchange,
    market_type: record.marketType,
    symbol: record.symbol,
    ts: record.exchangeTimestamp,
    received_ts: record.receivedTimestamp,
  };
}

function fromLevel(level: OrderBookLevel): NormalizedLevel {
  return [decimalToString(level.price), decimalToString(level.quantity)];
}

function toLevel(field: string, [price, size]: NormalizedLevel): OrderBookLevel {
  return {
    price: toDecimal(`${field}.price`, price),
    quantity: toDecimal(`${field}.size`, size),
  };
}

function toDecimal(field: string, value: DecimalInput): DecimalValue {
  return convert(field, value, () =>
    typeof value === 'number' ? decimalFromNumber(value) : decimalFromString(value)
  );
}

function toTimestamp(field: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConversionError(`Field "${field}" is not an epoch millisecond timestamp: ${value}`, {
      field,
      value,
    });
  }
  return value;
}

/**
 * コーデックのエラーを、どのフィールドで起きたかを添えて ConversionError に包み直す。
 */
function convert<T>(field: string, value: unknown, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CodecError) {
      throw new ConversionError(`Field "${field}" cannot be converted: ${error.message}`, {
        field,
        value,
        cause: error.name,
      });
    }
    throw error;
  }
}
