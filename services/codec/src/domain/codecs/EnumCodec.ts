import {
  CHANGE_ACTION_CODES,
  type ChangeAction,
  EXCHANGE_CODES,
  type Exchange,
  INFO_TYPE_CODES,
  type InfoType,
  MARKET_TYPE_CODES,
  type MarketType,
  MESSAGE_TYPE_CODES,
  type MessageType,
  PERIOD_CODES,
  type Period,
  SYMBOL_CODES,
  type SymbolPair,
  TRADE_SIDE_CODES,
  type TradeSide,
} from '@/domain/enums/tables';
import { MalformedInputError, UnknownCodeError } from '@/domain/errors';
import type { PrimitiveCodec } from './PrimitiveCodec';

/**
 * 閉じた列挙値と 1 バイトのコードの全単射。
 *
 * 表の不整合（範囲外・重複コード、大文字小文字だけが異なる名前）はプログラムの誤りとして
 * 構築時に `Error` を投げる。
 */
export class EnumCodec<T extends string> implements PrimitiveCodec<T> {
  readonly width = 1;
  private readonly byCode = new Map<number, T>();
  private readonly byLowerName = new Map<string, T>();
  private readonly codes: ReadonlyMap<T, number>;

  constructor(
    public readonly domain: string,
    table: Readonly<Record<T, number>>
  ) {
    const codes = new Map<T, number>();
    for (const member of memberNames(table)) {
      const code = table[member];
      if (!Number.isInteger(code) || code < 0 || code > 0xff) {
        throw new Error(`${domain}: code for "${member}" must be a byte, got ${code}`);
      }
      if (this.byCode.has(code)) {
        throw new Error(`${domain}: code ${code} is assigned twice`);
      }
      const lower = member.toLowerCase();
      if (this.byLowerName.has(lower)) {
        throw new Error(`${domain}: name "${member}" collides case-insensitively`);
      }
      this.byCode.set(code, member);
      this.byLowerName.set(lower, member);
      codes.set(member, code);
    }
    this.codes = codes;
  }

  get members(): readonly T[] {
    return [...this.codes.keys()];
  }

  encodeByte(member: T): number {
    const code = this.codes.get(member);
    if (code === undefined) {
      throw new UnknownCodeError(this.domain, member);
    }
    return code;
  }

  decodeByte(code: number): T {
    const member = this.byCode.get(code);
    if (member === undefined) {
      throw new UnknownCodeError(this.domain, code);
    }
    return member;
  }

  encode(member: T): Uint8Array {
    return Uint8Array.of(this.encodeByte(member));
  }

  decode(bytes: Uint8Array): T {
    const [code] = bytes;
    if (bytes.length !== this.width || code === undefined) {
      throw new MalformedInputError(`${this.domain} span must be 1 byte, received ${bytes.length}`, {
        length: bytes.length,
      });
    }
    return this.decodeByte(code);
  }

  /**
   * 名前から列挙値を引く。入力は小文字化してから照合する（`"btc/usdt"` → `'BTC/USDT'`）。
   */
  parseText(name: string): T {
    const member = this.byLowerName.get(name.toLowerCase());
    if (member === undefined) {
      throw new UnknownCodeError(this.domain, name);
    }
    return member;
  }

  isMember(name: string): name is T {
    return this.members.some((member) => member === name);
  }
}

function memberNames<T extends string>(table: Readonly<Record<T, number>>): T[] {
  return Object.keys(table).filter((key): key is T => Object.hasOwn(table, key));
}

export const EXCHANGE = new EnumCodec<Exchange>('exchange', EXCHANGE_CODES);
export const MARKET_TYPE = new EnumCodec<MarketType>('market type', MARKET_TYPE_CODES);
export const MESSAGE_TYPE = new EnumCodec<MessageType>('message type', MESSAGE_TYPE_CODES);
export const INFO_TYPE = new EnumCodec<InfoType>('info type', INFO_TYPE_CODES);
export const PERIOD = new EnumCodec<Period>('period', PERIOD_CODES);
export const SYMBOL = new EnumCodec<SymbolPair>('symbol', SYMBOL_CODES);
export const TRADE_SIDE = new EnumCodec<TradeSide>('trade side', TRADE_SIDE_CODES);
export const CHANGE_ACTION = new EnumCodec<ChangeAction>('change action', CHANGE_ACTION_CODES);
