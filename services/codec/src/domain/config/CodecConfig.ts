import { MILLIS_6, SECONDS_8, type TimestampLayout } from '@/domain/codecs/TimestampCodec';

/**
 * 構造体のレイアウトを決める設定。
 * 版ごとに異なる幅はモードフラグではなく、ここでフィールド単位に与える。
 */
export interface CodecConfig {
  /** 板スナップショットの片側あたりの段数（差分の片側容量はこの 2 倍） */
  orderbookDepth: number;
  /** ヘッダの取引所時刻・受信時刻 */
  eventTimestamp: TimestampLayout;
  /** 資金調達時刻など予定時刻 */
  scheduleTimestamp: TimestampLayout;
}

export const MIN_ORDERBOOK_DEPTH = 1;
export const MAX_ORDERBOOK_DEPTH = 255;

export const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = Object.freeze({
  orderbookDepth: 20,
  eventTimestamp: MILLIS_6,
  scheduleTimestamp: SECONDS_8,
});
