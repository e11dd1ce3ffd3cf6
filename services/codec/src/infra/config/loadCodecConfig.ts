import { MILLIS_6, SECONDS_8, type TimestampLayout } from '@/domain/codecs/TimestampCodec';
import {
  type CodecConfig,
  DEFAULT_CODEC_CONFIG,
  MAX_ORDERBOOK_DEPTH,
  MIN_ORDERBOOK_DEPTH,
} from '@/domain/config/CodecConfig';
import { ConfigValidationError } from '@/domain/errors';

const TIMESTAMP_LAYOUTS: Record<string, TimestampLayout> = {
  ms6: MILLIS_6,
  s8: SECONDS_8,
};

/**
 * 環境変数からコーデック設定を読み込む。
 *
 * - `CODEC_ORDERBOOK_DEPTH`: 板の片側段数（1〜255、既定 20）
 * - `CODEC_EVENT_TIMESTAMP`: ヘッダ時刻のレイアウト（`ms6` | `s8`、既定 `ms6`）
 * - `CODEC_SCHEDULE_TIMESTAMP`: 予定時刻のレイアウト（`ms6` | `s8`、既定 `s8`）
 *
 * 不正な値はすべて集めてから `ConfigValidationError` として投げる。
 */
export function loadCodecConfig(env: NodeJS.ProcessEnv = process.env): CodecConfig {
  const errors: string[] = [];

  const orderbookDepth = parseDepth(env.CODEC_ORDERBOOK_DEPTH, errors);
  const eventTimestamp = parseLayout(
    'CODEC_EVENT_TIMESTAMP',
    env.CODEC_EVENT_TIMESTAMP,
    DEFAULT_CODEC_CONFIG.eventTimestamp,
    errors
  );
  const scheduleTimestamp = parseLayout(
    'CODEC_SCHEDULE_TIMESTAMP',
    env.CODEC_SCHEDULE_TIMESTAMP,
    DEFAULT_CODEC_CONFIG.scheduleTimestamp,
    errors
  );

  if (errors.length > 0) {
    throw new ConfigValidationError('Codec configuration validation failed', errors);
  }

  return { orderbookDepth, eventTimestamp, scheduleTimestamp };
}

function parseDepth(raw: string | undefined, errors: string[]): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_CODEC_CONFIG.orderbookDepth;
  }
  const depth = Number(raw);
  if (!Number.isInteger(depth) || depth < MIN_ORDERBOOK_DEPTH || depth > MAX_ORDERBOOK_DEPTH) {
    errors.push(
      `CODEC_ORDERBOOK_DEPTH must be an integer between ${MIN_ORDERBOOK_DEPTH} and ${MAX_ORDERBOOK_DEPTH}, got "${raw}"`
    );
    return DEFAULT_CODEC_CONFIG.orderbookDepth;
  }
  return depth;
}

function parseLayout(
  name: string,
  raw: string | undefined,
  fallback: TimestampLayout,
  errors: string[]
): TimestampLayout {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const layout = TIMESTAMP_LAYOUTS[raw.trim().toLowerCase()];
  if (layout === undefined) {
    errors.push(`${name} must be one of ${Object.keys(TIMESTAMP_LAYOUTS).join(', ')}, got "${raw}"`);
    return fallback;
  }
  return layout;
}
