import { describe, expect, it } from 'vitest';
import { MILLIS_6, SECONDS_8 } from '@/domain/codecs/TimestampCodec';
import { ConfigValidationError } from '@/domain/errors';
import { loadCodecConfig } from '@/infra/config/loadCodecConfig';

describe('loadCodecConfig', () => {
  it('環境変数がなければ既定値を返す', () => {
    expect(loadCodecConfig({})).toEqual({
      orderbookDepth: 20,
      eventTimestamp: MILLIS_6,
      scheduleTimestamp: SECONDS_8,
    });
  });

  it('段数と時刻レイアウトを読み込む（レイアウト名は大文字小文字を問わない）', () => {
    const config = loadCodecConfig({
      CODEC_ORDERBOOK_DEPTH: '5',
      CODEC_EVENT_TIMESTAMP: 'S8',
      CODEC_SCHEDULE_TIMESTAMP: 'ms6',
    });

    expect(config).toEqual({
      orderbookDepth: 5,
      eventTimestamp: SECONDS_8,
      scheduleTimestamp: MILLIS_6,
    });
  });

  it('空文字は未設定として扱う', () => {
    expect(loadCodecConfig({ CODEC_ORDERBOOK_DEPTH: ' ' }).orderbookDepth).toBe(20);
  });

  it('不正な値はすべてまとめて ConfigValidationError にする', () => {
    let caught: unknown;
    try {
      loadCodecConfig({ CODEC_ORDERBOOK_DEPTH: '256', CODEC_EVENT_TIMESTAMP: 'ns9' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.validationErrors).toEqual([
        'CODEC_ORDERBOOK_DEPTH must be an integer between 1 and 255, got "256"',
        'CODEC_EVENT_TIMESTAMP must be one of ms6, s8, got "ns9"',
      ]);
    }
  });

  it('整数でない段数は拒否する', () => {
    expect(() => loadCodecConfig({ CODEC_ORDERBOOK_DEPTH: '2.5' })).toThrow(ConfigValidationError);
  });
});
