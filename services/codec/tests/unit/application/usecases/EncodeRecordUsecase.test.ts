import { beforeEach, describe, expect, it } from 'vitest';
import { EncodeRecordUsecase } from '@/application/usecases/EncodeRecordUsecase';
import { EncodingRangeError } from '@/domain/errors';
import { BufferSink } from '@/domain/io/BufferSink';
import { createStructures } from '@/domain/structures/recordStructures';
import {
  type NormalizedRecord,
  NormalizedMessageConverter,
} from '@/infra/adapters/normalized/NormalizedMessageConverter';
import type { NormalizedMessage } from '@/infra/adapters/normalized/messages/NormalizedMessage';
import { NEW_YEAR_2022 } from '@test/unit/helpers/fixtures/records';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';

/**
 * 単体テスト: EncodeRecordUsecase
 *
 * - 変換 → 書き込みの流れとメトリクス
 * - 変換・エンコード失敗時のログとエラーの再送出
 */
describe('EncodeRecordUsecase', () => {
  let usecase: EncodeRecordUsecase<NormalizedMessage, NormalizedRecord>;
  let logger: LoggerMock;
  let metrics: MetricsCollectorMock;
  const structures = createStructures();

  const trade: NormalizedMessage = {
    type: 'trade',
    exchange: 'binance',
    market_type: 'spot',
    symbol: 'BTC/USDT',
    ts: NEW_YEAR_2022,
    received_ts: NEW_YEAR_2022,
    data: { price: '42000.5', size: '0.01', side: 'buy' },
  };

  beforeEach(() => {
    logger = new LoggerMock();
    metrics = new MetricsCollectorMock();
    usecase = new EncodeRecordUsecase(new NormalizedMessageConverter(), structures, metrics, logger);
  });

  it('メッセージを変換してシンクに 1 レコード書き込む', () => {
    const sink = new BufferSink();

    const tagged = usecase.execute(trade, sink);

    expect(tagged.kind).toBe('trade');
    expect(sink.toBytes()).toHaveLength(38);
    expect(sink.toBytes()).toEqual(
      tagged.kind === 'trade' ? structures.trade.encode(tagged.record) : undefined
    );
    expect(metrics.incrementEncoded).toHaveBeenCalledWith('trade');
    expect(logger.child).toHaveBeenCalledWith({ component: 'EncodeRecordUsecase' });
  });

  it('変換に失敗するとエラーを数えてログに残し、投げ直す', () => {
    const sink = new BufferSink();

    expect(() => usecase.execute({ ...trade, symbol: 'DOGE/USDT' }, sink)).toThrow(
      'Field "symbol" cannot be converted: Unknown symbol code: DOGE/USDT'
    );
    expect(metrics.incrementError).toHaveBeenCalledWith('ConversionError');
    expect(metrics.incrementEncoded).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to encode record',
      expect.objectContaining({ errorType: 'ConversionError', code: 1006 })
    );
    expect(sink.byteLength).toBe(0);
  });

  it('板の段数がレイアウトを超えると EncodingRangeError で、シンクには何も書かない', () => {
    const sink = new BufferSink();
    const asks = Array.from({ length: 21 }, (_, i): [string, string] => [`${100 + i}`, '1']);

    expect(() =>
      usecase.execute(
        {
          type: 'orderbook',
          exchange: 'okx',
          symbol: 'BTC/USDT',
          ts: NEW_YEAR_2022,
          data: { is_snapshot: true, asks, bids: [] },
        },
        sink
      )
    ).toThrow(EncodingRangeError);
    expect(sink.byteLength).toBe(0);
    expect(metrics.incrementError).toHaveBeenCalledWith('EncodingRangeError');
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to encode record',
      expect.objectContaining({ kind: 'orderbook' })
    );
  });

  it('コーデック以外の例外は unexpected_error として数える', () => {
    const failing = new EncodeRecordUsecase<string>(
      {
        toRecord: () => {
          throw new TypeError('broken converter');
        },
        fromRecord: () => 'unused',
      },
      structures,
      metrics,
      logger
    );

    expect(() => failing.execute('raw', new BufferSink())).toThrow(TypeError);
    expect(metrics.incrementError).toHaveBeenCalledWith('unexpected_error');
  });
});
