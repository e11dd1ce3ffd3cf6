import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RecordConverter } from '@/application/interfaces/RecordConverter';
import { CodecError } from '@/domain/errors';
import { writeExact } from '@/domain/fields/Field';
import { BufferSink } from '@/domain/io/BufferSink';
import type { ByteSink } from '@/domain/io/ByteSink';
import type { RecordStructures } from '@/domain/structures/recordStructures';
import { serializeTagged } from '@/domain/structures/taggedRecords';
import type { TaggedRecord } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * アプリケーション層: レコードエンコードユースケース
 *
 * 責務: 外部メッセージ → レコード変換 → 構造体でシンクへ書き込み
 * レコード全体をエンコードし終えてから 1 回で書き込むため、失敗時にシンクへ半端なレコードは残らない。
 * 失敗はログとメトリクスに残したうえで呼び出し側へ投げ直す。
 */
export class EncodeRecordUsecase<TMessage, TRecord extends TaggedRecord = TaggedRecord> {
  private readonly logger: Logger;

  constructor(
    private readonly converter: RecordConverter<TMessage, TRecord>,
    private readonly structures: RecordStructures,
    private readonly metrics: MetricsCollector,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'EncodeRecordUsecase' });
  }

  /**
   * @returns 書き込んだレコード
   */
  execute(message: TMessage, sink: ByteSink): TRecord {
    let tagged: TRecord | undefined;
    try {
      tagged = this.converter.toRecord(message);
      const buffer = new BufferSink();
      const written = serializeTagged(this.structures, tagged, buffer);
      writeExact(sink, buffer.toBytes(), written, tagged.kind);

      this.metrics.incrementEncoded(tagged.kind);
      this.logger.debug('Record encoded', { kind: tagged.kind, bytes: written });
      return tagged;
    } catch (error) {
      const errorType = error instanceof CodecError ? error.name : 'unexpected_error';
      this.metrics.incrementError(errorType);
      this.logger.error('Failed to encode record', {
        kind: tagged?.kind,
        errorType,
        code: error instanceof CodecError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
