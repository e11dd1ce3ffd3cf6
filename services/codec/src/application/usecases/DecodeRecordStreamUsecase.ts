import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { CodecError, TruncatedInputError } from '@/domain/errors';
import type { ByteSource } from '@/domain/io/ByteSource';
import type { RecordStructures } from '@/domain/structures/recordStructures';
import type { RecordByKind, RecordKind } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * 壊れたレコードに出会ったときの方針
 * - `skip`: 警告を出して次のレコードへ進む（レコード長が固定なので再同期できる）
 * - `abort`: その場でエラーを投げ直す
 */
export type DecodeFailurePolicy = 'skip' | 'abort';

export interface DecodeStreamResult<R> {
  records: R[];
  /** 読み飛ばしたレコード数（末尾の欠けたレコードを含む） */
  skipped: number;
}

/**
 * アプリケーション層: レコード列のデコードユースケース
 *
 * 責務: 同じ種別のレコードが連続するソースを 1 レコードずつ読み、デコード結果を集める
 */
export class DecodeRecordStreamUsecase {
  private readonly logger: Logger;

  constructor(
    private readonly structures: RecordStructures,
    private readonly metrics: MetricsCollector,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'DecodeRecordStreamUsecase' });
  }

  execute<K extends RecordKind>(
    kind: K,
    source: ByteSource,
    policy: DecodeFailurePolicy = 'abort'
  ): DecodeStreamResult<RecordByKind[K]> {
    const structure = this.structures[kind];
    const result: DecodeStreamResult<RecordByKind[K]> = { records: [], skipped: 0 };

    for (let index = 0; ; index++) {
      const chunk = readChunk(source, structure.byteLength);
      if (chunk.length === 0) {
        break;
      }

      try {
        if (chunk.length < structure.byteLength) {
          throw new TruncatedInputError(structure.byteLength, chunk.length, `${kind} record ${index}`);
        }
        result.records.push(structure.decode(chunk));
        this.metrics.incrementDecoded(kind);
      } catch (error) {
        if (!(error instanceof CodecError)) {
          throw error;
        }
        this.metrics.incrementError(error.name);
        if (policy === 'abort') {
          this.logger.error('Failed to decode record', {
            kind,
            index,
            code: error.code,
            error: error.message,
          });
          throw error;
        }
        result.skipped++;
        this.metrics.incrementSkipped(kind);
        this.logger.warn('Skipping malformed record', {
          kind,
          index,
          code: error.code,
          error: error.message,
        });
      }
    }

    this.logger.debug('Record stream decoded', {
      kind,
      records: result.records.length,
      skipped: result.skipped,
    });
    return result;
  }
}

/**
 * 最大 `length` バイトを読む。終端に達した場合はそれより短い配列を返す。
 */
function readChunk(source: ByteSource, length: number): Uint8Array {
  const buffer = new Uint8Array(length);
  let filled = 0;
  while (filled < length) {
    const count = source.read(buffer.subarray(filled));
    if (count === 0) {
      break;
    }
    filled += count;
  }
  return buffer.subarray(0, filled);
}
