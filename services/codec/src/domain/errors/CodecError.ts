/**
 * コーデック層のエラー基底クラス
 *
 * エラーコードの範囲:
 * - 1000-1099: エンコード・デコード処理
 * - 1100-1199: 設定
 *
 * どのエラーも「1 レコード分の処理」を中断するだけで、プロセスは落とさない。
 * 再同期・スキップ・中断の判断は呼び出し側が行う。
 */
export abstract class CodecError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: 'critical' | 'error' | 'warning',
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export const CODEC_ERROR_CODES = {
  /** 値・時刻・スケールがエンコード可能な範囲外 */
  ENCODING_RANGE: 1001,
  /** バイト列の長さや内容が不正 */
  MALFORMED_INPUT: 1002,
  /** ソースが必要なバイト数を返す前に終端した */
  TRUNCATED_INPUT: 1003,
  /** 列挙値の対応表に存在しないコード */
  UNKNOWN_CODE: 1004,
  /** センチネルやレコード構造の不一致 */
  MALFORMED_RECORD: 1005,
  /** 外部メッセージ型との変換失敗 */
  CONVERSION: 1006,
  /** シンクが全バイトを受け取らなかった */
  SHORT_WRITE: 1007,
  CONFIG_VALIDATION: 1100,
} as const;
