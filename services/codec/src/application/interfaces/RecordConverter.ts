/**
 * 外部ドメインのメッセージ型とレコードの変換境界。
 *
 * 取引所ごと・収集系ごとの型はこのインターフェイスの実装に閉じ込め、
 * コーデック本体はレコード型だけを扱う。
 * 変換できない場合は `ConversionError` を投げる。
 */
export interface RecordConverter<TMessage, TRecord> {
  toRecord(message: TMessage): TRecord;
  fromRecord(record: TRecord): TMessage;
}
