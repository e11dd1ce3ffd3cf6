export type { Logger } from '@/application/interfaces/Logger';
export type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';
export type { RecordConverter } from '@/application/interfaces/RecordConverter';
export {
  type DecodeFailurePolicy,
  type DecodeStreamResult,
  DecodeRecordStreamUsecase,
} from '@/application/usecases/DecodeRecordStreamUsecase';
export { EncodeRecordUsecase } from '@/application/usecases/EncodeRecordUsecase';

export {
  CHANGE_ACTION,
  EnumCodec,
  EXCHANGE,
  INFO_TYPE,
  MARKET_TYPE,
  MESSAGE_TYPE,
  PERIOD,
  SYMBOL,
  TRADE_SIDE,
} from '@/domain/codecs/EnumCodec';
export { NUMERIC_5, NUMERIC_10, NumericCodec, type NumericWidth } from '@/domain/codecs/NumericCodec';
export type { PrimitiveCodec } from '@/domain/codecs/PrimitiveCodec';
export {
  MILLIS_6,
  SECONDS_8,
  TimestampCodec,
  type TimestampLayout,
  type TimestampUnit,
} from '@/domain/codecs/TimestampCodec';
export { type CodecConfig, DEFAULT_CODEC_CONFIG } from '@/domain/config/CodecConfig';
export {
  compareDecimal,
  decimalEquals,
  decimalFromNumber,
  decimalFromString,
  decimalIdentical,
  decimalToNumber,
  decimalToString,
  isZeroDecimal,
  ZERO_DECIMAL,
} from '@/domain/decimal/DecimalValue';
export * from '@/domain/enums/tables';
export * from '@/domain/errors';
export { ChangesField } from '@/domain/fields/ChangesField';
export { type FieldCodec, type FieldKind, PrimitiveField } from '@/domain/fields/Field';
export { LevelsField } from '@/domain/fields/LevelsField';
export { BufferSink } from '@/domain/io/BufferSink';
export { BufferSource } from '@/domain/io/BufferSource';
export type { ByteSink } from '@/domain/io/ByteSink';
export type { ByteSource } from '@/domain/io/ByteSource';
export { OrderbookDiffEngine } from '@/domain/orderbook/OrderbookDiffEngine';
export {
  createBboStructure,
  createFundingRateStructure,
  createKlineStructure,
  createOrderbookDiffStructure,
  createOrderbookStructure,
  createStructures,
  createTradeStructure,
  type RecordStructures,
} from '@/domain/structures/recordStructures';
export { type FieldMap, StructureCodec } from '@/domain/structures/StructureCodec';
export { serializeTagged } from '@/domain/structures/taggedRecords';
export type * from '@/domain/types';

export { loadCodecConfig } from '@/infra/config/loadCodecConfig';
export {
  type NormalizedRecord,
  NormalizedMessageConverter,
} from '@/infra/adapters/normalized/NormalizedMessageConverter';
export type * from '@/infra/adapters/normalized/messages/NormalizedMessage';
export { LoggerFactory } from '@/infra/logger/LoggerFactory';
export { PinoLogger } from '@/infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
