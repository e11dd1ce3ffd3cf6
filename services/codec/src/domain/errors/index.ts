export { CODEC_ERROR_CODES, CodecError } from './CodecError';
export {
  ConfigValidationError,
  ConversionError,
  EncodingRangeError,
  MalformedInputError,
  MalformedRecordError,
  ShortWriteError,
  TruncatedInputError,
  UnknownCodeError,
} from './codecErrors';
