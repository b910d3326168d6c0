/**
 * @sccp-ts/core
 *
 * Shared error types and helpers for the SCCP codec packages.
 */

export {
  CodecError,
  type CodecErrorCode,
  TruncatedBufferError,
  UnsupportedTypeError,
  UnknownMessageTypeError,
  UnimplementedMessageTypeError,
  FieldRangeError,
  MalformedMessageError,
  isCodecError,
} from './CodecError.js';

export { CodecResult } from './CodecResult.js';

export { toHex, fromHex, toHexByte } from './HexFormat.js';
