/**
 * @sccp-ts/codec
 *
 * Encoding and decoding of SCCP messages for SS7/SIGTRAN transport adapters.
 *
 * @example
 * ```typescript
 * import { DT1, MessageCodec, MessageType } from '@sccp-ts/codec';
 *
 * const codec = new MessageCodec();
 *
 * // Encode
 * const dt1 = new DT1(new Uint8Array([0x01, 0x02, 0x03]), 0, payload);
 * socket.write(codec.encode(dt1));
 *
 * // Decode
 * const result = codec.tryDecode(received);
 * if (result.isSuccess && result.value?.type === MessageType.DT1) {
 *   console.log(result.value.data);
 * }
 * ```
 */

// Re-export core types for convenience
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
  CodecResult,
  toHex,
  fromHex,
} from '@sccp-ts/core';

export {
  MessageCodec,
  type MessageCodecOptions,
  type CodecLogger,
  type CodecStats,
} from './MessageCodec.js';

export * from './protocol/index.js';
