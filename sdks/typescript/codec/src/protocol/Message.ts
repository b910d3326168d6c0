/**
 * Capability contract shared by every SCCP message grammar.
 */

import type { MessageTypeCode } from './MessageType.js';

/**
 * Options accepted by decode operations.
 */
export interface DecodeOptions {
  /**
   * Reject pointer fields that do not have their canonical value
   * (the variable part immediately following the pointers). Default: false.
   */
  strictPointers?: boolean;
}

/**
 * An SCCP message that can be written to and read from its wire encoding.
 *
 * Decoded messages never alias the input buffer: every byte array is copied out.
 */
export interface Message {
  /** Message type code written as the first octet */
  readonly type: MessageTypeCode;

  /**
   * Allocates a buffer of exactly {@link marshalLength} bytes and writes the message into it.
   */
  marshalBinary(): Uint8Array;

  /**
   * Writes the message into `buffer` starting at offset 0 and returns the byte count.
   * Nothing is written when the buffer is too short or a field is out of range.
   * @throws TruncatedBufferError if the buffer is shorter than {@link marshalLength}
   * @throws FieldRangeError if a field cannot be represented
   */
  marshalTo(buffer: Uint8Array): number;

  /**
   * Exact number of bytes {@link marshalTo} writes for the current field values.
   */
  marshalLength(): number;

  /**
   * Replaces every field with the values decoded from `buffer`.
   * @throws TruncatedBufferError at the first field the buffer cannot supply
   * @throws MalformedMessageError if the bytes are present but invalid
   */
  unmarshalBinary(buffer: Uint8Array, options?: DecodeOptions): void;

  /** Message type code */
  messageType(): MessageTypeCode;

  /** Message type display name (e.g. 'DT1') */
  messageTypeName(): string;

  /** Human-readable field dump */
  toString(): string;
}

