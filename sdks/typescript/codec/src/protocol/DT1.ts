/**
 * Data Form 1 (DT1): connection-oriented data on a single logical connection.
 *
 * Layout with the canonical pointer (7-byte minimum):
 * - [0]     Message type (0x06)
 * - [1-3]   Destination local reference (opaque)
 * - [4]     Segmenting/reassembling (opaque flags)
 * - [5]     Pointer to the data length octet, relative to byte 5 (1 when encoding)
 * - [6]     Data length (0-255)
 * - [7+]    Data
 *
 * On decode the pointer is followed as read, so `[5 + pointer]` holds the length octet.
 */

import { MalformedMessageError, TruncatedBufferError, toHex, toHexByte } from '@sccp-ts/core';
import { MAX_OCTET, assertLength, assertOctet } from './FieldChecks.js';
import type { DecodeOptions, Message } from './Message.js';
import { MessageType } from './MessageType.js';

/** Size of the fixed part, the pointer and the length octet. */
export const DT1_MIN_LENGTH = 7;

/** Size of a local reference number. */
export const LOCAL_REFERENCE_LENGTH = 3;

const POINTER_OFFSET = 5;
const CANONICAL_POINTER = 1;

export class DT1 implements Message {
  readonly type = MessageType.DT1;

  private _destinationLocalRef: Uint8Array;
  private _segmentingReassembling: number;
  private _pointer: number;
  private _data: Uint8Array;

  /**
   * Creates a DT1 with the canonical pointer. The byte arrays are copied.
   * Called with no arguments it creates the empty instance that decoding populates.
   * @throws FieldRangeError if the reference is not 3 bytes, the flags are not an octet,
   * or the data exceeds 255 bytes
   */
  constructor(
    destinationLocalRef: Uint8Array = new Uint8Array(LOCAL_REFERENCE_LENGTH),
    segmentingReassembling: number = 0,
    data: Uint8Array = new Uint8Array(0)
  ) {
    assertLength(
      'destinationLocalRef',
      destinationLocalRef,
      LOCAL_REFERENCE_LENGTH,
      LOCAL_REFERENCE_LENGTH
    );
    assertOctet('segmentingReassembling', segmentingReassembling);
    assertLength('dataLength', data, 0, MAX_OCTET);

    this._destinationLocalRef = destinationLocalRef.slice();
    this._segmentingReassembling = segmentingReassembling;
    this._pointer = CANONICAL_POINTER;
    this._data = data.slice();
  }

  /**
   * Decodes a DT1 from its wire encoding.
   */
  static parse(buffer: Uint8Array, options?: DecodeOptions): DT1 {
    const message = new DT1();
    message.unmarshalBinary(buffer, options);
    return message;
  }

  get destinationLocalRef(): Uint8Array {
    return this._destinationLocalRef;
  }

  get segmentingReassembling(): number {
    return this._segmentingReassembling;
  }

  /** Pointer as last read from the wire (1 unless decoded from a padded encoding) */
  get pointer(): number {
    return this._pointer;
  }

  /** Always the length of {@link data} */
  get dataLength(): number {
    return this._data.length;
  }

  get data(): Uint8Array {
    return this._data;
  }

  marshalBinary(): Uint8Array {
    const buffer = new Uint8Array(this.marshalLength());
    this.marshalTo(buffer);
    return buffer;
  }

  marshalTo(buffer: Uint8Array): number {
    assertLength('dataLength', this._data, 0, MAX_OCTET);

    const length = this.marshalLength();
    if (buffer.length < length) {
      throw new TruncatedBufferError('DT1', length, buffer.length);
    }

    buffer[0] = this.type;
    buffer.set(this._destinationLocalRef, 1);
    buffer[4] = this._segmentingReassembling;
    buffer[POINTER_OFFSET] = CANONICAL_POINTER;
    buffer[POINTER_OFFSET + CANONICAL_POINTER] = this._data.length;
    buffer.set(this._data, POINTER_OFFSET + CANONICAL_POINTER + 1);

    return length;
  }

  marshalLength(): number {
    return DT1_MIN_LENGTH + this._data.length;
  }

  unmarshalBinary(buffer: Uint8Array, options: DecodeOptions = {}): void {
    const available = buffer.length;
    if (available < DT1_MIN_LENGTH) {
      throw new TruncatedBufferError('DT1 header', DT1_MIN_LENGTH, available);
    }

    if (buffer[0] !== MessageType.DT1) {
      throw new MalformedMessageError(
        `Expected DT1 (${toHexByte(MessageType.DT1)}), got ${toHexByte(buffer[0])}`
      );
    }

    const pointer = buffer[POINTER_OFFSET];
    if (options.strictPointers && pointer !== CANONICAL_POINTER) {
      throw new MalformedMessageError(`Non-canonical DT1 pointer: ${pointer}`);
    }

    const lengthOffset = POINTER_OFFSET + pointer;
    if (available <= lengthOffset) {
      throw new TruncatedBufferError('dataLength', lengthOffset + 1, available);
    }

    const dataOffset = lengthOffset + 1;
    const dataEnd = dataOffset + buffer[lengthOffset];
    if (available < dataEnd) {
      throw new TruncatedBufferError('data', dataEnd, available);
    }

    this._destinationLocalRef = buffer.slice(1, 1 + LOCAL_REFERENCE_LENGTH);
    this._segmentingReassembling = buffer[4];
    this._pointer = pointer;
    this._data = buffer.slice(dataOffset, dataEnd);
  }

  messageType(): typeof MessageType.DT1 {
    return this.type;
  }

  messageTypeName(): string {
    return 'DT1';
  }

  toString(): string {
    return (
      `DT1 {type: ${toHexByte(this.type)}, ` +
      `destinationLocalRef: ${toHex(this._destinationLocalRef)}, ` +
      `segmentingReassembling: ${toHexByte(this._segmentingReassembling)}, ` +
      `pointer: ${this._pointer}, ` +
      `dataLength: ${this.dataLength}, ` +
      `data: ${toHex(this._data)}}`
    );
  }
}
