/**
 * Unitdata (UDT): connectionless data with called and calling party addresses.
 *
 * Layout with canonical pointers:
 * - [0]     Message type (0x09)
 * - [1]     Protocol class
 * - [2]     Pointer to called party address, relative to byte 2 (3)
 * - [3]     Pointer to calling party address, relative to byte 3
 * - [4]     Pointer to data, relative to byte 4
 * - [5+]    Called party address, calling party address, data; each length-prefixed
 */

import {
  FieldRangeError,
  MalformedMessageError,
  TruncatedBufferError,
  toHex,
  toHexByte,
} from '@sccp-ts/core';
import { MAX_OCTET, assertLength, assertOctet } from './FieldChecks.js';
import type { DecodeOptions, Message } from './Message.js';
import { MessageType } from './MessageType.js';
import { PartyAddress } from './PartyAddress.js';

/** Size of the fixed part and the three pointers. */
export const UDT_HEADER_LENGTH = 5;

const CALLED_POINTER_OFFSET = 2;
const CALLING_POINTER_OFFSET = 3;
const DATA_POINTER_OFFSET = 4;

/**
 * Pointer values that place the three variable parameters back to back after the header.
 */
function canonicalPointers(called: PartyAddress, calling: PartyAddress): [number, number, number] {
  const ptr1 = UDT_HEADER_LENGTH - CALLED_POINTER_OFFSET;
  const ptr2 = ptr1 + called.marshalLength() - 1;
  const ptr3 = ptr2 + calling.marshalLength() - 1;
  return [ptr1, ptr2, ptr3];
}

export class UDT implements Message {
  readonly type = MessageType.UDT;

  private _protocolClass: number;
  private _pointers: [number, number, number];
  private _calledPartyAddress: PartyAddress;
  private _callingPartyAddress: PartyAddress;
  private _data: Uint8Array;

  /**
   * Creates a UDT with canonical pointers. The data is copied.
   * Called with no arguments it creates the empty instance that decoding populates.
   * @throws FieldRangeError if the protocol class is not an octet or the data exceeds 255 bytes
   */
  constructor(
    protocolClass: number = 0,
    calledPartyAddress: PartyAddress = new PartyAddress(),
    callingPartyAddress: PartyAddress = new PartyAddress(),
    data: Uint8Array = new Uint8Array(0)
  ) {
    assertOctet('protocolClass', protocolClass);
    assertLength('dataLength', data, 0, MAX_OCTET);

    this._protocolClass = protocolClass;
    this._calledPartyAddress = calledPartyAddress;
    this._callingPartyAddress = callingPartyAddress;
    this._data = data.slice();
    this._pointers = canonicalPointers(calledPartyAddress, callingPartyAddress);
  }

  /**
   * Decodes a UDT from its wire encoding.
   */
  static parse(buffer: Uint8Array, options?: DecodeOptions): UDT {
    const message = new UDT();
    message.unmarshalBinary(buffer, options);
    return message;
  }

  get protocolClass(): number {
    return this._protocolClass;
  }

  /** Pointers as last read from the wire, or the canonical ones for a constructed message */
  get pointers(): readonly [number, number, number] {
    return this._pointers;
  }

  get calledPartyAddress(): PartyAddress {
    return this._calledPartyAddress;
  }

  get callingPartyAddress(): PartyAddress {
    return this._callingPartyAddress;
  }

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

    const [ptr1, ptr2, ptr3] = canonicalPointers(
      this._calledPartyAddress,
      this._callingPartyAddress
    );
    if (ptr3 > MAX_OCTET) {
      throw new FieldRangeError('dataPointer', ptr3, 0, MAX_OCTET);
    }

    const length = this.marshalLength();
    if (buffer.length < length) {
      throw new TruncatedBufferError('UDT', length, buffer.length);
    }

    buffer[0] = this.type;
    buffer[1] = this._protocolClass;
    buffer[CALLED_POINTER_OFFSET] = ptr1;
    buffer[CALLING_POINTER_OFFSET] = ptr2;
    buffer[DATA_POINTER_OFFSET] = ptr3;

    let pos = UDT_HEADER_LENGTH;
    pos += this._calledPartyAddress.marshalTo(buffer, pos);
    pos += this._callingPartyAddress.marshalTo(buffer, pos);
    buffer[pos++] = this._data.length;
    buffer.set(this._data, pos);

    return length;
  }

  marshalLength(): number {
    return (
      UDT_HEADER_LENGTH +
      this._calledPartyAddress.marshalLength() +
      this._callingPartyAddress.marshalLength() +
      1 +
      this._data.length
    );
  }

  unmarshalBinary(buffer: Uint8Array, options: DecodeOptions = {}): void {
    const available = buffer.length;
    if (available < UDT_HEADER_LENGTH) {
      throw new TruncatedBufferError('UDT header', UDT_HEADER_LENGTH, available);
    }

    if (buffer[0] !== MessageType.UDT) {
      throw new MalformedMessageError(
        `Expected UDT (${toHexByte(MessageType.UDT)}), got ${toHexByte(buffer[0])}`
      );
    }

    const pointers: [number, number, number] = [
      buffer[CALLED_POINTER_OFFSET],
      buffer[CALLING_POINTER_OFFSET],
      buffer[DATA_POINTER_OFFSET],
    ];

    const called = PartyAddress.parse(
      buffer,
      CALLED_POINTER_OFFSET + pointers[0],
      'calledPartyAddress'
    );
    const calling = PartyAddress.parse(
      buffer,
      CALLING_POINTER_OFFSET + pointers[1],
      'callingPartyAddress'
    );

    const lengthOffset = DATA_POINTER_OFFSET + pointers[2];
    if (available <= lengthOffset) {
      throw new TruncatedBufferError('dataLength', lengthOffset + 1, available);
    }
    const dataOffset = lengthOffset + 1;
    const dataEnd = dataOffset + buffer[lengthOffset];
    if (available < dataEnd) {
      throw new TruncatedBufferError('data', dataEnd, available);
    }

    if (options.strictPointers) {
      const expected = canonicalPointers(called, calling);
      if (pointers.some((pointer, i) => pointer !== expected[i])) {
        throw new MalformedMessageError(
          `Non-canonical UDT pointers: ${pointers.join(', ')} (expected ${expected.join(', ')})`
        );
      }
    }

    this._protocolClass = buffer[1];
    this._pointers = pointers;
    this._calledPartyAddress = called;
    this._callingPartyAddress = calling;
    this._data = buffer.slice(dataOffset, dataEnd);
  }

  messageType(): typeof MessageType.UDT {
    return this.type;
  }

  messageTypeName(): string {
    return 'UDT';
  }

  toString(): string {
    return (
      `UDT {type: ${toHexByte(this.type)}, ` +
      `protocolClass: ${toHexByte(this._protocolClass)}, ` +
      `calledPartyAddress: ${this._calledPartyAddress.toString()}, ` +
      `callingPartyAddress: ${this._callingPartyAddress.toString()}, ` +
      `dataLength: ${this.dataLength}, ` +
      `data: ${toHex(this._data)}}`
    );
  }
}
