/**
 * Called/calling party address parameter (ITU-T Q.713 3.4).
 *
 * Wire layout:
 * - [0]     Length of the contents that follow (not counting itself)
 * - [1]     Address indicator
 * - [+2]    Signalling point code, 14 bits little-endian (if indicated)
 * - [+1]    Subsystem number (if indicated)
 * - [+]     Global title (if indicated), runs to the end of the parameter
 */

import {
  FieldRangeError,
  MalformedMessageError,
  TruncatedBufferError,
  toHex,
  toHexByte,
} from '@sccp-ts/core';
import { MAX_OCTET, assertOctet } from './FieldChecks.js';
import {
  GlobalTitleIndicator,
  copyGlobalTitle,
  encodeGlobalTitleHeader,
  validateGlobalTitle,
  type GlobalTitle,
} from './GlobalTitle.js';
import { hasFlag } from './MessageFlags.js';

/**
 * Bits of the address indicator octet.
 */
export const AddressIndicator = {
  /** Signalling point code present */
  PointCode: 0x01,

  /** Subsystem number present */
  SubsystemNumber: 0x02,

  /** Mask of the 4-bit global title indicator */
  GlobalTitleMask: 0x3c,

  /** Route on SSN (set) or on global title (clear) */
  RouteOnSsn: 0x40,

  /** Reserved for national use */
  NationalUse: 0x80,
} as const;

/** Largest ITU signalling point code. */
export const MAX_POINT_CODE = 0x3fff;

export interface PartyAddressFields {
  pointCode?: number;
  subsystemNumber?: number;
  globalTitle?: GlobalTitle;
  /** Defaults to true when a subsystem number is given */
  routeOnSsn?: boolean;
  nationalUse?: boolean;
}

export class PartyAddress {
  readonly pointCode: number | undefined;
  readonly subsystemNumber: number | undefined;
  private readonly _globalTitle: GlobalTitle | undefined;
  readonly routeOnSsn: boolean;
  readonly nationalUse: boolean;

  /**
   * @throws FieldRangeError if a field does not fit its bits or the contents exceed 255 bytes
   */
  constructor(fields: PartyAddressFields = {}) {
    if (fields.pointCode !== undefined) {
      const pc = fields.pointCode;
      if (!Number.isInteger(pc) || pc < 0 || pc > MAX_POINT_CODE) {
        throw new FieldRangeError('pointCode', pc, 0, MAX_POINT_CODE);
      }
    }
    if (fields.subsystemNumber !== undefined) {
      assertOctet('subsystemNumber', fields.subsystemNumber);
    }
    if (fields.globalTitle !== undefined) {
      validateGlobalTitle(fields.globalTitle);
    }

    this.pointCode = fields.pointCode;
    this.subsystemNumber = fields.subsystemNumber;
    this._globalTitle = fields.globalTitle && copyGlobalTitle(fields.globalTitle);
    this.routeOnSsn = fields.routeOnSsn ?? fields.subsystemNumber !== undefined;
    this.nationalUse = fields.nationalUse ?? false;

    const contentLength = this.contentLength();
    if (contentLength > MAX_OCTET) {
      throw new FieldRangeError('partyAddressLength', contentLength, 1, MAX_OCTET);
    }
  }

  /**
   * Decodes the parameter whose length octet sits at `offset`.
   * @param field - Parameter name used in error messages
   */
  static parse(buffer: Uint8Array, offset: number = 0, field: string = 'partyAddress'): PartyAddress {
    if (buffer.length <= offset) {
      throw new TruncatedBufferError(`${field} length`, offset + 1, buffer.length);
    }

    const start = offset + 1;
    const end = start + buffer[offset];
    if (buffer.length < end) {
      throw new TruncatedBufferError(field, end, buffer.length);
    }

    return PartyAddress.fromContents(buffer.subarray(start, end), field);
  }

  private static fromContents(contents: Uint8Array, field: string): PartyAddress {
    if (contents.length < 1) {
      throw new MalformedMessageError(`${field} has no address indicator`);
    }

    const indicator = contents[0];
    let pos = 1;
    const take = (count: number, part: string): number => {
      if (pos + count > contents.length) {
        throw new MalformedMessageError(`${field} ${part} overruns its declared length`);
      }
      const at = pos;
      pos += count;
      return at;
    };

    let pointCode: number | undefined;
    if (hasFlag(indicator, AddressIndicator.PointCode)) {
      const at = take(2, 'point code');
      // Bits 7-8 of the second octet are spare.
      pointCode = contents[at] | ((contents[at + 1] & 0x3f) << 8);
    }

    let subsystemNumber: number | undefined;
    if (hasFlag(indicator, AddressIndicator.SubsystemNumber)) {
      subsystemNumber = contents[take(1, 'subsystem number')];
    }

    let globalTitle: GlobalTitle | undefined;
    const gti = (indicator & AddressIndicator.GlobalTitleMask) >> 2;
    switch (gti) {
      case GlobalTitleIndicator.None:
        break;
      case GlobalTitleIndicator.NatureOfAddress: {
        const octet = contents[take(1, 'global title')];
        globalTitle = {
          indicator: GlobalTitleIndicator.NatureOfAddress,
          natureOfAddress: octet & 0x7f,
          oddNumberOfDigits: hasFlag(octet, 0x80),
          addressInformation: contents.slice(pos),
        };
        break;
      }
      case GlobalTitleIndicator.TranslationType: {
        const at = take(1, 'global title');
        globalTitle = {
          indicator: GlobalTitleIndicator.TranslationType,
          translationType: contents[at],
          addressInformation: contents.slice(pos),
        };
        break;
      }
      case GlobalTitleIndicator.TranslationTypeNumberingPlan: {
        const at = take(2, 'global title');
        globalTitle = {
          indicator: GlobalTitleIndicator.TranslationTypeNumberingPlan,
          translationType: contents[at],
          numberingPlan: contents[at + 1] >> 4,
          encodingScheme: contents[at + 1] & 0x0f,
          addressInformation: contents.slice(pos),
        };
        break;
      }
      case GlobalTitleIndicator.Full: {
        const at = take(3, 'global title');
        globalTitle = {
          indicator: GlobalTitleIndicator.Full,
          translationType: contents[at],
          numberingPlan: contents[at + 1] >> 4,
          encodingScheme: contents[at + 1] & 0x0f,
          natureOfAddress: contents[at + 2] & 0x7f,
          addressInformation: contents.slice(pos),
        };
        break;
      }
      default:
        throw new MalformedMessageError(`${field} has reserved global title indicator ${gti}`);
    }

    if (globalTitle === undefined && pos < contents.length) {
      throw new MalformedMessageError(
        `${field} has ${contents.length - pos} unexpected trailing bytes`
      );
    }

    return new PartyAddress({
      pointCode,
      subsystemNumber,
      globalTitle,
      routeOnSsn: hasFlag(indicator, AddressIndicator.RouteOnSsn),
      nationalUse: hasFlag(indicator, AddressIndicator.NationalUse),
    });
  }

  /**
   * Copy of the global title; changing it does not affect this address.
   */
  get globalTitle(): GlobalTitle | undefined {
    return this._globalTitle && copyGlobalTitle(this._globalTitle);
  }

  /**
   * Address indicator octet derived from the present fields.
   */
  get addressIndicator(): number {
    let indicator = 0;
    if (this.pointCode !== undefined) indicator |= AddressIndicator.PointCode;
    if (this.subsystemNumber !== undefined) indicator |= AddressIndicator.SubsystemNumber;
    if (this._globalTitle !== undefined) indicator |= this._globalTitle.indicator << 2;
    if (this.routeOnSsn) indicator |= AddressIndicator.RouteOnSsn;
    if (this.nationalUse) indicator |= AddressIndicator.NationalUse;
    return indicator;
  }

  /**
   * Length of the contents, which is the value of the length octet.
   */
  contentLength(): number {
    let length = 1;
    if (this.pointCode !== undefined) length += 2;
    if (this.subsystemNumber !== undefined) length += 1;
    if (this._globalTitle !== undefined) {
      length +=
        encodeGlobalTitleHeader(this._globalTitle).length +
        this._globalTitle.addressInformation.length;
    }
    return length;
  }

  /**
   * Encoded size including the length octet.
   */
  marshalLength(): number {
    return 1 + this.contentLength();
  }

  /**
   * Writes the parameter, length octet first, at `offset` and returns the byte count.
   * @throws TruncatedBufferError if the parameter does not fit
   * @throws FieldRangeError if a global title field does not fit its bits
   */
  marshalTo(buffer: Uint8Array, offset: number = 0): number {
    if (this._globalTitle !== undefined) {
      validateGlobalTitle(this._globalTitle);
    }

    const length = this.marshalLength();
    if (buffer.length < offset + length) {
      throw new TruncatedBufferError('partyAddress', offset + length, buffer.length);
    }

    let pos = offset;
    buffer[pos++] = length - 1;
    buffer[pos++] = this.addressIndicator;
    if (this.pointCode !== undefined) {
      buffer[pos++] = this.pointCode & 0xff;
      buffer[pos++] = this.pointCode >> 8;
    }
    if (this.subsystemNumber !== undefined) {
      buffer[pos++] = this.subsystemNumber;
    }
    if (this._globalTitle !== undefined) {
      const header = encodeGlobalTitleHeader(this._globalTitle);
      buffer.set(header, pos);
      pos += header.length;
      buffer.set(this._globalTitle.addressInformation, pos);
      pos += this._globalTitle.addressInformation.length;
    }

    return pos - offset;
  }

  toString(): string {
    const parts = [`indicator: ${toHexByte(this.addressIndicator)}`];
    if (this.pointCode !== undefined) parts.push(`pointCode: ${this.pointCode}`);
    if (this.subsystemNumber !== undefined) parts.push(`ssn: ${this.subsystemNumber}`);
    if (this._globalTitle !== undefined) {
      parts.push(
        `gti: ${this._globalTitle.indicator}`,
        `address: ${toHex(this._globalTitle.addressInformation)}`
      );
    }
    return `{${parts.join(', ')}}`;
  }
}
