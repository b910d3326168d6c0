/**
 * Global title part of an SCCP party address (ITU-T Q.713 3.4.2.3).
 */

import { FieldRangeError } from '@sccp-ts/core';
import { assertOctet } from './FieldChecks.js';

/**
 * Global title indicator values (bits 3-6 of the address indicator).
 * Values 5-15 are spare or reserved.
 */
export const GlobalTitleIndicator = {
  None: 0,
  /** Nature of address indicator only */
  NatureOfAddress: 1,
  /** Translation type only */
  TranslationType: 2,
  /** Translation type, numbering plan and encoding scheme */
  TranslationTypeNumberingPlan: 3,
  /** Translation type, numbering plan, encoding scheme and nature of address */
  Full: 4,
} as const;

export const NumberingPlan = {
  Unknown: 0,
  IsdnTelephony: 1,
  Generic: 2,
  Data: 3,
  Telex: 4,
  MaritimeMobile: 5,
  LandMobile: 6,
  IsdnMobile: 7,
} as const;

export const EncodingScheme = {
  Unknown: 0,
  BcdOdd: 1,
  BcdEven: 2,
  National: 3,
} as const;

export const NatureOfAddress = {
  Unknown: 0,
  SubscriberNumber: 1,
  NationalSignificantNumber: 3,
  InternationalNumber: 4,
} as const;

export type GlobalTitle =
  | {
      indicator: typeof GlobalTitleIndicator.NatureOfAddress;
      natureOfAddress: number;
      oddNumberOfDigits: boolean;
      addressInformation: Uint8Array;
    }
  | {
      indicator: typeof GlobalTitleIndicator.TranslationType;
      translationType: number;
      addressInformation: Uint8Array;
    }
  | {
      indicator: typeof GlobalTitleIndicator.TranslationTypeNumberingPlan;
      translationType: number;
      numberingPlan: number;
      encodingScheme: number;
      addressInformation: Uint8Array;
    }
  | {
      indicator: typeof GlobalTitleIndicator.Full;
      translationType: number;
      numberingPlan: number;
      encodingScheme: number;
      natureOfAddress: number;
      addressInformation: Uint8Array;
    };

/**
 * Encodes the octets that precede the address information.
 */
export function encodeGlobalTitleHeader(globalTitle: GlobalTitle): number[] {
  switch (globalTitle.indicator) {
    case GlobalTitleIndicator.NatureOfAddress:
      return [(globalTitle.oddNumberOfDigits ? 0x80 : 0) | globalTitle.natureOfAddress];
    case GlobalTitleIndicator.TranslationType:
      return [globalTitle.translationType];
    case GlobalTitleIndicator.TranslationTypeNumberingPlan:
      return [
        globalTitle.translationType,
        (globalTitle.numberingPlan << 4) | globalTitle.encodingScheme,
      ];
    case GlobalTitleIndicator.Full:
      return [
        globalTitle.translationType,
        (globalTitle.numberingPlan << 4) | globalTitle.encodingScheme,
        globalTitle.natureOfAddress,
      ];
  }
}

/**
 * Throws if any global title field does not fit its bits.
 */
export function validateGlobalTitle(globalTitle: GlobalTitle): void {
  if ('translationType' in globalTitle) {
    assertOctet('translationType', globalTitle.translationType);
  }
  if ('numberingPlan' in globalTitle) {
    assertNibble('numberingPlan', globalTitle.numberingPlan);
    assertNibble('encodingScheme', globalTitle.encodingScheme);
  }
  if ('natureOfAddress' in globalTitle) {
    assertBits('natureOfAddress', globalTitle.natureOfAddress, 0x7f);
  }
}

/**
 * Copies a global title so the caller's address bytes are not shared.
 */
export function copyGlobalTitle(globalTitle: GlobalTitle): GlobalTitle {
  return { ...globalTitle, addressInformation: globalTitle.addressInformation.slice() };
}

/**
 * Encodes a digit string as packed BCD, first digit in the low nibble.
 * An odd digit count leaves a zero filler in the last high nibble.
 * Besides 0-9, the hex digits a-f are packed as nibbles 10-15 so that
 * the special codes (e.g. 0xb, 0xc, 0xf filler) can be written.
 * @throws Error if a character is not a hex digit
 */
export function encodeBcd(digits: string): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(digits.length / 2));
  for (let i = 0; i < digits.length; i++) {
    const nibble = parseInt(digits[i], 16);
    if (Number.isNaN(nibble)) {
      throw new Error(`Invalid BCD digit '${digits[i]}' in ${digits}`);
    }
    bytes[i >> 1] |= i % 2 === 0 ? nibble : nibble << 4;
  }
  return bytes;
}

/**
 * Decodes packed BCD into a digit string, dropping the filler when `odd` is set.
 */
export function decodeBcd(bytes: Uint8Array, odd: boolean): string {
  let digits = '';
  for (const b of bytes) {
    digits += (b & 0x0f).toString(16);
    digits += (b >> 4).toString(16);
  }
  return odd && digits.length > 0 ? digits.slice(0, -1) : digits;
}

/**
 * Creates an indicator 4 global title carrying an international E.164 number.
 */
export function createE164GlobalTitle(digits: string, translationType: number = 0): GlobalTitle {
  return {
    indicator: GlobalTitleIndicator.Full,
    translationType,
    numberingPlan: NumberingPlan.IsdnTelephony,
    encodingScheme: digits.length % 2 === 1 ? EncodingScheme.BcdOdd : EncodingScheme.BcdEven,
    natureOfAddress: NatureOfAddress.InternationalNumber,
    addressInformation: encodeBcd(digits),
  };
}

/**
 * Gets the address digits when the global title states its BCD parity, else undefined.
 */
export function getGlobalTitleDigits(globalTitle: GlobalTitle): string | undefined {
  switch (globalTitle.indicator) {
    case GlobalTitleIndicator.NatureOfAddress:
      return decodeBcd(globalTitle.addressInformation, globalTitle.oddNumberOfDigits);
    case GlobalTitleIndicator.TranslationType:
      return undefined;
    case GlobalTitleIndicator.TranslationTypeNumberingPlan:
    case GlobalTitleIndicator.Full:
      if (globalTitle.encodingScheme === EncodingScheme.BcdOdd) {
        return decodeBcd(globalTitle.addressInformation, true);
      }
      if (globalTitle.encodingScheme === EncodingScheme.BcdEven) {
        return decodeBcd(globalTitle.addressInformation, false);
      }
      return undefined;
  }
}

function assertNibble(field: string, value: number): void {
  assertBits(field, value, 0x0f);
}

function assertBits(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new FieldRangeError(field, value, 0, max);
  }
}
