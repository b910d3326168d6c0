/**
 * Unit tests for the called/calling party address parameter.
 */

import { describe, it, expect } from 'vitest';
import { FieldRangeError, MalformedMessageError, TruncatedBufferError, fromHex } from '@sccp-ts/core';
import { AddressIndicator, MAX_POINT_CODE, PartyAddress } from '../protocol/PartyAddress.js';
import {
  GlobalTitleIndicator,
  createE164GlobalTitle,
  encodeBcd,
  getGlobalTitleDigits,
} from '../protocol/GlobalTitle.js';
import { captureError } from './testUtils.js';

function encode(address: PartyAddress): Uint8Array {
  const buffer = new Uint8Array(address.marshalLength());
  address.marshalTo(buffer);
  return buffer;
}

describe('PartyAddress', () => {
  describe('address indicator', () => {
    it('should have the Q.713 bit values', () => {
      expect(AddressIndicator.PointCode).toBe(0x01);
      expect(AddressIndicator.SubsystemNumber).toBe(0x02);
      expect(AddressIndicator.GlobalTitleMask).toBe(0x3c);
      expect(AddressIndicator.RouteOnSsn).toBe(0x40);
      expect(AddressIndicator.NationalUse).toBe(0x80);
    });

    it('should route on SSN by default when an SSN is present', () => {
      expect(new PartyAddress({ subsystemNumber: 6 }).addressIndicator).toBe(0x42);
      expect(new PartyAddress({ pointCode: 1 }).addressIndicator).toBe(0x01);
      expect(
        new PartyAddress({ subsystemNumber: 6, routeOnSsn: false, nationalUse: true })
          .addressIndicator
      ).toBe(0x82);
    });
  });

  describe('encoding', () => {
    it('should write the point code little-endian after the indicator', () => {
      const address = new PartyAddress({ pointCode: 0x0123, subsystemNumber: 8 });

      expect(address.contentLength()).toBe(4);
      expect(encode(address)).toEqual(fromHex('04 43 2301 08'));
    });

    it('should write a full E.164 global title', () => {
      const address = new PartyAddress({
        subsystemNumber: 6,
        routeOnSsn: false,
        globalTitle: createE164GlobalTitle('4412345678'),
      });

      expect(address.addressIndicator).toBe(0x12);
      expect(encode(address)).toEqual(fromHex('0a 12 06 00 12 04 4421436587'));
    });

    it('should write a nature-of-address global title with the odd bit', () => {
      const address = new PartyAddress({
        globalTitle: {
          indicator: GlobalTitleIndicator.NatureOfAddress,
          natureOfAddress: 4,
          oddNumberOfDigits: true,
          addressInformation: encodeBcd('123'),
        },
      });

      expect(encode(address)).toEqual(fromHex('04 04 84 2103'));
    });

    it('should write at an offset and return the byte count', () => {
      const buffer = new Uint8Array(6).fill(0xff);

      const written = new PartyAddress({ subsystemNumber: 7 }).marshalTo(buffer, 2);

      expect(written).toBe(3);
      expect(buffer).toEqual(fromHex('ffff 02 42 07 ff'));
    });

    it('should fail when the buffer is too short', () => {
      expect(() => new PartyAddress({ subsystemNumber: 7 }).marshalTo(new Uint8Array(2))).toThrow(
        TruncatedBufferError
      );
    });
  });

  describe('validation', () => {
    it('should reject point codes beyond 14 bits', () => {
      expect(() => new PartyAddress({ pointCode: MAX_POINT_CODE + 1 })).toThrow(
        'pointCode out of range: 16384 (expected 0-16383)'
      );
    });

    it('should reject global title fields that do not fit', () => {
      expect(
        () =>
          new PartyAddress({
            globalTitle: {
              indicator: GlobalTitleIndicator.Full,
              translationType: 0,
              numberingPlan: 1,
              encodingScheme: 2,
              natureOfAddress: 0x80,
              addressInformation: encodeBcd('12'),
            },
          })
      ).toThrow('natureOfAddress out of range: 128 (expected 0-127)');
      expect(
        () =>
          new PartyAddress({
            globalTitle: {
              indicator: GlobalTitleIndicator.TranslationTypeNumberingPlan,
              translationType: 0,
              numberingPlan: 16,
              encodingScheme: 2,
              addressInformation: encodeBcd('12'),
            },
          })
      ).toThrow('numberingPlan out of range: 16 (expected 0-15)');
      expect(
        () =>
          new PartyAddress({
            globalTitle: {
              indicator: GlobalTitleIndicator.TranslationType,
              translationType: 300,
              addressInformation: encodeBcd('12'),
            },
          })
      ).toThrow('translationType out of range');
    });

    it('should reject contents longer than 255 bytes', () => {
      const error = captureError(
        () =>
          new PartyAddress({
            globalTitle: {
              indicator: GlobalTitleIndicator.TranslationType,
              translationType: 0,
              addressInformation: new Uint8Array(254),
            },
          })
      );
      expect(error).toBeInstanceOf(FieldRangeError);
      if (error instanceof FieldRangeError) {
        expect(error.field).toBe('partyAddressLength');
        expect(error.value).toBe(256);
      }
    });

    it('should copy the global title address bytes', () => {
      const globalTitle = createE164GlobalTitle('1234');
      const address = new PartyAddress({ globalTitle });

      globalTitle.addressInformation[0] = 0xff;

      expect(address.globalTitle?.addressInformation[0]).toBe(0x21);
    });

    it('should not let a returned global title change the encoding', () => {
      const address = new PartyAddress({ globalTitle: createE164GlobalTitle('1234') });

      const globalTitle = address.globalTitle;
      expect(globalTitle).not.toBe(address.globalTitle);
      if (globalTitle !== undefined && 'translationType' in globalTitle) {
        globalTitle.translationType = 0x1ff;
        globalTitle.addressInformation[0] = 0xff;
      }

      expect(address.globalTitle).toEqual(createE164GlobalTitle('1234'));
      expect(encode(address)).toEqual(fromHex('06 10 00 12 04 2143'));
    });
  });

  describe('parse', () => {
    it('should decode point code, SSN and global title', () => {
      const address = PartyAddress.parse(fromHex('0c 13 2301 06 00 12 04 4421436587'));

      expect(address.pointCode).toBe(0x0123);
      expect(address.subsystemNumber).toBe(6);
      expect(address.routeOnSsn).toBe(false);
      expect(address.globalTitle?.indicator).toBe(GlobalTitleIndicator.Full);
      expect(address.globalTitle && getGlobalTitleDigits(address.globalTitle)).toBe(
        '4412345678'
      );
    });

    it('should decode at an offset', () => {
      const address = PartyAddress.parse(fromHex('ffff 02 42 07'), 2);

      expect(address.subsystemNumber).toBe(7);
      expect(address.routeOnSsn).toBe(true);
    });

    it('should decode each global title format', () => {
      const noa = PartyAddress.parse(fromHex('04 04 84 2103')).globalTitle;
      expect(noa).toEqual({
        indicator: GlobalTitleIndicator.NatureOfAddress,
        natureOfAddress: 4,
        oddNumberOfDigits: true,
        addressInformation: new Uint8Array([0x21, 0x03]),
      });

      const tt = PartyAddress.parse(fromHex('03 08 05 21')).globalTitle;
      expect(tt).toEqual({
        indicator: GlobalTitleIndicator.TranslationType,
        translationType: 5,
        addressInformation: new Uint8Array([0x21]),
      });

      const ttnp = PartyAddress.parse(fromHex('04 0c 00 12 21')).globalTitle;
      expect(ttnp).toEqual({
        indicator: GlobalTitleIndicator.TranslationTypeNumberingPlan,
        translationType: 0,
        numberingPlan: 1,
        encodingScheme: 2,
        addressInformation: new Uint8Array([0x21]),
      });
    });

    it('should ignore the spare bits of the point code', () => {
      expect(PartyAddress.parse(fromHex('03 01 ffff')).pointCode).toBe(MAX_POINT_CODE);
    });

    it('should fail when the declared length exceeds the buffer', () => {
      const error = captureError(() => PartyAddress.parse(fromHex('05 42 06'), 0, 'called'));
      expect(error).toBeInstanceOf(TruncatedBufferError);
      if (error instanceof TruncatedBufferError) {
        expect(error.field).toBe('called');
        expect(error.required).toBe(6);
        expect(error.available).toBe(3);
      }
    });

    it('should fail when the length octet is missing', () => {
      expect(() => PartyAddress.parse(new Uint8Array(), 0)).toThrow(
        'Buffer too short for partyAddress length: need 1 bytes, have 0'
      );
    });

    it('should reject malformed contents', () => {
      expect(() => PartyAddress.parse(fromHex('00'))).toThrow(
        'partyAddress has no address indicator'
      );
      expect(() => PartyAddress.parse(fromHex('02 01 05'))).toThrow(
        'partyAddress point code overruns its declared length'
      );
      expect(() => PartyAddress.parse(fromHex('02 00 07'))).toThrow(
        'partyAddress has 1 unexpected trailing bytes'
      );
      expect(() => PartyAddress.parse(fromHex('01 14'))).toThrow(
        'partyAddress has reserved global title indicator 5'
      );
      expect(() => PartyAddress.parse(fromHex('01 14'))).toThrow(MalformedMessageError);
    });
  });
});
