/**
 * Property-based tests for the wire grammars.
 *
 * These cover the invariants every encoding must keep for arbitrary field values:
 * decode(encode(x)) == x, marshalLength agrees with the bytes produced, and every
 * strict prefix of a valid encoding is reported as truncated.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { TruncatedBufferError, UnsupportedTypeError } from '@sccp-ts/core';
import { DT1 } from '../protocol/DT1.js';
import { UDT } from '../protocol/UDT.js';
import { PartyAddress } from '../protocol/PartyAddress.js';
import { createE164GlobalTitle } from '../protocol/GlobalTitle.js';
import { isImplementedMessageType } from '../protocol/MessageType.js';
import { parseMessage } from '../protocol/ParseMessage.js';
import { captureError } from './testUtils.js';

// =============================================================================
// Arbitraries
// =============================================================================

const octetArb = fc.integer({ min: 0, max: 255 });

const dt1Arb = fc
  .record({
    ref: fc.uint8Array({ minLength: 3, maxLength: 3 }),
    flags: octetArb,
    data: fc.uint8Array({ maxLength: 255 }),
  })
  .map(({ ref, flags, data }) => new DT1(ref, flags, data));

const digitsArb = fc
  .array(fc.integer({ min: 0, max: 9 }), { maxLength: 15 })
  .map((digits) => digits.join(''));

const partyAddressArb = fc
  .record({
    pointCode: fc.option(fc.integer({ min: 0, max: 0x3fff }), { nil: undefined }),
    subsystemNumber: fc.option(octetArb, { nil: undefined }),
    digits: fc.option(digitsArb, { nil: undefined }),
    routeOnSsn: fc.boolean(),
    nationalUse: fc.boolean(),
  })
  .map(
    ({ digits, ...fields }) =>
      new PartyAddress({
        ...fields,
        globalTitle: digits === undefined ? undefined : createE164GlobalTitle(digits),
      })
  );

const udtArb = fc
  .record({
    protocolClass: octetArb,
    called: partyAddressArb,
    calling: partyAddressArb,
    data: fc.uint8Array({ maxLength: 255 }),
  })
  .map(({ protocolClass, called, calling, data }) => new UDT(protocolClass, called, calling, data));

// =============================================================================
// DT1
// =============================================================================

describe('DT1 properties', () => {
  it('round trips every field', () => {
    fc.assert(
      fc.property(dt1Arb, (dt1) => {
        const decoded = DT1.parse(dt1.marshalBinary());

        expect(decoded.destinationLocalRef).toEqual(dt1.destinationLocalRef);
        expect(decoded.segmentingReassembling).toBe(dt1.segmentingReassembling);
        expect(decoded.pointer).toBe(1);
        expect(decoded.dataLength).toBe(dt1.dataLength);
        expect(decoded.data).toEqual(dt1.data);
      })
    );
  });

  it('measures exactly the bytes it produces', () => {
    fc.assert(
      fc.property(dt1Arb, (dt1) => {
        expect(dt1.marshalBinary().length).toBe(dt1.marshalLength());
        expect(dt1.marshalLength()).toBe(7 + dt1.data.length);
      })
    );
  });

  it('reports every strict prefix as truncated', () => {
    fc.assert(
      fc.property(dt1Arb, (dt1) => {
        const bytes = dt1.marshalBinary();
        for (let length = 0; length < bytes.length; length++) {
          expect(captureError(() => DT1.parse(bytes.subarray(0, length)))).toBeInstanceOf(
            TruncatedBufferError
          );
        }
      }),
      { numRuns: 50 }
    );
  });

  it('dispatches to the same value as a direct decode', () => {
    fc.assert(
      fc.property(dt1Arb, (dt1) => {
        const bytes = dt1.marshalBinary();

        expect(parseMessage(bytes)).toEqual(DT1.parse(bytes));
      })
    );
  });
});

// =============================================================================
// UDT
// =============================================================================

describe('UDT properties', () => {
  it('round trips every field', () => {
    fc.assert(
      fc.property(udtArb, (udt) => {
        const bytes = udt.marshalBinary();
        const decoded = UDT.parse(bytes, { strictPointers: true });

        expect(bytes.length).toBe(udt.marshalLength());
        expect(decoded.protocolClass).toBe(udt.protocolClass);
        expect(decoded.calledPartyAddress).toEqual(udt.calledPartyAddress);
        expect(decoded.callingPartyAddress).toEqual(udt.callingPartyAddress);
        expect(decoded.data).toEqual(udt.data);
        expect(decoded.pointers).toEqual(udt.pointers);
      })
    );
  });

  it('reports every strict prefix as truncated', () => {
    fc.assert(
      fc.property(udtArb, (udt) => {
        const bytes = udt.marshalBinary();
        for (let length = 0; length < bytes.length; length++) {
          expect(captureError(() => UDT.parse(bytes.subarray(0, length)))).toBeInstanceOf(
            TruncatedBufferError
          );
        }
      }),
      { numRuns: 50 }
    );
  });
});

// =============================================================================
// Dispatch
// =============================================================================

describe('Dispatch properties', () => {
  it('rejects every tag without a grammar with the exact byte', () => {
    fc.assert(
      fc.property(
        octetArb.filter((tag) => !isImplementedMessageType(tag)),
        fc.uint8Array({ maxLength: 32 }),
        (tag, rest) => {
          const error = captureError(() => parseMessage(new Uint8Array([tag, ...rest])));

          expect(error).toBeInstanceOf(UnsupportedTypeError);
          expect(error instanceof UnsupportedTypeError && error.tag).toBe(tag);
        }
      )
    );
  });
});
