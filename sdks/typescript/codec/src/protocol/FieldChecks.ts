import { FieldRangeError } from '@sccp-ts/core';

/** Largest value of a single octet (length octets, pointers, opaque flags). */
export const MAX_OCTET = 0xff;

/**
 * Throws unless `value` is an integer that fits in one octet.
 */
export function assertOctet(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_OCTET) {
    throw new FieldRangeError(field, value, 0, MAX_OCTET);
  }
}

/**
 * Throws unless `bytes` has a length between `min` and `max` inclusive.
 */
export function assertLength(field: string, bytes: Uint8Array, min: number, max: number): void {
  if (bytes.length < min || bytes.length > max) {
    throw new FieldRangeError(field, bytes.length, min, max);
  }
}
