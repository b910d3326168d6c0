/**
 * Bit flags carried in single octets of SCCP messages.
 * The codec treats these octets as opaque; the helpers here are for callers.
 *
 * @example
 * ```typescript
 * const protocolClass = ProtocolClass.Class0 | ProtocolClass.ReturnOnError;
 * ```
 */

/**
 * Segmenting/reassembling octet of DT1 (Q.713 3.7).
 */
export const SegmentingReassembling = {
  /** Last (or only) segment of the data */
  None: 0x00,

  /** More data follows in a subsequent DT1. Bits 2-8 are spare. */
  MoreData: 0x01,
} as const;

export type SegmentingReassemblingType =
  (typeof SegmentingReassembling)[keyof typeof SegmentingReassembling];

/**
 * Protocol class octet of connectionless messages (Q.713 3.6).
 * Bits 1-4 hold the class, bits 5-8 the message handling option.
 */
export const ProtocolClass = {
  /** Basic connectionless class */
  Class0: 0x00,

  /** In-sequence delivery connectionless class */
  Class1: 0x01,

  /** Basic connection-oriented class */
  Class2: 0x02,

  /** Flow control connection-oriented class */
  Class3: 0x03,

  /**
   * Return message on error. Only meaningful for classes 0 and 1.
   */
  ReturnOnError: 0x80,
} as const;

export type ProtocolClassType = (typeof ProtocolClass)[keyof typeof ProtocolClass];

/**
 * Check if a flags byte has a specific flag set.
 */
export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) === flag;
}

/**
 * Check if a DT1 segmenting/reassembling octet announces more data.
 */
export function hasMoreData(segmentingReassembling: number): boolean {
  return hasFlag(segmentingReassembling, SegmentingReassembling.MoreData);
}

/**
 * Gets the class number (0-3) from a protocol class octet.
 */
export function getProtocolClassNumber(protocolClass: number): number {
  return protocolClass & 0x0f;
}

/**
 * Check if a protocol class octet requests return on error.
 */
export function isReturnOnError(protocolClass: number): boolean {
  return hasFlag(protocolClass, ProtocolClass.ReturnOnError);
}
