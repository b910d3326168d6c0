/**
 * SCCP message type codes (ITU-T Q.713 table 1).
 * The code is the first octet of every message and selects its wire grammar.
 */
export const MessageType = {
  /** Connection request */
  CR: 0x01,

  /** Connection confirm */
  CC: 0x02,

  /** Connection refused */
  CREF: 0x03,

  /** Released */
  RLSD: 0x04,

  /** Release complete */
  RLC: 0x05,

  /** Data form 1 */
  DT1: 0x06,

  /** Data form 2 */
  DT2: 0x07,

  /** Data acknowledgement */
  AK: 0x08,

  /** Unitdata */
  UDT: 0x09,

  /** Unitdata service */
  UDTS: 0x0a,

  /** Expedited data */
  ED: 0x0b,

  /** Expedited data acknowledgement */
  EA: 0x0c,

  /** Reset request */
  RSR: 0x0d,

  /** Reset confirmation */
  RSC: 0x0e,

  /** Protocol data unit error */
  ERR: 0x0f,

  /** Inactivity test */
  IT: 0x10,

  /** Extended unitdata */
  XUDT: 0x11,

  /** Extended unitdata service */
  XUDTS: 0x12,

  /** Long unitdata */
  LUDT: 0x13,

  /** Long unitdata service */
  LUDTS: 0x14,
} as const;

export type MessageTypeName = keyof typeof MessageType;

export type MessageTypeCode = (typeof MessageType)[MessageTypeName];

const messageTypeCodes: readonly number[] = Object.values(MessageType);

/**
 * Check if a byte is a defined message type code.
 */
export function isMessageType(code: number): code is MessageTypeCode {
  return messageTypeCodes.includes(code);
}

/**
 * Gets the display name for a message type code, or 'Unknown' for undefined codes.
 */
export function getMessageTypeName(code: number): string {
  const entries = Object.entries(MessageType);
  for (const [name, value] of entries) {
    if (value === code) {
      return name;
    }
  }
  return 'Unknown';
}

/**
 * Check if a message type has a decoder.
 */
export function isImplementedMessageType(code: number): boolean {
  return code === MessageType.DT1 || code === MessageType.UDT;
}
