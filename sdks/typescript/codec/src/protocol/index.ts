/**
 * Protocol layer for SCCP message encoding.
 *
 * - MessageType: Message type codes and name lookup
 * - MessageFlags: Segmenting/reassembling and protocol class octets
 * - Message: Capability contract shared by all message grammars
 * - DT1 / UDT: Implemented message grammars
 * - PartyAddress / GlobalTitle: Address parameters carried by UDT
 * - ParseMessage: Dispatch on the type octet
 */

export {
  MessageType,
  type MessageTypeName,
  type MessageTypeCode,
  isMessageType,
  getMessageTypeName,
  isImplementedMessageType,
} from './MessageType.js';

export {
  SegmentingReassembling,
  type SegmentingReassemblingType,
  ProtocolClass,
  type ProtocolClassType,
  hasFlag,
  hasMoreData,
  getProtocolClassNumber,
  isReturnOnError,
} from './MessageFlags.js';

export type { Message, DecodeOptions } from './Message.js';

export { DT1, DT1_MIN_LENGTH, LOCAL_REFERENCE_LENGTH } from './DT1.js';

export { UDT, UDT_HEADER_LENGTH } from './UDT.js';

export {
  PartyAddress,
  type PartyAddressFields,
  AddressIndicator,
  MAX_POINT_CODE,
} from './PartyAddress.js';

export {
  type GlobalTitle,
  GlobalTitleIndicator,
  NumberingPlan,
  EncodingScheme,
  NatureOfAddress,
  encodeBcd,
  decodeBcd,
  createE164GlobalTitle,
  getGlobalTitleDigits,
} from './GlobalTitle.js';

export {
  type SccpMessage,
  createMessage,
  parseMessage,
  tryParseMessage,
} from './ParseMessage.js';
