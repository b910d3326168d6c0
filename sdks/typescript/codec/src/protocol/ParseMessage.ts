/**
 * Message dispatch on the type octet.
 */

import {
  CodecResult,
  TruncatedBufferError,
  UnimplementedMessageTypeError,
  UnknownMessageTypeError,
} from '@sccp-ts/core';
import { DT1 } from './DT1.js';
import type { DecodeOptions } from './Message.js';
import { MessageType, getMessageTypeName, isMessageType } from './MessageType.js';
import { UDT } from './UDT.js';

/**
 * Every message type with an implemented grammar, discriminated by `type`.
 *
 * @example
 * ```typescript
 * const message = parseMessage(bytes);
 * switch (message.type) {
 *   case MessageType.DT1:
 *     handleData(message.destinationLocalRef, message.data);
 *     break;
 *   case MessageType.UDT:
 *     handleUnitdata(message.calledPartyAddress, message.data);
 *     break;
 * }
 * ```
 */
export type SccpMessage = DT1 | UDT;

/**
 * Creates the empty message instance for a type code.
 * @throws UnknownMessageTypeError if the code is not a defined message type
 * @throws UnimplementedMessageTypeError if the type has no grammar yet
 */
export function createMessage(tag: number): SccpMessage {
  if (!isMessageType(tag)) {
    throw new UnknownMessageTypeError(tag);
  }

  switch (tag) {
    case MessageType.DT1:
      return new DT1();
    case MessageType.UDT:
      return new UDT();
    case MessageType.CR:
    case MessageType.CC:
    case MessageType.CREF:
    case MessageType.RLSD:
    case MessageType.RLC:
    case MessageType.DT2:
    case MessageType.AK:
    case MessageType.UDTS:
    case MessageType.ED:
    case MessageType.EA:
    case MessageType.RSR:
    case MessageType.RSC:
    case MessageType.ERR:
    case MessageType.IT:
    case MessageType.XUDT:
    case MessageType.XUDTS:
    case MessageType.LUDT:
    case MessageType.LUDTS:
      throw new UnimplementedMessageTypeError(tag, getMessageTypeName(tag));
    default:
      return assertNever(tag);
  }
}

/**
 * Decodes a complete message buffer into the message its type octet selects.
 * @throws TruncatedBufferError if the buffer is empty or ends before a field
 * @throws UnsupportedTypeError if the type octet has no grammar
 */
export function parseMessage(buffer: Uint8Array, options?: DecodeOptions): SccpMessage {
  if (buffer.length < 1) {
    throw new TruncatedBufferError('message type', 1, 0);
  }

  const message = createMessage(buffer[0]);
  message.unmarshalBinary(buffer, options);
  return message;
}

/**
 * Non-throwing form of {@link parseMessage}.
 */
export function tryParseMessage(
  buffer: Uint8Array,
  options?: DecodeOptions
): CodecResult<SccpMessage> {
  return CodecResult.from(() => parseMessage(buffer, options));
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message type: ${String(value)}`);
}
