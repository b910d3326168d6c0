/**
 * MessageCodec - configurable entry point for transport adapters.
 *
 * Wraps dispatch and marshalling with decode options, optional debug logging
 * and per-instance counters.
 */

import { CodecResult, toHex } from '@sccp-ts/core';
import type { Message } from './protocol/Message.js';
import { parseMessage, type SccpMessage } from './protocol/ParseMessage.js';

/**
 * Logging sink. `console` satisfies it.
 */
export type CodecLogger = Pick<Console, 'debug' | 'warn'>;

export interface MessageCodecOptions {
  /** Reject non-canonical pointers on decode. Default: false */
  strictPointers?: boolean;
  /** Log a summary line for every message. Default: false */
  debug?: boolean;
  /** Default: console */
  logger?: CodecLogger;
}

export interface CodecStats {
  decoded: number;
  encoded: number;
  failed: number;
}

export class MessageCodec {
  private readonly strictPointers: boolean;
  private readonly debug: boolean;
  private readonly logger: CodecLogger;

  private stats: CodecStats = {
    decoded: 0,
    encoded: 0,
    failed: 0,
  };

  constructor(options: MessageCodecOptions = {}) {
    this.strictPointers = options.strictPointers ?? false;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? console;
  }

  /**
   * Decode a complete message buffer.
   * @throws CodecError subclasses as {@link parseMessage} does
   */
  decode(buffer: Uint8Array): SccpMessage {
    try {
      const message = parseMessage(buffer, { strictPointers: this.strictPointers });
      this.stats.decoded++;
      if (this.debug) {
        this.logger.debug(`[sccp] decoded ${message.toString()}`);
      }
      return message;
    } catch (error) {
      this.stats.failed++;
      throw error;
    }
  }

  /**
   * Decode without throwing codec errors. Failures are logged as warnings.
   */
  tryDecode(buffer: Uint8Array): CodecResult<SccpMessage> {
    const result = CodecResult.from(() => this.decode(buffer));
    if (result.error) {
      this.logger.warn(
        `[sccp] dropping undecodable message (${buffer.length} bytes): ${result.error.message}`
      );
    }
    return result;
  }

  /**
   * Encode a message into a new buffer.
   */
  encode(message: Message): Uint8Array {
    const buffer = new Uint8Array(message.marshalLength());
    this.encodeInto(message, buffer);
    return buffer;
  }

  /**
   * Encode a message into `buffer` and return the bytes written.
   * @throws TruncatedBufferError if the buffer is too short; nothing is written
   */
  encodeInto(message: Message, buffer: Uint8Array): number {
    try {
      const written = message.marshalTo(buffer);
      this.stats.encoded++;
      if (this.debug) {
        this.logger.debug(
          `[sccp] encoded ${message.messageTypeName()}: ${toHex(buffer.subarray(0, written))}`
        );
      }
      return written;
    } catch (error) {
      this.stats.failed++;
      throw error;
    }
  }

  /**
   * Snapshot of the counters.
   */
  getStats(): CodecStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = { decoded: 0, encoded: 0, failed: 0 };
  }
}
