/**
 * Error code carried by every codec failure.
 */
export type CodecErrorCode =
  | 'TRUNCATED_BUFFER'
  | 'UNSUPPORTED_TYPE'
  | 'INVALID_FIELD'
  | 'MALFORMED_MESSAGE';

/**
 * Base error class for the SCCP codec.
 *
 * All encode and decode operations throw errors that extend this class.
 * Check the `code` field for the specific failure.
 */
export class CodecError extends Error {
  /** Error code for programmatic handling */
  declare readonly code: CodecErrorCode;

  constructor(message: string, code: CodecErrorCode) {
    super(message);
    this.name = 'CodecError';
    this.code = code;
    Object.setPrototypeOf(this, CodecError.prototype);
  }
}

/**
 * The buffer holds fewer bytes than the grammar needs for the next field.
 * Raised by both directions: a short source on decode, a short destination on encode.
 */
export class TruncatedBufferError extends CodecError {
  declare readonly code: 'TRUNCATED_BUFFER';

  /** Field that could not be read or written */
  readonly field: string;

  /** Bytes required up to and including the field */
  readonly required: number;

  /** Bytes actually available */
  readonly available: number;

  constructor(field: string, required: number, available: number) {
    super(
      `Buffer too short for ${field}: need ${required} bytes, have ${available}`,
      'TRUNCATED_BUFFER'
    );
    this.name = 'TruncatedBufferError';
    this.field = field;
    this.required = required;
    this.available = available;
    Object.setPrototypeOf(this, TruncatedBufferError.prototype);
  }
}

/**
 * Dispatch met a tag byte with no grammar behind it.
 * See {@link UnknownMessageTypeError} and {@link UnimplementedMessageTypeError}.
 */
export class UnsupportedTypeError extends CodecError {
  declare readonly code: 'UNSUPPORTED_TYPE';

  /** Raw tag byte as read from the wire */
  readonly tag: number;

  constructor(message: string, tag: number) {
    super(message, 'UNSUPPORTED_TYPE');
    this.name = 'UnsupportedTypeError';
    this.tag = tag;
    Object.setPrototypeOf(this, UnsupportedTypeError.prototype);
  }
}

/**
 * The tag is not a defined message type (protocol violation by the peer).
 */
export class UnknownMessageTypeError extends UnsupportedTypeError {
  constructor(tag: number) {
    super(`Unknown message type: 0x${tag.toString(16).padStart(2, '0')}`, tag);
    this.name = 'UnknownMessageTypeError';
    Object.setPrototypeOf(this, UnknownMessageTypeError.prototype);
  }
}

/**
 * The tag names a defined message type whose grammar is not implemented.
 */
export class UnimplementedMessageTypeError extends UnsupportedTypeError {
  /** Display name of the message type */
  readonly typeName: string;

  constructor(tag: number, typeName: string) {
    super(
      `Message type ${typeName} (0x${tag.toString(16).padStart(2, '0')}) is not implemented`,
      tag
    );
    this.name = 'UnimplementedMessageTypeError';
    this.typeName = typeName;
    Object.setPrototypeOf(this, UnimplementedMessageTypeError.prototype);
  }
}

/**
 * A field value cannot be represented on the wire.
 */
export class FieldRangeError extends CodecError {
  declare readonly code: 'INVALID_FIELD';

  readonly field: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;

  constructor(field: string, value: number, min: number, max: number) {
    super(`${field} out of range: ${value} (expected ${min}-${max})`, 'INVALID_FIELD');
    this.name = 'FieldRangeError';
    this.field = field;
    this.value = value;
    this.min = min;
    this.max = max;
    Object.setPrototypeOf(this, FieldRangeError.prototype);
  }
}

/**
 * The bytes are all present but do not form a valid message.
 */
export class MalformedMessageError extends CodecError {
  declare readonly code: 'MALFORMED_MESSAGE';

  constructor(message: string) {
    super(message, 'MALFORMED_MESSAGE');
    this.name = 'MalformedMessageError';
    Object.setPrototypeOf(this, MalformedMessageError.prototype);
  }
}

/**
 * Type guard for codec errors.
 */
export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError;
}
