import { CodecError } from './CodecError.js';

/**
 * Represents the outcome of a codec operation, containing either a value or the error
 * that stopped it.
 * @typeParam T - The value type on success.
 */
export class CodecResult<T> {
  /**
   * Whether the operation succeeded.
   */
  readonly isSuccess: boolean;

  /**
   * The produced value. Only set when isSuccess is true.
   */
  readonly value?: T;

  /**
   * The failure. Only set when isSuccess is false.
   */
  readonly error?: CodecError;

  private constructor(isSuccess: boolean, value?: T, error?: CodecError) {
    this.isSuccess = isSuccess;
    this.value = value;
    this.error = error;
  }

  /**
   * Creates a successful result.
   */
  static success<T>(value: T): CodecResult<T> {
    return new CodecResult<T>(true, value, undefined);
  }

  /**
   * Creates a failed result.
   */
  static failure<T>(error: CodecError): CodecResult<T> {
    return new CodecResult<T>(false, undefined, error);
  }

  /**
   * Runs an operation, capturing codec errors as a failed result.
   * Anything that is not a {@link CodecError} is rethrown.
   */
  static from<T>(operation: () => T): CodecResult<T> {
    try {
      return CodecResult.success(operation());
    } catch (error) {
      if (error instanceof CodecError) {
        return CodecResult.failure<T>(error);
      }
      throw error;
    }
  }

  /**
   * Gets the value if successful, or throws the captured error.
   */
  getValueOrThrow(): T {
    if (this.isSuccess && this.value !== undefined) {
      return this.value;
    }
    throw this.error ?? new Error('Codec operation failed');
  }
}
