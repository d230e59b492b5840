/**
 * Error handling for primitives-compat
 *
 * Conversions between the two value families never fail at runtime: an
 * unsupported pairing is rejected by the type checker. The errors below are
 * raised only by the value constructors (byte slices, hex text, integers) and
 * by the configuration layer.
 */

/**
 * Error codes for value construction and configuration
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  /** Byte input does not have the exact length the type requires */
  INVALID_BYTE_LENGTH = 'INVALID_BYTE_LENGTH',
  /** Hex text is malformed or has the wrong number of digits */
  INVALID_HEX = 'INVALID_HEX',
  /** Mixed-case address text does not carry a valid checksum */
  INVALID_CHECKSUM = 'INVALID_CHECKSUM',
  /** Integer input is negative, fractional or wider than the type */
  VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for primitives-compat errors
 *
 * @example
 * ```typescript
 * try {
 *   B256.fromHex(userInput);
 * } catch (error) {
 *   if (isCompatError(error) && error.code === ErrorCode.INVALID_HEX) {
 *     console.error('Bad hash:', error.details);
 *   }
 * }
 * ```
 */
export class CompatError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompatError';
    Object.setPrototypeOf(this, CompatError.prototype);
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a CompatError
 */
export function isCompatError(error: unknown): error is CompatError {
  return error instanceof CompatError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for byte input of the wrong length
 *
 * @param typeName - Name of the type being constructed
 * @param expected - Required byte length (or maximum, for zero-extending imports)
 * @param actual - Length that was supplied
 */
export function invalidByteLengthError(
  typeName: string,
  expected: number,
  actual: number
): CompatError {
  return new CompatError(
    `${typeName} requires ${expected} bytes, got ${actual}`,
    ErrorCode.INVALID_BYTE_LENGTH,
    { typeName, expected, actual }
  );
}

/**
 * Create an error for malformed hex text
 *
 * @param input - The offending text
 * @param reason - What is wrong with it
 */
export function invalidHexError(input: string, reason: string): CompatError {
  return new CompatError(`Invalid hex string: ${reason}`, ErrorCode.INVALID_HEX, {
    input,
    reason,
  });
}

/**
 * Create an error for an address whose mixed-case checksum does not verify
 *
 * @param input - The address text as given
 * @param expected - The correctly checksummed rendering
 */
export function invalidChecksumError(input: string, expected: string): CompatError {
  return new CompatError('Address checksum mismatch', ErrorCode.INVALID_CHECKSUM, {
    input,
    expected,
  });
}

/**
 * Create an error for an integer that does not fit an unsigned type
 *
 * @param typeName - Name of the integer type
 * @param value - The rejected value as string
 * @param bits - Bit width of the type
 */
export function valueOutOfRangeError(typeName: string, value: string, bits: number): CompatError {
  return new CompatError(
    `${typeName} value out of range [0, 2^${bits})`,
    ErrorCode.VALUE_OUT_OF_RANGE,
    { typeName, value, bits }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional list of valid values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown[]
): CompatError {
  const details: Record<string, unknown> = { option, value };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new CompatError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}
