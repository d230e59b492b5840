/**
 * Input validation shared by the value constructors of both families
 *
 * Byte lengths are structural and always checked. The integer range check
 * follows the `validateInputs` setting.
 */

import type { UintInput } from './types.js';
import { getConfig } from './config.js';
import { invalidByteLengthError, valueOutOfRangeError } from './errors.js';

/**
 * Check that `bytes` holds exactly `expected` bytes
 *
 * @throws CompatError with INVALID_BYTE_LENGTH
 */
export function assertByteLength(typeName: string, bytes: Uint8Array, expected: number): void {
  if (bytes.length !== expected) {
    throw invalidByteLengthError(typeName, expected, bytes.length);
  }
}

/**
 * Check that `bytes` holds at most `max` bytes
 *
 * @throws CompatError with INVALID_BYTE_LENGTH
 */
export function assertMaxByteLength(typeName: string, bytes: Uint8Array, max: number): void {
  if (bytes.length > max) {
    throw invalidByteLengthError(typeName, max, bytes.length);
  }
}

/**
 * Check that `byte` is an integer in [0, 255]
 *
 * @throws CompatError with VALUE_OUT_OF_RANGE
 */
export function assertByteValue(typeName: string, byte: number): void {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw valueOutOfRangeError(typeName, String(byte), 8);
  }
}

/**
 * Normalise an integer input to a bigint in [0, 2^bits)
 *
 * Out-of-range values throw while input validation is on and wrap modulo
 * 2^bits when it is off. Numbers that are not safe integers always throw.
 *
 * @throws CompatError with VALUE_OUT_OF_RANGE
 */
export function toUintValue(typeName: string, value: UintInput, bits: number): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw valueOutOfRangeError(typeName, String(value), bits);
  }
  const big = BigInt(value);
  if (big >= 0n && big < 1n << BigInt(bits)) {
    return big;
  }
  if (getConfig().validateInputs) {
    throw valueOutOfRangeError(typeName, big.toString(), bits);
  }
  return BigInt.asUintN(bits, big);
}
