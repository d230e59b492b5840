/**
 * Hex text encoding shared by both value families
 */

import { invalidHexError } from '../errors.js';

const HEX_DIGITS = /^[0-9a-fA-F]*$/;

/**
 * Remove a leading '0x' / '0X' if present
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
}

/**
 * Encode bytes as lowercase hex
 *
 * @param bytes - The bytes to encode
 * @param prefix - Whether to include '0x' prefix
 */
export function bytesToHex(bytes: Uint8Array, prefix: boolean = true): string {
  let hex = '';
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return prefix ? '0x' + hex : hex;
}

/**
 * Decode hex text (with or without '0x' prefix) into bytes
 *
 * @param hex - The hex text
 * @param expectedLength - If given, the exact number of bytes required
 * @throws CompatError with INVALID_HEX for odd length, non-hex digits or a length mismatch
 */
export function hexToBytes(hex: string, expectedLength?: number): Uint8Array {
  const body = stripHexPrefix(hex);
  if (body.length % 2 !== 0) {
    throw invalidHexError(hex, 'odd number of digits');
  }
  if (!HEX_DIGITS.test(body)) {
    throw invalidHexError(hex, 'non-hex character');
  }
  const length = body.length / 2;
  if (expectedLength !== undefined && length !== expectedLength) {
    throw invalidHexError(hex, `expected ${expectedLength} bytes, got ${length}`);
  }

  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = parseInt(body.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Render an unsigned value as minimal lowercase hex with '0x' prefix ("0x0" for zero)
 */
export function bigintToMinimalHex(value: bigint): string {
  return '0x' + value.toString(16);
}
