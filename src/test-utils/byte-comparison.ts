/**
 * Byte and integer comparison utilities for testing
 */

import { expect } from 'vitest';

/**
 * Check if two byte arrays hold the same bytes in the same order
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * Assert that two byte arrays hold the same bytes in the same order
 */
export function assertBytesEqual(actual: Uint8Array, expected: Uint8Array): void {
  expect(Array.from(actual)).toEqual(Array.from(expected));
}

/**
 * Build a byte array of `length` bytes from a repeating ASCII pattern
 */
export function repeatAscii(pattern: string, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = pattern.charCodeAt(i % pattern.length);
  }
  return bytes;
}

/**
 * Little-endian bytes of `value`, exactly `length` bytes long, computed
 * independently of the library's limb packing
 */
export function referenceLeBytes(value: bigint, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let v = value;
  for (let i = 0; i < length; i++) {
    bytes[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return bytes;
}
