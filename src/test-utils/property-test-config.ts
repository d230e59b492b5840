/**
 * Property-based testing configuration and utilities
 *
 * Configuration and arbitraries shared by the fast-check property tests.
 */

import * as fc from 'fast-check';
import type { PairedByteLength, UintBits } from '../types.js';

/**
 * Standard configuration for property-based tests
 * - Minimum 100 iterations per property test
 * - Seed logging for reproducibility
 * - Shrinking enabled for minimal failing examples
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for fast property tests (used during development)
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 10,
  verbose: false,
  seed: Date.now(),
};

/**
 * Every byte length that has a pairing, generic and domain-specific
 */
export const PAIRED_BYTE_LENGTHS: readonly PairedByteLength[] = [8, 16, 20, 32, 64, 256];

/**
 * Every integer bit width
 */
export const UINT_BITS: readonly UintBits[] = [64, 128, 256, 512];

/**
 * Largest value of an unsigned integer of `bits` bits
 */
export function maxUint(bits: UintBits): bigint {
  return (1n << BigInt(bits)) - 1n;
}

/**
 * Arbitrary generator for byte arrays of exactly `length` bytes
 */
export function arbitraryBytesOfLength(length: number): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ minLength: length, maxLength: length });
}

/**
 * Arbitrary generator for paired byte lengths
 */
export function arbitraryPairedByteLength(): fc.Arbitrary<PairedByteLength> {
  return fc.constantFrom(...PAIRED_BYTE_LENGTHS);
}

/**
 * Arbitrary generator for integer bit widths
 */
export function arbitraryUintBits(): fc.Arbitrary<UintBits> {
  return fc.constantFrom(...UINT_BITS);
}

/**
 * Arbitrary generator for values in [0, 2^bits)
 *
 * Boundary values (0, 1, max, max - 1) are mixed in so that every run
 * exercises the edges of the width.
 */
export function arbitraryUintValue(bits: UintBits): fc.Arbitrary<bigint> {
  const max = maxUint(bits);
  return fc.oneof(
    fc.constantFrom(0n, 1n, max, max - 1n),
    fc.bigInt({ min: 0n, max })
  );
}

/**
 * Arbitrary generator for (width, value) pairs across every width
 */
export function arbitrarySizedUint(): fc.Arbitrary<{ bits: UintBits; value: bigint }> {
  return arbitraryUintBits().chain((bits) =>
    arbitraryUintValue(bits).map((value) => ({ bits, value }))
  );
}
