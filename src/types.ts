/**
 * Core type definitions for primitives-compat
 *
 * This module defines the width literals shared by both value families and
 * by the conversion layer. Widths are carried as literal types so that a
 * pairing between two types of different width cannot be expressed.
 *
 * @module types
 */

/**
 * Byte lengths of the fixed-size types that exist in both families
 *
 * - 8, 16, 32, 64: generic fixed bytes / hashes
 * - 20: addresses
 * - 256: bloom filters
 */
export type PairedByteLength = 8 | 16 | 20 | 32 | 64 | 256;

/**
 * Byte lengths that exist only in the `primitives` family
 *
 * These have no counterpart type in `ethtypes`, so no conversion is defined.
 */
export type UnpairedByteLength = 4 | 33 | 65;

/**
 * Every fixed byte length known to either family
 */
export type ByteLength = PairedByteLength | UnpairedByteLength;

/**
 * Bit widths of the unsigned integer types
 */
export type UintBits = 64 | 128 | 256 | 512;

/**
 * Byte width of an unsigned integer of `B` bits
 *
 * @example
 * ```typescript
 * type N = UintBytes<256>; // 32
 * ```
 */
export type UintBytes<B extends UintBits> = B extends 64
  ? 8
  : B extends 128
    ? 16
    : B extends 256
      ? 32
      : 64;

/**
 * Input accepted by the integer constructors of both families
 */
export type UintInput = bigint | number;
