/**
 * Fixed-size transcoder
 *
 * Both families store fixed-size values as the same raw byte sequence in the
 * same order, so conversion is a relabelling: the bytes are copied into a
 * value of the other family, unchanged. The length `N` is a literal type on
 * both the source value and the destination class; a pairing of two
 * different lengths does not type-check.
 */

import type { PairedByteLength } from '../types.js';

/** A `primitives` fixed-size value */
export interface FixedBytesSource<N extends PairedByteLength> {
  readonly size: N;
  toBytes(): Uint8Array;
}

/** An `ethtypes` fixed-size value */
export interface FixedHashSource<N extends PairedByteLength> {
  readonly size: N;
  asBytes(): Uint8Array;
}

/** An `ethtypes` hash class */
export interface FixedHashTarget<N extends PairedByteLength, T> {
  readonly LEN: N;
  new (bytes: Uint8Array): T;
}

/** A `primitives` fixed bytes class */
export interface FixedBytesTarget<N extends PairedByteLength, T> {
  readonly BYTES: N;
  new (bytes: Uint8Array): T;
}

/**
 * Transcode a `primitives` fixed-size value into an `ethtypes` hash
 *
 * The destination constructor checks the length and copies, so the result
 * never shares storage with the source.
 */
export function fixedBytesToHash<N extends PairedByteLength, T>(
  source: FixedBytesSource<N>,
  into: FixedHashTarget<NoInfer<N>, T>
): T {
  return new into(source.toBytes());
}

/**
 * Transcode an `ethtypes` hash into a `primitives` fixed-size value
 */
export function hashToFixedBytes<N extends PairedByteLength, T>(
  source: FixedHashSource<N>,
  into: FixedBytesTarget<NoInfer<N>, T>
): T {
  return new into(source.asBytes());
}
