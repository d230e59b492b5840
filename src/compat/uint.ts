/**
 * Wide-integer transcoder
 *
 * The two families agree on numeric value but not on API: `primitives`
 * integers export and import little-endian byte arrays (`toLeBytes` /
 * `fromLeBytes`), while `ethtypes` integers write into and read from a
 * caller buffer (`toLittleEndian(out)` / `fromLittleEndian`). Every
 * conversion goes through a little-endian buffer of exactly `bits / 8` bytes.
 *
 * Both sides carry the bit width as a literal type, so only equal widths can
 * be paired and no widening or narrowing can happen.
 */

import type { UintBits, UintBytes } from '../types.js';
import { leBytesToLimbs } from '../encoding/limbs.js';

/** A `primitives` integer */
export interface LeBytesUintSource<B extends UintBits> {
  readonly bitWidth: B;
  toLeBytes(): Uint8Array;
}

/** An `ethtypes` integer */
export interface LittleEndianUintSource<B extends UintBits> {
  readonly bitWidth: B;
  toLittleEndian(out: Uint8Array): void;
}

/** An `ethtypes` integer class */
export interface LittleEndianUintTarget<B extends UintBits, T> {
  readonly BITS: B;
  readonly WORDS: number;
  new (words: BigUint64Array): T;
}

/** A `primitives` integer class */
export interface LeBytesUintTarget<B extends UintBits, T> {
  readonly BITS: B;
  readonly BYTES: UintBytes<B>;
  readonly LIMBS: number;
  new (limbs: BigUint64Array): T;
}

/**
 * Re-encode a `primitives` integer as an `ethtypes` integer of the same width
 */
export function leBytesUintToWords<B extends UintBits, T>(
  source: LeBytesUintSource<B>,
  into: LittleEndianUintTarget<NoInfer<B>, T>
): T {
  return new into(leBytesToLimbs(source.toLeBytes(), into.WORDS));
}

/**
 * Re-encode an `ethtypes` integer as a `primitives` integer of the same width
 */
export function wordsToLeBytesUint<B extends UintBits, T>(
  source: LittleEndianUintSource<B>,
  into: LeBytesUintTarget<NoInfer<B>, T>
): T {
  const buffer = new Uint8Array(into.BYTES);
  source.toLittleEndian(buffer);
  return new into(leBytesToLimbs(buffer, into.LIMBS));
}
