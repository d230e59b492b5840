/**
 * Unsigned integers backed by 64-bit words
 *
 * A value of `BITS` bits is `BITS / 64` words in little-endian word order.
 * Byte import accepts up to `BYTES` bytes and zero-extends shorter input;
 * byte export writes into a caller buffer of exactly `BYTES` bytes.
 */

import type { UintBits, UintInput } from '../types.js';
import { invalidByteLengthError } from '../errors.js';
import { assertByteLength, assertMaxByteLength, toUintValue } from '../validation.js';
import { bigintToMinimalHex } from '../encoding/hex.js';
import {
  bigintToLimbs,
  bitLength,
  leBytesToLimbs,
  limbsAreZero,
  limbsEqual,
  limbsToBigint,
  limbsToLeBytes,
  reverseBytes,
} from '../encoding/limbs.js';
import { COMPAT, type Compat } from '../compat/sealed.js';
import { wordsToLeBytesUint } from '../compat/uint.js';
import {
  U64 as PrimitivesU64,
  U128 as PrimitivesU128,
  U256 as PrimitivesU256,
  U512 as PrimitivesU512,
} from '../primitives/uint.js';

const MAX_WORD = (1n << 64n) - 1n;

/**
 * Constructor shape shared by every concrete word-backed integer class
 */
export interface WordUintClass<T> {
  readonly BITS: UintBits;
  readonly BYTES: number;
  readonly WORDS: number;
  new (words: BigUint64Array): T;
}

export abstract class WordUint<B extends UintBits> {
  readonly #words: BigUint64Array;

  /** Bit width of the type */
  readonly bitWidth: B;

  /**
   * @param words - `bits / 64` words, least significant first; copied
   * @param bits - Bit width of the concrete class
   */
  protected constructor(words: BigUint64Array, bits: B) {
    const wordCount = bits / 64;
    if (words.length !== wordCount) {
      throw invalidByteLengthError(new.target.name, wordCount * 8, words.length * 8);
    }
    this.#words = new BigUint64Array(words);
    this.bitWidth = bits;
  }

  static zero<T>(this: WordUintClass<T>): T {
    return new this(new BigUint64Array(this.WORDS));
  }

  static one<T>(this: WordUintClass<T>): T {
    return new this(bigintToLimbs(1n, this.WORDS));
  }

  /**
   * @throws CompatError with VALUE_OUT_OF_RANGE while input validation is on
   */
  static from<T>(this: WordUintClass<T>, value: UintInput): T {
    return new this(bigintToLimbs(toUintValue(this.name, value, this.BITS), this.WORDS));
  }

  /**
   * Read up to `BYTES` little-endian bytes
   *
   * @throws CompatError with INVALID_BYTE_LENGTH for more than `BYTES` bytes
   */
  static fromLittleEndian<T>(this: WordUintClass<T>, bytes: Uint8Array): T {
    assertMaxByteLength(this.name, bytes, this.BYTES);
    return new this(leBytesToLimbs(bytes, this.WORDS));
  }

  /**
   * Read up to `BYTES` big-endian bytes
   *
   * @throws CompatError with INVALID_BYTE_LENGTH for more than `BYTES` bytes
   */
  static fromBigEndian<T>(this: WordUintClass<T>, bytes: Uint8Array): T {
    assertMaxByteLength(this.name, bytes, this.BYTES);
    return new this(leBytesToLimbs(reverseBytes(bytes), this.WORDS));
  }

  /**
   * Write the value into `out`, least significant byte first
   *
   * @throws CompatError with INVALID_BYTE_LENGTH unless `out` has exactly `bits / 8` bytes
   */
  toLittleEndian(out: Uint8Array): void {
    this.#assertOutLength(out);
    out.set(limbsToLeBytes(this.#words));
  }

  /**
   * Write the value into `out`, most significant byte first
   *
   * @throws CompatError with INVALID_BYTE_LENGTH unless `out` has exactly `bits / 8` bytes
   */
  toBigEndian(out: Uint8Array): void {
    this.#assertOutLength(out);
    out.set(reverseBytes(limbsToLeBytes(this.#words)));
  }

  #assertOutLength(out: Uint8Array): void {
    assertByteLength(this.constructor.name, out, this.bitWidth / 8);
  }

  toBigInt(): bigint {
    return limbsToBigint(this.#words);
  }

  /**
   * The least significant 64 bits
   */
  lowU64(): bigint {
    return this.#words[0] ?? 0n;
  }

  /**
   * Number of significant bits
   */
  bits(): number {
    return bitLength(this.toBigInt());
  }

  isZero(): boolean {
    return limbsAreZero(this.#words);
  }

  equals(other: WordUint<B>): boolean {
    return limbsEqual(this.#words, other.#words);
  }

  /**
   * Decimal rendering
   */
  toString(): string {
    return this.toBigInt().toString(10);
  }

  /**
   * Minimal lowercase hex with '0x' ("0x0" for zero)
   */
  toHex(): string {
    return bigintToMinimalHex(this.toBigInt());
  }

  toJSON(): string {
    return this.toHex();
  }
}

export class U64 extends WordUint<64> implements Compat<PrimitivesU64> {
  static readonly BITS = 64;
  static readonly BYTES = 8;
  static readonly WORDS = 1;
  static readonly MAX = new U64(new BigUint64Array(U64.WORDS).fill(MAX_WORD));

  constructor(words: BigUint64Array) {
    super(words, U64.BITS);
  }

  [COMPAT](): PrimitivesU64 {
    return wordsToLeBytesUint(this, PrimitivesU64);
  }
}

export class U128 extends WordUint<128> implements Compat<PrimitivesU128> {
  static readonly BITS = 128;
  static readonly BYTES = 16;
  static readonly WORDS = 2;
  static readonly MAX = new U128(new BigUint64Array(U128.WORDS).fill(MAX_WORD));

  constructor(words: BigUint64Array) {
    super(words, U128.BITS);
  }

  [COMPAT](): PrimitivesU128 {
    return wordsToLeBytesUint(this, PrimitivesU128);
  }
}

export class U256 extends WordUint<256> implements Compat<PrimitivesU256> {
  static readonly BITS = 256;
  static readonly BYTES = 32;
  static readonly WORDS = 4;
  static readonly MAX = new U256(new BigUint64Array(U256.WORDS).fill(MAX_WORD));

  constructor(words: BigUint64Array) {
    super(words, U256.BITS);
  }

  [COMPAT](): PrimitivesU256 {
    return wordsToLeBytesUint(this, PrimitivesU256);
  }
}

export class U512 extends WordUint<512> implements Compat<PrimitivesU512> {
  static readonly BITS = 512;
  static readonly BYTES = 64;
  static readonly WORDS = 8;
  static readonly MAX = new U512(new BigUint64Array(U512.WORDS).fill(MAX_WORD));

  constructor(words: BigUint64Array) {
    super(words, U512.BITS);
  }

  [COMPAT](): PrimitivesU512 {
    return wordsToLeBytesUint(this, PrimitivesU512);
  }
}
