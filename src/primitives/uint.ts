/**
 * Unsigned integers of a fixed bit width
 *
 * Values are stored as `BITS / 64` limbs of 64 bits in little-endian limb
 * order. The byte API is explicit about order: `toLeBytes` / `fromLeBytes`
 * and `toBeBytes` / `fromBeBytes` always use exactly `BYTES` bytes.
 */

import type { UintBits, UintInput } from '../types.js';
import { invalidByteLengthError } from '../errors.js';
import { assertByteLength, toUintValue } from '../validation.js';
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
import { leBytesUintToWords } from '../compat/uint.js';
import {
  U64 as EthU64,
  U128 as EthU128,
  U256 as EthU256,
  U512 as EthU512,
} from '../ethtypes/uint.js';

const MAX_LIMB = (1n << 64n) - 1n;

/**
 * Constructor shape shared by every concrete integer class
 */
export interface UintClass<T> {
  readonly BITS: UintBits;
  readonly BYTES: number;
  readonly LIMBS: number;
  new (limbs: BigUint64Array): T;
}

export abstract class Uint<B extends UintBits> {
  readonly #limbs: BigUint64Array;

  /** Bit width of the type */
  readonly bitWidth: B;

  /**
   * @param limbs - `bits / 64` limbs, least significant first; copied
   * @param bits - Bit width of the concrete class
   * @throws CompatError with INVALID_BYTE_LENGTH on a limb count mismatch
   */
  protected constructor(limbs: BigUint64Array, bits: B) {
    const limbCount = bits / 64;
    if (limbs.length !== limbCount) {
      throw invalidByteLengthError(new.target.name, limbCount * 8, limbs.length * 8);
    }
    this.#limbs = new BigUint64Array(limbs);
    this.bitWidth = bits;
  }

  /**
   * Create an integer from a bigint or a safe integer number
   *
   * @throws CompatError with VALUE_OUT_OF_RANGE (see `toUintValue`)
   */
  static from<T>(this: UintClass<T>, value: UintInput): T {
    return new this(bigintToLimbs(toUintValue(this.name, value, this.BITS), this.LIMBS));
  }

  /**
   * Read exactly `BYTES` little-endian bytes
   */
  static fromLeBytes<T>(this: UintClass<T>, bytes: Uint8Array): T {
    assertByteLength(this.name, bytes, this.BYTES);
    return new this(leBytesToLimbs(bytes, this.LIMBS));
  }

  /**
   * Read exactly `BYTES` big-endian bytes
   */
  static fromBeBytes<T>(this: UintClass<T>, bytes: Uint8Array): T {
    assertByteLength(this.name, bytes, this.BYTES);
    return new this(leBytesToLimbs(reverseBytes(bytes), this.LIMBS));
  }

  /**
   * Copy of the limbs, least significant first
   */
  asLimbs(): BigUint64Array {
    return new BigUint64Array(this.#limbs);
  }

  /**
   * Exactly `bits / 8` bytes, least significant first
   */
  toLeBytes(): Uint8Array {
    return limbsToLeBytes(this.#limbs);
  }

  /**
   * Exactly `bits / 8` bytes, most significant first
   */
  toBeBytes(): Uint8Array {
    return reverseBytes(limbsToLeBytes(this.#limbs));
  }

  toBigInt(): bigint {
    return limbsToBigint(this.#limbs);
  }

  /**
   * Number of significant bits
   */
  bitLen(): number {
    return bitLength(this.toBigInt());
  }

  isZero(): boolean {
    return limbsAreZero(this.#limbs);
  }

  equals(other: Uint<B>): boolean {
    return limbsEqual(this.#limbs, other.#limbs);
  }

  /**
   * @param radix - Base between 2 and 36 (default: 10)
   */
  toString(radix: number = 10): string {
    return this.toBigInt().toString(radix);
  }

  /**
   * Minimal lowercase hex with '0x' ("0x0" for zero)
   */
  toJSON(): string {
    return bigintToMinimalHex(this.toBigInt());
  }
}

export class U64 extends Uint<64> implements Compat<EthU64> {
  static readonly BITS = 64;
  static readonly BYTES = 8;
  static readonly LIMBS = 1;
  static readonly ZERO = new U64(new BigUint64Array(U64.LIMBS));
  static readonly MAX = new U64(new BigUint64Array(U64.LIMBS).fill(MAX_LIMB));

  constructor(limbs: BigUint64Array) {
    super(limbs, U64.BITS);
  }

  [COMPAT](): EthU64 {
    return leBytesUintToWords(this, EthU64);
  }
}

export class U128 extends Uint<128> implements Compat<EthU128> {
  static readonly BITS = 128;
  static readonly BYTES = 16;
  static readonly LIMBS = 2;
  static readonly ZERO = new U128(new BigUint64Array(U128.LIMBS));
  static readonly MAX = new U128(new BigUint64Array(U128.LIMBS).fill(MAX_LIMB));

  constructor(limbs: BigUint64Array) {
    super(limbs, U128.BITS);
  }

  [COMPAT](): EthU128 {
    return leBytesUintToWords(this, EthU128);
  }
}

export class U256 extends Uint<256> implements Compat<EthU256> {
  static readonly BITS = 256;
  static readonly BYTES = 32;
  static readonly LIMBS = 4;
  static readonly ZERO = new U256(new BigUint64Array(U256.LIMBS));
  static readonly MAX = new U256(new BigUint64Array(U256.LIMBS).fill(MAX_LIMB));

  constructor(limbs: BigUint64Array) {
    super(limbs, U256.BITS);
  }

  [COMPAT](): EthU256 {
    return leBytesUintToWords(this, EthU256);
  }
}

export class U512 extends Uint<512> implements Compat<EthU512> {
  static readonly BITS = 512;
  static readonly BYTES = 64;
  static readonly LIMBS = 8;
  static readonly ZERO = new U512(new BigUint64Array(U512.LIMBS));
  static readonly MAX = new U512(new BigUint64Array(U512.LIMBS).fill(MAX_LIMB));

  constructor(limbs: BigUint64Array) {
    super(limbs, U512.BITS);
  }

  [COMPAT](): EthU512 {
    return leBytesUintToWords(this, EthU512);
  }
}
