/**
 * Fixed-size hashes
 *
 * Every hash holds its bytes in the order they are written, most significant
 * first. `toString` abbreviates to the first and last two bytes; `toHex` and
 * `toJSON` give the full value.
 */

import type { PairedByteLength } from '../types.js';
import { assertByteLength, assertByteValue } from '../validation.js';
import { bytesToHex, hexToBytes } from '../encoding/hex.js';

/**
 * Constructor shape shared by every concrete hash class
 */
export interface FixedHashClass<T> {
  readonly LEN: PairedByteLength;
  new (bytes: Uint8Array): T;
}

export abstract class FixedHash<N extends PairedByteLength> {
  readonly #bytes: Uint8Array;

  /** Number of bytes held */
  readonly size: N;

  protected constructor(bytes: Uint8Array, size: N) {
    assertByteLength(new.target.name, bytes, size);
    this.#bytes = Uint8Array.from(bytes);
    this.size = size;
  }

  static zero<T>(this: FixedHashClass<T>): T {
    return new this(new Uint8Array(this.LEN));
  }

  static repeatByte<T>(this: FixedHashClass<T>, byte: number): T {
    assertByteValue(this.name, byte);
    return new this(new Uint8Array(this.LEN).fill(byte));
  }

  /**
   * Copy exactly `LEN` bytes into a new hash
   *
   * @throws CompatError with INVALID_BYTE_LENGTH
   */
  static fromSlice<T>(this: FixedHashClass<T>, bytes: Uint8Array): T {
    return new this(bytes);
  }

  /**
   * Parse `LEN * 2` hex digits, with or without '0x'
   *
   * @throws CompatError with INVALID_HEX
   */
  static fromHex<T>(this: FixedHashClass<T>, hex: string): T {
    return new this(hexToBytes(hex, this.LEN));
  }

  /**
   * Copy of the underlying bytes
   */
  asBytes(): Uint8Array {
    return this.#bytes.slice();
  }

  toHex(): string {
    return bytesToHex(this.#bytes);
  }

  /**
   * Abbreviated form, e.g. `0xdead…0000`
   */
  toString(): string {
    const head = bytesToHex(this.#bytes.subarray(0, 2), false);
    const tail = bytesToHex(this.#bytes.subarray(this.#bytes.length - 2), false);
    return `0x${head}…${tail}`;
  }

  toJSON(): string {
    return this.toHex();
  }

  isZero(): boolean {
    return this.#bytes.every((byte) => byte === 0);
  }

  equals(other: FixedHash<N>): boolean {
    return this.size === other.size && this.#bytes.every((byte, i) => byte === other.#bytes[i]);
  }
}
