/**
 * Fixed-size byte arrays
 *
 * `FixedBytes<N>` holds exactly `N` bytes. The concrete lengths live in
 * `bytes.ts`, `address.ts` and `bloom.ts`.
 */

import type { ByteLength } from '../types.js';
import { assertByteLength, assertByteValue } from '../validation.js';
import { bytesToHex, hexToBytes } from '../encoding/hex.js';

/**
 * Constructor shape shared by every concrete fixed bytes class
 */
export interface FixedBytesClass<T> {
  readonly BYTES: ByteLength;
  new (bytes: Uint8Array): T;
}

export abstract class FixedBytes<N extends ByteLength> {
  readonly #bytes: Uint8Array;

  /** Number of bytes held */
  readonly size: N;

  /**
   * @param bytes - Exactly `size` bytes; the array is copied
   * @param size - Byte length of the concrete class
   * @throws CompatError with INVALID_BYTE_LENGTH on a length mismatch
   */
  protected constructor(bytes: Uint8Array, size: N) {
    assertByteLength(new.target.name, bytes, size);
    this.#bytes = Uint8Array.from(bytes);
    this.size = size;
  }

  /**
   * Build a value from exactly `BYTES` bytes (copied)
   */
  static from<T>(this: FixedBytesClass<T>, bytes: Uint8Array): T {
    return new this(bytes);
  }

  /**
   * Parse `BYTES * 2` hex digits, with or without '0x'
   */
  static fromHex<T>(this: FixedBytesClass<T>, hex: string): T {
    return new this(hexToBytes(hex, this.BYTES));
  }

  static zero<T>(this: FixedBytesClass<T>): T {
    return new this(new Uint8Array(this.BYTES));
  }

  /**
   * A value with every byte set to `byte`
   */
  static repeatByte<T>(this: FixedBytesClass<T>, byte: number): T {
    assertByteValue(this.name, byte);
    return new this(new Uint8Array(this.BYTES).fill(byte));
  }

  /**
   * Copy of the underlying bytes
   */
  toBytes(): Uint8Array {
    return this.#bytes.slice();
  }

  /**
   * '0x' followed by every byte in lowercase hex
   */
  toHex(): string {
    return bytesToHex(this.#bytes);
  }

  toString(): string {
    return this.toHex();
  }

  toJSON(): string {
    return this.toHex();
  }

  isZero(): boolean {
    return this.#bytes.every((byte) => byte === 0);
  }

  equals(other: FixedBytes<N>): boolean {
    if (other.size !== this.size) {
      return false;
    }
    return this.#bytes.every((byte, i) => byte === other.#bytes[i]);
  }
}
