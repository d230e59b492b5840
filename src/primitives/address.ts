/**
 * 20-byte account address
 *
 * Rendered as mixed-case checksummed hex by default: each hex letter is
 * upper-cased when the matching nibble of keccak-256 over the lowercase hex
 * text is 8 or more.
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { utf8ToBytes } from '@noble/hashes/utils';
import { getConfig } from '../config.js';
import { invalidChecksumError } from '../errors.js';
import { bytesToHex, hexToBytes, stripHexPrefix } from '../encoding/hex.js';
import { COMPAT, type Compat } from '../compat/sealed.js';
import { fixedBytesToHash } from '../compat/fixed.js';
import { H160 } from '../ethtypes/hash.js';
import { FixedBytes, type FixedBytesClass } from './fixed-bytes.js';
import { B160 } from './bytes.js';

/**
 * Checksummed rendering of 20 address bytes, with '0x'
 */
export function toChecksumHex(bytes: Uint8Array): string {
  const hex = bytesToHex(bytes, false);
  const hash = keccak_256(utf8ToBytes(hex));
  let out = '0x';
  for (let i = 0; i < hex.length; i++) {
    const char = hex.charAt(i);
    const hashByte = hash[i >> 1] ?? 0;
    const nibble = i % 2 === 0 ? hashByte >> 4 : hashByte & 0x0f;
    out += nibble >= 8 ? char.toUpperCase() : char;
  }
  return out;
}

function isMixedCase(text: string): boolean {
  return text !== text.toLowerCase() && text !== text.toUpperCase();
}

export class Address extends FixedBytes<20> implements Compat<H160> {
  static readonly BYTES = 20;

  constructor(bytes: Uint8Array) {
    super(bytes, Address.BYTES);
  }

  /**
   * Parse 40 hex digits, with or without '0x'
   *
   * All-lowercase and all-uppercase text is accepted as is. Mixed-case text
   * must carry a valid checksum unless input validation is switched off.
   *
   * @throws CompatError with INVALID_HEX or INVALID_CHECKSUM
   */
  static override fromHex<T>(this: FixedBytesClass<T>, hex: string): T {
    const bytes = hexToBytes(hex, this.BYTES);
    const body = stripHexPrefix(hex);
    if (getConfig().validateInputs && isMixedCase(body)) {
      const expected = toChecksumHex(bytes);
      if (expected !== '0x' + body) {
        throw invalidChecksumError(hex, expected);
      }
    }
    return new this(bytes);
  }

  /**
   * Mixed-case checksummed hex with '0x'
   */
  toChecksum(): string {
    return toChecksumHex(this.toBytes());
  }

  /**
   * The same bytes as a raw `B160`
   */
  asB160(): B160 {
    return new B160(this.toBytes());
  }

  override toString(): string {
    return this.toChecksum();
  }

  override toJSON(): string {
    return this.toChecksum();
  }

  [COMPAT](): H160 {
    return fixedBytesToHash(this, H160);
  }
}
