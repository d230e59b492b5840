/**
 * 3-of-2048 bloom filter bit placement
 *
 * An input sets three bits: keccak-256 of the input is taken, and each of the
 * byte pairs (0,1), (2,3), (4,5) gives an 11-bit index `i`. Bit `i` lives in
 * byte `255 - floor(i / 8)` under mask `1 << (i % 8)`, so index 0 is the
 * lowest bit of the last byte.
 */

import { keccak_256 } from '@noble/hashes/sha3';

export const BLOOM_BYTES = 256;

const BLOOM_INDEX_MASK = BLOOM_BYTES * 8 - 1;

interface BloomBit {
  readonly byte: number;
  readonly mask: number;
}

function bloomBits(input: Uint8Array): BloomBit[] {
  const hash = keccak_256(input);
  const bits: BloomBit[] = [];
  for (let i = 0; i < 6; i += 2) {
    const index = (((hash[i] ?? 0) << 8) | (hash[i + 1] ?? 0)) & BLOOM_INDEX_MASK;
    bits.push({ byte: BLOOM_BYTES - 1 - (index >> 3), mask: 1 << (index & 7) });
  }
  return bits;
}

/**
 * Set the three bits of `input` in `bloom` (mutates `bloom`)
 */
export function accrueInput(bloom: Uint8Array, input: Uint8Array): void {
  for (const { byte, mask } of bloomBits(input)) {
    bloom[byte] = (bloom[byte] ?? 0) | mask;
  }
}

/**
 * Whether all three bits of `input` are set in `bloom`
 */
export function bloomContainsInput(bloom: Uint8Array, input: Uint8Array): boolean {
  return bloomBits(input).every(({ byte, mask }) => ((bloom[byte] ?? 0) & mask) === mask);
}

/**
 * OR `other` into `bloom` (mutates `bloom`)
 */
export function accrueBloomBytes(bloom: Uint8Array, other: Uint8Array): void {
  for (let i = 0; i < bloom.length; i++) {
    bloom[i] = (bloom[i] ?? 0) | (other[i] ?? 0);
  }
}

/**
 * Whether every bit set in `other` is also set in `bloom`
 */
export function bloomContainsBloom(bloom: Uint8Array, other: Uint8Array): boolean {
  for (let i = 0; i < bloom.length; i++) {
    const o = other[i] ?? 0;
    if (((bloom[i] ?? 0) & o) !== o) {
      return false;
    }
  }
  return true;
}
