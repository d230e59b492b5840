/**
 * Tests for bloom bit placement
 */

import { describe, it, expect } from 'vitest';
import { keccak_256 } from '@noble/hashes/sha3';
import { utf8ToBytes } from '@noble/hashes/utils';
import {
  BLOOM_BYTES,
  accrueBloomBytes,
  accrueInput,
  bloomContainsBloom,
  bloomContainsInput,
} from './bloom.js';

function countBits(bytes: Uint8Array): number {
  let count = 0;
  for (const byte of bytes) {
    for (let b = byte; b !== 0; b >>= 1) {
      count += b & 1;
    }
  }
  return count;
}

describe('bloom bits', () => {
  it('should set between one and three bits per input', () => {
    const bloom = new Uint8Array(BLOOM_BYTES);
    accrueInput(bloom, utf8ToBytes('test-input'));

    const bits = countBits(bloom);
    expect(bits).toBeGreaterThanOrEqual(1);
    expect(bits).toBeLessThanOrEqual(3);
  });

  it('should place the first index from hash bytes 0 and 1', () => {
    const input = utf8ToBytes('placement');
    const hash = keccak_256(input);
    const index = (((hash[0] ?? 0) << 8) | (hash[1] ?? 0)) % 2048;
    const bloom = new Uint8Array(BLOOM_BYTES);
    accrueInput(bloom, input);

    const byte = bloom[255 - Math.floor(index / 8)] ?? 0;
    expect(byte & (1 << index % 8)).not.toBe(0);
  });

  it('should find what was added', () => {
    const bloom = new Uint8Array(BLOOM_BYTES);
    const input = utf8ToBytes('event');

    expect(bloomContainsInput(bloom, input)).toBe(false);
    accrueInput(bloom, input);
    expect(bloomContainsInput(bloom, input)).toBe(true);
  });

  it('should merge and compare filters', () => {
    const a = new Uint8Array(BLOOM_BYTES);
    const b = new Uint8Array(BLOOM_BYTES);
    a[0] = 0x01;
    b[255] = 0x80;

    expect(bloomContainsBloom(a, b)).toBe(false);
    accrueBloomBytes(a, b);
    expect(a[0]).toBe(0x01);
    expect(a[255]).toBe(0x80);
    expect(bloomContainsBloom(a, b)).toBe(true);
    expect(bloomContainsBloom(b, a)).toBe(false);
  });
});
