/**
 * Tests for fixed-size hashes and the bloom filter
 */

import { describe, it, expect } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils';
import { CompatError, ErrorCode } from '../errors.js';
import { Address, H64, H160, H256, H512 } from './hash.js';
import { Bloom } from './bloom.js';

describe('FixedHash', () => {
  it('should copy exactly LEN bytes from a slice', () => {
    const bytes = Uint8Array.of(9, 8, 7, 6, 5, 4, 3, 2);
    const hash = H64.fromSlice(bytes);
    bytes[0] = 0;

    expect(hash.toHex()).toBe('0x0908070605040302');
  });

  it('should reject a slice of another length', () => {
    expect(() => H256.fromSlice(new Uint8Array(20))).toThrow(CompatError);
    expect(() => H256.fromSlice(new Uint8Array(20))).toThrow('H256 requires 32 bytes, got 20');
  });

  it('should abbreviate toString and keep the full value in JSON', () => {
    const hash = H160.fromHex('deadbeefdeadbeefdeadbeefdeadbeef00000000');

    expect(hash.toString()).toBe('0xdead…0000');
    expect(hash.toJSON()).toBe('0xdeadbeefdeadbeefdeadbeefdeadbeef00000000');
  });

  it('should hand out copies from asBytes', () => {
    const hash = H512.repeatByte(0x22);
    const bytes = hash.asBytes();
    bytes.fill(0);

    expect(hash.isZero()).toBe(false);
    expect(H512.zero().isZero()).toBe(true);
  });

  it('should reject repeatByte values that are not a byte', () => {
    try {
      H256.repeatByte(0x1ff);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompatError);
      if (error instanceof CompatError) {
        expect(error.code).toBe(ErrorCode.VALUE_OUT_OF_RANGE);
        expect(error.details).toEqual({ typeName: 'H256', value: '511', bits: 8 });
      }
    }
    expect(() => H64.repeatByte(-1)).toThrow('H64 value out of range [0, 2^8)');
  });

  it('should compare by content', () => {
    expect(H256.repeatByte(1).equals(H256.repeatByte(1))).toBe(true);
    expect(H256.repeatByte(1).equals(H256.zero())).toBe(false);
  });

  it('should export Address as H160', () => {
    expect(Address).toBe(H160);
    expect(Address.zero()).toBeInstanceOf(H160);
  });
});

describe('Bloom', () => {
  it('should start empty', () => {
    expect(Bloom.zero().isEmpty()).toBe(true);
    expect(Bloom.zero().containsInput(utf8ToBytes('anything'))).toBe(false);
  });

  it('should contain accrued inputs without changing the original', () => {
    const empty = Bloom.zero();
    const input = utf8ToBytes('test-topic');
    const bloom = empty.accrue(input);

    expect(bloom.containsInput(input)).toBe(true);
    expect(empty.isEmpty()).toBe(true);
  });

  it('should combine filters', () => {
    const a = Bloom.zero().accrue(utf8ToBytes('a'));
    const b = Bloom.zero().accrue(utf8ToBytes('b'));
    const both = a.accrueBloom(b);

    expect(both.containsBloom(a)).toBe(true);
    expect(both.containsBloom(b)).toBe(true);
    expect(both.containsInput(utf8ToBytes('a'))).toBe(true);
    expect(Bloom.zero().containsBloom(both)).toBe(false);
  });
});
