/**
 * Tests for limb-backed unsigned integers
 */

import { describe, it, expect } from 'vitest';
import { CompatError, ErrorCode } from '../errors.js';
import { withoutValidation } from '../config.js';
import { U64, U128, U256, U512 } from './uint.js';

describe('Uint', () => {
  describe('from', () => {
    it('should accept bigint and safe integer numbers', () => {
      expect(U64.from(255).toBigInt()).toBe(255n);
      expect(U256.from(1n << 200n).toBigInt()).toBe(1n << 200n);
    });

    it('should reject negative and too-wide values', () => {
      expect(() => U64.from(-1n)).toThrow('U64 value out of range [0, 2^64)');
      expect(() => U64.from(1n << 64n)).toThrow(CompatError);
    });

    it('should wrap out-of-range values without validation', () => {
      expect(withoutValidation(() => U64.from(1n << 64n)).toBigInt()).toBe(0n);
      expect(withoutValidation(() => U64.from(-1n)).toBigInt()).toBe((1n << 64n) - 1n);
    });

    it('should always reject numbers that are not safe integers', () => {
      expect(() => withoutValidation(() => U128.from(1.5))).toThrow(CompatError);
      expect(() => U128.from(Number.MAX_SAFE_INTEGER + 1)).toThrow(CompatError);
    });
  });

  describe('byte order', () => {
    it('should export little-endian and big-endian bytes', () => {
      const value = U64.from(0x0102n);

      expect(Array.from(value.toLeBytes())).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
      expect(Array.from(value.toBeBytes())).toEqual([0, 0, 0, 0, 0, 0, 1, 2]);
    });

    it('should import exactly BYTES bytes in either order', () => {
      const bytes = Uint8Array.of(1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 2);

      expect(U128.fromLeBytes(bytes).toBigInt()).toBe((2n << 120n) | 1n);
      expect(U128.fromBeBytes(bytes).toBigInt()).toBe((1n << 120n) | 2n);
    });

    it('should reject byte input of another length', () => {
      expect(() => U128.fromLeBytes(new Uint8Array(15))).toThrow('U128 requires 16 bytes, got 15');

      try {
        U256.fromBeBytes(new Uint8Array(33));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompatError);
        if (error instanceof CompatError) {
          expect(error.code).toBe(ErrorCode.INVALID_BYTE_LENGTH);
        }
      }
    });
  });

  describe('constructor', () => {
    it('should reject the wrong number of limbs', () => {
      expect(() => new U128(new BigUint64Array(1))).toThrow('U128 requires 16 bytes, got 8');
    });

    it('should copy the limbs it is given', () => {
      const limbs = BigUint64Array.of(5n);
      const value = new U64(limbs);
      limbs[0] = 6n;

      expect(value.toBigInt()).toBe(5n);
    });
  });

  describe('accessors', () => {
    it('should hand out a copy of the limbs', () => {
      const value = U128.from((3n << 64n) | 4n);
      const limbs = value.asLimbs();

      expect(Array.from(limbs)).toEqual([4n, 3n]);
      limbs[0] = 0n;
      expect(value.toBigInt()).toBe((3n << 64n) | 4n);
    });

    it('should expose constants', () => {
      expect(U512.ZERO.isZero()).toBe(true);
      expect(U128.MAX.toBigInt()).toBe((1n << 128n) - 1n);
      expect(U256.MAX.bitLen()).toBe(256);
      expect(U64.ZERO.bitLen()).toBe(0);
    });

    it('should render text', () => {
      const value = U256.from(255);

      expect(value.toString()).toBe('255');
      expect(value.toString(16)).toBe('ff');
      expect(value.toJSON()).toBe('0xff');
      expect(JSON.stringify(U64.ZERO)).toBe('"0x0"');
    });

    it('should compare by value', () => {
      expect(U256.from(9n).equals(U256.from(9))).toBe(true);
      expect(U256.from(9n).equals(U256.from(10n))).toBe(false);
    });
  });
});
