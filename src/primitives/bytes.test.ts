/**
 * Tests for the fixed bytes classes
 */

import { describe, it, expect } from 'vitest';
import { CompatError, ErrorCode } from '../errors.js';
import { B32, B64, B160, B256, B264, B512, B520 } from './bytes.js';

describe('FixedBytes', () => {
  describe('from', () => {
    it('should accept exactly BYTES bytes', () => {
      const value = B64.from(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8));

      expect(value.size).toBe(8);
      expect(value.toHex()).toBe('0x0102030405060708');
    });

    it('should reject any other length', () => {
      expect(() => B256.from(new Uint8Array(31))).toThrow(CompatError);
      expect(() => B256.from(new Uint8Array(31))).toThrow('B256 requires 32 bytes, got 31');
      expect(() => B256.from(new Uint8Array(33))).toThrow('B256 requires 32 bytes, got 33');
    });

    it('should report the length error code and details', () => {
      try {
        B64.from(new Uint8Array(4));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompatError);
        if (error instanceof CompatError) {
          expect(error.code).toBe(ErrorCode.INVALID_BYTE_LENGTH);
          expect(error.details).toEqual({ typeName: 'B64', expected: 8, actual: 4 });
        }
      }
    });

    it('should copy its input', () => {
      const input = new Uint8Array(8);
      const value = B64.from(input);
      input[0] = 0xff;

      expect(value.isZero()).toBe(true);
    });
  });

  describe('fromHex', () => {
    it('should parse with and without prefix', () => {
      const withPrefix = B64.fromHex('0x00000000deadbeef');
      const without = B64.fromHex('00000000DEADBEEF');

      expect(withPrefix.equals(without)).toBe(true);
      expect(without.toHex()).toBe('0x00000000deadbeef');
    });

    it('should reject the wrong number of digits', () => {
      expect(() => B64.fromHex('0xdeadbeef')).toThrow('Invalid hex string: expected 8 bytes, got 4');
    });
  });

  describe('accessors', () => {
    it('should hand out copies from toBytes', () => {
      const value = B32.repeatByte(0x01);
      const bytes = value.toBytes();
      bytes[0] = 0x02;

      expect(value.toHex()).toBe('0x01010101');
    });

    it('should render toString and toJSON as full lowercase hex', () => {
      const value = B32.fromHex('0xCAFEBABE');

      expect(value.toString()).toBe('0xcafebabe');
      expect(JSON.stringify({ value })).toBe('{"value":"0xcafebabe"}');
    });

    it('should reject repeatByte values that are not a byte', () => {
      expect(() => B256.repeatByte(0x1ff)).toThrow('B256 value out of range [0, 2^8)');
      expect(() => B256.repeatByte(-1)).toThrow(CompatError);
      expect(() => B64.repeatByte(1.5)).toThrow(CompatError);
      expect(B64.repeatByte(0xff).toHex()).toBe('0xffffffffffffffff');
    });

    it('should detect zero', () => {
      expect(B512.zero().isZero()).toBe(true);
      expect(B512.repeatByte(1).isZero()).toBe(false);
    });

    it('should compare by content', () => {
      expect(B256.repeatByte(7).equals(B256.repeatByte(7))).toBe(true);
      expect(B256.repeatByte(7).equals(B256.repeatByte(8))).toBe(false);
    });
  });

  describe('unpaired lengths', () => {
    it('should still construct values of every width', () => {
      expect(B32.zero().size).toBe(4);
      expect(B160.zero().size).toBe(20);
      expect(B264.zero().size).toBe(33);
      expect(B520.zero().size).toBe(65);
    });
  });
});
