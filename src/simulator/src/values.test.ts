import { describe, it, expect } from 'vitest';
import {
  ZERO,
  asFloat,
  asSigned,
  asUnsigned,
  bitsToFloat,
  floatToBits,
  floatValue,
  intValue,
  toHex,
  valuesEqual,
} from './values.js';

describe('values', () => {
  describe('views', () => {
    it('should expose the bit pattern of a float as its integer view', () => {
      expect(asUnsigned(floatValue(1.0))).toBe(0x3FF0_0000_0000_0000n);
      expect(floatToBits(-2.0)).toBe(0xC000_0000_0000_0000n);
    });

    it('should reinterpret integer bits as a float', () => {
      expect(asFloat(intValue(0x4004_0000_0000_0000n))).toBe(2.5);
      expect(bitsToFloat(0n)).toBe(0);
    });

    it('should mask integers to unsigned 64 bits', () => {
      expect(asUnsigned(intValue(-1n))).toBe(0xFFFF_FFFF_FFFF_FFFFn);
    });

    it('should give the signed view of the top bit', () => {
      expect(asSigned(intValue(0xFFFF_FFFF_FFFF_FFFEn))).toBe(-2n);
      expect(asSigned(intValue(7n))).toBe(7n);
    });
  });

  describe('valuesEqual', () => {
    it('should compare tag and payload', () => {
      expect(valuesEqual(intValue(3n), intValue(3n))).toBe(true);
      expect(valuesEqual(intValue(0n), floatValue(0))).toBe(false);
      expect(valuesEqual(floatValue(NaN), floatValue(NaN))).toBe(true);
      expect(valuesEqual(ZERO, intValue(1n))).toBe(false);
    });
  });

  describe('toHex', () => {
    it('should render the unsigned view', () => {
      expect(toHex(255n)).toBe('0xff');
      expect(toHex(-1n)).toBe('0xffffffffffffffff');
    });
  });
});
