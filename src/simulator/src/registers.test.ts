import { describe, it, expect } from 'vitest';
import { isGeneralRegister, lookupRegister, readAlias, writeAlias } from './registers.js';

describe('registers', () => {
  describe('lookupRegister', () => {
    it('should resolve every width of a legacy register to its parent', () => {
      expect(lookupRegister('eax')).toEqual({ kind: 'general', name: 'eax', parent: 'rax', width: 32 });
      expect(lookupRegister('ax')).toEqual({ kind: 'general', name: 'ax', parent: 'rax', width: 16 });
      expect(lookupRegister('al')).toEqual({ kind: 'general', name: 'al', parent: 'rax', width: 8 });
      expect(lookupRegister('ah')).toEqual({ kind: 'general', name: 'ah', parent: 'rax', width: 'high8' });
      expect(lookupRegister('dil')).toEqual({ kind: 'general', name: 'dil', parent: 'rdi', width: 8 });
    });

    it('should resolve extended register aliases', () => {
      expect(lookupRegister('r10d')).toEqual({ kind: 'general', name: 'r10d', parent: 'r10', width: 32 });
      expect(lookupRegister('r15b')).toEqual({ kind: 'general', name: 'r15b', parent: 'r15', width: 8 });
    });

    it('should be case-insensitive', () => {
      expect(lookupRegister('RBP')).toEqual({ kind: 'general', name: 'rbp', parent: 'rbp', width: 64 });
    });

    it('should know the vector registers', () => {
      expect(lookupRegister('xmm7')).toEqual({ kind: 'float', name: 'xmm7' });
      expect(lookupRegister('xmm16')).toBeNull();
    });

    it('should reject unknown names', () => {
      expect(lookupRegister('foo')).toBeNull();
      expect(isGeneralRegister('rax')).toBe(true);
      expect(isGeneralRegister('eax')).toBe(false);
    });
  });

  describe('alias rules', () => {
    const parent = 0x1122_3344_5566_7788n;

    it('should read narrow views', () => {
      expect(readAlias(parent, 32)).toBe(0x5566_7788n);
      expect(readAlias(parent, 16)).toBe(0x7788n);
      expect(readAlias(parent, 8)).toBe(0x88n);
      expect(readAlias(parent, 'high8')).toBe(0x77n);
    });

    it('should zero-extend 32-bit writes', () => {
      expect(writeAlias(parent, 32, 0xFFFF_FFFF_0000_0001n)).toBe(1n);
    });

    it('should merge 16-bit and 8-bit writes into the parent', () => {
      expect(writeAlias(parent, 16, 0xAAAAn)).toBe(0x1122_3344_5566_AAAAn);
      expect(writeAlias(parent, 8, 0x1FFn)).toBe(0x1122_3344_5566_77FFn);
      expect(writeAlias(parent, 'high8', 0xBBn)).toBe(0x1122_3344_5566_BB88n);
    });

    it('should mask 64-bit writes', () => {
      expect(writeAlias(parent, 64, -1n)).toBe(0xFFFF_FFFF_FFFF_FFFFn);
    });
  });
});
