/**
 * Opcode tables shared by the loader (mnemonic normalization) and the
 * engine (condition predicates).
 */

import type { Flags } from './machine.js';

export type Condition =
  | 'always'
  | 'e' | 'ne'
  | 'l' | 'le' | 'g' | 'ge'
  | 'b' | 'be' | 'a' | 'ae';

export const JUMP_CONDITIONS: Record<string, Condition> = {
  jmp: 'always',
  je: 'e', jz: 'e',
  jne: 'ne', jnz: 'ne',
  jl: 'l', jnge: 'l',
  jle: 'le', jng: 'le',
  jg: 'g', jnle: 'g',
  jge: 'ge', jnl: 'ge',
  jb: 'b', jc: 'b', jnae: 'b',
  jbe: 'be', jna: 'be',
  ja: 'a', jnbe: 'a',
  jae: 'ae', jnb: 'ae', jnc: 'ae',
};

export const SET_CONDITIONS: Record<string, Condition> = {
  sete: 'e', setz: 'e',
  setne: 'ne', setnz: 'ne',
  setl: 'l', setnge: 'l',
  setle: 'le', setng: 'le',
  setg: 'g', setnle: 'g',
  setge: 'ge', setnl: 'ge',
  setb: 'b', setc: 'b', setnae: 'b',
  setbe: 'be', setna: 'be',
  seta: 'a', setnbe: 'a',
  setae: 'ae', setnb: 'ae', setnc: 'ae',
};

/**
 * Evaluate a condition code against the flags.
 *
 * Signed predicates compare sign with overflow. The engine never sets
 * overflow, so in practice they reduce to the sign flag alone.
 */
export function evaluateCondition(condition: Condition, flags: Flags): boolean {
  switch (condition) {
    case 'always':
      return true;
    case 'e':
      return flags.zero;
    case 'ne':
      return !flags.zero;
    case 'l':
      return flags.sign !== flags.overflow;
    case 'le':
      return flags.zero || flags.sign !== flags.overflow;
    case 'g':
      return !flags.zero && flags.sign === flags.overflow;
    case 'ge':
      return flags.sign === flags.overflow;
    case 'b':
      return flags.carry;
    case 'be':
      return flags.carry || flags.zero;
    case 'a':
      return !flags.carry && !flags.zero;
    case 'ae':
      return !flags.carry;
  }
}

const BASE_OPCODES = [
  'nop',
  'mov', 'movzx', 'movsx', 'movsxd',
  'push', 'pop',
  'add', 'sub', 'imul', 'idiv',
  'inc', 'dec', 'neg',
  'cmp', 'test',
  'call', 'ret', 'leave', 'lea',
  'cdq', 'cqo', 'cdqe',
  'xor', 'and', 'or',
  'movsd', 'addsd', 'subsd', 'mulsd', 'divsd',
  'xorpd', 'pxor', 'cvtsi2sd', 'cvttsd2si',
];

export const KNOWN_OPCODES: ReadonlySet<string> = new Set([
  ...BASE_OPCODES,
  ...Object.keys(JUMP_CONDITIONS),
  ...Object.keys(SET_CONDITIONS),
]);

// Alternate spellings that map onto one table entry
const MNEMONIC_ALIASES: Record<string, string> = {
  movq: 'mov',
  movabs: 'mov',
  movabsq: 'mov',
  cltq: 'cdqe',
  cqto: 'cqo',
  cltd: 'cdq',
  retq: 'ret',
  callq: 'call',
  leaveq: 'leave',
  jmpq: 'jmp',
};

export type SuffixSize = 1 | 2 | 4 | 8;

const SUFFIX_SIZES: Record<string, SuffixSize> = { b: 1, w: 2, l: 4, q: 8 };

export interface NormalizedMnemonic {
  opcode: string;
  // Operand size the mnemonic implies (AT&T suffix, or the source width of movzbq-style moves)
  size?: SuffixSize;
}

/**
 * Normalize an AT&T mnemonic: aliases, extension moves, size suffixes
 */
export function normalizeAttMnemonic(raw: string): NormalizedMnemonic {
  const mnemonic = raw.toLowerCase();

  const alias = MNEMONIC_ALIASES[mnemonic];
  if (alias) {
    return { opcode: alias };
  }

  // movzbq / movzwl: source width is the first suffix letter
  const zeroExtend = mnemonic.match(/^movz([bw])([wlq])$/);
  if (zeroExtend) {
    return { opcode: 'movzx', size: SUFFIX_SIZES[zeroExtend[1]] };
  }
  const signExtend = mnemonic.match(/^movs([bwl])([wlq])$/);
  if (signExtend) {
    return { opcode: signExtend[1] === 'l' ? 'movsxd' : 'movsx', size: SUFFIX_SIZES[signExtend[1]] };
  }

  if (KNOWN_OPCODES.has(mnemonic)) {
    return { opcode: mnemonic };
  }

  const suffix = mnemonic.charAt(mnemonic.length - 1);
  const stripped = mnemonic.substring(0, mnemonic.length - 1);
  const size = SUFFIX_SIZES[suffix];
  if (size !== undefined && KNOWN_OPCODES.has(stripped)) {
    return { opcode: stripped, size };
  }

  return { opcode: mnemonic };
}

/**
 * Normalize an Intel mnemonic (no size suffixes in this dialect)
 */
export function normalizeIntelMnemonic(raw: string): NormalizedMnemonic {
  const mnemonic = raw.toLowerCase();
  return { opcode: MNEMONIC_ALIASES[mnemonic] ?? mnemonic };
}
