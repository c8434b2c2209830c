/**
 * Register file layout
 *
 * One storage cell per architectural register. Narrow register names are
 * aliases resolved to their parent cell; the read/write rules for each
 * width are pure functions over that cell.
 */

import { MASK_32, MASK_64 } from './values.js';

export const GENERAL_REGISTERS = [
  'rax', 'rbx', 'rcx', 'rdx', 'rsi', 'rdi', 'rbp', 'rsp',
  'r8', 'r9', 'r10', 'r11', 'r12', 'r13', 'r14', 'r15',
  'rip',
] as const;

export type GeneralRegister = typeof GENERAL_REGISTERS[number];

export const FLOAT_REGISTER_COUNT = 16;

export type FloatRegister = `xmm${number}`;

export const FLOAT_REGISTERS: FloatRegister[] = Array.from(
  { length: FLOAT_REGISTER_COUNT },
  (_, i): FloatRegister => `xmm${i}`
);

// Width in bits; 'high8' is the ah/bh/ch/dh byte at bits 8-15
export type RegisterWidth = 64 | 32 | 16 | 8 | 'high8';

export interface GeneralRegisterAlias {
  kind: 'general';
  name: string;
  parent: GeneralRegister;
  width: RegisterWidth;
}

export interface FloatRegisterAlias {
  kind: 'float';
  name: FloatRegister;
}

export type RegisterAlias = GeneralRegisterAlias | FloatRegisterAlias;

export const INITIAL_STACK_POINTER = 0x7FFF_FFFF_FFF0n;

// Legacy registers: [64-bit, 32-bit, 16-bit, low byte, high byte]
const LEGACY_NAMES: [GeneralRegister, string, string, string, string | null][] = [
  ['rax', 'eax', 'ax', 'al', 'ah'],
  ['rbx', 'ebx', 'bx', 'bl', 'bh'],
  ['rcx', 'ecx', 'cx', 'cl', 'ch'],
  ['rdx', 'edx', 'dx', 'dl', 'dh'],
  ['rsi', 'esi', 'si', 'sil', null],
  ['rdi', 'edi', 'di', 'dil', null],
  ['rbp', 'ebp', 'bp', 'bpl', null],
  ['rsp', 'esp', 'sp', 'spl', null],
];

const EXTENDED_NAMES: GeneralRegister[] = ['r8', 'r9', 'r10', 'r11', 'r12', 'r13', 'r14', 'r15'];

function buildAliasTable(): Map<string, RegisterAlias> {
  const table = new Map<string, RegisterAlias>();
  const add = (name: string, parent: GeneralRegister, width: RegisterWidth): void => {
    table.set(name, { kind: 'general', name, parent, width });
  };

  for (const [r64, r32, r16, r8, high] of LEGACY_NAMES) {
    add(r64, r64, 64);
    add(r32, r64, 32);
    add(r16, r64, 16);
    add(r8, r64, 8);
    if (high) {
      add(high, r64, 'high8');
    }
  }

  for (const r64 of EXTENDED_NAMES) {
    add(r64, r64, 64);
    add(`${r64}d`, r64, 32);
    add(`${r64}w`, r64, 16);
    add(`${r64}b`, r64, 8);
  }

  add('rip', 'rip', 64);
  add('eip', 'rip', 32);

  for (const name of FLOAT_REGISTERS) {
    table.set(name, { kind: 'float', name });
  }

  return table;
}

const ALIASES = buildAliasTable();

/**
 * Look up a register by any of its names (case-insensitive)
 */
export function lookupRegister(name: string): RegisterAlias | null {
  return ALIASES.get(name.toLowerCase()) ?? null;
}

const GENERAL_REGISTER_SET: ReadonlySet<string> = new Set(GENERAL_REGISTERS);

export function isGeneralRegister(name: string): name is GeneralRegister {
  return GENERAL_REGISTER_SET.has(name);
}

export function widthInBits(width: RegisterWidth): number {
  return width === 'high8' ? 8 : width;
}

/**
 * Value seen through an alias.
 *
 * The engine reads the full parent cell for arithmetic; this view is for
 * callers that need the architecturally narrow value (display, movzx/movsx
 * sources).
 */
export function readAlias(parent: bigint, width: RegisterWidth): bigint {
  switch (width) {
    case 64:
      return parent & MASK_64;
    case 32:
      return parent & MASK_32;
    case 16:
      return parent & 0xFFFFn;
    case 8:
      return parent & 0xFFn;
    case 'high8':
      return (parent >> 8n) & 0xFFn;
  }
}

/**
 * New parent cell after writing through an alias.
 *
 * 32-bit writes zero-extend into the parent; 16-bit and 8-bit writes
 * replace only their own bits.
 */
export function writeAlias(parent: bigint, width: RegisterWidth, value: bigint): bigint {
  switch (width) {
    case 64:
      return value & MASK_64;
    case 32:
      return value & MASK_32;
    case 16:
      return ((parent & ~0xFFFFn) | (value & 0xFFFFn)) & MASK_64;
    case 8:
      return ((parent & ~0xFFn) | (value & 0xFFn)) & MASK_64;
    case 'high8':
      return ((parent & ~0xFF00n) | ((value & 0xFFn) << 8n)) & MASK_64;
  }
}
