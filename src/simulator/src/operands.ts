/**
 * Operand model
 *
 * Both assembler dialects are parsed into these variants at load time, so
 * the engine only ever sees one representation:
 * - immediate: literal integer
 * - register: any register name, resolved to its alias record
 * - memory: [base + offset]
 * - label: jump/call target, or a rip-relative reference into the data section
 */

import { lookupRegister, type GeneralRegisterAlias, type RegisterAlias } from './registers.js';

export type Syntax = 'att' | 'intel';

export type MemorySize = 1 | 2 | 4 | 8 | 16;

export interface ImmediateOperand {
  kind: 'immediate';
  value: bigint;
}

export interface RegisterOperand {
  kind: 'register';
  register: RegisterAlias;
}

export interface MemoryOperand {
  kind: 'memory';
  base: GeneralRegisterAlias;
  offset: bigint;
  size?: MemorySize;
}

export interface LabelOperand {
  kind: 'label';
  name: string;
  ripRelative: boolean;
}

export type Operand = ImmediateOperand | RegisterOperand | MemoryOperand | LabelOperand;

const LABEL_PATTERN = /^[A-Za-z_.$][\w.$@]*$/;

const INTEL_SIZE_PREFIXES: Record<string, MemorySize> = {
  BYTE: 1,
  WORD: 2,
  DWORD: 4,
  QWORD: 8,
  XMMWORD: 16,
};

/**
 * Parse an integer literal: decimal or 0x hex, optionally negative
 */
export function parseInteger(text: string): bigint | null {
  let str = text.trim();
  let negative = false;

  if (str.startsWith('-')) {
    negative = true;
    str = str.substring(1).trim();
  } else if (str.startsWith('+')) {
    str = str.substring(1).trim();
  }

  let value: bigint;
  if (/^0[xX][0-9a-fA-F]+$/.test(str)) {
    value = BigInt(str);
  } else if (/^[0-9]+$/.test(str)) {
    value = BigInt(str);
  } else {
    return null;
  }

  return negative ? -value : value;
}

/**
 * Split an operand list on top-level commas (commas inside () or [] stay)
 */
export function splitOperands(text: string): string[] {
  const operands: string[] = [];
  let depth = 0;
  let current = '';

  for (const char of text) {
    if (char === '(' || char === '[') depth++;
    else if (char === ')' || char === ']') depth--;

    if (char === ',' && depth === 0) {
      operands.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  if (current.trim().length > 0) {
    operands.push(current.trim());
  }
  return operands;
}

function isLabel(text: string): boolean {
  return LABEL_PATTERN.test(text);
}

function generalBase(name: string): GeneralRegisterAlias | null {
  const register = lookupRegister(name);
  return register && register.kind === 'general' ? register : null;
}

/**
 * Parse one AT&T operand: %reg, $imm, off(%base), label(%rip), label
 */
export function parseAttOperand(text: string): Operand | null {
  const token = text.trim();

  if (token.startsWith('%')) {
    const register = lookupRegister(token.substring(1));
    return register ? { kind: 'register', register } : null;
  }

  if (token.startsWith('$')) {
    const literal = token.substring(1);
    const value = parseInteger(literal);
    if (value !== null) {
      return { kind: 'immediate', value };
    }
    return isLabel(literal) ? { kind: 'label', name: literal, ripRelative: false } : null;
  }

  // displacement(%base)
  const memoryMatch = token.match(/^([^()]*)\(\s*%(\w+)\s*\)$/);
  if (memoryMatch) {
    const displacement = memoryMatch[1].trim();
    const baseName = memoryMatch[2].toLowerCase();

    if (baseName === 'rip' && isLabel(displacement)) {
      return { kind: 'label', name: displacement, ripRelative: true };
    }

    const base = generalBase(baseName);
    if (!base) {
      return null;
    }
    const offset = displacement.length === 0 ? 0n : parseInteger(displacement);
    if (offset === null) {
      return null;
    }
    return { kind: 'memory', base, offset };
  }

  const value = parseInteger(token);
  if (value !== null) {
    // Bare number in AT&T is an absolute address; no base register to hang it on
    return null;
  }

  return isLabel(token) ? { kind: 'label', name: token, ripRelative: false } : null;
}

/**
 * Parse the inside of an Intel [ ... ] reference
 */
function parseIntelAddress(inner: string, size: MemorySize | undefined): Operand | null {
  const match = inner.trim().match(/^([\w.$@]+)\s*(?:([+-])\s*([\w.$@]+))?$/);
  if (!match) {
    return null;
  }
  const [, first, sign, second] = match;

  if (first.toLowerCase() === 'rip' && second && sign === '+' && isLabel(second)) {
    return { kind: 'label', name: second, ripRelative: true };
  }

  const base = generalBase(first);
  if (!base) {
    // [label]
    return !sign && isLabel(first) ? { kind: 'label', name: first, ripRelative: true } : null;
  }

  let offset = 0n;
  if (second !== undefined) {
    const magnitude = parseInteger(second);
    if (magnitude === null) {
      return null;
    }
    offset = sign === '-' ? -magnitude : magnitude;
  }

  return size === undefined
    ? { kind: 'memory', base, offset }
    : { kind: 'memory', base, offset, size };
}

/**
 * Parse one Intel operand: reg, imm, [base±off], SIZE PTR [..], label[rip], label
 */
export function parseIntelOperand(text: string): Operand | null {
  let token = text.trim();
  let size: MemorySize | undefined;

  const sizeMatch = token.match(/^(BYTE|WORD|DWORD|QWORD|XMMWORD)\s+PTR\s+(.*)$/i);
  if (sizeMatch) {
    size = INTEL_SIZE_PREFIXES[sizeMatch[1].toUpperCase()];
    token = sizeMatch[2].trim();
  }

  const offsetMatch = token.match(/^OFFSET\s+(?:FLAT:)?(\S+)$/i);
  if (offsetMatch) {
    return isLabel(offsetMatch[1]) ? { kind: 'label', name: offsetMatch[1], ripRelative: false } : null;
  }

  // label[rip]
  const ripSuffix = token.match(/^([\w.$@]+)\s*\[\s*rip\s*\]$/i);
  if (ripSuffix) {
    return isLabel(ripSuffix[1]) ? { kind: 'label', name: ripSuffix[1], ripRelative: true } : null;
  }

  if (token.startsWith('[') && token.endsWith(']')) {
    return parseIntelAddress(token.slice(1, -1), size);
  }

  const register = lookupRegister(token);
  if (register) {
    return { kind: 'register', register };
  }

  const value = parseInteger(token);
  if (value !== null) {
    return { kind: 'immediate', value };
  }

  return isLabel(token) ? { kind: 'label', name: token, ripRelative: false } : null;
}

export function parseOperand(text: string, syntax: Syntax): Operand | null {
  return syntax === 'att' ? parseAttOperand(text) : parseIntelOperand(text);
}

/**
 * Render an operand in Intel form (used in diagnostics)
 */
export function describeOperand(operand: Operand): string {
  switch (operand.kind) {
    case 'immediate':
      return operand.value.toString();
    case 'register':
      return operand.register.name;
    case 'memory': {
      if (operand.offset === 0n) {
        return `[${operand.base.name}]`;
      }
      const sign = operand.offset < 0n ? '-' : '+';
      const magnitude = operand.offset < 0n ? -operand.offset : operand.offset;
      return `[${operand.base.name}${sign}${magnitude}]`;
    }
    case 'label':
      return operand.ripRelative ? `[rip+${operand.name}]` : operand.name;
  }
}
