/**
 * Machine state
 *
 * Everything a step can change lives in one plain object so the controller
 * can snapshot and restore it as a unit.
 */

import type { Diagnostic } from './diagnostics.js';
import { FLOAT_REGISTER_COUNT, INITIAL_STACK_POINTER, type GeneralRegister } from './registers.js';
import { ZERO, intValue, type Value } from './values.js';

export interface Flags {
  zero: boolean;
  sign: boolean;
  carry: boolean;
  overflow: boolean;
}

export interface MachineState {
  registers: Record<GeneralRegister, Value>;
  floatRegisters: number[]; // xmm0-xmm15
  flags: Flags;
  memory: Map<bigint, Value>; // sparse, zero on first read
  callStack: string[];
  output: string[];
  cursor: number;
  halted: boolean;
  diagnostics: Diagnostic[];
}

function createRegisters(): Record<GeneralRegister, Value> {
  return {
    rax: ZERO, rbx: ZERO, rcx: ZERO, rdx: ZERO,
    rsi: ZERO, rdi: ZERO, rbp: ZERO, rsp: intValue(INITIAL_STACK_POINTER),
    r8: ZERO, r9: ZERO, r10: ZERO, r11: ZERO,
    r12: ZERO, r13: ZERO, r14: ZERO, r15: ZERO,
    rip: ZERO,
  };
}

export function createMachineState(entryIndex: number = 0): MachineState {
  return {
    registers: createRegisters(),
    floatRegisters: new Array<number>(FLOAT_REGISTER_COUNT).fill(0),
    flags: { zero: false, sign: false, carry: false, overflow: false },
    memory: new Map(),
    callStack: [],
    output: [],
    cursor: entryIndex,
    halted: false,
    diagnostics: [],
  };
}

/**
 * Copy every mutable part of the state. Values themselves are immutable
 * records, so copying the containers is enough.
 */
export function cloneMachineState(state: MachineState): MachineState {
  return {
    registers: { ...state.registers },
    floatRegisters: [...state.floatRegisters],
    flags: { ...state.flags },
    memory: new Map(state.memory),
    callStack: [...state.callStack],
    output: [...state.output],
    cursor: state.cursor,
    halted: state.halted,
    diagnostics: [...state.diagnostics],
  };
}

export function readMemory(state: MachineState, address: bigint): Value {
  return state.memory.get(address) ?? ZERO;
}

export function writeMemory(state: MachineState, address: bigint, value: Value): void {
  state.memory.set(address, value);
}
