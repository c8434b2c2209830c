/**
 * State presentation
 *
 * Builds the read-only, JSON-serializable view of the machine that the
 * visualizer front ends render after every transition.
 */

import type { Diagnostic } from './diagnostics.js';
import type { Instruction } from './loader.js';
import type { Flags, MachineState } from './machine.js';
import { FLOAT_REGISTERS, GENERAL_REGISTERS } from './registers.js';
import { ZERO, asUnsigned, toHex, type Value } from './values.js';

export const END_OF_PROGRAM = 'END';

export interface MemoryCellView {
  address: string;   // hex
  value: string;     // signed decimal, or the float as written by JavaScript
  kind: Value['kind'];
  isFramePointer: boolean;
  isStackPointer: boolean;
  frameOffset: number | null; // address - rbp, when rbp is set
}

export interface StateSnapshot {
  registers: Record<string, string>;       // keyed by GENERAL_REGISTERS names
  floatRegisters: Record<string, number>;  // xmm0-xmm15
  flags: Flags;
  stack: MemoryCellView[]; // descending addresses
  currentInstruction: number;
  instruction: string;
  sourceLine: number | null;
  callStack: string[];
  output: string[];
  canStepBack: boolean;
  canStepForward: boolean;
  halted: boolean;
  historyDepth: number;
  diagnostics: Diagnostic[];
}

export interface SnapshotInput {
  state: MachineState;
  instruction: Instruction | null;
  loadDiagnostics: readonly Diagnostic[];
  historyDepth: number;
  canStepBack: boolean;
  canStepForward: boolean;
}

/**
 * Display form of a register cell: hex for integers, the number for floats
 */
export function formatRegister(value: Value): string {
  return value.kind === 'float' ? String(value.value) : toHex(value.value);
}

/**
 * Display form of a memory word
 */
export function formatMemoryValue(value: Value): string {
  return value.kind === 'float' ? String(value.value) : BigInt.asIntN(64, value.value).toString();
}

function buildMemoryView(state: MachineState): MemoryCellView[] {
  const rbp = asUnsigned(state.registers.rbp);
  const rsp = asUnsigned(state.registers.rsp);

  const addresses = [...state.memory.keys()].sort((a, b) => (a > b ? -1 : a < b ? 1 : 0));

  return addresses.map((address) => {
    const value = state.memory.get(address) ?? ZERO;
    return {
      address: toHex(address),
      value: formatMemoryValue(value),
      kind: value.kind,
      isFramePointer: address === rbp,
      isStackPointer: address === rsp,
      frameOffset: rbp === 0n ? null : Number(BigInt.asIntN(64, address - rbp)),
    };
  });
}

export function buildStateSnapshot(input: SnapshotInput): StateSnapshot {
  const { state, instruction } = input;

  const registers: Record<string, string> = {};
  for (const name of GENERAL_REGISTERS) {
    registers[name] = formatRegister(state.registers[name]);
  }

  const floatRegisters: Record<string, number> = {};
  FLOAT_REGISTERS.forEach((name, index) => {
    floatRegisters[name] = state.floatRegisters[index] ?? 0;
  });

  return {
    registers,
    floatRegisters,
    flags: { ...state.flags },
    stack: buildMemoryView(state),
    currentInstruction: state.cursor,
    instruction: instruction ? instruction.text : END_OF_PROGRAM,
    sourceLine: instruction ? instruction.sourceLine : null,
    callStack: [...state.callStack],
    output: [...state.output],
    canStepBack: input.canStepBack,
    canStepForward: input.canStepForward,
    halted: !input.canStepForward,
    historyDepth: input.historyDepth,
    diagnostics: [...input.loadDiagnostics, ...state.diagnostics],
  };
}
