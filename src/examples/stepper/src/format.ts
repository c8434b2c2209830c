/**
 * Text helpers for the terminal stepper
 */

import type { Flags, MemoryCellView, StateSnapshot } from '../../../simulator/src/index.js';

export const REGISTERS_PER_ROW = 4;

// Register display order: the argument registers first, rip last
const DISPLAY_ORDER = [
  'rax', 'rbx', 'rcx', 'rdx',
  'rsi', 'rdi', 'rbp', 'rsp',
  'r8', 'r9', 'r10', 'r11',
  'r12', 'r13', 'r14', 'r15',
];

export interface RegisterCell {
  name: string;
  value: string;
}

export function registerRows(registers: Record<string, string>): RegisterCell[][] {
  const rows: RegisterCell[][] = [];
  for (let i = 0; i < DISPLAY_ORDER.length; i += REGISTERS_PER_ROW) {
    rows.push(DISPLAY_ORDER.slice(i, i + REGISTERS_PER_ROW).map((name) => ({
      name,
      value: registers[name] ?? '0x0',
    })));
  }
  return rows;
}

export function formatFlags(flags: Flags): string {
  const bit = (set: boolean): number => (set ? 1 : 0);
  return `ZF=${bit(flags.zero)} SF=${bit(flags.sign)} CF=${bit(flags.carry)} OF=${bit(flags.overflow)}`;
}

/**
 * Lowest `size` cells of the memory view (the end of the descending list,
 * where the stack top is)
 */
export function stackWindow(stack: MemoryCellView[], size: number): MemoryCellView[] {
  return stack.slice(Math.max(0, stack.length - size));
}

function frameLabel(offset: number | null): string {
  if (offset === null) {
    return '';
  }
  if (offset === 0) {
    return '[rbp]';
  }
  return offset > 0 ? `[rbp+${offset}]` : `[rbp${offset}]`;
}

export function formatStackCell(cell: MemoryCellView): string {
  const pointers: string[] = [];
  if (cell.isFramePointer) pointers.push('rbp');
  if (cell.isStackPointer) pointers.push('rsp');

  const marker = pointers.length > 0 ? `<- ${pointers.join(', ')}` : '';
  return `${cell.address}  ${cell.value.padStart(20)}  ${frameLabel(cell.frameOffset).padEnd(10)}${marker}`.trimEnd();
}

/**
 * One-line status: what runs next, or why nothing does
 */
export function statusLine(snapshot: StateSnapshot): string {
  if (snapshot.halted) {
    return `Program finished after ${snapshot.historyDepth} step(s)`;
  }
  const line = snapshot.sourceLine === null ? '' : ` (line ${snapshot.sourceLine})`;
  return `Next [${snapshot.currentInstruction}]${line}: ${snapshot.instruction}`;
}
