/**
 * Execution engine
 *
 * Semantic table for the supported x86-64 subset. Executes one normalized
 * instruction against a machine state:
 * - integer arithmetic wraps at 64 bits
 * - cmp/test/xor are the only flag writers; overflow is never set
 * - control transfers set the cursor to (target - 1); the controller's
 *   post-step increment lands on the target
 * - anything it cannot carry out becomes a no-op with a diagnostic
 */

import { createDiagnostic, type DiagnosticKind } from './diagnostics.js';
import type { DataLiteral, Instruction } from './loader.js';
import { readMemory, writeMemory, type MachineState } from './machine.js';
import { JUMP_CONDITIONS, SET_CONDITIONS, evaluateCondition } from './opcodes.js';
import type { Operand } from './operands.js';
import { writeAlias } from './registers.js';
import { LABEL_PLACEHOLDER_ADDRESS, OperandResolver } from './resolution.js';
import {
  MASK_64,
  WORD_SIZE,
  asFloat,
  asSigned,
  asUnsigned,
  bitsToFloat,
  floatToBits,
  floatValue,
  intValue,
  type Value,
} from './values.js';

const PRINTF_SYMBOL = 'printf';

// Byte count of the "number of vector arguments" register (al) that selects
// the float path of the simulated printf
const VECTOR_COUNT_MASK = 0xFFn;

export interface ProgramImage {
  labels: ReadonlyMap<string, number>;
  data: ReadonlyMap<string, DataLiteral>;
}

/**
 * True for printf and its PLT-decorated forms (printf@PLT)
 */
export function isPrintfSymbol(name: string): boolean {
  return name === PRINTF_SYMBOL || name.startsWith(`${PRINTF_SYMBOL}@`);
}

/**
 * Render an integer argument the way printf("%ld") would for the values the
 * code generator produces: 64-bit two's complement, and 32-bit results
 * that were zero-extended into their parent register
 */
export function formatIntegerOutput(value: bigint): string {
  const unsigned = BigInt.asUintN(64, value);
  if (unsigned > 0x7FFF_FFFFn && unsigned <= 0xFFFF_FFFFn) {
    return BigInt.asIntN(32, unsigned).toString();
  }
  return BigInt.asIntN(64, unsigned).toString();
}

/**
 * Render a double the way printf("%f") would
 */
export function formatFloatOutput(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  return value.toFixed(6);
}

export class ExecutionEngine {
  private readonly labels: ReadonlyMap<string, number>;
  private readonly operands: OperandResolver;

  constructor(program: ProgramImage) {
    this.labels = program.labels;
    this.operands = new OperandResolver(program.data);
  }

  /**
   * Execute one instruction against the state.
   * @returns false only when `ret` pops the zero sentinel (return from the entry point)
   */
  execute(instruction: Instruction, state: MachineState): boolean {
    return new Execution(this.labels, this.operands, state, instruction.sourceLine).run(instruction);
  }
}

/**
 * One instruction's worth of work against one state
 */
class Execution {
  constructor(
    private readonly labels: ReadonlyMap<string, number>,
    private readonly operands: OperandResolver,
    private readonly state: MachineState,
    private readonly line: number
  ) {}

  run(instruction: Instruction): boolean {
    const state = this.state;
    const { opcode } = instruction;

    const jumpCondition = JUMP_CONDITIONS[opcode];
    if (jumpCondition !== undefined) {
      if (this.expectOperands(instruction, 1)) {
        this.execJump(instruction.operands[0], evaluateCondition(jumpCondition, state.flags));
      }
      return true;
    }

    const setCondition = SET_CONDITIONS[opcode];
    if (setCondition !== undefined) {
      if (this.expectOperands(instruction, 1)) {
        this.execSet(instruction.operands[0], evaluateCondition(setCondition, state.flags));
      }
      return true;
    }

    switch (opcode) {
      case 'nop':
        return true;
      case 'ret':
        return this.execRET();
      case 'leave':
        this.execLEAVE();
        return true;
      case 'cdq':
      case 'cqo':
        this.execCQO();
        return true;
      case 'cdqe':
        this.execCDQE();
        return true;
    }

    const arity = UNARY_OPCODES.has(opcode) ? 1 : 2;
    if (!KNOWN_BINARY_OR_UNARY.has(opcode)) {
      this.diagnose('semantic-skip', `Unsupported instruction '${opcode}'`);
      return true;
    }
    if (!this.expectOperands(instruction, arity)) {
      return true;
    }

    const [dest, src] = instruction.operands;
    switch (opcode) {
      case 'mov':
        this.write(dest, this.read(src));
        break;
      case 'movzx':
        this.execMOVZX(dest, src, instruction.size ?? memorySize(src) ?? 1);
        break;
      case 'movsx':
      case 'movsxd':
        this.execMOVSX(dest, src, instruction.size ?? memorySize(src) ?? (opcode === 'movsxd' ? 4 : 1));
        break;
      case 'push':
        this.execPUSH(dest);
        break;
      case 'pop':
        this.execPOP(dest);
        break;
      case 'add':
        this.integerOp(dest, src, (a, b) => a + b);
        break;
      case 'sub':
        this.integerOp(dest, src, (a, b) => a - b);
        break;
      case 'imul':
        this.execIMUL(instruction.operands);
        break;
      case 'idiv':
        this.execIDIV(dest);
        break;
      case 'inc':
        this.unaryOp(dest, (a) => a + 1n);
        break;
      case 'dec':
        this.unaryOp(dest, (a) => a - 1n);
        break;
      case 'neg':
        this.unaryOp(dest, (a) => -a);
        break;
      case 'cmp':
        this.execCMP(dest, src);
        break;
      case 'test':
        this.execTEST(dest, src);
        break;
      case 'call':
        this.execCALL(dest);
        break;
      case 'lea':
        this.execLEA(dest, src);
        break;
      case 'xor': {
        const result = this.integerOp(dest, src, (a, b) => a ^ b);
        this.state.flags.zero = result === 0n;
        break;
      }
      case 'and':
        this.integerOp(dest, src, (a, b) => a & b);
        break;
      case 'or':
        this.integerOp(dest, src, (a, b) => a | b);
        break;
      case 'movsd':
        this.write(dest, floatValue(asFloat(this.read(src))));
        break;
      case 'addsd':
        this.floatOp(dest, src, (a, b) => a + b);
        break;
      case 'subsd':
        this.floatOp(dest, src, (a, b) => a - b);
        break;
      case 'mulsd':
        this.floatOp(dest, src, (a, b) => a * b);
        break;
      case 'divsd':
        this.execDIVSD(dest, src);
        break;
      case 'xorpd':
      case 'pxor': {
        const bits = floatToBits(asFloat(this.read(dest))) ^ floatToBits(asFloat(this.read(src)));
        this.write(dest, floatValue(bitsToFloat(bits)));
        break;
      }
      case 'cvtsi2sd':
        this.execCVTSI2SD(dest, src, instruction.size);
        break;
      case 'cvttsd2si':
        this.execCVTTSD2SI(dest, src);
        break;
    }

    return true;
  }

  // Helpers

  private diagnose(kind: DiagnosticKind, message: string): void {
    this.state.diagnostics.push(createDiagnostic(kind, this.line, message));
  }

  private expectOperands(instruction: Instruction, count: number): boolean {
    if (instruction.operands.length < count) {
      this.diagnose(
        'semantic-skip',
        `'${instruction.opcode}' expects ${count} operand(s), got ${instruction.operands.length}`
      );
      return false;
    }
    return true;
  }

  private read(operand: Operand): Value {
    return this.operands.resolve(this.state, operand, this.line);
  }

  private write(operand: Operand, value: Value): void {
    this.operands.assign(this.state, operand, value, this.line);
  }

  private getRegister(name: 'rax' | 'rdx' | 'rsp' | 'rbp' | 'rsi'): bigint {
    return asUnsigned(this.state.registers[name]);
  }

  private setRegister(name: 'rax' | 'rdx' | 'rsp' | 'rbp', value: bigint): void {
    this.state.registers[name] = intValue(BigInt.asUintN(64, value));
  }

  /**
   * dest = op(dest, src) on the unsigned 64-bit views; returns the stored result
   */
  private integerOp(dest: Operand, src: Operand, op: (a: bigint, b: bigint) => bigint): bigint {
    const result = BigInt.asUintN(64, op(asUnsigned(this.read(dest)), asUnsigned(this.read(src))));
    this.write(dest, intValue(result));
    return result;
  }

  private unaryOp(dest: Operand, op: (a: bigint) => bigint): void {
    this.write(dest, intValue(BigInt.asUintN(64, op(asUnsigned(this.read(dest))))));
  }

  private floatOp(dest: Operand, src: Operand, op: (a: number, b: number) => number): void {
    this.write(dest, floatValue(op(asFloat(this.read(dest)), asFloat(this.read(src)))));
  }

  private push(value: Value): void {
    const sp = this.getRegister('rsp') - WORD_SIZE;
    this.setRegister('rsp', sp);
    writeMemory(this.state, BigInt.asUintN(64, sp), value);
  }

  private pop(): Value {
    const sp = this.getRegister('rsp');
    const value = readMemory(this.state, sp);
    this.setRegister('rsp', sp + WORD_SIZE);
    return value;
  }

  private targetIndex(target: Operand): { name: string; index: number | undefined } | null {
    if (target.kind !== 'label') {
      return null;
    }
    return { name: target.name, index: this.labels.get(target.name) };
  }

  // Instruction implementations

  private execMOVZX(dest: Operand, src: Operand, bytes: number): void {
    const { value } = this.operands.resolveNarrow(this.state, src, bytes, this.line);
    this.write(dest, intValue(value));
  }

  private execMOVSX(dest: Operand, src: Operand, bytes: number): void {
    const { value, bits } = this.operands.resolveNarrow(this.state, src, bytes, this.line);
    this.write(dest, intValue(BigInt.asUintN(64, BigInt.asIntN(bits, value))));
  }

  private execPUSH(operand: Operand): void {
    this.push(this.read(operand));
  }

  private execPOP(operand: Operand): void {
    const sp = this.getRegister('rsp');
    this.write(operand, readMemory(this.state, sp));
    this.setRegister('rsp', sp + WORD_SIZE);
  }

  private execIMUL(operands: Operand[]): void {
    const [dest, first, second] = operands;
    // Three-operand form: dest = first * imm
    const left = second === undefined ? this.read(dest) : this.read(first);
    const right = second === undefined ? this.read(first) : this.read(second);
    const product = asSigned(left) * asSigned(right);
    this.write(dest, intValue(BigInt.asUintN(64, product)));
  }

  private execIDIV(operand: Operand): void {
    const divisor = asSigned(this.read(operand));
    if (divisor === 0n) {
      this.diagnose('guarded-arithmetic', 'Integer division by zero skipped');
      return;
    }
    const dividend = BigInt.asIntN(64, this.getRegister('rax'));
    // bigint division truncates toward zero; remainder takes the dividend's sign
    this.setRegister('rax', dividend / divisor);
    this.setRegister('rdx', dividend % divisor);
  }

  private execCMP(dest: Operand, src: Operand): void {
    const a = asUnsigned(this.read(dest));
    const b = asUnsigned(this.read(src));
    const result = BigInt.asIntN(64, a - b);
    const flags = this.state.flags;
    flags.zero = result === 0n;
    flags.sign = result < 0n;
    flags.carry = a < b;
    flags.overflow = false;
  }

  private execTEST(dest: Operand, src: Operand): void {
    const result = BigInt.asIntN(64, asUnsigned(this.read(dest)) & asUnsigned(this.read(src)));
    this.state.flags.zero = result === 0n;
    this.state.flags.sign = result < 0n;
  }

  private execJump(target: Operand, taken: boolean): void {
    if (!taken) {
      return;
    }
    const resolved = this.targetIndex(target);
    if (!resolved || resolved.index === undefined) {
      this.diagnose('unresolved-transfer', `Jump target '${resolved?.name ?? 'operand'}' is not a label; falling through`);
      return;
    }
    this.state.cursor = resolved.index - 1;
  }

  private execSet(dest: Operand, condition: boolean): void {
    const bit = condition ? 1n : 0n;
    if (dest.kind === 'register' && dest.register.kind === 'general') {
      const register = dest.register;
      const width = register.width === 'high8' ? 'high8' : 8;
      const parent = asUnsigned(this.state.registers[register.parent]);
      this.state.registers[register.parent] = intValue(writeAlias(parent, width, bit));
      return;
    }
    this.write(dest, intValue(bit));
  }

  private execCALL(target: Operand): void {
    const resolved = this.targetIndex(target);
    if (!resolved) {
      this.diagnose('unresolved-transfer', 'Indirect call is not supported; falling through');
      return;
    }

    this.push(intValue(BigInt(this.state.cursor + 1)));
    this.state.callStack.push(resolved.name);

    if (resolved.index !== undefined) {
      this.state.cursor = resolved.index - 1;
      return;
    }

    // External routine: no body to enter, so execution continues after the call
    if (isPrintfSymbol(resolved.name)) {
      this.state.output.push(this.printfArgument());
      return;
    }
    this.diagnose('unresolved-transfer', `Call to undefined routine '${resolved.name}'; falling through`);
  }

  /**
   * The one argument the simulated printf shows: xmm0 when al (vector
   * argument count) is non-zero, otherwise rsi
   */
  private printfArgument(): string {
    if ((this.getRegister('rax') & VECTOR_COUNT_MASK) !== 0n) {
      return formatFloatOutput(this.state.floatRegisters[0]);
    }
    return formatIntegerOutput(this.getRegister('rsi'));
  }

  private execRET(): boolean {
    this.state.callStack.pop();
    const returnAddress = asUnsigned(this.pop());
    if (returnAddress === 0n) {
      this.state.halted = true;
      return false;
    }
    this.state.cursor = Number(returnAddress) - 1;
    return true;
  }

  private execLEAVE(): void {
    this.setRegister('rsp', this.getRegister('rbp'));
    this.setRegister('rbp', asUnsigned(this.pop()));
  }

  private execLEA(dest: Operand, src: Operand): void {
    if (src.kind === 'memory') {
      this.write(dest, intValue(this.operands.address(this.state, src)));
    } else if (src.kind === 'label') {
      this.write(dest, intValue(LABEL_PLACEHOLDER_ADDRESS));
    } else {
      this.diagnose('semantic-skip', 'lea needs a memory or label operand');
    }
  }

  private execCQO(): void {
    const negative = BigInt.asIntN(64, this.getRegister('rax')) < 0n;
    this.setRegister('rdx', negative ? MASK_64 : 0n);
  }

  private execCDQE(): void {
    this.setRegister('rax', BigInt.asIntN(32, this.getRegister('rax')));
  }

  private execDIVSD(dest: Operand, src: Operand): void {
    const divisor = asFloat(this.read(src));
    if (divisor === 0) {
      this.diagnose('guarded-arithmetic', 'Floating-point division by zero skipped');
      return;
    }
    this.write(dest, floatValue(asFloat(this.read(dest)) / divisor));
  }

  private execCVTSI2SD(dest: Operand, src: Operand, size: number | undefined): void {
    const narrow32 = size === 4 || (src.kind === 'register' && src.register.kind === 'general' && src.register.width === 32);
    const raw = asUnsigned(this.read(src));
    const integer = narrow32 ? BigInt.asIntN(32, raw) : BigInt.asIntN(64, raw);
    this.write(dest, floatValue(Number(integer)));
  }

  private execCVTTSD2SI(dest: Operand, src: Operand): void {
    const value = asFloat(this.read(src));
    // Out-of-range conversions produce the "integer indefinite" value
    const result = Number.isFinite(value) && Math.abs(value) < 2 ** 63
      ? BigInt(Math.trunc(value))
      : 1n << 63n;
    this.write(dest, intValue(BigInt.asUintN(64, result)));
  }
}

const UNARY_OPCODES: ReadonlySet<string> = new Set([
  'push', 'pop', 'idiv', 'inc', 'dec', 'neg', 'call',
]);

const KNOWN_BINARY_OR_UNARY: ReadonlySet<string> = new Set([
  ...UNARY_OPCODES,
  'mov', 'movzx', 'movsx', 'movsxd',
  'add', 'sub', 'imul',
  'cmp', 'test', 'lea',
  'xor', 'and', 'or',
  'movsd', 'addsd', 'subsd', 'mulsd', 'divsd',
  'xorpd', 'pxor', 'cvtsi2sd', 'cvttsd2si',
]);

function memorySize(operand: Operand | undefined): number | undefined {
  return operand?.kind === 'memory' ? operand.size : undefined;
}
