/**
 * Operand resolution
 *
 * Reading a value out of an operand and writing one back into it, against
 * a machine state. Registers are read at full parent width; writes follow
 * the alias rules in registers.ts.
 */

import { createDiagnostic } from './diagnostics.js';
import { constantValue, type DataLiteral } from './loader.js';
import { readMemory, writeMemory, type MachineState } from './machine.js';
import { describeOperand, type MemoryOperand, type Operand } from './operands.js';
import { readAlias, widthInBits, writeAlias, type FloatRegister } from './registers.js';
import { ZERO, asFloat, asUnsigned, floatValue, intValue, type Value } from './values.js';

// Address handed out for a label reference; there is no relocation
export const LABEL_PLACEHOLDER_ADDRESS = 0x1000n;

export function floatRegisterIndex(name: FloatRegister): number {
  return parseInt(name.substring(3), 10);
}

export class OperandResolver {
  private readonly data: ReadonlyMap<string, DataLiteral>;

  constructor(data: ReadonlyMap<string, DataLiteral>) {
    this.data = data;
  }

  /**
   * Effective address of a memory operand: base register + offset
   */
  address(state: MachineState, operand: MemoryOperand): bigint {
    const base = asUnsigned(state.registers[operand.base.parent]);
    return BigInt.asUintN(64, base + operand.offset);
  }

  resolve(state: MachineState, operand: Operand, line: number): Value {
    switch (operand.kind) {
      case 'immediate':
        return intValue(BigInt.asUintN(64, operand.value));

      case 'register': {
        const register = operand.register;
        if (register.kind === 'float') {
          return floatValue(state.floatRegisters[floatRegisterIndex(register.name)]);
        }
        return state.registers[register.parent];
      }

      case 'memory':
        return readMemory(state, this.address(state, operand));

      case 'label': {
        if (!operand.ripRelative) {
          return intValue(LABEL_PLACEHOLDER_ADDRESS);
        }
        const data = this.data.get(operand.name);
        const constant = data ? constantValue(data) : null;
        if (constant) {
          return constant;
        }
        state.diagnostics.push(createDiagnostic(
          'semantic-skip',
          line,
          `No constant value for ${operand.name}; read as 0`
        ));
        return ZERO;
      }
    }
  }

  /**
   * Narrow view of a source operand: registers through their alias width,
   * everything else masked to `bytes`
   */
  resolveNarrow(state: MachineState, operand: Operand, bytes: number, line: number): { value: bigint; bits: number } {
    if (operand.kind === 'register' && operand.register.kind === 'general') {
      const width = operand.register.width;
      return { value: readAlias(asUnsigned(state.registers[operand.register.parent]), width), bits: widthInBits(width) };
    }
    const bits = bytes * 8;
    return { value: BigInt.asUintN(bits, asUnsigned(this.resolve(state, operand, line))), bits };
  }

  /**
   * Write a value to an operand. Returns false (with a diagnostic) when the
   * operand cannot be written.
   */
  assign(state: MachineState, operand: Operand, value: Value, line: number): boolean {
    switch (operand.kind) {
      case 'register': {
        const register = operand.register;
        if (register.kind === 'float') {
          state.floatRegisters[floatRegisterIndex(register.name)] = asFloat(value);
          return true;
        }
        if (register.width === 64) {
          state.registers[register.parent] = value.kind === 'float'
            ? value
            : intValue(BigInt.asUintN(64, value.value));
          return true;
        }
        const parent = asUnsigned(state.registers[register.parent]);
        state.registers[register.parent] = intValue(writeAlias(parent, register.width, asUnsigned(value)));
        return true;
      }

      case 'memory':
        writeMemory(state, this.address(state, operand), value);
        return true;

      case 'immediate':
      case 'label':
        state.diagnostics.push(createDiagnostic(
          'semantic-skip',
          line,
          `Cannot write to ${describeOperand(operand)}`
        ));
        return false;
    }
  }
}
