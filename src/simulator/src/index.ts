export { ExecutionController, DEFAULT_STEP_BUDGET } from './controller.js';
export type { LoadResult, StepResult } from './controller.js';
export { ExecutionEngine, formatFloatOutput, formatIntegerOutput, isPrintfSymbol } from './engine.js';
export type { ProgramImage } from './engine.js';
export { loadAssembly, constantValue, ENTRY_LABEL } from './loader.js';
export type { DataLiteral, Instruction, LoadOptions, LoadedProgram } from './loader.js';
export { createMachineState, cloneMachineState, readMemory, writeMemory } from './machine.js';
export type { Flags, MachineState } from './machine.js';
export { buildStateSnapshot, formatMemoryValue, formatRegister, END_OF_PROGRAM } from './presentation.js';
export type { MemoryCellView, SnapshotInput, StateSnapshot } from './presentation.js';
export { createDiagnostic, countDiagnostics } from './diagnostics.js';
export type { Diagnostic, DiagnosticKind } from './diagnostics.js';
export { parseOperand, describeOperand } from './operands.js';
export type { Operand, Syntax } from './operands.js';
export { GENERAL_REGISTERS, FLOAT_REGISTERS, INITIAL_STACK_POINTER, lookupRegister } from './registers.js';
export type { GeneralRegister, FloatRegister } from './registers.js';
export { asFloat, asSigned, asUnsigned, toHex } from './values.js';
export type { Value } from './values.js';
