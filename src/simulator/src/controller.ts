/**
 * Execution controller
 *
 * Owns one loaded program and its machine state. Every forward step pushes
 * a full snapshot first, so stepping back is a pop-and-restore and the
 * history depth always equals the number of net forward steps.
 */

import type { Diagnostic } from './diagnostics.js';
import { ExecutionEngine } from './engine.js';
import { loadAssembly, type Instruction, type LoadOptions, type LoadedProgram } from './loader.js';
import { cloneMachineState, createMachineState, type MachineState } from './machine.js';
import { buildStateSnapshot, type StateSnapshot } from './presentation.js';

export const DEFAULT_STEP_BUDGET = 10_000;

export interface LoadResult {
  entryIndex: number;
  instructionCount: number;
  instructions: string[]; // source text per instruction index
  diagnostics: Diagnostic[];
}

export interface StepResult {
  canContinue: boolean;
}

export class ExecutionController {
  private program: LoadedProgram;
  private engine: ExecutionEngine;
  private state: MachineState;
  private history: MachineState[] = [];

  constructor() {
    this.program = loadAssembly('');
    this.engine = new ExecutionEngine(this.program);
    this.state = createMachineState(this.program.entryIndex);
  }

  /**
   * Load assembly text, discarding all previous state
   */
  load(text: string, options: LoadOptions = {}): LoadResult {
    this.program = loadAssembly(text, options);
    this.engine = new ExecutionEngine(this.program);
    this.state = createMachineState(this.program.entryIndex);
    this.history = [];

    return {
      entryIndex: this.program.entryIndex,
      instructionCount: this.program.instructions.length,
      instructions: this.program.instructions.map((instruction) => instruction.text),
      diagnostics: [...this.program.diagnostics],
    };
  }

  get instructionCount(): number {
    return this.program.instructions.length;
  }

  get cursor(): number {
    return this.state.cursor;
  }

  get historyDepth(): number {
    return this.history.length;
  }

  get halted(): boolean {
    return this.state.halted || this.state.cursor >= this.instructionCount;
  }

  get canStepBack(): boolean {
    return this.history.length > 0;
  }

  get canStepForward(): boolean {
    return !this.halted;
  }

  /**
   * Instruction at the cursor, or null once execution has ended
   */
  get currentInstruction(): Instruction | null {
    if (this.state.halted) {
      return null;
    }
    return this.program.instructions[this.state.cursor] ?? null;
  }

  /**
   * Execute the instruction at the cursor
   */
  step(): StepResult {
    const instruction = this.currentInstruction;
    if (!instruction) {
      return { canContinue: false };
    }

    this.history.push(cloneMachineState(this.state));

    const proceed = this.engine.execute(instruction, this.state);
    // Keep the cursor within [0, count] whatever the program did to it
    this.state.cursor = Math.min(Math.max(this.state.cursor + 1, 0), this.instructionCount);

    return { canContinue: proceed && this.state.cursor < this.instructionCount };
  }

  /**
   * Undo the most recent step. Returns false, changing nothing, when there
   * is no history.
   */
  stepBack(): boolean {
    const previous = this.history.pop();
    if (!previous) {
      return false;
    }
    this.state = previous;
    return true;
  }

  /**
   * Step until the cursor reaches the breakpoint, the budget runs out or the
   * program ends. The breakpoint is checked before every step, the first
   * included, so a run started on it executes nothing.
   *
   * @returns Number of instructions executed
   */
  run(breakpointIndex: number = -1, stepBudget: number = DEFAULT_STEP_BUDGET): number {
    let steps = 0;

    while (steps < stepBudget) {
      if (this.state.cursor === breakpointIndex) {
        break;
      }
      if (!this.currentInstruction) {
        break;
      }
      const { canContinue } = this.step();
      steps++;
      if (!canContinue) {
        break;
      }
    }

    return steps;
  }

  /**
   * Rewind to the state right after load
   */
  reset(): void {
    while (this.stepBack()) {
      // unwind
    }
  }

  getState(): StateSnapshot {
    return buildStateSnapshot({
      state: this.state,
      instruction: this.currentInstruction,
      loadDiagnostics: this.program.diagnostics,
      historyDepth: this.history.length,
      canStepBack: this.canStepBack,
      canStepForward: this.canStepForward,
    });
  }

  /**
   * Copy of the raw machine state (for comparisons in tooling and tests)
   */
  getMachineState(): MachineState {
    return cloneMachineState(this.state);
  }
}
