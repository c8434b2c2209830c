/**
 * Execution engine tests
 *
 * Straight-line programs run one instruction at a time against a fresh
 * machine state; control flow and undo live in controller.test.ts.
 */

import { describe, it, expect } from 'vitest';
import { ExecutionEngine, formatFloatOutput, formatIntegerOutput, isPrintfSymbol } from './engine.js';
import { loadAssembly } from './loader.js';
import { createMachineState, type MachineState } from './machine.js';
import type { Syntax } from './operands.js';
import { INITIAL_STACK_POINTER } from './registers.js';

function runLinear(source: string, syntax: Syntax = 'intel'): MachineState {
  const program = loadAssembly(source, { syntax });
  const engine = new ExecutionEngine(program);
  const state = createMachineState(program.entryIndex);
  while (!state.halted && state.cursor < program.instructions.length) {
    engine.execute(program.instructions[state.cursor], state);
    state.cursor++;
  }
  return state;
}

const int = (value: bigint) => ({ kind: 'int', value: BigInt.asUintN(64, value) });

describe('ExecutionEngine', () => {
  describe('integer arithmetic', () => {
    it('should wrap add at 64 bits', () => {
      const state = runLinear('mov rax, 0xFFFFFFFFFFFFFFFF\nadd rax, 2');
      expect(state.registers.rax).toEqual(int(1n));
    });

    it('should wrap sub below zero', () => {
      const state = runLinear('mov rax, 1\nsub rax, 2');
      expect(state.registers.rax).toEqual(int(-1n));
    });

    it('should multiply in both imul forms', () => {
      expect(runLinear('mov rax, 6\nimul rax, 7').registers.rax).toEqual(int(42n));
      expect(runLinear('mov rbx, -3\nimul rax, rbx, 4').registers.rax).toEqual(int(-12n));
    });

    it('should apply inc, dec and neg', () => {
      expect(runLinear('mov rax, 5\ninc rax').registers.rax).toEqual(int(6n));
      expect(runLinear('dec rax').registers.rax).toEqual(int(-1n));
      expect(runLinear('mov rax, 5\nneg rax').registers.rax).toEqual(int(-5n));
    });

    it('should truncate idiv toward zero', () => {
      const state = runLinear('mov rax, -7\ncqo\nmov rcx, 2\nidiv rcx');
      expect(state.registers.rax).toEqual(int(-3n));
      expect(state.registers.rdx).toEqual(int(-1n));
    });

    it('should skip idiv by zero with a diagnostic', () => {
      const state = runLinear('mov rax, 9\nmov rcx, 0\nidiv rcx');
      expect(state.registers.rax).toEqual(int(9n));
      expect(state.diagnostics).toHaveLength(1);
      expect(state.diagnostics[0].kind).toBe('guarded-arithmetic');
      expect(state.diagnostics[0].line).toBe(3);
    });

    it('should sign-fill rdx on cqo', () => {
      expect(runLinear('mov rax, -1\ncqo').registers.rdx).toEqual(int(-1n));
      expect(runLinear('mov rdx, 9\nmov rax, 1\ncqo').registers.rdx).toEqual(int(0n));
    });

    it('should sign-extend eax on cdqe', () => {
      expect(runLinear('mov eax, 0xFFFFFFFE\ncdqe').registers.rax).toEqual(int(-2n));
    });
  });

  describe('register widths', () => {
    it('should zero-extend 32-bit writes', () => {
      expect(runLinear('mov rax, -1\nmov eax, 5').registers.rax).toEqual(int(5n));
    });

    it('should merge 16-bit writes', () => {
      expect(runLinear('mov rax, -1\nmov ax, 0').registers.rax).toEqual(int(0xFFFF_FFFF_FFFF_0000n));
    });

    it('should zero-extend with movzx and sign-extend with movsx', () => {
      expect(runLinear('mov rax, 0x1FF\nmovzx rbx, al').registers.rbx).toEqual(int(0xFFn));
      expect(runLinear('mov rax, 0xFF\nmovsx rbx, al').registers.rbx).toEqual(int(-1n));
    });

    it('should read through AT&T extension suffixes', () => {
      const state = runLinear('movq $0x180, %rax\nmovzbl %al, %ecx\nmovsbq %al, %rdx', 'att');
      expect(state.registers.rcx).toEqual(int(0x80n));
      expect(state.registers.rdx).toEqual(int(-128n));
    });
  });

  describe('flags', () => {
    it('should set sign and carry when cmp finds dest below src', () => {
      const state = runLinear('mov rax, 3\ncmp rax, 5');
      expect(state.flags).toEqual({ zero: false, sign: true, carry: true, overflow: false });
    });

    it('should set zero on equal compare', () => {
      const state = runLinear('mov rax, 3\ncmp rax, 3');
      expect(state.flags).toEqual({ zero: true, sign: false, carry: false, overflow: false });
    });

    it('should take sign from the wrapped difference', () => {
      const state = runLinear('mov rax, 0x8000000000000000\ncmp rax, 1');
      expect(state.flags.sign).toBe(false);
      expect(state.flags.carry).toBe(false);
      expect(state.flags.overflow).toBe(false);
    });

    it('should leave carry alone on test', () => {
      const state = runLinear('mov rax, 1\ncmp rax, 2\nmov rbx, 0\ntest rbx, rbx');
      expect(state.flags).toEqual({ zero: true, sign: false, carry: true, overflow: false });
    });

    it('should set zero from xor', () => {
      const state = runLinear('mov rax, 5\nxor rax, rax');
      expect(state.registers.rax).toEqual(int(0n));
      expect(state.flags.zero).toBe(true);
    });

    it('should not touch flags on add', () => {
      const state = runLinear('mov rax, 3\ncmp rax, 3\nadd rax, 1');
      expect(state.flags.zero).toBe(true);
    });

    it('should write the condition into the low byte only', () => {
      const state = runLinear('mov rax, -1\nmov rbx, 3\ncmp rbx, 5\nsetl al');
      expect(state.registers.rax).toEqual(int(0xFFFF_FFFF_FFFF_FF01n));
    });

    it('should evaluate unsigned conditions from carry', () => {
      const state = runLinear('mov rbx, 3\ncmp rbx, 5\nsetb cl\nseta dl');
      expect(state.registers.rcx).toEqual(int(1n));
      expect(state.registers.rdx).toEqual(int(0n));
    });
  });

  describe('stack', () => {
    it('should push and pop through memory', () => {
      const state = runLinear('mov rax, 42\npush rax\npop rbx');
      expect(state.registers.rbx).toEqual(int(42n));
      expect(state.registers.rsp).toEqual(int(INITIAL_STACK_POINTER));
      expect(state.memory.get(INITIAL_STACK_POINTER - 8n)).toEqual(int(42n));
    });

    it('should unwind a frame with leave', () => {
      const state = runLinear('push rbp\nmov rbp, rsp\nsub rsp, 16\nleave');
      expect(state.registers.rsp).toEqual(int(INITIAL_STACK_POINTER));
      expect(state.registers.rbp).toEqual(int(0n));
    });

    it('should read unwritten memory as zero', () => {
      expect(runLinear('mov rax, 7\nmov rax, QWORD PTR [rsp-64]').registers.rax).toEqual(int(0n));
    });
  });

  describe('lea', () => {
    it('should compute the effective address', () => {
      expect(runLinear('mov rbp, 100\nlea rax, [rbp-8]').registers.rax).toEqual(int(92n));
    });

    it('should give labels the placeholder address', () => {
      expect(runLinear('lea rdi, [rip+msg]').registers.rdi).toEqual(int(0x1000n));
    });
  });

  describe('floating point', () => {
    const data = '.data\n.LC0:\n.double 1.5\n.text\n';

    it('should load a constant and add', () => {
      const state = runLinear(`${data}movsd xmm0, QWORD PTR .LC0[rip]\naddsd xmm0, xmm0`);
      expect(state.floatRegisters[0]).toBe(3);
    });

    it('should multiply and subtract', () => {
      const state = runLinear(`${data}movsd xmm0, [rip+.LC0]\nmovsd xmm1, xmm0\nmulsd xmm0, xmm1\nsubsd xmm0, xmm1`);
      expect(state.floatRegisters[0]).toBe(0.75);
    });

    it('should skip divsd by zero', () => {
      const state = runLinear(`${data}movsd xmm0, [rip+.LC0]\ndivsd xmm0, xmm1`);
      expect(state.floatRegisters[0]).toBe(1.5);
      expect(state.diagnostics.map((d) => d.kind)).toEqual(['guarded-arithmetic']);
    });

    it('should convert between integers and doubles', () => {
      const state = runLinear(`${data}mov rax, -4\ncvtsi2sd xmm1, rax\nmovsd xmm0, [rip+.LC0]\ncvttsd2si rbx, xmm0`);
      expect(state.floatRegisters[1]).toBe(-4);
      expect(state.registers.rbx).toEqual(int(1n));
    });

    it('should keep the float tag when moved to a general register', () => {
      const state = runLinear(`${data}movsd xmm0, [rip+.LC0]\nmovq rax, xmm0`);
      expect(state.registers.rax).toEqual({ kind: 'float', value: 1.5 });
    });

    it('should clear with xorpd', () => {
      const state = runLinear(`${data}movsd xmm0, [rip+.LC0]\nxorpd xmm0, xmm0`);
      expect(state.floatRegisters[0]).toBe(0);
    });
  });

  describe('external calls', () => {
    it('should print rsi as an integer when al is zero', () => {
      const state = runLinear(
        'movq $7, %rsi\nleaq int_fmt(%rip), %rdi\nmovl $0, %eax\ncall printf@PLT',
        'att'
      );
      expect(state.output).toEqual(['7']);
      expect(state.registers.rsp).toEqual(int(INITIAL_STACK_POINTER - 8n));
      expect(state.memory.get(INITIAL_STACK_POINTER - 8n)).toEqual(int(4n));
      expect(state.callStack).toEqual(['printf@PLT']);
    });

    it('should print 32-bit negative values as negative', () => {
      const state = runLinear('movl $-5, %esi\nmovl $0, %eax\ncall printf', 'att');
      expect(state.output).toEqual(['-5']);
    });

    it('should print xmm0 when al is non-zero', () => {
      const state = runLinear(
        '.section .rodata\n.LC0:\n.double 2.5\n.text\nmovsd .LC0(%rip), %xmm0\nmovl $1, %eax\ncall printf@PLT',
        'att'
      );
      expect(state.output).toEqual(['2.500000']);
    });

    it('should fall through other external calls with a diagnostic', () => {
      const state = runLinear('call puts\nmov rax, 1');
      expect(state.registers.rax).toEqual(int(1n));
      expect(state.registers.rsp).toEqual(int(INITIAL_STACK_POINTER - 8n));
      expect(state.callStack).toEqual(['puts']);
      expect(state.diagnostics.map((d) => d.kind)).toEqual(['unresolved-transfer']);
    });
  });

  describe('unresolved jumps', () => {
    it('should fall through a taken jmp to an undefined label', () => {
      const program = loadAssembly('jmp nowhere\nmov rax, 1', { syntax: 'intel' });
      const engine = new ExecutionEngine(program);
      const state = createMachineState(program.entryIndex);

      engine.execute(program.instructions[0], state);
      state.cursor++;
      expect(state.cursor).toBe(1);
      expect(state.diagnostics.map((d) => d.kind)).toEqual(['unresolved-transfer']);

      engine.execute(program.instructions[1], state);
      expect(state.registers.rax).toEqual(int(1n));
    });

    it('should fall through a taken je to an undefined label', () => {
      const state = runLinear('cmp rax, 0\nje missing\nmov rbx, 2');
      expect(state.flags.zero).toBe(true);
      expect(state.registers.rbx).toEqual(int(2n));
      expect(state.diagnostics).toHaveLength(1);
      expect(state.diagnostics[0].kind).toBe('unresolved-transfer');
    });

    it('should not diagnose an untaken jump to an undefined label', () => {
      const state = runLinear('mov rax, 1\ncmp rax, 0\nje missing');
      expect(state.diagnostics).toEqual([]);
    });
  });

  describe('no-ops', () => {
    it('should skip unknown opcodes', () => {
      const state = runLinear('frobnicate rax');
      expect(state.diagnostics[0]).toEqual({
        kind: 'semantic-skip',
        line: 1,
        message: "Unsupported instruction 'frobnicate'",
        severity: 'warning',
      });
    });

    it('should refuse to write an immediate', () => {
      const state = runLinear('mov 5, rax');
      expect(state.diagnostics[0].message).toBe('Cannot write to 5');
    });

    it('should read a missing constant as zero', () => {
      const state = runLinear('mov rax, 3\nmov rax, QWORD PTR [rip+missing]');
      expect(state.registers.rax).toEqual(int(0n));
      expect(state.diagnostics[0].kind).toBe('semantic-skip');
    });

    it('should skip instructions missing operands', () => {
      const state = runLinear('add rax');
      expect(state.diagnostics[0].message).toBe("'add' expects 2 operand(s), got 1");
    });
  });

  describe('formatting', () => {
    it('should format integers like %ld', () => {
      expect(formatIntegerOutput(42n)).toBe('42');
      expect(formatIntegerOutput(0xFFFF_FFFFn)).toBe('-1');
      expect(formatIntegerOutput(0x1_0000_0000n)).toBe('4294967296');
      expect(formatIntegerOutput(-3n)).toBe('-3');
    });

    it('should format doubles like %f', () => {
      expect(formatFloatOutput(3.14159265)).toBe('3.141593');
      expect(formatFloatOutput(NaN)).toBe('nan');
      expect(formatFloatOutput(-Infinity)).toBe('-inf');
    });

    it('should recognize printf symbols', () => {
      expect(isPrintfSymbol('printf')).toBe(true);
      expect(isPrintfSymbol('printf@PLT')).toBe(true);
      expect(isPrintfSymbol('puts')).toBe(false);
    });
  });
});
