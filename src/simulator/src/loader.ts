/**
 * Assembly loader
 *
 * Single pass over the source text that produces:
 * - the instruction list (operands normalized to destination-first order)
 * - the label table (label name -> instruction index)
 * - the data section (label -> literal)
 *
 * Lines that do not match any recognized shape are dropped and recorded
 * as parse-skip diagnostics; loading never throws.
 */

import { createDiagnostic, type Diagnostic } from './diagnostics.js';
import { normalizeAttMnemonic, normalizeIntelMnemonic, type SuffixSize } from './opcodes.js';
import { parseInteger, parseOperand, splitOperands, type Operand, type Syntax } from './operands.js';
import { floatValue, intValue, type Value } from './values.js';

export interface Instruction {
  opcode: string;
  operands: Operand[]; // destination first
  sourceLine: number;  // 1-based
  text: string;        // source text as written, for display
  size?: SuffixSize;
}

export interface DataLiteral {
  directive: string; // e.g. 'double', 'asciz', 'quad'
  literal: string;
  line: number;
}

export interface LoadedProgram {
  instructions: Instruction[];
  labels: Map<string, number>;
  data: Map<string, DataLiteral>;
  entryIndex: number;
  diagnostics: Diagnostic[];
  syntax: Syntax; // dialect in effect at the end of the text
}

export interface LoadOptions {
  // Fixes the dialect and ignores .intel_syntax/.att_syntax. Without it the
  // text starts in initialSyntax (AT&T by default) and switches at those
  // directives.
  syntax?: Syntax;
  initialSyntax?: Syntax;
}

export const ENTRY_LABEL = 'main';

const LABEL_DEFINITION = /^([A-Za-z_.$][\w.$@]*):(.*)$/;

const DATA_DIRECTIVES = new Set([
  'double', 'float', 'quad', 'long', 'int', 'word', 'short', 'byte',
  'ascii', 'asciz', 'string', 'zero',
]);

/**
 * Remove a trailing # or ; comment that is not inside a string literal
 */
function removeComment(line: string): string {
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (inString) {
      if (char === '\\') i++;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === '#' || char === ';') {
      return line.substring(0, i);
    }
  }
  return line;
}

/**
 * Constant value of a data literal, for the rip-relative load paths
 */
export function constantValue(data: DataLiteral): Value | null {
  const first = splitOperands(data.literal)[0] ?? '';
  switch (data.directive) {
    case 'double':
    case 'float': {
      const value = Number(first);
      return first.length > 0 && !Number.isNaN(value) ? floatValue(value) : null;
    }
    case 'quad':
    case 'long':
    case 'int':
    case 'word':
    case 'short':
    case 'byte': {
      const value = parseInteger(first);
      return value === null ? null : intValue(BigInt.asUintN(64, value));
    }
    case '': {
      const integer = parseInteger(first);
      if (integer !== null) {
        return intValue(BigInt.asUintN(64, integer));
      }
      const value = Number(first);
      return first.length > 0 && !Number.isNaN(value) ? floatValue(value) : null;
    }
    default:
      return null;
  }
}

type Mode = 'code' | 'data';

class Loader {
  private readonly instructions: Instruction[] = [];
  private readonly labels = new Map<string, number>();
  private readonly data = new Map<string, DataLiteral>();
  private readonly diagnostics: Diagnostic[] = [];

  private mode: Mode = 'code';
  private syntax: Syntax;
  private readonly syntaxFixed: boolean;
  private pendingDataLabel: string | null = null;

  constructor(options: LoadOptions) {
    this.syntax = options.syntax ?? options.initialSyntax ?? 'att';
    this.syntaxFixed = options.syntax !== undefined;
  }

  load(text: string): LoadedProgram {
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const trimmed = lines[i].trim();
      if (trimmed.length === 0 || trimmed.startsWith('#') || trimmed.startsWith(';')) {
        continue;
      }
      const line = removeComment(trimmed).trim();
      if (line.length > 0) {
        this.processLine(line, i + 1);
      }
    }

    return {
      instructions: this.instructions,
      labels: this.labels,
      data: this.data,
      entryIndex: this.labels.get(ENTRY_LABEL) ?? 0,
      diagnostics: this.diagnostics,
      syntax: this.syntax,
    };
  }

  private processLine(line: string, lineNumber: number): void {
    const labelMatch = line.match(LABEL_DEFINITION);
    if (labelMatch) {
      const label = labelMatch[1];
      const rest = labelMatch[2].trim();
      if (this.mode === 'data') {
        if (rest.length > 0 && !rest.startsWith('.')) {
          // label: literal, without a directive
          this.data.set(label, { directive: '', literal: rest, line: lineNumber });
          return;
        }
        this.pendingDataLabel = label;
      } else {
        this.labels.set(label, this.instructions.length);
      }
      if (rest.length > 0) {
        this.processLine(rest, lineNumber);
      }
      return;
    }

    if (line.startsWith('.')) {
      this.processDirective(line, lineNumber);
      return;
    }

    if (this.mode === 'data') {
      this.skip(lineNumber, `Unrecognized line in data section: ${line}`);
      return;
    }

    this.processInstruction(line, lineNumber);
  }

  private processDirective(line: string, lineNumber: number): void {
    const parts = line.split(/\s+/);
    const name = parts[0].substring(1).toLowerCase();
    const args = line.substring(parts[0].length).trim();

    switch (name) {
      case 'text':
        this.mode = 'code';
        return;
      case 'data':
      case 'bss':
      case 'rodata':
        this.mode = 'data';
        return;
      case 'section':
        this.mode = args.startsWith('.text') ? 'code' : 'data';
        return;
      case 'global':
      case 'globl':
        this.mode = 'code';
        return;
      case 'intel_syntax':
        this.switchSyntax('intel');
        return;
      case 'att_syntax':
        this.switchSyntax('att');
        return;
    }

    if (DATA_DIRECTIVES.has(name) && this.mode === 'data') {
      if (this.pendingDataLabel === null) {
        // Continuation of an earlier literal (e.g. a second .quad); nothing to bind
        return;
      }
      this.data.set(this.pendingDataLabel, { directive: name, literal: args, line: lineNumber });
      this.pendingDataLabel = null;
    }
    // Alignment, symbol type/size, debug info and similar directives carry
    // nothing the interpreter uses.
  }

  private switchSyntax(syntax: Syntax): void {
    this.mode = 'code';
    if (!this.syntaxFixed) {
      this.syntax = syntax;
    }
  }

  private processInstruction(line: string, lineNumber: number): void {
    const spaceIndex = line.search(/\s/);
    const mnemonic = spaceIndex < 0 ? line : line.substring(0, spaceIndex);
    const operandText = spaceIndex < 0 ? '' : line.substring(spaceIndex + 1).trim();

    if (!/^[A-Za-z][\w]*$/.test(mnemonic)) {
      this.skip(lineNumber, `Malformed instruction: ${line}`);
      return;
    }

    const normalized = this.syntax === 'att'
      ? normalizeAttMnemonic(mnemonic)
      : normalizeIntelMnemonic(mnemonic);

    const operands: Operand[] = [];
    for (const token of splitOperands(operandText)) {
      const operand = parseOperand(token, this.syntax);
      if (!operand) {
        this.skip(lineNumber, `Unrecognized operand '${token}' in: ${line}`);
        return;
      }
      operands.push(operand);
    }

    // AT&T lists the source first
    if (this.syntax === 'att') {
      operands.reverse();
    }

    const instruction: Instruction = {
      opcode: normalized.opcode,
      operands,
      sourceLine: lineNumber,
      text: line,
    };
    if (normalized.size !== undefined) {
      instruction.size = normalized.size;
    }
    this.instructions.push(instruction);
  }

  private skip(lineNumber: number, message: string): void {
    this.diagnostics.push(createDiagnostic('parse-skip', lineNumber, message));
  }
}

/**
 * Load assembly text into an executable program
 */
export function loadAssembly(text: string, options: LoadOptions = {}): LoadedProgram {
  return new Loader(options).load(text);
}
