import type { Syntax } from '../../../simulator/src/index.js';

export const USAGE = 'Usage: x86-stepper <file.s> [--intel | --att]';

export type StepperArgs =
  | { ok: true; file: string; syntax?: Syntax }
  | { ok: false; error: string };

/**
 * Parse command-line arguments (without the node and script entries).
 * Without a dialect flag the file picks its own via .intel_syntax/.att_syntax.
 */
export function parseStepperArgs(argv: string[]): StepperArgs {
  let file: string | null = null;
  let syntax: Syntax | undefined;

  for (const arg of argv) {
    if (arg === '--intel' || arg === '--att') {
      const requested: Syntax = arg === '--intel' ? 'intel' : 'att';
      if (syntax !== undefined && syntax !== requested) {
        return { ok: false, error: 'Choose one of --intel and --att' };
      }
      syntax = requested;
    } else if (arg.startsWith('-')) {
      return { ok: false, error: `Unknown option ${arg}` };
    } else if (file === null) {
      file = arg;
    } else {
      return { ok: false, error: `Unexpected argument ${arg}` };
    }
  }

  if (file === null) {
    return { ok: false, error: USAGE };
  }
  return syntax === undefined ? { ok: true, file } : { ok: true, file, syntax };
}
