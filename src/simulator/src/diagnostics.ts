/**
 * Diagnostics
 *
 * The interpreter never throws on malformed input. Every line it drops and
 * every instruction it turns into a no-op leaves one of these behind so a
 * caller can tell an ignored construct from a broken one.
 */

export type DiagnosticKind =
  | 'parse-skip'          // source line dropped at load time
  | 'semantic-skip'       // unknown opcode or unusable operand, executed as a no-op
  | 'guarded-arithmetic'  // division by zero turned into a no-op
  | 'unresolved-transfer'; // jump or call to a label that is not defined

export interface Diagnostic {
  kind: DiagnosticKind;
  line: number; // 1-based source line
  message: string;
  severity: 'error' | 'warning' | 'info';
}

const SEVERITY: Record<DiagnosticKind, Diagnostic['severity']> = {
  'parse-skip': 'error',
  'semantic-skip': 'warning',
  'guarded-arithmetic': 'warning',
  'unresolved-transfer': 'info',
};

export function createDiagnostic(kind: DiagnosticKind, line: number, message: string): Diagnostic {
  return { kind, line, message, severity: SEVERITY[kind] };
}

/**
 * Count diagnostics per kind
 */
export function countDiagnostics(diagnostics: readonly Diagnostic[]): Record<DiagnosticKind, number> {
  const counts: Record<DiagnosticKind, number> = {
    'parse-skip': 0,
    'semantic-skip': 0,
    'guarded-arithmetic': 0,
    'unresolved-transfer': 0,
  };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.kind]++;
  }
  return counts;
}
