/**
 * Main App Component
 * Loads one program and steps it from the keyboard
 */

import React, { useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import { ExecutionController, type StateSnapshot, type Syntax } from '../../../simulator/src/index.js';
import { RegisterDisplay } from './RegisterDisplay.js';
import { StackView } from './StackView.js';
import { statusLine } from './format.js';

interface AppProps {
  fileName: string;
  source: string;
  syntax?: Syntax;
  runBudget: number;
}

const STACK_ROWS = 12;
const OUTPUT_ROWS = 6;

export const App: React.FC<AppProps> = ({ fileName, source, syntax, runBudget }) => {
  const { exit } = useApp();
  const [controller] = useState(() => {
    const created = new ExecutionController();
    created.load(source, syntax === undefined ? {} : { syntax });
    return created;
  });
  const [snapshot, setSnapshot] = useState<StateSnapshot>(() => controller.getState());
  const [previous, setPrevious] = useState<StateSnapshot | null>(null);
  const [message, setMessage] = useState<string | null>(null);

  const refresh = (note: string | null): void => {
    setPrevious(snapshot);
    setSnapshot(controller.getState());
    setMessage(note);
  };

  useInput((input, key) => {
    if (key.escape || input === 'q') {
      exit();
      return;
    }

    if (input === ' ' || key.return) {
      if (snapshot.halted) {
        setMessage('Program finished - press b to step back or 0 to reset');
        return;
      }
      controller.step();
      refresh(null);
    } else if (input === 'b') {
      refresh(controller.stepBack() ? null : 'Nothing to step back to');
    } else if (input === 'r') {
      const steps = controller.run(-1, runBudget);
      refresh(`Ran ${steps} step(s)${controller.halted ? '' : ' (budget reached)'}`);
    } else if (input === '0') {
      controller.reset();
      refresh('Reset');
    }
  });

  const output = snapshot.output.slice(-OUTPUT_ROWS);
  const runtimeDiagnostics = snapshot.diagnostics.slice(-3);

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold>
        Stepping: {fileName}
      </Text>
      <Text dimColor>
        Space/Enter step, b back, r run, 0 reset, Esc quit
      </Text>
      <Text> </Text>

      <RegisterDisplay snapshot={snapshot} previous={previous} />
      <Text> </Text>

      <Box>
        <Box flexDirection="column" width={64}>
          <Text underline>Stack</Text>
          <StackView stack={snapshot.stack} rows={STACK_ROWS} />
        </Box>
        <Box flexDirection="column">
          <Text underline>Call stack</Text>
          {snapshot.callStack.length === 0
            ? <Text dimColor>(main)</Text>
            : snapshot.callStack.map((name, index) => <Text key={index}>{name}</Text>)}
          <Text> </Text>
          <Text underline>Output</Text>
          {output.map((line, index) => <Text key={index} color="green">{line}</Text>)}
        </Box>
      </Box>
      <Text> </Text>

      <Text>
        <Text bold color={snapshot.halted ? 'green' : 'cyan'}>{statusLine(snapshot)}</Text>
      </Text>
      {runtimeDiagnostics.map((diagnostic, index) => (
        <Text key={index} color={diagnostic.severity === 'error' ? 'red' : 'yellow'}>
          line {diagnostic.line}: {diagnostic.message}
        </Text>
      ))}
      {message && <Text dimColor>{message}</Text>}
    </Box>
  );
};
