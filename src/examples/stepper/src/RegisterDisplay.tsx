/**
 * Register Display Component
 * Shows general registers, the first vector registers and the flags
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { StateSnapshot } from '../../../simulator/src/index.js';
import { formatFlags, registerRows } from './format.js';

interface RegisterDisplayProps {
  snapshot: StateSnapshot;
  previous: StateSnapshot | null;
}

const VECTOR_REGISTERS_SHOWN = 4;

export const RegisterDisplay: React.FC<RegisterDisplayProps> = ({ snapshot, previous }) => {
  const rows = registerRows(snapshot.registers).map((row, rowIndex) => (
    <Box key={rowIndex}>
      {row.map(({ name, value }) => {
        const changed = previous !== null && previous.registers[name] !== value;
        return (
          <Box key={name} width={26}>
            <Text>{name.padStart(3)}: </Text>
            <Text color={changed ? 'yellow' : undefined} bold={changed}>{value}</Text>
          </Box>
        );
      })}
    </Box>
  ));

  const vectors: JSX.Element[] = [];
  for (let i = 0; i < VECTOR_REGISTERS_SHOWN; i++) {
    const name = `xmm${i}`;
    vectors.push(
      <Box key={name} width={26}>
        <Text>{name}: {String(snapshot.floatRegisters[name] ?? 0)}</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      {rows}
      <Box>{vectors}</Box>
      <Text>{formatFlags(snapshot.flags)}</Text>
    </Box>
  );
};
