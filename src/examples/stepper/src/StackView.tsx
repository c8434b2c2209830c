/**
 * Stack View Component
 * Memory words near the stack top, highest address first
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { MemoryCellView } from '../../../simulator/src/index.js';
import { formatStackCell, stackWindow } from './format.js';

interface StackViewProps {
  stack: MemoryCellView[];
  rows: number;
}

export const StackView: React.FC<StackViewProps> = ({ stack, rows }) => {
  if (stack.length === 0) {
    return <Text dimColor>(stack empty)</Text>;
  }

  const cells = stackWindow(stack, rows);
  const hidden = stack.length - cells.length;

  return (
    <Box flexDirection="column">
      {hidden > 0 && <Text dimColor>... {hidden} higher word(s)</Text>}
      {cells.map((cell) => (
        <Text
          key={cell.address}
          color={cell.isStackPointer ? 'red' : cell.isFramePointer ? 'cyan' : undefined}
          bold={cell.isStackPointer}
        >
          {formatStackCell(cell)}
        </Text>
      ))}
    </Box>
  );
};
