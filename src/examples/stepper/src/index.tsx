#!/usr/bin/env node
import React from 'react';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { render } from 'ink';
import { DEFAULT_STEP_BUDGET } from '../../../simulator/src/index.js';
import { App } from './App.js';
import { parseStepperArgs } from './args.js';

async function main() {
  const args = parseStepperArgs(process.argv.slice(2));
  if (!args.ok) {
    console.error(args.error);
    process.exit(2);
  }

  try {
    const source = await readFile(args.file, 'utf8');
    const { waitUntilExit } = render(
      <App fileName={basename(args.file)} source={source} syntax={args.syntax} runBudget={DEFAULT_STEP_BUDGET} />
    );
    await waitUntilExit();
  } catch (error) {
    console.error('❌ Failed to run stepper:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
