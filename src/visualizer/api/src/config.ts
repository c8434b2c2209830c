import dotenv from 'dotenv';
import type { Syntax } from '../../../simulator/src/index.js';

// Load environment variables
dotenv.config();

function parseSyntax(value: string | undefined): Syntax | null {
  const syntax = (value || 'att').toLowerCase();
  return syntax === 'att' || syntax === 'intel' ? syntax : null;
}

export const config = {
  // Server configuration
  port: parseInt(process.env.PORT || '3001', 10),
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5173',

  // External code generator (C source -> assembly); compile is disabled without it
  compilerPath: process.env.COMPILER_PATH || '',
  compileTimeoutMs: parseInt(process.env.COMPILE_TIMEOUT_MS || '10000', 10),

  // Simulator sessions
  runStepBudget: parseInt(process.env.RUN_STEP_BUDGET || '10000', 10),
  sessionTtlMs: parseInt(process.env.SESSION_TTL_MS || '1800000', 10),
  maxSessions: parseInt(process.env.MAX_SESSIONS || '100', 10),
  defaultSyntax: parseSyntax(process.env.DEFAULT_SYNTAX),

  // Validate required config
  validate(): void {
    const numbers: [string, number][] = [
      ['PORT', this.port],
      ['COMPILE_TIMEOUT_MS', this.compileTimeoutMs],
      ['RUN_STEP_BUDGET', this.runStepBudget],
      ['SESSION_TTL_MS', this.sessionTtlMs],
      ['MAX_SESSIONS', this.maxSessions],
    ];
    for (const [name, value] of numbers) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer.\nCheck your .env file.`);
      }
    }

    if (this.defaultSyntax === null) {
      throw new Error(
        `Unsupported DEFAULT_SYNTAX: ${process.env.DEFAULT_SYNTAX}\n` +
        'Supported dialects: att, intel'
      );
    }

    if (!this.compilerPath) {
      console.log('⚠️  COMPILER_PATH not set; /compile is disabled');
    }
  }
};

export type Config = typeof config;
