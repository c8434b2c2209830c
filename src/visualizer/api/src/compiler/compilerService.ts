/**
 * Code generator invocation
 *
 * Runs the external compiler as `<compiler> <input.c> -o <output.s>` in a
 * scratch directory and returns the assembly it wrote. Failures and
 * timeouts come back as an error response.
 */

import { execFile } from 'node:child_process';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import type { CompileRequest, CompileResponse, ServiceResult } from '../types/index.js';

export type ExecRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultRunner: ExecRunner = (file, args, options) =>
  execFileAsync(file, args, { ...options, encoding: 'utf8' });

export interface CompilerServiceOptions {
  compilerPath: string;
  timeoutMs: number;
  runner?: ExecRunner;
}

function parseCompileRequest(payload: unknown): CompileRequest | null {
  const code = typeof payload === 'object' && payload !== null && 'code' in payload ? payload.code : undefined;
  return typeof code === 'string' ? { code } : null;
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    // execFile kills the child when the timeout expires
    if ('killed' in error && error.killed === true) {
      return 'Compilation timeout';
    }
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.length > 0) {
      return error.stderr;
    }
    return error.message;
  }
  return String(error);
}

export class CompilerService {
  private readonly compilerPath: string;
  private readonly timeoutMs: number;
  private readonly runner: ExecRunner;

  constructor(options: CompilerServiceOptions) {
    this.compilerPath = options.compilerPath;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? defaultRunner;
  }

  get enabled(): boolean {
    return this.compilerPath.length > 0;
  }

  async compile(payload: unknown): Promise<ServiceResult<CompileResponse>> {
    const request = parseCompileRequest(payload);
    if (!request) {
      return { status: 400, body: { success: false, error: 'code must be a string' } };
    }
    if (!this.enabled) {
      return { status: 503, body: { success: false, error: 'No compiler configured' } };
    }

    const directory = await mkdtemp(join(tmpdir(), 'x86-stepper-'));
    const sourcePath = join(directory, 'program.c');
    const outputPath = join(directory, 'program.s');

    try {
      await writeFile(sourcePath, request.code, 'utf8');
      await this.runner(this.compilerPath, [sourcePath, '-o', outputPath], { timeout: this.timeoutMs });
      const assembly = await readFile(outputPath, 'utf8');
      return { status: 200, body: { success: true, assembly } };
    } catch (error) {
      const message = describeFailure(error);
      console.error('❌ Compilation failed:', message);
      return { status: 200, body: { success: false, error: message } };
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  }
}
