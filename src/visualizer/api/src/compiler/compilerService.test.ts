import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { CompilerService, type ExecRunner } from './compilerService.js';

describe('CompilerService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the assembly the compiler wrote', async () => {
    const runner = vi.fn<ExecRunner>(async (_file, args) => {
      await writeFile(args[2], 'main:\n\tret\n', 'utf8');
      return { stdout: '', stderr: '' };
    });
    const service = new CompilerService({ compilerPath: '/opt/cc', timeoutMs: 500, runner });

    const result = await service.compile({ code: 'int main() { return 0; }' });

    expect(result).toEqual({ status: 200, body: { success: true, assembly: 'main:\n\tret\n' } });
    expect(runner).toHaveBeenCalledTimes(1);
    const [file, args, options] = runner.mock.calls[0];
    expect(file).toBe('/opt/cc');
    expect(args[1]).toBe('-o');
    expect(options).toEqual({ timeout: 500 });
  });

  it('should report compiler errors from stderr', async () => {
    const runner: ExecRunner = async () => {
      throw Object.assign(new Error('Command failed'), { stderr: 'syntax error at line 1' });
    };
    const service = new CompilerService({ compilerPath: '/opt/cc', timeoutMs: 500, runner });

    const result = await service.compile({ code: 'int main(' });
    expect(result).toEqual({ status: 200, body: { success: false, error: 'syntax error at line 1' } });
  });

  it('should report timeouts', async () => {
    const runner: ExecRunner = async () => {
      throw Object.assign(new Error('Command failed'), { killed: true, stderr: '' });
    };
    const service = new CompilerService({ compilerPath: '/opt/cc', timeoutMs: 1, runner });

    const result = await service.compile({ code: 'for(;;);' });
    expect(result).toEqual({ status: 200, body: { success: false, error: 'Compilation timeout' } });
  });

  it('should refuse without a compiler or without code', async () => {
    const disabled = new CompilerService({ compilerPath: '', timeoutMs: 500 });
    expect(disabled.enabled).toBe(false);
    expect(await disabled.compile({ code: 'x' })).toEqual({
      status: 503,
      body: { success: false, error: 'No compiler configured' },
    });
    expect((await disabled.compile({})).status).toBe(400);
  });
});
