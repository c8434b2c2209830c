import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CompilerService } from './compiler/compilerService.js';
import { SessionStore } from './sessions/sessionStore.js';
import { SimulatorService } from './sessions/simulatorService.js';
import { compileRoute, createApp, route, sessionRoutes, type RouteResponse } from './server.js';

class RecordingResponse implements RouteResponse {
  statusCode = 200;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

describe('server routes', () => {
  let simulator: SimulatorService;
  let routes: ReturnType<typeof sessionRoutes>;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    simulator = new SimulatorService(
      new SessionStore({ ttlMs: 60_000, maxSessions: 10 }),
      { runStepBudget: 100, defaultSyntax: 'intel' }
    );
    routes = sessionRoutes(simulator);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function post(path: string, body: unknown): RecordingResponse {
    const res = new RecordingResponse();
    route(path.slice(1), routes[path])({ body }, res);
    return res;
  }

  it('should expose one route per session operation', () => {
    expect(Object.keys(routes)).toEqual([
      '/load_assembly',
      '/step',
      '/step_back',
      '/run',
      '/reset',
      '/get_state',
    ]);
  });

  it('should build an express app', () => {
    const app = createApp({ simulator, compiler: new CompilerService({ compilerPath: '', timeoutMs: 100 }) });
    expect(typeof app).toBe('function');
  });

  it('should drive a session through load, step and run', () => {
    const loaded = post('/load_assembly', { sessionId: 'web', assembly: 'mov rax, 2\nadd rax, 3\nnop' });
    expect(loaded.statusCode).toBe(200);
    expect(loaded.body).toMatchObject({ success: true, totalInstructions: 3 });

    const stepped = post('/step', { sessionId: 'web' });
    expect(stepped.body).toMatchObject({ success: true, canContinue: true });

    const run = post('/run', { sessionId: 'web' });
    expect(run.body).toMatchObject({ success: true, stepsExecuted: 2 });
  });

  it('should pass service errors through with their status', () => {
    expect(post('/step', {})).toMatchObject({
      statusCode: 404,
      body: { success: false, error: 'No simulator loaded' },
    });
    expect(post('/load_assembly', { assembly: 7 })).toMatchObject({
      statusCode: 400,
      body: { success: false, error: 'assembly must be a string' },
    });
  });

  it('should answer 500 when a handler throws', () => {
    vi.spyOn(simulator, 'reset').mockImplementation(() => {
      throw new Error('state corrupted');
    });

    const res = post('/reset', { sessionId: 'web' });
    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'state corrupted' });
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  describe('compile', () => {
    it('should relay the compiler result', async () => {
      const compiler = new CompilerService({ compilerPath: '', timeoutMs: 100 });
      const res = new RecordingResponse();

      await compileRoute(compiler)({ body: { code: 'int main() {}' } }, res);
      expect(res.statusCode).toBe(503);
      expect(res.body).toEqual({ success: false, error: 'No compiler configured' });
    });

    it('should answer 500 when compilation rejects', async () => {
      const compiler = new CompilerService({ compilerPath: '/opt/cc', timeoutMs: 100 });
      vi.spyOn(compiler, 'compile').mockRejectedValue(new Error('disk full'));
      const res = new RecordingResponse();

      await compileRoute(compiler)({ body: { code: 'int main() {}' } }, res);
      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({ success: false, error: 'disk full' });
    });
  });
});
