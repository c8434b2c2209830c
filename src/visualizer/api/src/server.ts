import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { config } from './config.js';
import type { CompilerService } from './compiler/compilerService.js';
import { sessionIdFrom, type SimulatorService } from './sessions/simulatorService.js';
import type { ServiceResult, SimulatorResponse } from './types/index.js';

export interface AppServices {
  simulator: SimulatorService;
  compiler: CompilerService;
}

// The parts of express's request and response the handlers touch
export interface RouteRequest {
  body: unknown;
}

export interface RouteResponse {
  status(code: number): RouteResponse;
  json(body: unknown): unknown;
}

type SessionHandler = (req: RouteRequest) => ServiceResult<SimulatorResponse>;

function sendError(res: RouteResponse, name: string, error: unknown): void {
  console.error(`Error handling ${name}:`, error);
  res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : String(error)
  });
}

/**
 * Session routes by path; every one takes its session id from the body
 */
export function sessionRoutes(simulator: SimulatorService): Record<string, SessionHandler> {
  return {
    '/load_assembly': (req) => simulator.load(sessionIdFrom(req.body), req.body),
    '/step': (req) => simulator.step(sessionIdFrom(req.body)),
    '/step_back': (req) => simulator.stepBack(sessionIdFrom(req.body)),
    '/run': (req) => simulator.run(sessionIdFrom(req.body), req.body),
    '/reset': (req) => simulator.reset(sessionIdFrom(req.body)),
    '/get_state': (req) => simulator.getState(sessionIdFrom(req.body)),
  };
}

/**
 * Wrap a synchronous session handler so unexpected exceptions answer 500
 */
export function route(name: string, handler: SessionHandler) {
  return (req: RouteRequest, res: RouteResponse): void => {
    try {
      const result = handler(req);
      res.status(result.status).json(result.body);
    } catch (error) {
      sendError(res, name, error);
    }
  };
}

export function compileRoute(compiler: CompilerService) {
  return (req: RouteRequest, res: RouteResponse): Promise<void> =>
    compiler.compile(req.body)
      .then((result) => {
        res.status(result.status).json(result.body);
      })
      .catch((error: unknown) => {
        sendError(res, 'compile', error);
      });
}

export function createApp(services: AppServices) {
  const { simulator, compiler } = services;
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.clientUrl,
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), compiler: compiler.enabled });
  });

  for (const [path, handler] of Object.entries(sessionRoutes(simulator))) {
    app.post(path, route(path.slice(1), handler));
  }

  app.post('/compile', compileRoute(compiler));

  return app;
}

export function createAppServer(services: AppServices) {
  const app = createApp(services);

  // Create HTTP server
  const httpServer = createServer(app);

  return { app, httpServer };
}
