/**
 * Simulator service
 *
 * Request validation and the session operations shared by the HTTP routes
 * and the socket handlers. Everything returns a ServiceResult; nothing here
 * throws for bad input.
 */

import { countDiagnostics, type ExecutionController, type Syntax } from '../../../../simulator/src/index.js';
import type {
  ErrorResponse,
  LoadRequest,
  LoadResponse,
  RunRequest,
  RunResponse,
  ServiceResult,
  StateResponse,
  StepBackResponse,
  StepResponse,
} from '../types/index.js';
import type { SessionStore } from './sessionStore.js';

export const DEFAULT_SESSION_ID = 'default';
export const NO_SIMULATOR_ERROR = 'No simulator loaded';

export interface SimulatorServiceOptions {
  runStepBudget: number;
  defaultSyntax: Syntax;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function badRequest(error: string): ServiceResult<ErrorResponse> {
  return { status: 400, body: { success: false, error } };
}

function parseLoadRequest(payload: unknown): LoadRequest | string {
  const body: Record<string, unknown> = isRecord(payload) ? payload : {};

  const assembly = body.assembly;
  if (typeof assembly !== 'string') {
    return 'assembly must be a string';
  }

  const syntax = body.syntax;
  if (syntax === undefined) {
    return { assembly };
  }
  if (syntax !== 'att' && syntax !== 'intel') {
    return "syntax must be 'att' or 'intel'";
  }
  return { assembly, syntax };
}

function parseRunRequest(payload: unknown, stepBudget: number): RunRequest | string {
  const body: Record<string, unknown> = isRecord(payload) ? payload : {};

  const breakpoint = body.breakpoint ?? -1;
  if (typeof breakpoint !== 'number' || !Number.isInteger(breakpoint)) {
    return 'breakpoint must be an integer';
  }

  const maxSteps = body.maxSteps ?? stepBudget;
  if (typeof maxSteps !== 'number' || !Number.isInteger(maxSteps) || maxSteps <= 0) {
    return 'maxSteps must be a positive integer';
  }

  return { breakpoint, maxSteps: Math.min(maxSteps, stepBudget) };
}

/**
 * Session id from a request body (sessionId or session_id), or the default
 */
export function sessionIdFrom(body: unknown): string {
  if (isRecord(body)) {
    const id = body.sessionId ?? body.session_id;
    if (typeof id === 'string' && id.length > 0) {
      return id;
    }
  }
  return DEFAULT_SESSION_ID;
}

export class SimulatorService {
  constructor(
    private readonly store: SessionStore,
    private readonly options: SimulatorServiceOptions
  ) {}

  load(sessionId: string, payload: unknown): ServiceResult<LoadResponse | ErrorResponse> {
    const request = parseLoadRequest(payload);
    if (typeof request === 'string') {
      return badRequest(request);
    }

    const controller = this.store.create(sessionId);
    // An explicit dialect is fixed; otherwise the default is only where parsing starts
    const result = controller.load(request.assembly, {
      syntax: request.syntax,
      initialSyntax: this.options.defaultSyntax,
    });
    const skipped = countDiagnostics(result.diagnostics)['parse-skip'];
    if (skipped > 0) {
      console.warn(`⚠️  ${skipped} line(s) skipped while loading session ${sessionId}`);
    }

    return {
      status: 200,
      body: {
        success: true,
        state: controller.getState(),
        totalInstructions: result.instructionCount,
        instructions: result.instructions,
        diagnostics: result.diagnostics,
      },
    };
  }

  step(sessionId: string): ServiceResult<StepResponse | ErrorResponse> {
    return this.withController(sessionId, (controller): StepResponse => {
      const { canContinue } = controller.step();
      return { success: true, state: controller.getState(), canContinue };
    });
  }

  stepBack(sessionId: string): ServiceResult<StepBackResponse | ErrorResponse> {
    return this.withController(sessionId, (controller): StepBackResponse => {
      const success = controller.stepBack();
      return { success, state: success ? controller.getState() : null };
    });
  }

  run(sessionId: string, payload: unknown): ServiceResult<RunResponse | ErrorResponse> {
    const request = parseRunRequest(payload, this.options.runStepBudget);
    if (typeof request === 'string') {
      return badRequest(request);
    }

    return this.withController(sessionId, (controller): RunResponse => {
      const stepsExecuted = controller.run(request.breakpoint, request.maxSteps);
      return { success: true, state: controller.getState(), stepsExecuted };
    });
  }

  reset(sessionId: string): ServiceResult<StateResponse | ErrorResponse> {
    return this.withController(sessionId, (controller): StateResponse => {
      controller.reset();
      return { success: true, state: controller.getState() };
    });
  }

  getState(sessionId: string): ServiceResult<StateResponse | ErrorResponse> {
    return this.withController(sessionId, (controller): StateResponse => ({
      success: true,
      state: controller.getState(),
    }));
  }

  private withController<T extends StateResponse | StepBackResponse>(
    sessionId: string,
    action: (controller: ExecutionController) => T
  ): ServiceResult<T | ErrorResponse> {
    const controller = this.store.get(sessionId);
    if (!controller) {
      return { status: 404, body: { success: false, error: NO_SIMULATOR_ERROR } };
    }
    return { status: 200, body: action(controller) };
  }
}
