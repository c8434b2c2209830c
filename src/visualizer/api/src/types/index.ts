import type { Diagnostic, StateSnapshot, Syntax } from '../../../../simulator/src/index.js';

// Socket events the client sends
export type ClientEventType =
  | 'load'
  | 'step'
  | 'step_back'
  | 'run'
  | 'reset'
  | 'get_state';

// Socket events the server sends
export type ServerEventType = 'state' | 'error';

// Validated request bodies. HTTP bodies may also carry sessionId (or
// session_id); socket payloads use the socket id instead.
export interface LoadRequest {
  assembly: string;
  syntax?: Syntax; // absent: start in the default dialect, directives switch it
}

export interface RunRequest {
  breakpoint: number; // -1 for none
  maxSteps: number;
}

export interface CompileRequest {
  code: string;
}

// Responses
export interface ErrorResponse {
  success: false;
  error: string;
}

export interface StateResponse {
  success: true;
  state: StateSnapshot;
}

export interface LoadResponse extends StateResponse {
  totalInstructions: number;
  instructions: string[];
  diagnostics: Diagnostic[];
}

export interface StepResponse extends StateResponse {
  canContinue: boolean;
}

export interface StepBackResponse {
  success: boolean;
  state: StateSnapshot | null;
}

export interface RunResponse extends StateResponse {
  stepsExecuted: number;
}

export type CompileResponse =
  | { success: true; assembly: string }
  | ErrorResponse;

export type SimulatorResponse =
  | LoadResponse
  | StepResponse
  | StepBackResponse
  | RunResponse
  | StateResponse
  | ErrorResponse;

// Response plus the HTTP status it goes out with
export interface ServiceResult<T extends SimulatorResponse | CompileResponse = SimulatorResponse> {
  status: number;
  body: T;
}
