import type { SimulatorService } from '../sessions/simulatorService.js';
import type { ClientEventType, ServerEventType, ServiceResult, SimulatorResponse } from '../types/index.js';

// The part of a socket.io Socket the handlers use
export interface SimulatorSocket {
  id: string;
  emit(event: ServerEventType, payload: unknown): unknown;
}

function reply(socket: SimulatorSocket, result: ServiceResult<SimulatorResponse>): void {
  if (result.body.success === false && 'error' in result.body) {
    socket.emit('error', { message: result.body.error, status: result.status });
    return;
  }
  socket.emit('state', result.body);
}

/**
 * Dispatch one client event against the socket's own session
 */
export function handleSimulatorEvent(
  simulator: SimulatorService,
  socket: SimulatorSocket,
  event: ClientEventType,
  data: unknown
): void {
  const sessionId = socket.id;

  switch (event) {
    case 'load': {
      const result = simulator.load(sessionId, data);
      if (result.body.success) {
        console.log(`📄 Loaded ${result.body.totalInstructions} instruction(s) for ${sessionId}`);
      }
      reply(socket, result);
      return;
    }
    case 'step':
      reply(socket, simulator.step(sessionId));
      return;
    case 'step_back':
      reply(socket, simulator.stepBack(sessionId));
      return;
    case 'run':
      reply(socket, simulator.run(sessionId, data));
      return;
    case 'reset':
      reply(socket, simulator.reset(sessionId));
      return;
    case 'get_state':
      reply(socket, simulator.getState(sessionId));
      return;
  }
}
