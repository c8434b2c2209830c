import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import { config } from '../config.js';
import type { SessionStore } from '../sessions/sessionStore.js';
import type { SimulatorService } from '../sessions/simulatorService.js';
import type { ClientEventType } from '../types/index.js';
import { handleSimulatorEvent } from './messageHandlers.js';

const CLIENT_EVENTS: ClientEventType[] = ['load', 'step', 'step_back', 'run', 'reset', 'get_state'];

export function initializeSocketServer(httpServer: HTTPServer, simulator: SimulatorService, store: SessionStore) {
  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: config.clientUrl,
      methods: ['GET', 'POST'],
      credentials: true
    }
  });

  io.on('connection', (socket) => {
    console.log(`🔌 Client connected: ${socket.id}`);

    for (const event of CLIENT_EVENTS) {
      socket.on(event, (data: unknown) => {
        try {
          handleSimulatorEvent(simulator, socket, event, data);
        } catch (error) {
          console.error(`Error handling ${event}:`, error);
          socket.emit('error', {
            message: `Failed to process ${event}`,
            error: error instanceof Error ? error.message : String(error)
          });
        }
      });
    }

    socket.on('disconnect', () => {
      console.log(`🔌 Client disconnected: ${socket.id}`);
      store.delete(socket.id);
    });
  });

  return io;
}
