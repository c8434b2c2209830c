import { config } from './config.js';
import { CompilerService } from './compiler/compilerService.js';
import { createAppServer } from './server.js';
import { SessionStore } from './sessions/sessionStore.js';
import { SimulatorService } from './sessions/simulatorService.js';
import { initializeSocketServer } from './websocket/socketServer.js';

function main() {
  try {
    // Validate configuration
    config.validate();

    console.log('🚀 Starting x86 visualizer API...');

    const store = new SessionStore({ ttlMs: config.sessionTtlMs, maxSessions: config.maxSessions });
    const simulator = new SimulatorService(store, {
      runStepBudget: config.runStepBudget,
      defaultSyntax: config.defaultSyntax ?? 'att',
    });
    const compiler = new CompilerService({
      compilerPath: config.compilerPath,
      timeoutMs: config.compileTimeoutMs,
    });

    // Create HTTP server
    const { httpServer } = createAppServer({ simulator, compiler });

    // Initialize WebSocket server
    initializeSocketServer(httpServer, simulator, store);

    // Start listening
    httpServer.listen(config.port, () => {
      console.log(`✅ Server running on port ${config.port}`);
      console.log(`📡 WebSocket ready for connections`);
      console.log(`🧮 Default syntax: ${config.defaultSyntax}, run budget: ${config.runStepBudget} steps`);
      if (compiler.enabled) {
        console.log(`   Compiler: ${config.compilerPath}`);
      }
    });

  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

main();
