// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { InMemorySessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { SessionFactory } from '@/infrastructure/session/SessionFactory.js';
import { Logger } from '@/utils/logger.js';

const serverLogger = new Logger('Server');

function main(): void {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  const registry = new InMemorySessionRegistry(config.sessions, () =>
    SessionFactory.createDependencies(config.game)
  );

  // Log startup info
  console.log('========================================');
  console.log('  Cultivation Server Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Default Difficulty: ${config.game.defaultDifficulty}`);
  console.log(`  Max Sessions: ${config.sessions.maxActiveSessions}`);
  console.log('========================================');

  // Create Express app
  const app = createApp({
    registry,
    corsOrigins: config.server.corsOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    defaultDifficulty: config.game.defaultDifficulty,
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    serverLogger.info('Shutdown requested', { signal, sessions: registry.size });
    server.close(() => {
      console.log('✓ Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    serverLogger.error('Uncaught exception', { error: err.message });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    serverLogger.error('Unhandled rejection', { reason: String(reason) });
  });
}

main();
