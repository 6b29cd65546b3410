/**
 * Connector Service
 * Main entry point
 */

import 'dotenv/config';

import { config } from './config/index.js';
import { createLogger } from './lib/logger.js';
import { handleShutdownSignals } from './lib/shutdown.js';
import { buildServer } from './app.js';

const log = createLogger('server');

// ============================================
// Start Server
// ============================================

async function start() {
  try {
    const server = await buildServer(config);

    await server.listen({
      port: config.server.port,
      host: config.server.host,
    });

    handleShutdownSignals(server, {
      timeoutMs: config.server.shutdownTimeoutMs,
      log,
    });

    log.info(`Server running at http://${config.server.host}:${config.server.port}`);

    if (config.docs.enabled) {
      log.info(`API docs at http://localhost:${config.server.port}/docs`);
    }
  } catch (error) {
    log.error('Failed to start server', error);
    process.exit(1);
  }
}

void start();
