/**
 * @fileoverview Express server entry point for the calendar assistant.
 *
 * Bootstraps the HTTP API over the turn controller. Confirmations are
 * deferred: clients poll thread state and post decisions.
 */

import config, { validateConfig } from './config.js';
import { createApp } from './app.js';
import { getTurnController } from './orchestrator/index.js';
import { closeCheckpointStore } from './services/checkpoint/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

// Fail fast if critical configuration is missing
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });

// Build the controller up front so registry and store errors surface at boot
getTurnController();

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    checkpointProvider: config.checkpoint.provider,
    model: config.models.agent,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    closeCheckpointStore();
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
