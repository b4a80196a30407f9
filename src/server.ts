/**
 * =============================================================================
 * FIELD SERVICE DISPATCH - MAIN SERVER
 * =============================================================================
 *
 * Wires the dispatch store, technician directory and task service, then
 * serves the HTTP API.
 * =============================================================================
 */

import { config } from './config/environment';
import { logger, logError } from './shared/services/logger.service';
import { JsonDispatchStore } from './shared/database/db';
import { createTechnicianDirectory } from './modules/technician/technician-directory.service';
import { createTaskService } from './modules/task/task.service';
import { API_PREFIX, createApp } from './app';

const store = new JsonDispatchStore(config.database.file);
const directory = createTechnicianDirectory();
const taskService = createTaskService(store, directory);

const app = createApp({ taskService, directory });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Server started on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    apiPrefix: API_PREFIX,
    identityService: config.identity.validationEnabled ? config.identity.baseUrl : 'disabled',
    failOpen: config.identity.failOpen,
    workloadThreshold: config.dispatch.workloadWarningThreshold
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError('Unhandled rejection', reason);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('Graceful shutdown complete');
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 30000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
