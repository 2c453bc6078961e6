#!/usr/bin/env tsx

/**
 * Customer Support Agent Server
 *
 * Quick Start:
 * 1. cp .env.example .env
 * 2. Fill in your OpenAI credentials
 * 3. npm install && npm run db:init && npm run ingest
 * 4. npm start
 */

import dotenv from 'dotenv';
import { createApp } from './api/app';
import { createSupportRuntime, SupportRuntime } from './bootstrap';
import { loadEnvironment } from './config/environment';
import { logger, toError } from './utils/logger';

// Load environment variables
dotenv.config();

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

let runtime: SupportRuntime | undefined;

/**
 * Initialize the server
 */
async function startServer(): Promise<void> {
  const config = loadEnvironment();
  logger.setLevel(config.logLevel);

  runtime = await createSupportRuntime(config);
  const { knowledgeBase, pendingTurns } = runtime;

  const summary = await knowledgeBase.initialize();
  logger.info('Knowledge base ready', {
    operation: 'server_init'
  }, summary);

  const cleanupTimer = setInterval(() => {
    pendingTurns.cleanupOldStates().catch(error => {
      logger.error('Pending turn cleanup failed', toError(error), {
        operation: 'state_cleanup'
      });
    });
  }, CLEANUP_INTERVAL_MS);
  cleanupTimer.unref();

  const app = createApp(runtime);
  app.listen(config.port, () => {
    logger.info('Customer support server started', {
      operation: 'server_start'
    }, {
      port: config.port,
      env: process.env.NODE_ENV || 'development',
      endpoints: [
        `http://localhost:${config.port}/chat (POST)`,
        `http://localhost:${config.port}/approvals (POST)`,
        `http://localhost:${config.port}/tickets (GET)`,
        `http://localhost:${config.port}/tickets/:ticketId/response (POST)`,
        `http://localhost:${config.port}/knowledge-base/refresh (POST)`,
        `http://localhost:${config.port}/health (GET)`,
        `http://localhost:${config.port}/status (GET)`
      ]
    });
  });
}

// Graceful shutdown
process.on('SIGINT', () => {
  logger.info('Shutting down server...');

  const closing = runtime ? runtime.close() : Promise.resolve();
  closing
    .then(() => {
      logger.info('Server shutdown complete');
      process.exit(0);
    })
    .catch(error => {
      logger.error('Error during shutdown', toError(error), {
        operation: 'server_shutdown'
      });
      process.exit(1);
    });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', toError(reason), {
    operation: 'unhandled_rejection'
  });
});

startServer().catch(error => {
  logger.error('Failed to start server', toError(error), {
    operation: 'server_start_error'
  });
  process.exit(1);
});
