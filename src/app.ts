/**
 * @fileoverview Express application factory.
 *
 * Kept separate from the server entry point so tests can mount the same
 * app without listening on a port.
 */

import express from 'express';
import threadsRouter from './routes/threads.js';
import { healthHandler } from './routes/health.js';

export function createApp(): express.Application {
  const app = express();

  app.use(express.json({ limit: '256kb' }));

  // Health check endpoint
  app.get('/health', healthHandler);

  // Thread API
  app.use(threadsRouter);

  return app;
}
