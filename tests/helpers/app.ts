/**
 * Test app factory.
 *
 * Creates the Express app over a given turn controller for integration
 * testing without starting the server or listening on a port.
 */

import type express from 'express';
import { createApp } from '../../src/app.js';
import { setTurnController, type TurnController } from '../../src/orchestrator/index.js';

/**
 * Create a test Express app whose routes use `controller`.
 */
export function createTestApp(controller: TurnController): express.Application {
  setTurnController(controller);
  return createApp();
}
