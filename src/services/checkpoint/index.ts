/**
 * @fileoverview Checkpoint store factory.
 *
 * Returns the appropriate checkpoint store based on configuration.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CheckpointStore } from './types.js';
import { SqliteCheckpointStore } from './sqlite.js';
import { MemoryCheckpointStore } from './memory.js';

export type { CheckpointStore, ThreadLease, ThreadSummary } from './types.js';
export { MemoryCheckpointStore } from './memory.js';
export { SqliteCheckpointStore } from './sqlite.js';
export { parseThread, serializeThread } from './serialize.js';

let instance: CheckpointStore | null = null;

/**
 * Get the checkpoint store instance.
 *
 * Returns a singleton based on CHECKPOINT_STORE_PROVIDER config:
 * - 'sqlite': SQLite file at CHECKPOINT_DB_PATH (default)
 * - 'memory': In-memory store (for tests only)
 */
export function getCheckpointStore(): CheckpointStore {
  if (instance) {
    return instance;
  }

  switch (config.checkpoint.provider) {
    case 'sqlite':
      instance = new SqliteCheckpointStore(config.checkpoint.sqlitePath, config.checkpoint.leaseTtlMs);
      break;
    case 'memory':
      instance = new MemoryCheckpointStore(config.checkpoint.leaseTtlMs);
      break;
  }

  return instance;
}

/**
 * Close the database connection (if any) and drop the instance.
 */
export function closeCheckpointStore(): void {
  if (instance instanceof SqliteCheckpointStore) {
    instance.close();
  }
  instance = null;
}

/**
 * Reset the checkpoint store instance.
 * Useful for tests to get a fresh store.
 */
export function resetCheckpointStore(): void {
  instance = null;
}
