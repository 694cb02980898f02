/**
 * @fileoverview Checkpoint store interface.
 *
 * Threads are saved after every controller transition. Writers are
 * serialized per thread with leases: a turn acquires the thread's lease,
 * every save presents it, and a save from anyone else fails with
 * ThreadBusyError. Leases expire so a crashed process cannot wedge a thread.
 *
 * Note: Methods return Promises for interface flexibility, even though the
 * SQLite implementation (better-sqlite3) is synchronous.
 */

import type { Thread, ThreadPhase } from '../../orchestrator/types.js';

/**
 * Proof of single-writer access to one thread.
 */
export interface ThreadLease {
  threadId: string;
  token: string;
  /** Unix timestamp (milliseconds) after which the lease may be taken over */
  expiresAt: number;
}

export interface ThreadSummary {
  threadId: string;
  phase: ThreadPhase;
  messageCount: number;
  updatedAt: number;
}

export interface CheckpointStore {
  /**
   * Take the thread's lease.
   * @throws ThreadBusyError if another unexpired lease is held
   */
  acquire(threadId: string): Promise<ThreadLease>;

  /**
   * Extend a held lease without saving. Used while a turn waits on
   * something other than the store, such as a human confirmation.
   * @throws ThreadBusyError if `lease` is not the current holder
   */
  renew(lease: ThreadLease): Promise<void>;

  /**
   * Give the lease back. No-op if it is no longer the current holder.
   */
  release(lease: ThreadLease): Promise<void>;

  /**
   * Load the last saved state.
   * @throws ThreadNotFoundError
   * @throws CheckpointError if the stored payload cannot be read back
   */
  load(threadId: string): Promise<Thread>;

  /**
   * Save the complete thread state and extend the lease.
   * @throws ThreadBusyError if `lease` is not the current holder
   */
  save(threadId: string, thread: Thread, lease: ThreadLease): Promise<void>;

  /**
   * Remove a thread and its lease. No-op if it doesn't exist.
   */
  delete(threadId: string): Promise<void>;

  /** Saved threads, most recently updated first. */
  list(): Promise<ThreadSummary[]>;
}
