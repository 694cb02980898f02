/**
 * @fileoverview In-memory checkpoint store for testing.
 *
 * Threads are kept in their serialized form so loads hand back independent
 * copies, the same as the SQLite store. Data is lost on process restart.
 */

import { randomUUID } from 'crypto';
import { CheckpointError, ThreadBusyError, ThreadNotFoundError } from '../../utils/errors.js';
import type { Thread } from '../../orchestrator/types.js';
import { parseThread, serializeThread } from './serialize.js';
import type { CheckpointStore, ThreadLease, ThreadSummary } from './types.js';

interface StoredCheckpoint {
  payload: string;
  summary: ThreadSummary;
}

export class MemoryCheckpointStore implements CheckpointStore {
  private checkpoints = new Map<string, StoredCheckpoint>();
  private leases = new Map<string, ThreadLease>();

  constructor(
    private readonly leaseTtlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  private isHeld(lease: ThreadLease | undefined): lease is ThreadLease {
    return lease !== undefined && lease.expiresAt > this.now();
  }

  async acquire(threadId: string): Promise<ThreadLease> {
    if (this.isHeld(this.leases.get(threadId))) {
      throw new ThreadBusyError(threadId);
    }
    const lease: ThreadLease = { threadId, token: randomUUID(), expiresAt: this.now() + this.leaseTtlMs };
    this.leases.set(threadId, lease);
    return { ...lease };
  }

  async renew(lease: ThreadLease): Promise<void> {
    const current = this.leases.get(lease.threadId);
    if (!this.isHeld(current) || current.token !== lease.token) {
      throw new ThreadBusyError(lease.threadId);
    }
    current.expiresAt = this.now() + this.leaseTtlMs;
    lease.expiresAt = current.expiresAt;
  }

  async release(lease: ThreadLease): Promise<void> {
    if (this.leases.get(lease.threadId)?.token === lease.token) {
      this.leases.delete(lease.threadId);
    }
  }

  async load(threadId: string): Promise<Thread> {
    const stored = this.checkpoints.get(threadId);
    if (!stored) {
      throw new ThreadNotFoundError(threadId);
    }
    const parsed = parseThread(stored.payload);
    if (!parsed.success) {
      throw new CheckpointError(threadId, parsed.error);
    }
    return parsed.data;
  }

  async save(threadId: string, thread: Thread, lease: ThreadLease): Promise<void> {
    const current = this.leases.get(threadId);
    if (!this.isHeld(current) || current.token !== lease.token) {
      throw new ThreadBusyError(threadId);
    }

    this.checkpoints.set(threadId, {
      payload: serializeThread(thread),
      summary: {
        threadId,
        phase: thread.phase,
        messageCount: thread.messages.length,
        updatedAt: thread.updatedAt,
      },
    });
    current.expiresAt = this.now() + this.leaseTtlMs;
    lease.expiresAt = current.expiresAt;
  }

  async delete(threadId: string): Promise<void> {
    this.checkpoints.delete(threadId);
    this.leases.delete(threadId);
  }

  async list(): Promise<ThreadSummary[]> {
    return [...this.checkpoints.values()]
      .map((stored) => ({ ...stored.summary }))
      .sort((a, b) => b.updatedAt - a.updatedAt);
  }

  /** Clear all checkpoints and leases. Useful for test cleanup. */
  clear(): void {
    this.checkpoints.clear();
    this.leases.clear();
  }
}
