/**
 * @fileoverview SQLite checkpoint store.
 *
 * One row per thread holding the serialized envelope, plus a lease table.
 * Lease checks and writes run inside one transaction so two processes
 * sharing the database file cannot both believe they hold a thread.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import { AppError, CheckpointError, ThreadBusyError, ThreadNotFoundError } from '../../utils/errors.js';
import type { Thread, ThreadPhase } from '../../orchestrator/types.js';
import { parseThread, serializeThread } from './serialize.js';
import type { CheckpointStore, ThreadLease, ThreadSummary } from './types.js';

interface LeaseRow {
  token: string;
  expires_at: number;
}

interface CheckpointRow {
  payload_json: string;
}

interface SummaryRow {
  thread_id: string;
  phase: ThreadPhase;
  message_count: number;
  updated_at: number;
}

/**
 * SQLite implementation of the checkpoint store.
 */
export class SqliteCheckpointStore implements CheckpointStore {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly leaseTtlMs: number,
    private readonly now: () => number = Date.now
  ) {
    // Ensure directory exists
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS thread_checkpoints (
        thread_id TEXT PRIMARY KEY,
        phase TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        message_count INTEGER NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_checkpoints_updated
        ON thread_checkpoints(updated_at DESC);

      CREATE TABLE IF NOT EXISTS thread_leases (
        thread_id TEXT PRIMARY KEY,
        token TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      );
    `);
  }

  /**
   * Run a store operation, reporting driver failures as CheckpointError.
   */
  private guard<T>(threadId: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new CheckpointError(threadId, error);
    }
  }

  private currentLease(threadId: string): LeaseRow | undefined {
    return this.db
      .prepare<[string], LeaseRow>(`SELECT token, expires_at FROM thread_leases WHERE thread_id = ?`)
      .get(threadId);
  }

  async acquire(threadId: string): Promise<ThreadLease> {
    return this.guard(threadId, () =>
      this.db.transaction((): ThreadLease => {
        const now = this.now();
        const existing = this.currentLease(threadId);
        if (existing && existing.expires_at > now) {
          throw new ThreadBusyError(threadId);
        }

        const lease: ThreadLease = { threadId, token: randomUUID(), expiresAt: now + this.leaseTtlMs };
        this.db
          .prepare(
            `INSERT INTO thread_leases (thread_id, token, expires_at)
             VALUES (?, ?, ?)
             ON CONFLICT (thread_id) DO UPDATE SET
               token = excluded.token,
               expires_at = excluded.expires_at`
          )
          .run(threadId, lease.token, lease.expiresAt);
        return lease;
      })()
    );
  }

  async renew(lease: ThreadLease): Promise<void> {
    this.guard(lease.threadId, () =>
      this.db.transaction(() => {
        const now = this.now();
        const current = this.currentLease(lease.threadId);
        if (!current || current.token !== lease.token || current.expires_at <= now) {
          throw new ThreadBusyError(lease.threadId);
        }
        lease.expiresAt = now + this.leaseTtlMs;
        this.db
          .prepare(`UPDATE thread_leases SET expires_at = ? WHERE thread_id = ?`)
          .run(lease.expiresAt, lease.threadId);
      })()
    );
  }

  async release(lease: ThreadLease): Promise<void> {
    this.guard(lease.threadId, () => {
      this.db
        .prepare(`DELETE FROM thread_leases WHERE thread_id = ? AND token = ?`)
        .run(lease.threadId, lease.token);
    });
  }

  async load(threadId: string): Promise<Thread> {
    const row = this.guard(threadId, () =>
      this.db
        .prepare<[string], CheckpointRow>(`SELECT payload_json FROM thread_checkpoints WHERE thread_id = ?`)
        .get(threadId)
    );
    if (!row) {
      throw new ThreadNotFoundError(threadId);
    }

    const parsed = parseThread(row.payload_json);
    if (!parsed.success) {
      throw new CheckpointError(threadId, parsed.error);
    }
    return parsed.data;
  }

  async save(threadId: string, thread: Thread, lease: ThreadLease): Promise<void> {
    const payload = serializeThread(thread);

    this.guard(threadId, () =>
      this.db.transaction(() => {
        const now = this.now();
        const current = this.currentLease(threadId);
        if (!current || current.token !== lease.token || current.expires_at <= now) {
          throw new ThreadBusyError(threadId);
        }

        this.db
          .prepare(
            `INSERT INTO thread_checkpoints (thread_id, phase, payload_json, message_count, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?)
             ON CONFLICT (thread_id) DO UPDATE SET
               phase = excluded.phase,
               payload_json = excluded.payload_json,
               message_count = excluded.message_count,
               updated_at = excluded.updated_at`
          )
          .run(threadId, thread.phase, payload, thread.messages.length, thread.createdAt, thread.updatedAt);

        lease.expiresAt = now + this.leaseTtlMs;
        this.db
          .prepare(`UPDATE thread_leases SET expires_at = ? WHERE thread_id = ?`)
          .run(lease.expiresAt, threadId);
      })()
    );
  }

  async delete(threadId: string): Promise<void> {
    this.guard(threadId, () =>
      this.db.transaction(() => {
        this.db.prepare(`DELETE FROM thread_checkpoints WHERE thread_id = ?`).run(threadId);
        this.db.prepare(`DELETE FROM thread_leases WHERE thread_id = ?`).run(threadId);
      })()
    );
  }

  async list(): Promise<ThreadSummary[]> {
    const rows = this.guard('*', () =>
      this.db
        .prepare<[], SummaryRow>(
          `SELECT thread_id, phase, message_count, updated_at
           FROM thread_checkpoints
           ORDER BY updated_at DESC`
        )
        .all()
    );
    return rows.map((row) => ({
      threadId: row.thread_id,
      phase: row.phase,
      messageCount: row.message_count,
      updatedAt: row.updated_at,
    }));
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
