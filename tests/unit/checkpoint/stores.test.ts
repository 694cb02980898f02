/**
 * Unit tests for the checkpoint stores.
 *
 * The memory and SQLite stores run the same contract; SQLite adds a check
 * that two handles on one file share leases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { MemoryCheckpointStore } from '../../../src/services/checkpoint/memory.js';
import { SqliteCheckpointStore } from '../../../src/services/checkpoint/sqlite.js';
import type { CheckpointStore } from '../../../src/services/checkpoint/types.js';
import { appendMessage, createThread, createTurnState } from '../../../src/orchestrator/thread.js';
import type { Thread } from '../../../src/orchestrator/types.js';
import { CheckpointError, ThreadBusyError, ThreadNotFoundError } from '../../../src/utils/errors.js';

const TEST_DB_PATH = './data/test-checkpoints-store.db';
const LEASE_TTL_MS = 30_000;

function removeDbFiles(): void {
  for (const suffix of ['', '-wal', '-shm']) {
    if (fs.existsSync(TEST_DB_PATH + suffix)) {
      fs.unlinkSync(TEST_DB_PATH + suffix);
    }
  }
}

function sampleThread(threadId: string, updatedAt = 1_000): Thread {
  const thread = createThread(threadId, 1_000, 'You are a calendar assistant.');
  thread.turn = createTurnState('turn-1', 1_000);
  appendMessage(thread, { kind: 'user', text: 'What is on tomorrow?', origin: 'user' }, 1_000);
  appendMessage(
    thread,
    {
      kind: 'invocation_request',
      invocation: { invocationId: 'c1', capabilityName: 'list_bookings', arguments: { start: '2025-07-11T00:00:00Z' } },
    },
    1_001
  );
  thread.turn.pending = [
    { invocationId: 'c1', capabilityName: 'list_bookings', arguments: { start: '2025-07-11T00:00:00Z' } },
  ];
  thread.turn.decisions = { c1: { invocationId: 'c1', approved: true } };
  thread.turn.outcomes = {
    c1: { invocationId: 'c1', capabilityName: 'list_bookings', status: 'succeeded', output: { bookings: [] } },
  };
  thread.phase = 'dispatching';
  thread.updatedAt = updatedAt;
  return thread;
}

interface StoreHarness {
  store: CheckpointStore;
  advance(ms: number): void;
}

const factories: Array<[string, () => StoreHarness]> = [
  [
    'MemoryCheckpointStore',
    () => {
      let clock = 10_000;
      return {
        store: new MemoryCheckpointStore(LEASE_TTL_MS, () => clock),
        advance: (ms) => {
          clock += ms;
        },
      };
    },
  ],
  [
    'SqliteCheckpointStore',
    () => {
      let clock = 10_000;
      return {
        store: new SqliteCheckpointStore(TEST_DB_PATH, LEASE_TTL_MS, () => clock),
        advance: (ms) => {
          clock += ms;
        },
      };
    },
  ],
];

describe.each(factories)('%s', (_name, create) => {
  let harness: StoreHarness;
  let store: CheckpointStore;

  beforeEach(() => {
    removeDbFiles();
    harness = create();
    store = harness.store;
  });

  afterEach(() => {
    if (store instanceof SqliteCheckpointStore) {
      store.close();
    }
    removeDbFiles();
  });

  it('saves and loads a thread unchanged', async () => {
    const thread = sampleThread('t-1');
    const lease = await store.acquire('t-1');

    await store.save('t-1', thread, lease);

    expect(await store.load('t-1')).toEqual(thread);
  });

  it('returns independent copies on load', async () => {
    const lease = await store.acquire('t-1');
    await store.save('t-1', sampleThread('t-1'), lease);

    const first = await store.load('t-1');
    first.messages.push({ id: 'm9', createdAt: 1, kind: 'assistant_text', text: 'changed' });

    expect((await store.load('t-1')).messages).toHaveLength(3);
  });

  it('throws ThreadNotFoundError for unknown threads', async () => {
    await expect(store.load('missing')).rejects.toBeInstanceOf(ThreadNotFoundError);
  });

  it('rejects a second lease while the first is held', async () => {
    await store.acquire('t-1');

    await expect(store.acquire('t-1')).rejects.toBeInstanceOf(ThreadBusyError);
  });

  it('leases threads independently', async () => {
    await store.acquire('t-1');

    await expect(store.acquire('t-2')).resolves.toMatchObject({ threadId: 't-2' });
  });

  it('hands the lease over once it is released', async () => {
    const lease = await store.acquire('t-1');
    await store.release(lease);

    const next = await store.acquire('t-1');

    expect(next.token).not.toBe(lease.token);
  });

  it('lets an expired lease be taken over and fences the old holder', async () => {
    const stale = await store.acquire('t-1');
    harness.advance(LEASE_TTL_MS + 1);

    const fresh = await store.acquire('t-1');

    await expect(store.save('t-1', sampleThread('t-1'), stale)).rejects.toBeInstanceOf(ThreadBusyError);
    await expect(store.save('t-1', sampleThread('t-1'), fresh)).resolves.toBeUndefined();
  });

  it('extends the lease on every save', async () => {
    const lease = await store.acquire('t-1');
    harness.advance(LEASE_TTL_MS - 1);

    await store.save('t-1', sampleThread('t-1'), lease);
    harness.advance(LEASE_TTL_MS - 1);

    await expect(store.acquire('t-1')).rejects.toBeInstanceOf(ThreadBusyError);
    await expect(store.save('t-1', sampleThread('t-1'), lease)).resolves.toBeUndefined();
  });

  it('renews a held lease without saving', async () => {
    const lease = await store.acquire('t-1');
    const firstExpiry = lease.expiresAt;
    harness.advance(LEASE_TTL_MS - 1);

    await store.renew(lease);
    harness.advance(LEASE_TTL_MS - 1);

    expect(lease.expiresAt).toBe(firstExpiry + LEASE_TTL_MS - 1);
    await expect(store.acquire('t-1')).rejects.toBeInstanceOf(ThreadBusyError);
    await expect(store.load('t-1')).rejects.toBeInstanceOf(ThreadNotFoundError);
  });

  it('refuses to renew a lease that was taken over', async () => {
    const stale = await store.acquire('t-1');
    harness.advance(LEASE_TTL_MS + 1);
    await store.acquire('t-1');

    await expect(store.renew(stale)).rejects.toBeInstanceOf(ThreadBusyError);
  });

  it('ignores release of a lease it no longer holds', async () => {
    const stale = await store.acquire('t-1');
    harness.advance(LEASE_TTL_MS + 1);
    await store.acquire('t-1');

    await store.release(stale);

    await expect(store.acquire('t-1')).rejects.toBeInstanceOf(ThreadBusyError);
  });

  it('rejects saves without a lease', async () => {
    const lease = await store.acquire('t-1');
    await store.release(lease);

    await expect(store.save('t-1', sampleThread('t-1'), lease)).rejects.toBeInstanceOf(ThreadBusyError);
    await expect(store.load('t-1')).rejects.toBeInstanceOf(ThreadNotFoundError);
  });

  it('deletes a thread and its lease', async () => {
    const lease = await store.acquire('t-1');
    await store.save('t-1', sampleThread('t-1'), lease);

    await store.delete('t-1');

    await expect(store.load('t-1')).rejects.toBeInstanceOf(ThreadNotFoundError);
    await expect(store.acquire('t-1')).resolves.toMatchObject({ threadId: 't-1' });
  });

  it('lists summaries, most recently updated first', async () => {
    const older = await store.acquire('t-old');
    await store.save('t-old', sampleThread('t-old', 2_000), older);
    const newer = await store.acquire('t-new');
    await store.save('t-new', sampleThread('t-new', 3_000), newer);

    expect(await store.list()).toEqual([
      { threadId: 't-new', phase: 'dispatching', messageCount: 3, updatedAt: 3_000 },
      { threadId: 't-old', phase: 'dispatching', messageCount: 3, updatedAt: 2_000 },
    ]);
  });
});

describe('SqliteCheckpointStore across handles', () => {
  afterEach(() => {
    removeDbFiles();
  });

  it('shares leases and checkpoints between connections to the same file', async () => {
    removeDbFiles();
    const first = new SqliteCheckpointStore(TEST_DB_PATH, LEASE_TTL_MS);
    const second = new SqliteCheckpointStore(TEST_DB_PATH, LEASE_TTL_MS);

    try {
      const lease = await first.acquire('t-1');
      await first.save('t-1', sampleThread('t-1'), lease);

      await expect(second.acquire('t-1')).rejects.toBeInstanceOf(ThreadBusyError);
      expect((await second.load('t-1')).phase).toBe('dispatching');
    } finally {
      first.close();
      second.close();
    }
  });

  it('reports an unreadable row as CheckpointError', async () => {
    removeDbFiles();
    const store = new SqliteCheckpointStore(TEST_DB_PATH, LEASE_TTL_MS);

    try {
      const lease = await store.acquire('t-1');
      const broken = sampleThread('t-1');
      // Result before its request
      broken.messages.splice(2, 0, {
        id: 'm9',
        createdAt: 1_000,
        kind: 'invocation_result',
        invocationId: 'c1',
        capabilityName: 'list_bookings',
        status: 'succeeded',
        output: null,
      });
      await store.save('t-1', broken, lease);

      await expect(store.load('t-1')).rejects.toBeInstanceOf(CheckpointError);
      await expect(store.load('t-1')).rejects.toThrow(
        'Checkpoint failed for thread t-1: result c1 has no preceding request'
      );
    } finally {
      store.close();
    }
  });
});
