import { describe, expect, it } from 'vitest';
import {
  CHECKPOINT_FORMAT_VERSION,
  parseThread,
  serializeThread,
} from '../../../src/services/checkpoint/serialize.js';
import { appendMessage, createThread, createTurnState } from '../../../src/orchestrator/thread.js';
import type { Thread } from '../../../src/orchestrator/types.js';

function suspendedThread(): Thread {
  const thread = createThread('t-1', 500, 'system prompt');
  thread.turn = createTurnState('turn-1', 500);
  appendMessage(thread, { kind: 'user', text: 'Book Monday', origin: 'user' }, 500);
  const invocation = {
    invocationId: 'c1',
    capabilityName: 'create_booking',
    arguments: { event_type_id: 11, attendee: { name: 'Sam' } },
  };
  appendMessage(thread, { kind: 'invocation_request', invocation }, 501);
  thread.turn.pending = [invocation];
  thread.turn.awaiting = [{ invocationId: 'c1', requestedAt: 501, expiresAt: 60_501 }];
  thread.phase = 'approving';
  return thread;
}

describe('checkpoint serialization', () => {
  it('wraps the thread in a versioned envelope', () => {
    const raw = serializeThread(suspendedThread());
    const envelope: unknown = JSON.parse(raw);

    expect(envelope).toMatchObject({ formatVersion: CHECKPOINT_FORMAT_VERSION, thread: { threadId: 't-1' } });
  });

  it('reads back a suspended thread with its approval scratch', () => {
    const thread = suspendedThread();

    const parsed = parseThread(serializeThread(thread));

    expect(parsed).toEqual({ success: true, data: thread });
  });

  it('keeps a halted turn', () => {
    const thread = suspendedThread();
    thread.phase = 'model_invoking';
    if (thread.turn) thread.turn.haltReason = 'runaway_loop';

    const parsed = parseThread(serializeThread(thread));

    expect(parsed.success && parsed.data.turn?.haltReason).toBe('runaway_loop');
  });

  it('rejects malformed JSON', () => {
    const parsed = parseThread('{not json');

    expect(parsed.success).toBe(false);
    expect(!parsed.success && parsed.error.startsWith('invalid JSON: ')).toBe(true);
  });

  it('rejects a non-object envelope', () => {
    expect(parseThread('[1, 2]')).toEqual({ success: false, error: 'checkpoint envelope must be an object' });
  });

  it('rejects other format versions', () => {
    const raw = JSON.stringify({ formatVersion: 99, thread: suspendedThread() });

    expect(parseThread(raw)).toEqual({ success: false, error: 'unsupported checkpoint format version: 99' });
  });

  it('rejects an unknown phase', () => {
    const raw = JSON.stringify({ formatVersion: 1, thread: { ...suspendedThread(), phase: 'sleeping' } });

    expect(parseThread(raw)).toEqual({ success: false, error: 'checkpoint payload is not a valid thread' });
  });

  it('rejects a message of an unknown kind', () => {
    const thread = suspendedThread();
    const raw = JSON.stringify({
      formatVersion: 1,
      thread: { ...thread, messages: [...thread.messages, { id: 'm9', createdAt: 1, kind: 'tool_call' }] },
    });

    expect(parseThread(raw)).toEqual({ success: false, error: 'checkpoint payload is not a valid thread' });
  });

  it('rejects a result that comes before its request', () => {
    const thread = suspendedThread();
    thread.messages.splice(1, 0, {
      id: 'm0',
      createdAt: 500,
      kind: 'invocation_result',
      invocationId: 'c1',
      capabilityName: 'create_booking',
      status: 'rejected',
      output: null,
    });

    expect(parseThread(serializeThread(thread))).toEqual({
      success: false,
      error: 'result c1 has no preceding request',
    });
  });
});
