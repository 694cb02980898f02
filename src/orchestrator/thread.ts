/**
 * Thread helpers: construction, message appends and read-side queries.
 *
 * Message ids are sequential within a thread so two runs of the same turn
 * produce the same ids.
 */

import type { CapabilityInvocationRequest } from '../capabilities/types.js';
import type {
  InvocationOutcome,
  InvocationResultMessage,
  Thread,
  ThreadMessage,
  TurnState,
} from './types.js';

type MessageFields<T extends ThreadMessage> = T extends ThreadMessage
  ? Omit<T, 'id' | 'createdAt'>
  : never;

export function createThread(threadId: string, now: number, systemPrompt?: string): Thread {
  const thread: Thread = {
    threadId,
    phase: 'awaiting_user_input',
    messages: [],
    turn: null,
    createdAt: now,
    updatedAt: now,
  };
  if (systemPrompt) {
    appendMessage(thread, { kind: 'system', text: systemPrompt }, now);
  }
  return thread;
}

export function createTurnState(turnId: string, now: number): TurnState {
  return {
    turnId,
    startedAt: now,
    roundTrips: 0,
    pending: [],
    decisions: {},
    outcomes: {},
    awaiting: [],
  };
}

export function appendMessage(thread: Thread, fields: MessageFields<ThreadMessage>, now: number): ThreadMessage {
  const message: ThreadMessage = {
    ...fields,
    id: `m${thread.messages.length + 1}`,
    createdAt: now,
  };
  thread.messages.push(message);
  return message;
}

export function appendResult(thread: Thread, outcome: InvocationOutcome, now: number): void {
  appendMessage(thread, { kind: 'invocation_result', ...outcome }, now);
}

/** Every invocation id the thread has recorded a request for. */
export function recordedInvocationIds(thread: Thread): Set<string> {
  const ids = new Set<string>();
  for (const message of thread.messages) {
    if (message.kind === 'invocation_request') ids.add(message.invocation.invocationId);
  }
  return ids;
}

/** Text of the most recent assistant message, or '' when there is none. */
export function lastReply(thread: Thread): string {
  for (let i = thread.messages.length - 1; i >= 0; i--) {
    const message = thread.messages[i];
    if (message.kind === 'assistant_text') return message.text;
  }
  return '';
}

/** Rejected results of the most recent round. */
export function latestRejections(thread: Thread): InvocationResultMessage[] {
  const rejected: InvocationResultMessage[] = [];
  for (let i = thread.messages.length - 1; i >= 0; i--) {
    const message = thread.messages[i];
    if (message.kind !== 'invocation_result') break;
    if (message.status === 'rejected') rejected.unshift(message);
  }
  return rejected;
}

/** Pending invocations still waiting for a decision. */
export function awaitingInvocations(turn: TurnState): CapabilityInvocationRequest[] {
  const waiting = new Set(turn.awaiting.map((entry) => entry.invocationId));
  return turn.pending.filter((invocation) => waiting.has(invocation.invocationId));
}

/**
 * Check that every invocation result follows its request and that results
 * appear in the same relative order as their requests.
 */
export function checkResultOrdering(messages: ThreadMessage[]): string | null {
  const requestOrder = new Map<string, number>();
  let lastResultRank = -1;

  for (const message of messages) {
    if (message.kind === 'invocation_request') {
      requestOrder.set(message.invocation.invocationId, requestOrder.size);
    } else if (message.kind === 'invocation_result') {
      const rank = requestOrder.get(message.invocationId);
      if (rank === undefined) {
        return `result ${message.invocationId} has no preceding request`;
      }
      if (rank <= lastResultRank) {
        return `result ${message.invocationId} is out of request order`;
      }
      lastResultRank = rank;
    }
  }
  return null;
}
