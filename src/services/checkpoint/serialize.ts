/**
 * @fileoverview Checkpoint persistence format.
 *
 * Threads are stored as a versioned JSON envelope: { formatVersion, thread }.
 * Loading validates the shape field by field so a damaged or foreign row is
 * reported instead of producing a half-formed thread.
 */

import { isRecord } from '../../capabilities/validation.js';
import type { CapabilityInvocationRequest, JsonValue } from '../../capabilities/types.js';
import { checkResultOrdering } from '../../orchestrator/thread.js';
import {
  THREAD_PHASES,
  type ApprovalDecision,
  type AwaitingApproval,
  type InvocationOutcome,
  type Thread,
  type ThreadMessage,
  type ThreadPhase,
  type TurnState,
} from '../../orchestrator/types.js';
import type { Result } from '../../utils/errors.js';

export const CHECKPOINT_FORMAT_VERSION = 1;

export function serializeThread(thread: Thread): string {
  return JSON.stringify({ formatVersion: CHECKPOINT_FORMAT_VERSION, thread });
}

// ============================================================================
// Shape checks
// ============================================================================

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isOptional<T>(value: unknown, check: (v: unknown) => v is T): value is T | undefined {
  return value === undefined || check(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || isString(value) || isNumber(value) || typeof value === 'boolean') return true;
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

function isPhase(value: unknown): value is ThreadPhase {
  return THREAD_PHASES.some((phase) => phase === value);
}

function isInvocation(value: unknown): value is CapabilityInvocationRequest {
  return (
    isRecord(value) &&
    isString(value.invocationId) &&
    isString(value.capabilityName) &&
    isRecord(value.arguments)
  );
}

function isErrorInfo(value: unknown): value is { code: string; message: string } {
  return isRecord(value) && isString(value.code) && isString(value.message);
}

function isOutcome(value: unknown): value is InvocationOutcome {
  return (
    isRecord(value) &&
    isString(value.invocationId) &&
    isString(value.capabilityName) &&
    (value.status === 'succeeded' || value.status === 'failed' || value.status === 'rejected') &&
    isJsonValue(value.output) &&
    isOptional(value.error, isErrorInfo) &&
    isOptional(value.humanFeedback, isString)
  );
}

function isMessage(value: unknown): value is ThreadMessage {
  if (!isRecord(value) || !isString(value.id) || !isNumber(value.createdAt)) return false;

  switch (value.kind) {
    case 'system':
    case 'assistant_text':
      return isString(value.text);
    case 'user':
      return isString(value.text) && (value.origin === 'user' || value.origin === 'feedback');
    case 'invocation_request':
      return isInvocation(value.invocation);
    case 'invocation_result':
      return isOutcome(value);
    default:
      return false;
  }
}

function isDecision(value: unknown): value is ApprovalDecision {
  return (
    isRecord(value) &&
    isString(value.invocationId) &&
    typeof value.approved === 'boolean' &&
    isOptional(value.humanFeedback, isString)
  );
}

function isAwaiting(value: unknown): value is AwaitingApproval {
  return (
    isRecord(value) &&
    isString(value.invocationId) &&
    isNumber(value.requestedAt) &&
    isNumber(value.expiresAt)
  );
}

function isRecordOf<T>(value: unknown, check: (v: unknown) => v is T): value is Record<string, T> {
  return isRecord(value) && Object.values(value).every(check);
}

function isTurnState(value: unknown): value is TurnState {
  return (
    isRecord(value) &&
    isString(value.turnId) &&
    isNumber(value.startedAt) &&
    isNumber(value.roundTrips) &&
    Array.isArray(value.pending) &&
    value.pending.every(isInvocation) &&
    isRecordOf(value.decisions, isDecision) &&
    isRecordOf(value.outcomes, isOutcome) &&
    Array.isArray(value.awaiting) &&
    value.awaiting.every(isAwaiting) &&
    (value.haltReason === undefined || value.haltReason === 'runaway_loop')
  );
}

function isThread(value: unknown): value is Thread {
  return (
    isRecord(value) &&
    isString(value.threadId) &&
    isPhase(value.phase) &&
    Array.isArray(value.messages) &&
    value.messages.every(isMessage) &&
    (value.turn === null || isTurnState(value.turn)) &&
    isNumber(value.createdAt) &&
    isNumber(value.updatedAt)
  );
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a stored checkpoint payload.
 */
export function parseThread(raw: string): Result<Thread> {
  let envelope: unknown;
  try {
    envelope = JSON.parse(raw);
  } catch (error) {
    return { success: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  if (!isRecord(envelope)) {
    return { success: false, error: 'checkpoint envelope must be an object' };
  }
  if (envelope.formatVersion !== CHECKPOINT_FORMAT_VERSION) {
    return { success: false, error: `unsupported checkpoint format version: ${String(envelope.formatVersion)}` };
  }
  if (!isThread(envelope.thread)) {
    return { success: false, error: 'checkpoint payload is not a valid thread' };
  }

  const orderingError = checkResultOrdering(envelope.thread.messages);
  if (orderingError) {
    return { success: false, error: orderingError };
  }

  return { success: true, data: envelope.thread };
}
