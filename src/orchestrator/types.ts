/**
 * Turn Controller Type Definitions
 *
 * A thread is one conversation plus the scratch state of the turn in
 * flight. Everything here is plain JSON so a thread can be checkpointed at
 * any phase and resumed by another process.
 */

import type { CapabilityInvocationRequest, JsonValue } from '../capabilities/types.js';

// ============================================================================
// Phases
// ============================================================================

/**
 * Turn controller state.
 *
 * awaiting_user_input → model_invoking → dispatching | done
 * dispatching → approving | model_invoking | human_intervening
 * approving → dispatching
 * human_intervening → model_invoking
 */
export type ThreadPhase =
  | 'awaiting_user_input'
  | 'model_invoking'
  | 'dispatching'
  | 'approving'
  | 'human_intervening'
  | 'done';

export const THREAD_PHASES: readonly ThreadPhase[] = [
  'awaiting_user_input',
  'model_invoking',
  'dispatching',
  'approving',
  'human_intervening',
  'done',
];

// ============================================================================
// Messages
// ============================================================================

interface MessageBase {
  /** Sequential within the thread ("m1", "m2", ...) */
  id: string;
  /** Unix timestamp (milliseconds) */
  createdAt: number;
}

export interface SystemMessage extends MessageBase {
  kind: 'system';
  text: string;
}

export interface UserMessage extends MessageBase {
  kind: 'user';
  text: string;
  /** 'feedback' marks text supplied after a rejected invocation */
  origin: 'user' | 'feedback';
}

export interface AssistantTextMessage extends MessageBase {
  kind: 'assistant_text';
  text: string;
}

export interface InvocationRequestMessage extends MessageBase {
  kind: 'invocation_request';
  invocation: CapabilityInvocationRequest;
}

export type InvocationStatus = 'succeeded' | 'failed' | 'rejected';

/**
 * Outcome of one invocation. Held in turn scratch until every invocation of
 * the round has one, then appended as a message.
 */
export interface InvocationOutcome {
  invocationId: string;
  capabilityName: string;
  status: InvocationStatus;
  /** Executor result for succeeded invocations, otherwise null */
  output: JsonValue | null;
  /** Set for failed invocations */
  error?: { code: string; message: string };
  /** Set for rejected invocations when the human said something */
  humanFeedback?: string;
}

export interface InvocationResultMessage extends MessageBase, InvocationOutcome {
  kind: 'invocation_result';
}

export type ThreadMessage =
  | SystemMessage
  | UserMessage
  | AssistantTextMessage
  | InvocationRequestMessage
  | InvocationResultMessage;

// ============================================================================
// Approval
// ============================================================================

export interface ApprovalDecision {
  invocationId: string;
  approved: boolean;
  humanFeedback?: string;
}

/**
 * An invocation suspended on a human decision.
 */
export interface AwaitingApproval {
  invocationId: string;
  requestedAt: number;
  /** After this instant the invocation resolves as a rejection */
  expiresAt: number;
}

// ============================================================================
// Thread
// ============================================================================

/**
 * Per-turn scratch. Created by sendMessage, kept after the turn ends so the
 * round-trip count stays inspectable.
 */
export interface TurnState {
  turnId: string;
  startedAt: number;
  /** Completed model_invoking → dispatching → model_invoking cycles */
  roundTrips: number;
  /** Invocations of the current round, in request order */
  pending: CapabilityInvocationRequest[];
  /** Keyed by invocationId */
  decisions: Record<string, ApprovalDecision>;
  /** Keyed by invocationId; executed but not yet appended */
  outcomes: Record<string, InvocationOutcome>;
  awaiting: AwaitingApproval[];
  /** Set when the round-trip bound stopped the turn */
  haltReason?: 'runaway_loop';
}

export interface Thread {
  threadId: string;
  phase: ThreadPhase;
  messages: ThreadMessage[];
  turn: TurnState | null;
  createdAt: number;
  updatedAt: number;
}

// ============================================================================
// Controller results
// ============================================================================

export type TurnOutcome =
  | { status: 'completed'; reply: string; thread: Thread }
  | { status: 'awaiting_approval'; pending: CapabilityInvocationRequest[]; thread: Thread }
  | { status: 'awaiting_feedback'; rejected: InvocationResultMessage[]; thread: Thread };

/**
 * Decision delivered by a front end for a suspended invocation.
 */
export interface DecisionInput {
  invocationId: string;
  approved: boolean;
  feedback?: string;
}

export interface TurnOptions {
  /** Checked between transitions; an aborted signal ends the turn with TurnCancelledError */
  signal?: AbortSignal;
}
