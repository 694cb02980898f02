/**
 * Turn Controller
 *
 * Drives one thread through the turn state machine:
 *
 *   awaiting_user_input → model_invoking → dispatching | done
 *   dispatching → approving → dispatching
 *   dispatching → model_invoking | human_intervening
 *   human_intervening → model_invoking
 *
 * Every transition is saved before the next step starts, and every
 * capability execution is saved as soon as it returns. A thread loaded in
 * any phase can therefore be continued with resume() without calling the
 * model again or executing an invocation twice.
 *
 * All public operations hold the thread's checkpoint lease for their whole
 * run. A second operation on the same thread fails with ThreadBusyError.
 */

import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { CapabilityInvocationRequest } from '../capabilities/types.js';
import type { ModelGateway, ModelResponse } from '../llm/types.js';
import type { CheckpointStore, ThreadLease, ThreadSummary } from '../services/checkpoint/types.js';
import {
  DuplicateInvocationError,
  ExecutionError,
  InvalidArgumentsError,
  InvalidPhaseError,
  RunawayLoopError,
  ThreadNotFoundError,
  TurnCancelledError,
  UnknownCapabilityError,
  UnknownInvocationError,
} from '../utils/errors.js';
import { createLogger, createTurnId, withLogContext } from '../utils/observability/index.js';
import type { AppLogger } from '../utils/observability/index.js';
import type { ApprovalGate } from './approval-gate.js';
import {
  appendMessage,
  appendResult,
  awaitingInvocations,
  createThread,
  createTurnState,
  lastReply,
  latestRejections,
  recordedInvocationIds,
} from './thread.js';
import type {
  ApprovalDecision,
  AwaitingApproval,
  DecisionInput,
  InvocationOutcome,
  Thread,
  ThreadPhase,
  TurnOptions,
  TurnOutcome,
  TurnState,
} from './types.js';

export interface TurnControllerOptions {
  store: CheckpointStore;
  gateway: ModelGateway;
  /** Frozen by the controller if the caller has not done so */
  registry: CapabilityRegistry;
  gate: ApprovalGate;
  /** model_invoking ↔ dispatching round trips allowed per user turn */
  maxRoundTrips: number;
  /** Seeded as the first message of every new thread */
  systemPrompt?: string;
  now?: () => number;
}

/**
 * Working state of one controller operation.
 */
interface TurnSession {
  thread: Thread;
  lease: ThreadLease;
  signal?: AbortSignal;
  logger: AppLogger;
}

export class TurnController {
  private readonly store: CheckpointStore;
  private readonly gateway: ModelGateway;
  private readonly registry: CapabilityRegistry;
  private readonly gate: ApprovalGate;
  private readonly maxRoundTrips: number;
  private readonly systemPrompt?: string;
  private readonly now: () => number;
  private readonly logger = createLogger({ domain: 'turn-controller' });

  constructor(options: TurnControllerOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.registry = options.registry.freeze();
    this.gate = options.gate;
    this.maxRoundTrips = options.maxRoundTrips;
    this.systemPrompt = options.systemPrompt;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Public operations
  // ==========================================================================

  /**
   * Start a turn with a user message. Creates the thread if it does not
   * exist. Allowed when the previous turn finished or was halted by the
   * round-trip bound.
   */
  async sendMessage(threadId: string, text: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    return this.withThread(threadId, 'sendMessage', options, true, async (session) => {
      const { thread } = session;
      const halted = thread.phase === 'model_invoking' && thread.turn?.haltReason === 'runaway_loop';
      if (thread.phase !== 'awaiting_user_input' && thread.phase !== 'done' && !halted) {
        throw new InvalidPhaseError(threadId, thread.phase, 'send a message');
      }

      const now = this.now();
      thread.turn = createTurnState(createTurnId(), now);
      appendMessage(thread, { kind: 'user', text, origin: 'user' }, now);
      session.logger = session.logger.child({ turnId: thread.turn.turnId });
      await this.transition(session, 'model_invoking');

      return this.advance(session);
    });
  }

  /**
   * Deliver decisions for invocations suspended in `approving`.
   * Decisions may cover a subset; the rest stay suspended.
   */
  async submitDecisions(threadId: string, decisions: DecisionInput[], options: TurnOptions = {}): Promise<TurnOutcome> {
    return this.withThread(threadId, 'submitDecisions', options, false, async (session) => {
      const { thread } = session;
      if (thread.phase !== 'approving') {
        throw new InvalidPhaseError(threadId, thread.phase, 'submit decisions');
      }
      const turn = this.requireTurn(thread);

      for (const input of decisions) {
        const entry = turn.awaiting.find((waiting) => waiting.invocationId === input.invocationId);
        const invocation = turn.pending.find((pending) => pending.invocationId === input.invocationId);
        if (!entry || !invocation) {
          throw new UnknownInvocationError(threadId, input.invocationId);
        }
        turn.decisions[input.invocationId] = this.gate.resolve(
          invocation,
          { approved: input.approved, feedback: input.feedback },
          entry.expiresAt
        );
        turn.awaiting = turn.awaiting.filter((waiting) => waiting.invocationId !== input.invocationId);
      }
      await this.save(session);

      return this.advance(session);
    });
  }

  /**
   * Deliver free-text feedback after a rejection.
   */
  async submitFeedback(threadId: string, text: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    return this.withThread(threadId, 'submitFeedback', options, false, async (session) => {
      const { thread } = session;
      if (thread.phase !== 'human_intervening') {
        throw new InvalidPhaseError(threadId, thread.phase, 'submit feedback');
      }

      appendMessage(thread, { kind: 'user', text, origin: 'feedback' }, this.now());
      await this.transition(session, 'model_invoking');

      return this.advance(session);
    });
  }

  /**
   * Continue a thread from its last saved phase. Suspended threads report
   * what they are waiting for; expired approvals resolve as rejections.
   */
  async resume(threadId: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    return this.withThread(threadId, 'resume', options, false, async (session) => {
      const { thread } = session;
      if (thread.phase === 'awaiting_user_input') {
        throw new InvalidPhaseError(threadId, thread.phase, 'resume');
      }
      if (thread.turn?.haltReason === 'runaway_loop') {
        throw new RunawayLoopError(threadId, this.maxRoundTrips);
      }
      return this.advance(session);
    });
  }

  /**
   * Read the last saved state of a thread.
   * @throws ThreadNotFoundError
   */
  async getThread(threadId: string): Promise<Thread> {
    return this.store.load(threadId);
  }

  async listThreads(): Promise<ThreadSummary[]> {
    return this.store.list();
  }

  /**
   * Delete a thread. Fails with ThreadBusyError while a turn holds it.
   * @throws ThreadNotFoundError
   */
  async deleteThread(threadId: string): Promise<void> {
    const lease = await this.store.acquire(threadId);
    try {
      await this.store.load(threadId);
      await this.store.delete(threadId);
      this.logger.info('thread_deleted', { threadId });
    } finally {
      await this.store.release(lease);
    }
  }

  // ==========================================================================
  // State machine
  // ==========================================================================

  /**
   * Run the state machine until the turn finishes or suspends.
   */
  private async advance(session: TurnSession): Promise<TurnOutcome> {
    for (;;) {
      const { thread } = session;

      switch (thread.phase) {
        case 'model_invoking':
          this.checkCancelled(session);
          await this.invokeModel(session);
          break;

        case 'dispatching':
          this.checkCancelled(session);
          await this.dispatch(session);
          break;

        case 'approving': {
          this.checkCancelled(session);
          const pending = await this.approve(session);
          if (pending.length > 0) {
            return { status: 'awaiting_approval', pending, thread };
          }
          break;
        }

        case 'human_intervening':
          return { status: 'awaiting_feedback', rejected: latestRejections(thread), thread };

        case 'done':
          return { status: 'completed', reply: lastReply(thread), thread };

        case 'awaiting_user_input':
          throw new InvalidPhaseError(thread.threadId, thread.phase, 'advance');
      }
    }
  }

  /**
   * model_invoking → done | dispatching
   */
  private async invokeModel(session: TurnSession): Promise<void> {
    const { thread } = session;
    const turn = this.requireTurn(thread);

    let response: ModelResponse;
    try {
      response = await this.gateway.converse(thread.messages, this.registry.list(), {
        signal: session.signal,
        threadId: thread.threadId,
      });
    } catch (error) {
      if (session.signal?.aborted) throw new TurnCancelledError(thread.threadId);
      throw error;
    }

    const now = this.now();
    if (response.type === 'final_answer') {
      appendMessage(thread, { kind: 'assistant_text', text: response.text }, now);
      await this.transition(session, 'done');
      return;
    }

    if (turn.roundTrips >= this.maxRoundTrips) {
      turn.haltReason = 'runaway_loop';
      await this.save(session);
      session.logger.warn('turn_runaway_loop', {
        roundTrips: turn.roundTrips,
        limit: this.maxRoundTrips,
        requested: response.requests.map((request) => request.capabilityName),
      });
      throw new RunawayLoopError(thread.threadId, this.maxRoundTrips);
    }

    const seen = recordedInvocationIds(thread);
    for (const request of response.requests) {
      if (seen.has(request.invocationId)) {
        throw new DuplicateInvocationError(thread.threadId, request.invocationId);
      }
      seen.add(request.invocationId);
    }

    if (response.leadingText) {
      appendMessage(thread, { kind: 'assistant_text', text: response.leadingText }, now);
    }
    for (const request of response.requests) {
      appendMessage(thread, { kind: 'invocation_request', invocation: request }, now);
    }
    turn.pending = response.requests;
    turn.decisions = {};
    turn.outcomes = {};
    turn.awaiting = [];

    session.logger.info('invocations_requested', {
      capabilities: response.requests.map((request) => request.capabilityName),
    });
    await this.transition(session, 'dispatching');
  }

  /**
   * dispatching → approving (undecided invocations remain)
   * dispatching → model_invoking | human_intervening (round finished)
   *
   * Invocations are executed one at a time in request order and each
   * outcome is saved before the next starts.
   */
  private async dispatch(session: TurnSession): Promise<void> {
    const { thread } = session;
    const turn = this.requireTurn(thread);

    const undecided = turn.pending.filter((invocation) => !turn.decisions[invocation.invocationId]);
    if (undecided.length > 0) {
      await this.transition(session, 'approving');
      return;
    }

    for (const invocation of turn.pending) {
      if (turn.outcomes[invocation.invocationId]) continue;
      this.checkCancelled(session);

      const decision = turn.decisions[invocation.invocationId];
      turn.outcomes[invocation.invocationId] = await this.execute(session, invocation, decision);
      await this.save(session);
    }

    const now = this.now();
    let anyRejected = false;
    for (const invocation of turn.pending) {
      const outcome = turn.outcomes[invocation.invocationId];
      if (outcome.status === 'rejected') anyRejected = true;
      appendResult(thread, outcome, now);
    }

    turn.pending = [];
    turn.decisions = {};
    turn.outcomes = {};
    turn.awaiting = [];
    turn.roundTrips += 1;

    await this.transition(session, anyRejected ? 'human_intervening' : 'model_invoking');
  }

  /**
   * approving → dispatching once every pending invocation has a decision.
   * Returns the invocations still suspended (empty when none are).
   */
  private async approve(session: TurnSession): Promise<CapabilityInvocationRequest[]> {
    const { thread } = session;
    const turn = this.requireTurn(thread);
    const suspended: AwaitingApproval[] = [];

    for (const invocation of turn.pending) {
      if (turn.decisions[invocation.invocationId]) continue;

      const previous = turn.awaiting.find((entry) => entry.invocationId === invocation.invocationId);
      const requestedAt = previous?.requestedAt ?? this.now();
      const verdict = this.gate.isBlocking()
        ? await this.keepingLease(session, () => this.gate.decide(invocation, requestedAt))
        : await this.gate.decide(invocation, requestedAt);

      if (verdict.status === 'decided') {
        turn.decisions[invocation.invocationId] = verdict.decision;
      } else {
        suspended.push({ invocationId: invocation.invocationId, requestedAt, expiresAt: verdict.expiresAt });
      }
    }
    turn.awaiting = suspended;

    if (suspended.length > 0) {
      await this.save(session);
      session.logger.info('turn_suspended', {
        awaiting: suspended.map((entry) => entry.invocationId),
      });
      return awaitingInvocations(turn);
    }

    await this.transition(session, 'dispatching');
    return [];
  }

  /**
   * Run one decided invocation. Invocation-level failures become failed
   * outcomes for the model; anything else ends the turn.
   */
  private async execute(
    session: TurnSession,
    invocation: CapabilityInvocationRequest,
    decision: ApprovalDecision
  ): Promise<InvocationOutcome> {
    const { invocationId, capabilityName } = invocation;

    if (!decision.approved) {
      const outcome: InvocationOutcome = { invocationId, capabilityName, status: 'rejected', output: null };
      if (decision.humanFeedback !== undefined) outcome.humanFeedback = decision.humanFeedback;
      return outcome;
    }

    try {
      const output = await this.registry.execute(capabilityName, invocation.arguments, {
        threadId: session.thread.threadId,
        invocationId,
        signal: session.signal,
      });
      return { invocationId, capabilityName, status: 'succeeded', output };
    } catch (error) {
      if (
        error instanceof UnknownCapabilityError ||
        error instanceof InvalidArgumentsError ||
        error instanceof ExecutionError
      ) {
        return {
          invocationId,
          capabilityName,
          status: 'failed',
          output: null,
          error: { code: error.code, message: error.message },
        };
      }
      throw error;
    }
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  /**
   * Hold the thread's lease for the duration of `fn`.
   */
  private async withThread(
    threadId: string,
    operation: string,
    options: TurnOptions,
    create: boolean,
    fn: (session: TurnSession) => Promise<TurnOutcome>
  ): Promise<TurnOutcome> {
    if (options.signal?.aborted) {
      throw new TurnCancelledError(threadId);
    }

    const lease = await this.store.acquire(threadId);
    try {
      const thread = await this.loadOrCreate(threadId, create);
      const logger = this.logger.child({
        threadId,
        operation,
        ...(thread.turn ? { turnId: thread.turn.turnId } : {}),
      });
      const session: TurnSession = { thread, lease, signal: options.signal, logger };

      return await withLogContext({ threadId, operation }, () => fn(session));
    } finally {
      await this.store.release(lease);
    }
  }

  /**
   * Renew the lease at half its remaining time while `work` is pending.
   * A failed renewal is logged; the next save reports the lost lease.
   */
  private async keepingLease<T>(session: TurnSession, work: () => Promise<T>): Promise<T> {
    const intervalMs = Math.max(1, Math.floor((session.lease.expiresAt - this.now()) / 2));
    let renewal: Promise<void> = Promise.resolve();

    const timer = setInterval(() => {
      renewal = this.store.renew(session.lease).catch((error: unknown) => {
        clearInterval(timer);
        session.logger.warn('lease_renewal_failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, intervalMs);

    try {
      return await work();
    } finally {
      clearInterval(timer);
      await renewal;
    }
  }

  private async loadOrCreate(threadId: string, create: boolean): Promise<Thread> {
    try {
      return await this.store.load(threadId);
    } catch (error) {
      if (create && error instanceof ThreadNotFoundError) {
        this.logger.info('thread_created', { threadId });
        return createThread(threadId, this.now(), this.systemPrompt);
      }
      throw error;
    }
  }

  private requireTurn(thread: Thread): TurnState {
    if (!thread.turn) {
      throw new InvalidPhaseError(thread.threadId, thread.phase, 'continue without an active turn');
    }
    return thread.turn;
  }

  private checkCancelled(session: TurnSession): void {
    if (session.signal?.aborted) {
      session.logger.info('turn_cancelled', { phase: session.thread.phase });
      throw new TurnCancelledError(session.thread.threadId);
    }
  }

  private async transition(session: TurnSession, to: ThreadPhase): Promise<void> {
    const from = session.thread.phase;
    session.thread.phase = to;
    await this.save(session);
    session.logger.info('turn_transition', { from, to, roundTrips: session.thread.turn?.roundTrips ?? 0 });
  }

  private async save(session: TurnSession): Promise<void> {
    session.thread.updatedAt = this.now();
    await this.store.save(session.thread.threadId, session.thread, session.lease);
  }
}
