/**
 * Turn controller factory for tests.
 *
 * Wires the real registry, gate and controller over an in-memory store,
 * a scripted gateway and the fake calendar client.
 */

import { createCalendarRegistry } from '../../src/capabilities/index.js';
import { CapabilityRegistry } from '../../src/capabilities/registry.js';
import type { ModelGateway } from '../../src/llm/types.js';
import { ApprovalGate, type ApprovalPolicy, type ConfirmationPrompt } from '../../src/orchestrator/approval-gate.js';
import { TurnController } from '../../src/orchestrator/controller.js';
import { MemoryCheckpointStore } from '../../src/services/checkpoint/memory.js';
import type { CheckpointStore } from '../../src/services/checkpoint/types.js';
import type { Thread, TurnOutcome } from '../../src/orchestrator/types.js';
import { createFakeCalendarClient, type FakeCalendarClient } from '../mocks/calendar.js';

export const TEST_SYSTEM_PROMPT = 'You are a helpful calendar assistant.';

export interface TestControllerOptions {
  gateway: ModelGateway;
  store?: CheckpointStore;
  registry?: CapabilityRegistry;
  calendar?: FakeCalendarClient;
  policies?: Record<string, ApprovalPolicy>;
  prompt?: ConfirmationPrompt;
  timeoutMs?: number;
  maxRoundTrips?: number;
  now?: () => number;
}

export interface TestController {
  controller: TurnController;
  store: CheckpointStore;
  calendar: FakeCalendarClient;
  gate: ApprovalGate;
}

export function buildController(options: TestControllerOptions): TestController {
  const calendar = options.calendar ?? createFakeCalendarClient();
  const store = options.store ?? new MemoryCheckpointStore(60_000, options.now);
  const gate = new ApprovalGate({
    policies: options.policies ?? { create_booking: 'require_confirmation', cancel_booking: 'require_confirmation' },
    timeoutMs: options.timeoutMs ?? 60_000,
    prompt: options.prompt,
    now: options.now,
  });

  const controller = new TurnController({
    store,
    gateway: options.gateway,
    registry: options.registry ?? createCalendarRegistry(calendar),
    gate,
    maxRoundTrips: options.maxRoundTrips ?? 10,
    systemPrompt: TEST_SYSTEM_PROMPT,
    now: options.now,
  });

  return { controller, store, calendar, gate };
}

type Completed = Extract<TurnOutcome, { status: 'completed' }>;
type AwaitingApprovalOutcome = Extract<TurnOutcome, { status: 'awaiting_approval' }>;
type AwaitingFeedbackOutcome = Extract<TurnOutcome, { status: 'awaiting_feedback' }>;

export function expectCompleted(outcome: TurnOutcome): Completed {
  if (outcome.status !== 'completed') {
    throw new Error(`expected completed, got ${outcome.status}`);
  }
  return outcome;
}

export function expectAwaitingApproval(outcome: TurnOutcome): AwaitingApprovalOutcome {
  if (outcome.status !== 'awaiting_approval') {
    throw new Error(`expected awaiting_approval, got ${outcome.status}`);
  }
  return outcome;
}

export function expectAwaitingFeedback(outcome: TurnOutcome): AwaitingFeedbackOutcome {
  if (outcome.status !== 'awaiting_feedback') {
    throw new Error(`expected awaiting_feedback, got ${outcome.status}`);
  }
  return outcome;
}

const VOLATILE_KEYS = new Set(['createdAt', 'updatedAt', 'startedAt', 'turnId']);

/**
 * Thread state with timestamps and generated turn ids removed.
 */
export function stableThread(thread: Thread): unknown {
  return JSON.parse(JSON.stringify(thread, (key: string, value: unknown) => (VOLATILE_KEYS.has(key) ? undefined : value)));
}
