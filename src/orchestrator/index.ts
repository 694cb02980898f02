/**
 * Orchestrator Module
 *
 * Wires the turn controller from configuration: checkpoint store, Anthropic
 * gateway, frozen calendar registry and approval gate.
 */

import config from '../config.js';
import { createCalendarRegistry } from '../capabilities/index.js';
import { CalComClient } from '../domains/calendar/providers/cal-com.js';
import { AnthropicGateway } from '../llm/anthropic-gateway.js';
import { buildSystemPrompt } from '../llm/prompts.js';
import { getCheckpointStore } from '../services/checkpoint/index.js';
import { ApprovalGate, type ApprovalPolicy, type ConfirmationPrompt } from './approval-gate.js';
import { TurnController } from './controller.js';

export * from './types.js';
export { TurnController, type TurnControllerOptions } from './controller.js';
export {
  ApprovalGate,
  NO_RESPONSE_FEEDBACK,
  type ApprovalPolicy,
  type ConfirmationPrompt,
  type ConfirmationReply,
  type ConfirmationRequest,
  type GateVerdict,
} from './approval-gate.js';

let instance: TurnController | null = null;

/**
 * Per-capability policies from CONFIRM_CAPABILITIES.
 */
export function configuredPolicies(): Record<string, ApprovalPolicy> {
  return Object.fromEntries(
    config.approval.confirmCapabilities.map((name): [string, ApprovalPolicy] => [name, 'require_confirmation'])
  );
}

/**
 * Build a turn controller from configuration.
 *
 * @param prompt Confirmation prompt for blocking front ends (terminal).
 *   Without one, confirmations are deferred to submitDecisions().
 */
export function createTurnController(prompt?: ConfirmationPrompt): TurnController {
  const calendar = new CalComClient({ apiKey: config.cal.apiKey ?? '', baseUrl: config.cal.baseUrl });

  return new TurnController({
    store: getCheckpointStore(),
    gateway: new AnthropicGateway({
      model: config.models.agent,
      maxTokens: config.models.maxTokens,
      timezone: config.cal.timezone,
    }),
    registry: createCalendarRegistry(calendar),
    gate: new ApprovalGate({
      policies: configuredPolicies(),
      defaultPolicy: config.approval.defaultPolicy,
      timeoutMs: config.approval.timeoutMs,
      prompt,
    }),
    maxRoundTrips: config.turn.maxRoundTrips,
    systemPrompt: buildSystemPrompt(config.cal.timezone),
  });
}

/**
 * Get the shared (deferred-approval) turn controller.
 */
export function getTurnController(): TurnController {
  if (!instance) {
    instance = createTurnController();
  }
  return instance;
}

/**
 * Replace the shared controller. Useful for tests.
 */
export function setTurnController(controller: TurnController): void {
  instance = controller;
}

export function resetTurnController(): void {
  instance = null;
}
