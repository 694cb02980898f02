/**
 * Approval Gate
 *
 * Decides whether a requested invocation may run. Capabilities under the
 * 'require_confirmation' policy wait for a human; silence past the deadline
 * is a rejection, never an approval.
 *
 * Two delivery modes:
 * - blocking: a ConfirmationPrompt is configured and awaited (terminal)
 * - deferred: no prompt; the invocation is reported as suspended and the
 *   decision arrives later through resolve() (HTTP)
 *
 * The gate never touches thread state; the controller applies verdicts.
 */

import type { CapabilityInvocationRequest } from '../capabilities/types.js';
import { createLogger } from '../utils/observability/index.js';
import type { ApprovalDecision } from './types.js';

const logger = createLogger({ domain: 'approval-gate' });

/** humanFeedback recorded when a confirmation times out. */
export const NO_RESPONSE_FEEDBACK = 'no response';

export type ApprovalPolicy = 'auto' | 'require_confirmation';

export interface ConfirmationRequest {
  invocation: CapabilityInvocationRequest;
  expiresAt: number;
  /** Aborted once the gate stops waiting (timeout or answer) */
  signal: AbortSignal;
}

export interface ConfirmationReply {
  approved: boolean;
  feedback?: string;
}

export type ConfirmationPrompt = (request: ConfirmationRequest) => Promise<ConfirmationReply>;

export type GateVerdict =
  | { status: 'decided'; decision: ApprovalDecision }
  | { status: 'suspended'; invocationId: string; expiresAt: number };

export interface ApprovalGateOptions {
  /** Policy per capability name */
  policies?: Record<string, ApprovalPolicy>;
  /** Policy for names not listed in `policies` */
  defaultPolicy?: ApprovalPolicy;
  timeoutMs: number;
  prompt?: ConfirmationPrompt;
  now?: () => number;
}

export class ApprovalGate {
  private readonly policies: Record<string, ApprovalPolicy>;
  private readonly defaultPolicy: ApprovalPolicy;
  private readonly timeoutMs: number;
  private readonly prompt?: ConfirmationPrompt;
  private readonly now: () => number;

  constructor(options: ApprovalGateOptions) {
    this.policies = { ...options.policies };
    this.defaultPolicy = options.defaultPolicy ?? 'auto';
    this.timeoutMs = options.timeoutMs;
    this.prompt = options.prompt;
    this.now = options.now ?? Date.now;
  }

  policyFor(capabilityName: string): ApprovalPolicy {
    return this.policies[capabilityName] ?? this.defaultPolicy;
  }

  isBlocking(): boolean {
    return this.prompt !== undefined;
  }

  /**
   * Decide one invocation.
   *
   * @param requestedAt When the confirmation was first requested. Passing
   *   the original instant on re-entry keeps the deadline fixed.
   */
  async decide(invocation: CapabilityInvocationRequest, requestedAt = this.now()): Promise<GateVerdict> {
    const { invocationId, capabilityName } = invocation;

    if (this.policyFor(capabilityName) === 'auto') {
      return { status: 'decided', decision: { invocationId, approved: true } };
    }

    const expiresAt = requestedAt + this.timeoutMs;
    if (this.now() >= expiresAt) {
      return { status: 'decided', decision: this.timedOut(invocation) };
    }

    if (!this.prompt) {
      logger.info('approval_suspended', { invocationId, capability: capabilityName, expiresAt });
      return { status: 'suspended', invocationId, expiresAt };
    }

    const reply = await this.awaitPrompt(this.prompt, invocation, expiresAt);
    return {
      status: 'decided',
      decision: reply ? this.resolve(invocation, reply) : this.timedOut(invocation),
    };
  }

  /**
   * Turn a human reply into a decision. A reply that arrives after the
   * deadline counts as a timeout.
   */
  resolve(invocation: CapabilityInvocationRequest, reply: ConfirmationReply, expiresAt?: number): ApprovalDecision {
    if (expiresAt !== undefined && this.now() >= expiresAt) {
      return this.timedOut(invocation);
    }

    const feedback = reply.feedback?.trim();
    const decision: ApprovalDecision = { invocationId: invocation.invocationId, approved: reply.approved };
    if (feedback) decision.humanFeedback = feedback;

    logger.info('approval_decided', {
      invocationId: invocation.invocationId,
      capability: invocation.capabilityName,
      approved: reply.approved,
    });
    return decision;
  }

  private timedOut(invocation: CapabilityInvocationRequest): ApprovalDecision {
    logger.warn('approval_timed_out', {
      invocationId: invocation.invocationId,
      capability: invocation.capabilityName,
    });
    return { invocationId: invocation.invocationId, approved: false, humanFeedback: NO_RESPONSE_FEEDBACK };
  }

  /**
   * Race the prompt against the deadline. Resolves null on timeout.
   */
  private async awaitPrompt(
    prompt: ConfirmationPrompt,
    invocation: CapabilityInvocationRequest,
    expiresAt: number
  ): Promise<ConfirmationReply | null> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), Math.max(0, expiresAt - this.now()));
    });

    try {
      return await Promise.race([prompt({ invocation, expiresAt, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }
}
