/**
 * Type definitions for the LLM module.
 */

import type { CapabilityDescriptor, CapabilityInvocationRequest } from '../capabilities/types.js';
import type { ThreadMessage } from '../orchestrator/types.js';

/**
 * What one model call produced: either a final answer or a non-empty list
 * of capability invocations, in the order the model asked for them.
 */
export type ModelResponse =
  | { type: 'final_answer'; text: string }
  | {
      type: 'invocations_requested';
      requests: CapabilityInvocationRequest[];
      /** Text the model wrote before its tool calls */
      leadingText?: string;
    };

export interface ConverseOptions {
  signal?: AbortSignal;
  /** For logs only */
  threadId?: string;
}

/**
 * Language-model gateway. Stateless: the whole visible history is sent on
 * every call.
 */
export interface ModelGateway {
  converse(
    history: ThreadMessage[],
    capabilities: CapabilityDescriptor[],
    options?: ConverseOptions
  ): Promise<ModelResponse>;
}
