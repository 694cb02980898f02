/**
 * Model gateway that plays back a fixed script.
 *
 * Each converse() call consumes the next entry. Entries may be functions of
 * the history so a test can react to what the controller sent.
 */

import type { CapabilityDescriptor } from '../../src/capabilities/types.js';
import type { ConverseOptions, ModelGateway, ModelResponse } from '../../src/llm/types.js';
import type { ThreadMessage } from '../../src/orchestrator/types.js';

type ScriptEntry = ModelResponse | ((history: ThreadMessage[]) => ModelResponse);

export interface GatewayCall {
  history: ThreadMessage[];
  capabilities: string[];
  signal?: AbortSignal;
}

export class ScriptedGateway implements ModelGateway {
  readonly calls: GatewayCall[] = [];
  private readonly script: ScriptEntry[];

  constructor(script: ScriptEntry[]) {
    this.script = [...script];
  }

  async converse(
    history: ThreadMessage[],
    capabilities: CapabilityDescriptor[],
    options: ConverseOptions = {}
  ): Promise<ModelResponse> {
    this.calls.push({
      history: structuredClone(history),
      capabilities: capabilities.map((capability) => capability.name),
      signal: options.signal,
    });

    const entry = this.script.shift();
    if (!entry) {
      throw new Error(`ScriptedGateway ran out of responses after ${this.calls.length - 1} calls`);
    }
    return typeof entry === 'function' ? entry(history) : entry;
  }

  remaining(): number {
    return this.script.length;
  }
}

export function finalAnswer(text: string): ModelResponse {
  return { type: 'final_answer', text };
}

export function requestInvocations(
  ...requests: Array<[invocationId: string, capabilityName: string, args?: Record<string, unknown>]>
): ModelResponse {
  return {
    type: 'invocations_requested',
    requests: requests.map(([invocationId, capabilityName, args]) => ({
      invocationId,
      capabilityName,
      arguments: args ?? {},
    })),
  };
}
