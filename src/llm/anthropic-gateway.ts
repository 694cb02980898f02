/**
 * Anthropic Messages API gateway.
 *
 * ## Thread → Messages mapping
 * - `system` messages become the `system` parameter (with a time context
 *   line added at call time)
 * - `user` messages (typed or feedback) become user text blocks
 * - `assistant_text` and `invocation_request` become assistant `text` and
 *   `tool_use` blocks
 * - `invocation_result` becomes a user `tool_result` block; failed and
 *   rejected results set `is_error`
 *
 * Consecutive entries for the same role are merged into one turn, so a
 * round of several tool calls is one assistant turn followed by one user
 * turn of results.
 *
 * ## Response → ModelResponse
 * Any `tool_use` block makes the response an `invocations_requested`;
 * otherwise the text blocks are the final answer.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  ContentBlockParam,
  Message as AnthropicMessage,
  MessageParam,
  ToolUseBlock,
} from '@anthropic-ai/sdk/resources/messages';
import { isRecord, toToolDeclaration } from '../capabilities/validation.js';
import type { CapabilityDescriptor, CapabilityInvocationRequest } from '../capabilities/types.js';
import type { InvocationResultMessage, ThreadMessage } from '../orchestrator/types.js';
import { UpstreamError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import { getClient } from './client.js';
import { withTimeContext } from './prompts.js';
import type { ConverseOptions, ModelGateway, ModelResponse } from './types.js';

const logger = createLogger({ domain: 'llm' });

export interface AnthropicGatewayOptions {
  model: string;
  maxTokens: number;
  /** IANA zone used for the time context line */
  timezone: string;
  /** Defaults to the shared client singleton */
  client?: Anthropic;
  now?: () => Date;
}

/**
 * Content of a tool_result block for an invocation result.
 */
export function renderResultContent(result: InvocationResultMessage): string {
  switch (result.status) {
    case 'succeeded':
      return JSON.stringify(result.output);
    case 'failed':
      return JSON.stringify({ error: result.error ?? { code: 'UNKNOWN', message: 'Invocation failed' } });
    case 'rejected':
      return JSON.stringify({ rejected: true, humanFeedback: result.humanFeedback ?? null });
  }
}

function toContentBlock(message: Exclude<ThreadMessage, { kind: 'system' }>): ContentBlockParam {
  switch (message.kind) {
    case 'user':
    case 'assistant_text':
      return { type: 'text', text: message.text };
    case 'invocation_request':
      return {
        type: 'tool_use',
        id: message.invocation.invocationId,
        name: message.invocation.capabilityName,
        input: message.invocation.arguments,
      };
    case 'invocation_result':
      return {
        type: 'tool_result',
        tool_use_id: message.invocationId,
        content: renderResultContent(message),
        is_error: message.status !== 'succeeded',
      };
  }
}

/**
 * Convert a thread history to the system prompt and message list the
 * Messages API takes.
 */
export function toAnthropicMessages(history: ThreadMessage[]): { system: string; messages: MessageParam[] } {
  const systemParts: string[] = [];
  const messages: MessageParam[] = [];

  for (const message of history) {
    if (message.kind === 'system') {
      systemParts.push(message.text);
      continue;
    }
    // The API rejects text blocks without non-whitespace content
    if ((message.kind === 'user' || message.kind === 'assistant_text') && message.text.trim() === '') {
      continue;
    }

    const role = message.kind === 'assistant_text' || message.kind === 'invocation_request' ? 'assistant' : 'user';
    const block = toContentBlock(message);
    const previous = messages[messages.length - 1];

    if (previous && previous.role === role && Array.isArray(previous.content)) {
      previous.content.push(block);
    } else {
      messages.push({ role, content: [block] });
    }
  }

  return { system: systemParts.join('\n\n'), messages };
}

function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

/**
 * Convert an API response to a ModelResponse.
 */
export function fromAnthropicResponse(response: Pick<AnthropicMessage, 'content'>): ModelResponse {
  const toolUses = response.content.filter(isToolUse);
  const texts = (blocks: ContentBlock[]): string =>
    blocks
      .map((block) => (block.type === 'text' ? block.text : ''))
      .filter((text) => text.length > 0)
      .join('\n');

  if (toolUses.length === 0) {
    return { type: 'final_answer', text: texts(response.content) };
  }

  const requests: CapabilityInvocationRequest[] = toolUses.map((block) => {
    if (!isRecord(block.input)) {
      logger.warn('tool_input_not_object', { tool: block.name, toolUseId: block.id });
    }
    return {
      invocationId: block.id,
      capabilityName: block.name,
      arguments: isRecord(block.input) ? block.input : {},
    };
  });

  const firstToolIndex = response.content.findIndex(isToolUse);
  const leadingText = texts(response.content.slice(0, firstToolIndex));

  return leadingText
    ? { type: 'invocations_requested', requests, leadingText }
    : { type: 'invocations_requested', requests };
}

export class AnthropicGateway implements ModelGateway {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly timezone: string;
  private readonly client?: Anthropic;
  private readonly now: () => Date;

  constructor(options: AnthropicGatewayOptions) {
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.timezone = options.timezone;
    this.client = options.client;
    this.now = options.now ?? (() => new Date());
  }

  async converse(
    history: ThreadMessage[],
    capabilities: CapabilityDescriptor[],
    options: ConverseOptions = {}
  ): Promise<ModelResponse> {
    const { system, messages } = toAnthropicMessages(history);
    const client = this.client ?? getClient();
    const startedAt = Date.now();

    let response: AnthropicMessage;
    try {
      response = await client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: withTimeContext(system, this.timezone, this.now()),
          tools: capabilities.map(toToolDeclaration),
          messages,
        },
        { signal: options.signal }
      );
    } catch (error) {
      const status = isRecord(error) ? error.status : undefined;
      if (typeof status === 'number') {
        const body = error instanceof Error ? error.message : '';
        throw new UpstreamError(status, body, 'anthropic.messages.create');
      }
      throw error;
    }

    logger.info('model_call_completed', {
      threadId: options.threadId,
      model: this.model,
      stopReason: response.stop_reason,
      durationMs: Date.now() - startedAt,
      messageCount: messages.length,
    });
    if (response.stop_reason === 'max_tokens') {
      logger.warn('model_response_truncated', { threadId: options.threadId, maxTokens: this.maxTokens });
    }

    return fromAnthropicResponse(response);
  }
}
