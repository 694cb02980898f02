/**
 * LLM Integration Module
 *
 * The turn controller talks to the model through the ModelGateway
 * interface; AnthropicGateway is the Messages API implementation.
 */

export type { ConverseOptions, ModelGateway, ModelResponse } from './types.js';
export { AnthropicGateway, fromAnthropicResponse, toAnthropicMessages } from './anthropic-gateway.js';
export { getClient, resetClient } from './client.js';
export { buildSystemPrompt, withTimeContext } from './prompts.js';
