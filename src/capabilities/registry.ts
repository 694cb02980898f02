/**
 * Capability Registry
 *
 * Holds the capability surface advertised to the model. Capabilities are
 * registered at startup, then the registry is frozen: the advertised set
 * must not change while conversations are in flight.
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import {
  DuplicateCapabilityError,
  ExecutionError,
  InvalidArgumentsError,
  RegistryFrozenError,
  UnknownCapabilityError,
} from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';
import type {
  CapabilityArguments,
  CapabilityContext,
  CapabilityDescriptor,
  JsonValue,
} from './types.js';
import { toToolDeclaration, validateArguments } from './validation.js';

const logger = createLogger({ domain: 'capability-registry' });

/**
 * Normalize an executor result into plain JSON so it can be checkpointed
 * and replayed to the model unchanged.
 */
function toJsonValue(value: unknown): JsonValue {
  if (value === undefined) return null;
  const encoded = JSON.stringify(value);
  return encoded === undefined ? null : JSON.parse(encoded);
}

export class CapabilityRegistry {
  private readonly descriptors = new Map<string, CapabilityDescriptor>();
  private frozen = false;

  /**
   * Register a capability.
   * @throws DuplicateCapabilityError if the name is taken
   * @throws RegistryFrozenError after freeze()
   */
  register(descriptor: CapabilityDescriptor): this {
    if (this.frozen) {
      throw new RegistryFrozenError(descriptor.name);
    }
    if (this.descriptors.has(descriptor.name)) {
      throw new DuplicateCapabilityError(descriptor.name);
    }
    this.descriptors.set(descriptor.name, Object.freeze({ ...descriptor }));
    return this;
  }

  /** Stop accepting registrations. Idempotent. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  /**
   * @throws UnknownCapabilityError
   */
  lookup(name: string): CapabilityDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownCapabilityError(name);
    }
    return descriptor;
  }

  /** Descriptors in registration order. */
  list(): CapabilityDescriptor[] {
    return [...this.descriptors.values()];
  }

  toTools(): Tool[] {
    return this.list().map(toToolDeclaration);
  }

  /**
   * Validate arguments and run the capability's executor.
   *
   * @throws UnknownCapabilityError if the name is not registered
   * @throws InvalidArgumentsError if validation fails (executor not called)
   * @throws ExecutionError if the executor throws
   */
  async execute(
    name: string,
    args: CapabilityArguments,
    context: CapabilityContext
  ): Promise<JsonValue> {
    const descriptor = this.lookup(name);

    const issues = validateArguments(args, descriptor.inputSchema);
    if (issues.length > 0) {
      logger.warn('capability_arguments_invalid', {
        capability: name,
        invocationId: context.invocationId,
        issues,
      });
      throw new InvalidArgumentsError(name, issues);
    }

    const startedAt = Date.now();
    try {
      const result = await descriptor.executor(args, context);
      logger.info('capability_executed', {
        capability: name,
        invocationId: context.invocationId,
        durationMs: Date.now() - startedAt,
      });
      return toJsonValue(result);
    } catch (error) {
      logger.error('capability_failed', {
        capability: name,
        invocationId: context.invocationId,
        durationMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ExecutionError(name, error);
    }
  }
}
