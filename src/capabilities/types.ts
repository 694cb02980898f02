/**
 * Capability type definitions.
 *
 * A capability is a named action the model may request. Descriptors are
 * stateless: anything an executor needs beyond its arguments (the current
 * user, the calendar client) is resolved by the executor itself or passed
 * through CapabilityContext.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Field specification for capability input validation.
 */
export interface FieldSpec {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  required: boolean;
  /** Shown to the model in the tool declaration */
  description?: string;
  /** Reject empty/whitespace-only strings. Defaults to true for required strings. */
  nonEmpty?: boolean;
  /** Allowed values for string fields */
  enum?: readonly string[];
  /** Element spec for array fields */
  items?: FieldSpec;
  /** Nested field specs for object fields; unknown nested keys are rejected */
  properties?: InputSchema;
  /** Custom validator returning an error message or null if valid. */
  validate?: (value: unknown) => string | null;
}

/** Input schema for a capability: one spec per argument name. */
export type InputSchema = Record<string, FieldSpec>;

export type CapabilityArguments = Record<string, unknown>;

/**
 * Per-invocation context handed to executors.
 */
export interface CapabilityContext {
  threadId: string;
  invocationId: string;
  /** Advisory; executors are not required to stop when it fires */
  signal?: AbortSignal;
}

export type CapabilityExecutor = (
  args: CapabilityArguments,
  context: CapabilityContext
) => Promise<unknown>;

export interface CapabilityDescriptor {
  name: string;
  description: string;
  inputSchema: InputSchema;
  executor: CapabilityExecutor;
}

/**
 * One concrete request from the model to run a capability.
 */
export interface CapabilityInvocationRequest {
  invocationId: string;
  capabilityName: string;
  arguments: CapabilityArguments;
}
