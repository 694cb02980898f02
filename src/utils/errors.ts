/**
 * @fileoverview Error taxonomy for the assistant.
 *
 * Every failure the turn controller, capability registry, checkpoint store
 * or calendar client can raise is an AppError subclass with a stable code.
 * Front ends map codes to user-facing output (HTTP status, terminal line).
 *
 * - Invocation-level errors (UNKNOWN_CAPABILITY, INVALID_ARGUMENTS,
 *   EXECUTION_ERROR) are folded into tool output for the model.
 * - Turn-level errors (RUNAWAY_LOOP, THREAD_BUSY, CHECKPOINT_ERROR, ...)
 *   abort the turn and reach the caller.
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Extract a message from anything that was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Capability errors
// ============================================================================

export class DuplicateCapabilityError extends AppError {
  constructor(name: string) {
    super(`Capability already registered: ${name}`, 'DUPLICATE_CAPABILITY', false, { capability: name });
    this.name = 'DuplicateCapabilityError';
  }
}

export class RegistryFrozenError extends AppError {
  constructor(name: string) {
    super(
      `Capability registry is frozen; cannot register ${name}`,
      'REGISTRY_FROZEN',
      false,
      { capability: name }
    );
    this.name = 'RegistryFrozenError';
  }
}

export class UnknownCapabilityError extends AppError {
  constructor(name: string) {
    super(`Unknown capability: ${name}`, 'UNKNOWN_CAPABILITY', true, { capability: name });
    this.name = 'UnknownCapabilityError';
  }
}

export class InvalidArgumentsError extends AppError {
  constructor(
    name: string,
    public readonly issues: string[]
  ) {
    super(`Invalid arguments for ${name}: ${issues.join('; ')}`, 'INVALID_ARGUMENTS', true, {
      capability: name,
      issues,
    });
    this.name = 'InvalidArgumentsError';
  }
}

export class ExecutionError extends AppError {
  constructor(name: string, reason: unknown) {
    super(`${name} failed: ${errorMessage(reason)}`, 'EXECUTION_ERROR', true, {
      capability: name,
      ...(reason instanceof UpstreamError
        ? { statusCode: reason.statusCode }
        : {}),
    });
    this.name = 'ExecutionError';
  }
}

// ============================================================================
// Collaborator errors
// ============================================================================

/**
 * Non-success response from an upstream HTTP API.
 */
export class UpstreamError extends AppError {
  constructor(
    public readonly statusCode: number,
    public readonly body: string,
    operation: string
  ) {
    super(`${operation} returned HTTP ${statusCode}`, 'UPSTREAM_ERROR', statusCode >= 500, {
      operation,
      statusCode,
    });
    this.name = 'UpstreamError';
  }
}

// ============================================================================
// Turn and thread errors
// ============================================================================

export class RunawayLoopError extends AppError {
  constructor(threadId: string, limit: number) {
    super(
      `Turn exceeded ${limit} capability round trips`,
      'RUNAWAY_LOOP',
      true,
      { threadId, limit }
    );
    this.name = 'RunawayLoopError';
  }
}

export class ThreadBusyError extends AppError {
  constructor(threadId: string) {
    super(`Thread ${threadId} is being processed by another turn`, 'THREAD_BUSY', true, { threadId });
    this.name = 'ThreadBusyError';
  }
}

export class ThreadNotFoundError extends AppError {
  constructor(threadId: string) {
    super(`Thread not found: ${threadId}`, 'THREAD_NOT_FOUND', false, { threadId });
    this.name = 'ThreadNotFoundError';
  }
}

export class InvalidPhaseError extends AppError {
  constructor(threadId: string, phase: string, operation: string) {
    super(
      `Cannot ${operation} while thread ${threadId} is in phase ${phase}`,
      'INVALID_PHASE',
      false,
      { threadId, phase, operation }
    );
    this.name = 'InvalidPhaseError';
  }
}

export class UnknownInvocationError extends AppError {
  constructor(threadId: string, invocationId: string) {
    super(
      `No invocation ${invocationId} is awaiting approval on thread ${threadId}`,
      'UNKNOWN_INVOCATION',
      false,
      { threadId, invocationId }
    );
    this.name = 'UnknownInvocationError';
  }
}

export class DuplicateInvocationError extends AppError {
  constructor(threadId: string, invocationId: string) {
    super(
      `Model reused invocation id ${invocationId} on thread ${threadId}`,
      'DUPLICATE_INVOCATION',
      true,
      { threadId, invocationId }
    );
    this.name = 'DuplicateInvocationError';
  }
}

export class TurnCancelledError extends AppError {
  constructor(threadId: string) {
    super(`Turn on thread ${threadId} was cancelled`, 'TURN_CANCELLED', true, { threadId });
    this.name = 'TurnCancelledError';
  }
}

export class CheckpointError extends AppError {
  constructor(threadId: string, reason: unknown) {
    super(`Checkpoint failed for thread ${threadId}: ${errorMessage(reason)}`, 'CHECKPOINT_ERROR', true, {
      threadId,
    });
    this.name = 'CheckpointError';
  }
}
