// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Caller misuse. Thrown before any state is touched, so the model is
 * exactly as it was before the call.
 */
export class PreconditionError extends RuntimeError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'PreconditionError';
  }
}

/**
 * Error when a payload is merged into the aggregate model.
 */
export class AggregateMergeError extends PreconditionError {
  constructor() {
    super('AGGREGATE_MERGE', 'The aggregate model only mirrors events and cannot be merged into');
    this.name = 'AggregateMergeError';
  }
}

/**
 * Error when a payload was produced at a different access level than expected.
 */
export class LevelMismatchError extends PreconditionError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super('LEVEL_MISMATCH', `Payload level ${received} does not match expected level ${expected}`);
    this.name = 'LevelMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Error when a tag update is not a list of strings.
 */
export class InvalidTagsError extends PreconditionError {
  readonly tags: unknown;

  constructor(tags: unknown, reason: string) {
    super('INVALID_TAGS', `Invalid tag update: ${reason}`);
    this.name = 'InvalidTagsError';
    this.tags = tags;
  }
}

/**
 * Error when a find() predicate calls back into the registry.
 */
export class RegistryReentryError extends PreconditionError {
  readonly operation: string;

  constructor(operation: string) {
    super('REGISTRY_REENTRY', `Cannot call ${operation} from inside a find() predicate`);
    this.name = 'RegistryReentryError';
    this.operation = operation;
  }
}
