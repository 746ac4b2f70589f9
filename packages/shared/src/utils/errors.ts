export class CogniSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CogniSyncError';
  }
}

export class SchemaValidationError extends CogniSyncError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends CogniSyncError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class LlmError extends CogniSyncError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class JobNotFoundError extends CogniSyncError {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND');
    this.name = 'JobNotFoundError';
  }
}

export class JobConflictError extends CogniSyncError {
  constructor(
    public readonly jobId: string,
    public readonly status: string,
  ) {
    super(`Job ${jobId} cannot be run while ${status}`, 'JOB_CONFLICT');
    this.name = 'JobConflictError';
  }
}

export class PersistenceError extends CogniSyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class PaymentError extends CogniSyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'PAYMENT_ERROR', cause);
    this.name = 'PaymentError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
