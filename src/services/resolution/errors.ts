import type { ResolutionErrorCode } from '../../types/index.js';

export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly code: ResolutionErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

/** Missing model, store or subflow definition. Fatal for the call, never retried. */
export class ConfigurationError extends ResolutionError {
  constructor(message: string) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

/** A completion provider or entity store call failed or timed out. */
export class ProviderError extends ResolutionError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${provider}: ${message}`, 'provider', options);
    this.name = 'ProviderError';
  }
}

export class UserDeclinedError extends ResolutionError {
  constructor(message = 'Entity creation cancelled by user') {
    super(message, 'user_declined');
    this.name = 'UserDeclinedError';
  }
}

export class WorkflowStackError extends ResolutionError {
  constructor(message: string) {
    super(message, 'workflow_stack');
    this.name = 'WorkflowStackError';
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}
