import type {
  ActionResult,
  DataRecord,
  FailureResult,
  NeedsUserInputResult,
  ResultMetadata,
  SuccessResult,
} from '../../types/index.js';
import { isResolutionError } from './errors.js';

export const ActionResults = {
  success(message: string, data: DataRecord = {}, metadata?: ResultMetadata): SuccessResult {
    return metadata ? { status: 'success', message, data, metadata } : { status: 'success', message, data };
  },

  failure(error: string, metadata?: ResultMetadata): FailureResult {
    return metadata ? { status: 'failure', error, metadata } : { status: 'failure', error };
  },

  needsUserInput(message: string, metadata: ResultMetadata = {}): NeedsUserInputResult {
    return { status: 'needs_user_input', message, metadata };
  },

  /**
   * Map a thrown value to a Failure. Resolution errors keep their code.
   */
  failureFromError(error: unknown, field?: string): FailureResult {
    if (isResolutionError(error)) {
      return ActionResults.failure(error.message, { error: error.code, ...(field ? { field } : {}) });
    }
    const message = error instanceof Error ? error.message : String(error);
    return ActionResults.failure(message, { error: 'unexpected', ...(field ? { field } : {}) });
  },
};

export function isTerminal(result: ActionResult): result is SuccessResult | FailureResult {
  return result.status !== 'needs_user_input';
}

export function isSuccess(result: ActionResult): result is SuccessResult {
  return result.status === 'success';
}
