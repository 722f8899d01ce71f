// Error taxonomy for stage work
// Work functions throw TransientError (retry) or PermanentError (stop)

import { ProviderError } from 'newsdesk-market-data';
import { errorMessage } from '../utils/logger.js';

export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
  }
}

export class PermanentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermanentError';
  }
}

/** Invalid stage graph, raised before any work runs */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

/** Raised by the executor's timer; counts as transient */
export class StageTimeoutError extends TransientError {
  constructor(stage: string, timeoutMs: number) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientError;
}

/**
 * Map provider failures onto the retry taxonomy at the work-function boundary.
 * Anything unclassified is permanent.
 */
export function toStageError(err: unknown): TransientError | PermanentError {
  if (err instanceof TransientError || err instanceof PermanentError) return err;
  if (err instanceof ProviderError) {
    return err.retryable
      ? new TransientError(err.message, { cause: err })
      : new PermanentError(err.message, { cause: err });
  }
  const message = errorMessage(err);
  return new PermanentError(message, { cause: err });
}
