/**
 * Custom Error Classes
 */

import type { JobState } from '../stateMachine.js';

/**
 * Base error class for all reelport errors
 */
export class ReelportError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReelportError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The capability listing produced nothing usable
 */
export class ResolutionFailureError extends ReelportError {
  constructor(url: string, reason?: string) {
    super('No information available for this URL.', 'RESOLUTION_FAILURE', { url, reason });
    this.name = 'ResolutionFailureError';
  }
}

/**
 * The fetch tool exited non-zero or left no file behind
 */
export class FetchFailureError extends ReelportError {
  constructor(reason: string, exitCode?: number) {
    super(`Download failed: ${reason}`, 'FETCH_FAILURE', { reason, exitCode });
    this.name = 'FetchFailureError';
  }
}

/**
 * A repackaging step failed. Asset steps absorb it; segmentation with no
 * usable parts does not.
 */
export class ProcessingFailureError extends ReelportError {
  constructor(step: string, reason: string) {
    super(`${step} failed: ${reason}`, 'PROCESSING_FAILURE', { step, reason });
    this.name = 'ProcessingFailureError';
  }
}

export class DeliverySizeExceededError extends ReelportError {
  constructor(sizeBytes: number, limitBytes: number) {
    const limitGiB = Number((limitBytes / 1024 ** 3).toFixed(2));
    super(
      `File is too large to upload (>${limitGiB} GB).\n\n` +
        `Enable 'Split Large Files' in /settings to upload large files.`,
      'DELIVERY_SIZE_EXCEEDED',
      { sizeBytes, limitBytes }
    );
    this.name = 'DeliverySizeExceededError';
  }
}

/**
 * The delivery channel asked us to slow down
 */
export class DeliveryRateLimitedError extends ReelportError {
  public readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super(`Rate limited, retry after ${retryAfterSeconds}s`, 'DELIVERY_RATE_LIMITED', { retryAfterSeconds });
    this.name = 'DeliveryRateLimitedError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class AdmissionConflictError extends ReelportError {
  constructor(requester: string, activeJobId: string) {
    super('You already have an active download.', 'ADMISSION_CONFLICT', { requester, activeJobId });
    this.name = 'AdmissionConflictError';
  }
}

export class NoActiveJobError extends ReelportError {
  constructor(requester: string) {
    super('No active download.', 'NO_ACTIVE_JOB', { requester });
    this.name = 'NoActiveJobError';
  }
}

export class JobCancelledError extends ReelportError {
  constructor(jobId: string) {
    super('Download cancelled.', 'JOB_CANCELLED', { jobId });
    this.name = 'JobCancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends ReelportError {
  constructor(jobId: string, fromState: JobState, toState: JobState, message?: string) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}
