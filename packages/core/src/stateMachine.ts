/**
 * Job State Machine
 *
 * Strict state machine for job lifecycle management.
 *
 * State Flow:
 * QUEUED → RESOLVING → FETCHING → SEGMENTING → GENERATING_ASSETS → DELIVERING → COMPLETED
 *                               ↘ GENERATING_ASSETS (no split needed)
 *          ↘ FAILED / CANCELLED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Terminal states are final; a retry is a new job
 */

import { StateTransitionError } from './errors/index.js';

export const JOB_STATES = [
  'QUEUED',
  'RESOLVING',
  'FETCHING',
  'SEGMENTING',
  'GENERATING_ASSETS',
  'DELIVERING',
  'COMPLETED',
  'FAILED',
  'CANCELLED',
] as const;

export type JobState = (typeof JOB_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['COMPLETED', 'FAILED', 'CANCELLED']);

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<JobState, Set<JobState>> = {
  QUEUED: new Set<JobState>(['RESOLVING', 'CANCELLED', 'FAILED']),
  RESOLVING: new Set<JobState>(['FETCHING', 'CANCELLED', 'FAILED']),
  FETCHING: new Set<JobState>([
    'SEGMENTING',
    'GENERATING_ASSETS', // Skip segmenting when the file fits
    'CANCELLED',
    'FAILED',
  ]),
  SEGMENTING: new Set<JobState>(['GENERATING_ASSETS', 'CANCELLED', 'FAILED']),
  GENERATING_ASSETS: new Set<JobState>(['DELIVERING', 'CANCELLED', 'FAILED']),
  DELIVERING: new Set<JobState>(['COMPLETED', 'CANCELLED', 'FAILED']),
  COMPLETED: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
  CANCELLED: new Set<JobState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Job State Machine class
 * Manages state transitions with validation
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'QUEUED') {
    this.jobId = jobId;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): JobState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  /**
   * Fail the job with a reason
   */
  fail(reason: string): JobStateTransition {
    return this.transitionTo('FAILED', reason);
  }

  cancel(reason?: string): JobStateTransition {
    return this.transitionTo('CANCELLED', reason);
  }
}
