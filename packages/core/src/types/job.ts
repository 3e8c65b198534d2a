/**
 * Job Types
 */

import { randomUUID } from 'node:crypto';
import { ProgressTracker } from '@reelport/acquisition';
import { JobStateMachine, type JobState } from '../stateMachine.js';
import type { StatusReporter } from './collaborators.js';

export interface JobRequest {
  /** Identity of whoever asked; at most one active job each */
  requester: string;
  url: string;
  /** Format id or "best"; null means resolve it before fetching */
  encoding?: string | null;
  /** Where stage and progress text for this job goes */
  reporter?: StatusReporter;
}

export interface Job {
  readonly id: string;
  readonly requester: string;
  readonly url: string;
  encoding: string | null;
  readonly createdAt: Date;
  readonly machine: JobStateMachine;
  failureReason: string | null;
  readonly progress: ProgressTracker;
  /** Owned by the scheduler; aborting it cancels the job */
  readonly controller: AbortController;
  readonly reporter: StatusReporter | null;
}

export function createJob(request: JobRequest, id: string = randomUUID()): Job {
  return {
    id,
    requester: request.requester,
    url: request.url,
    encoding: request.encoding ?? null,
    createdAt: new Date(),
    machine: new JobStateMachine(id),
    failureReason: null,
    progress: new ProgressTracker(),
    controller: new AbortController(),
    reporter: request.reporter ?? null,
  };
}

export function jobStatus(job: Job): JobState {
  return job.machine.getState();
}
