/**
 * Job Scheduler
 *
 * Admits requests, keeps the FIFO queue and runs a single worker loop
 * that takes each job to a terminal state before starting the next.
 *
 * Events:
 * - job:queued   (job)
 * - job:started  (job)
 * - job:finished (job)
 */

import { EventEmitter } from 'node:events';
import { createLogger, formatDuration, type Logger } from '@reelport/utils';
import { AdmissionConflictError, NoActiveJobError } from './errors/index.js';
import { JobRegistry } from './registry.js';
import { createJob, jobStatus, type Job, type JobRequest } from './types/job.js';

export interface JobExecutor {
  execute(job: Job): Promise<void>;
}

export type AdmissionResult =
  | { status: 'accepted'; job: Job }
  | { status: 'rejected'; reason: 'AlreadyActive'; error: AdmissionConflictError };

export type CancelResult =
  | { status: 'ok'; job: Job; wasRunning: boolean }
  | { status: 'rejected'; reason: 'NoActiveJob'; error: NoActiveJobError };

export class JobScheduler extends EventEmitter {
  private readonly registry = new JobRegistry();
  private readonly queue: Job[] = [];
  private readonly executor: JobExecutor;
  private readonly log: Logger;
  private worker: Promise<void> | null = null;
  private current: Job | null = null;

  constructor(executor: JobExecutor, log?: Logger) {
    super();
    this.executor = executor;
    this.log = log ?? createLogger('scheduler');
  }

  /**
   * Create a job for the request and queue it, unless the requester
   * already has one in flight
   */
  admit(request: JobRequest): AdmissionResult {
    const job = createJob(request);
    const admission = this.registry.admit(job);

    if (admission.status === 'rejected') {
      this.log.info({ requester: request.requester, activeJobId: admission.activeJob.id }, 'Admission rejected');
      return {
        status: 'rejected',
        reason: 'AlreadyActive',
        error: new AdmissionConflictError(request.requester, admission.activeJob.id),
      };
    }

    this.log.info({ jobId: job.id, requester: job.requester, url: job.url }, 'Job admitted');
    this.enqueue(job);
    return { status: 'accepted', job };
  }

  enqueue(job: Job): void {
    this.queue.push(job);
    this.emit('job:queued', job);
    this.wake();
  }

  /**
   * Cancel the requester's job. A queued job is dropped without ever
   * starting; a running job has its abort signal fired.
   */
  cancel(requester: string): CancelResult {
    const job = this.registry.get(requester);
    if (!job) {
      return { status: 'rejected', reason: 'NoActiveJob', error: new NoActiveJobError(requester) };
    }

    // Work is done; only cleanup and release remain
    if (job.machine.isTerminal()) {
      return { status: 'rejected', reason: 'NoActiveJob', error: new NoActiveJobError(requester) };
    }

    const index = this.queue.indexOf(job);
    if (index >= 0) {
      this.queue.splice(index, 1);
      job.machine.cancel('Cancelled while queued');
      this.registry.release(job);
      this.log.info({ jobId: job.id }, 'Queued job cancelled');
      this.emit('job:finished', job);
      return { status: 'ok', job, wasRunning: false };
    }

    this.log.info({ jobId: job.id, status: jobStatus(job) }, 'Cancelling running job');
    job.controller.abort();
    return { status: 'ok', job, wasRunning: true };
  }

  get(requester: string): Job | undefined {
    return this.registry.get(requester);
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Resolves once the queue is empty and no job is running
   */
  async waitForIdle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Cancel every queued job, abort the running one and wait for the worker
   */
  async stop(): Promise<void> {
    for (const job of [...this.queue]) {
      this.cancel(job.requester);
    }
    if (this.current) {
      this.cancel(this.current.requester);
    }
    await this.waitForIdle();
  }

  private wake(): void {
    this.worker ??= this.drain()
      .catch((error: unknown) => {
        this.log.error({ err: error }, 'Worker loop crashed');
      })
      .finally(() => {
        this.worker = null;
        if (this.queue.length > 0) this.wake();
      });
  }

  private async drain(): Promise<void> {
    for (let job = this.queue.shift(); job; job = this.queue.shift()) {
      await this.runJob(job);
    }
  }

  private async runJob(job: Job): Promise<void> {
    this.current = job;
    this.emit('job:started', job);

    try {
      await this.executor.execute(job);
    } catch (error) {
      this.log.error({ err: error, jobId: job.id }, 'Job executor threw');
      if (!job.machine.isTerminal()) {
        job.failureReason = error instanceof Error ? error.message : String(error);
        job.machine.fail(job.failureReason);
      }
    } finally {
      this.registry.release(job);
      this.current = null;
      this.log.info(
        { jobId: job.id, status: jobStatus(job), elapsed: formatDuration(Date.now() - job.createdAt.getTime()) },
        'Job finished'
      );
      this.emit('job:finished', job);
    }
  }
}
