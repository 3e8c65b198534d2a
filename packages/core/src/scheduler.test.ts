import { describe, expect, it } from 'vitest';

import { JobRegistry } from './registry.js';
import { JobScheduler, type JobExecutor } from './scheduler.js';
import { createJob, jobStatus, type Job } from './types/job.js';

/**
 * Executor that walks each job straight to COMPLETED, optionally holding
 * it open until released
 */
class StepExecutor implements JobExecutor {
  executed: string[] = [];
  private gates = new Map<string, () => void>();
  hold = false;

  async execute(job: Job): Promise<void> {
    this.executed.push(job.url);
    if (this.hold) {
      await new Promise<void>((resolve) => this.gates.set(job.id, resolve));
    }
    job.machine.transitionTo('RESOLVING');
    job.machine.transitionTo('FETCHING');
    job.machine.transitionTo('GENERATING_ASSETS');
    job.machine.transitionTo('DELIVERING');
    job.machine.transitionTo('COMPLETED');
  }

  release(job: Job): void {
    this.gates.get(job.id)?.();
  }
}

describe('JobRegistry', () => {
  it('admits one job per requester', () => {
    const registry = new JobRegistry();
    const first = createJob({ requester: 'user-1', url: 'https://example.com/a' });
    const second = createJob({ requester: 'user-1', url: 'https://example.com/b' });

    expect(registry.admit(first)).toEqual({ status: 'accepted' });
    expect(registry.admit(second)).toEqual({ status: 'rejected', reason: 'AlreadyActive', activeJob: first });
    expect(registry.size).toBe(1);
  });

  it('only releases the entry that belongs to the job', () => {
    const registry = new JobRegistry();
    const first = createJob({ requester: 'user-1', url: 'https://example.com/a' });
    const stale = createJob({ requester: 'user-1', url: 'https://example.com/b' });
    registry.admit(first);

    expect(registry.release(stale)).toBe(false);
    expect(registry.get('user-1')).toBe(first);
    expect(registry.release(first)).toBe(true);
    expect(registry.get('user-1')).toBeUndefined();
  });
});

describe('JobScheduler', () => {
  it('accepts exactly one of two back-to-back requests from one requester', () => {
    const scheduler = new JobScheduler(new StepExecutor());

    const results = [
      scheduler.admit({ requester: 'user-1', url: 'https://example.com/a' }),
      scheduler.admit({ requester: 'user-1', url: 'https://example.com/b' }),
    ];

    expect(results.map((r) => r.status)).toEqual(['accepted', 'rejected']);
    const rejected = results[1];
    expect(rejected?.status === 'rejected' && rejected.error.code).toBe('ADMISSION_CONFLICT');
  });

  it('admits again once the first job reached a terminal state', async () => {
    const scheduler = new JobScheduler(new StepExecutor());

    const first = scheduler.admit({ requester: 'user-1', url: 'https://example.com/a' });
    await scheduler.waitForIdle();
    const second = scheduler.admit({ requester: 'user-1', url: 'https://example.com/b' });

    expect(first.status === 'accepted' && jobStatus(first.job)).toBe('COMPLETED');
    expect(second.status).toBe('accepted');
    await scheduler.waitForIdle();
  });

  it('runs jobs one at a time in admission order', async () => {
    const executor = new StepExecutor();
    const scheduler = new JobScheduler(executor);
    const events: string[] = [];
    scheduler.on('job:started', (job: Job) => events.push(`start ${job.requester}`));
    scheduler.on('job:finished', (job: Job) => events.push(`finish ${job.requester}`));

    scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    scheduler.admit({ requester: 'user-2', url: 'https://example.com/2' });
    scheduler.admit({ requester: 'user-3', url: 'https://example.com/3' });
    await scheduler.waitForIdle();

    expect(executor.executed).toEqual(['https://example.com/1', 'https://example.com/2', 'https://example.com/3']);
    expect(events).toEqual([
      'start user-1',
      'finish user-1',
      'start user-2',
      'finish user-2',
      'start user-3',
      'finish user-3',
    ]);
  });

  it('drops a queued job on cancel without running it', async () => {
    const executor = new StepExecutor();
    executor.hold = true;
    const scheduler = new JobScheduler(executor);

    const running = scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    const queued = scheduler.admit({ requester: 'user-2', url: 'https://example.com/2' });
    await Promise.resolve();

    const result = scheduler.cancel('user-2');
    expect(result.status === 'ok' && result.wasRunning).toBe(false);
    expect(scheduler.pending).toBe(0);
    expect(scheduler.get('user-2')).toBeUndefined();

    if (running.status === 'accepted') executor.release(running.job);
    await scheduler.waitForIdle();

    expect(executor.executed).toEqual(['https://example.com/1']);
    expect(queued.status === 'accepted' && jobStatus(queued.job)).toBe('CANCELLED');
  });

  it('fires the abort signal of a running job', async () => {
    const executor = new StepExecutor();
    executor.hold = true;
    const scheduler = new JobScheduler(executor);

    const admitted = scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    await Promise.resolve();
    const result = scheduler.cancel('user-1');

    expect(result.status === 'ok' && result.wasRunning).toBe(true);
    expect(admitted.status === 'accepted' && admitted.job.controller.signal.aborted).toBe(true);

    if (admitted.status === 'accepted') executor.release(admitted.job);
    await scheduler.waitForIdle();
  });

  it('drops the queue and aborts the running job on stop', async () => {
    const executor = new StepExecutor();
    executor.hold = true;
    const scheduler = new JobScheduler(executor);

    const running = scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    const queued = scheduler.admit({ requester: 'user-2', url: 'https://example.com/2' });

    const stopping = scheduler.stop();
    expect(running.status === 'accepted' && running.job.controller.signal.aborted).toBe(true);
    expect(queued.status === 'accepted' && jobStatus(queued.job)).toBe('CANCELLED');

    if (running.status === 'accepted') executor.release(running.job);
    await stopping;

    expect(executor.executed).toEqual(['https://example.com/1']);
    expect(scheduler.pending).toBe(0);
    expect(scheduler.get('user-1')).toBeUndefined();
  });

  it('rejects a cancel once the job has reached a terminal state', async () => {
    let finishCleanup = (): void => {};
    const scheduler = new JobScheduler({
      execute: async (job) => {
        job.machine.transitionTo('RESOLVING');
        job.machine.transitionTo('FETCHING');
        job.machine.transitionTo('GENERATING_ASSETS');
        job.machine.transitionTo('DELIVERING');
        job.machine.transitionTo('COMPLETED');
        await new Promise<void>((resolve) => {
          finishCleanup = resolve;
        });
      },
    });

    const admitted = scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    const result = scheduler.cancel('user-1');

    expect(result.status === 'rejected' && result.reason).toBe('NoActiveJob');
    expect(admitted.status === 'accepted' && admitted.job.controller.signal.aborted).toBe(false);

    finishCleanup();
    await scheduler.waitForIdle();
    expect(admitted.status === 'accepted' && jobStatus(admitted.job)).toBe('COMPLETED');
  });

  it('rejects a cancel with no active job', () => {
    const scheduler = new JobScheduler(new StepExecutor());

    const result = scheduler.cancel('nobody');

    expect(result.status).toBe('rejected');
    expect(result.status === 'rejected' && result.error.code).toBe('NO_ACTIVE_JOB');
  });

  it('marks a job FAILED when the executor throws', async () => {
    const scheduler = new JobScheduler({
      execute: async () => {
        throw new Error('executor exploded');
      },
    });

    const admitted = scheduler.admit({ requester: 'user-1', url: 'https://example.com/1' });
    await scheduler.waitForIdle();

    expect(admitted.status === 'accepted' && admitted.job.failureReason).toBe('executor exploded');
    expect(scheduler.get('user-1')).toBeUndefined();
  });
});
