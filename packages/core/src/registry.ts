/**
 * Job Registry
 *
 * Active jobs by requester. Admission is a synchronous check-and-insert,
 * so two requests from one requester cannot both get in.
 */

import type { Job } from './types/job.js';

export type RegistryAdmission =
  | { status: 'accepted' }
  | { status: 'rejected'; reason: 'AlreadyActive'; activeJob: Job };

export class JobRegistry {
  private readonly active = new Map<string, Job>();

  admit(job: Job): RegistryAdmission {
    const existing = this.active.get(job.requester);
    if (existing) {
      return { status: 'rejected', reason: 'AlreadyActive', activeJob: existing };
    }
    this.active.set(job.requester, job);
    return { status: 'accepted' };
  }

  /**
   * Remove the job's entry. An entry that belongs to a newer job is left alone.
   */
  release(job: Job): boolean {
    if (this.active.get(job.requester) !== job) {
      return false;
    }
    return this.active.delete(job.requester);
  }

  get(requester: string): Job | undefined {
    return this.active.get(requester);
  }

  get size(): number {
    return this.active.size;
  }
}
