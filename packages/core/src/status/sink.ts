/**
 * Status Sink
 *
 * Consumes status messages for one job and turns them into edits of the
 * job's status message. Stage messages always go out; progress messages
 * pass through the throttle.
 */

import type { ProgressSnapshot } from '@reelport/acquisition';
import { createLogger, type Logger } from '@reelport/utils';
import type { StatusReporter } from '../types/collaborators.js';
import { CoalescingChannel } from './channel.js';
import { formatProgressText } from './format.js';
import { ProgressThrottle } from './throttle.js';

export type StatusMessage =
  | { kind: 'stage'; text: string }
  | { kind: 'progress'; title: string; snapshot: ProgressSnapshot };

export interface StatusSinkOptions {
  capacity?: number;
  throttle?: ProgressThrottle;
  log?: Logger;
}

const DEFAULT_CAPACITY = 16;

export class StatusSink {
  private readonly channel: CoalescingChannel<StatusMessage>;
  private readonly throttle: ProgressThrottle;
  private readonly reporter: StatusReporter;
  private readonly log: Logger;
  private task: Promise<void> | null = null;
  private currentTitle: string | null = null;

  constructor(reporter: StatusReporter, options: StatusSinkOptions = {}) {
    this.reporter = reporter;
    this.channel = new CoalescingChannel<StatusMessage>(
      options.capacity ?? DEFAULT_CAPACITY,
      (message) => message.kind === 'progress'
    );
    this.throttle = options.throttle ?? new ProgressThrottle();
    this.log = options.log ?? createLogger('status');
  }

  start(): void {
    this.task ??= this.consume().catch((error: unknown) => {
      this.log.error({ err: error }, 'Status sink stopped');
    });
  }

  stage(text: string): void {
    this.channel.push({ kind: 'stage', text });
  }

  progress(title: string, snapshot: ProgressSnapshot): void {
    this.channel.push({ kind: 'progress', title, snapshot });
  }

  /**
   * Flush what is queued and stop
   */
  async close(): Promise<void> {
    this.channel.close();
    await this.task;
  }

  private async consume(): Promise<void> {
    for (;;) {
      const message = await this.channel.receive();
      if (message === null) return;
      await this.publish(message);
    }
  }

  private async publish(message: StatusMessage): Promise<void> {
    let text: string;

    if (message.kind === 'stage') {
      this.throttle.reset();
      this.currentTitle = null;
      text = message.text;
    } else {
      if (message.title !== this.currentTitle) {
        this.throttle.reset();
        this.currentTitle = message.title;
      }
      if (!this.throttle.shouldEmit(message.snapshot.percent)) return;
      text = formatProgressText(message.title, message.snapshot);
    }

    try {
      await this.reporter.update(text);
    } catch (error) {
      // Typically "message is not modified" or a transient network error
      this.log.debug({ err: error }, 'Status update failed');
    }
  }
}
