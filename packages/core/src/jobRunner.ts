/**
 * Job Runner
 *
 * Takes one job from QUEUED to a terminal state:
 * resolve → fetch → (split) → derived assets → deliver → cleanup.
 *
 * Cancellation is observed between steps through the job's abort signal;
 * a cancelled job always ends CANCELLED, never FAILED.
 */

import { basename } from 'node:path';
import { BEST_ENCODING, extractEncodingOptions } from '@reelport/acquisition';
import { isVideoContainer } from '@reelport/processing';
import {
  createLogger,
  fileExists,
  getFileSizeBytes,
  getJobDir,
  removePath,
  retry,
  type Logger,
} from '@reelport/utils';
import {
  DeliveryRateLimitedError,
  DeliverySizeExceededError,
  FetchFailureError,
  JobCancelledError,
  ProcessingFailureError,
  ResolutionFailureError,
} from './errors/index.js';
import type { JobState } from './stateMachine.js';
import type { JobExecutor } from './scheduler.js';
import { StatusSink } from './status/sink.js';
import { ProgressThrottle } from './status/throttle.js';
import {
  STATUS_TEXT,
  completedText,
  failedText,
  uploadSnapshot,
  uploadingTitle,
} from './status/format.js';
import type {
  AssetProducer,
  DeliveryChannel,
  DeliveryItem,
  FetchTool,
  MediaProbe,
  PreferenceStore,
  Segmenter,
  StatusReporter,
} from './types/collaborators.js';
import type { Job } from './types/job.js';
import type { UserPreferences } from './types/preferences.js';

export interface JobRunnerConfig {
  /** Each job works in <workRoot>/<jobId>, removed when the job ends */
  workRoot: string;
  /** Largest single upload the delivery channel takes */
  maxFileSizeBytes: number;
  /** Part size used when splitting */
  splitSizeBytes: number;
  screenshotCount: number;
  sampleSeconds: number;
}

export interface JobRunnerDeps {
  fetcher: FetchTool;
  segmenter: Segmenter;
  assets: AssetProducer;
  probe: MediaProbe;
  delivery: DeliveryChannel;
  preferences: PreferenceStore;
  log?: Logger;
  now?: () => number;
}

interface DerivedAssets {
  thumbnail: string | null;
  screenshots: string[];
  sample: string | null;
}

const NULL_REPORTER: StatusReporter = {
  update: async () => {},
};

export const DEFAULT_RUNNER_CONFIG: Omit<JobRunnerConfig, 'workRoot'> = {
  maxFileSizeBytes: 2 * 1024 * 1024 * 1024,
  splitSizeBytes: 2093796556, // 1.95 GiB
  screenshotCount: 10,
  sampleSeconds: 20,
};

export class JobRunner implements JobExecutor {
  private readonly config: JobRunnerConfig;
  private readonly deps: JobRunnerDeps;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(config: Partial<JobRunnerConfig> & { workRoot: string }, deps: JobRunnerDeps) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.deps = deps;
    this.log = deps.log ?? createLogger('job-runner');
    this.now = deps.now ?? Date.now;
  }

  async execute(job: Job): Promise<void> {
    const log = this.log.child({ jobId: job.id, requester: job.requester });
    const signal = job.controller.signal;
    const jobDir = getJobDir(this.config.workRoot, job.id);
    const sink = new StatusSink(job.reporter ?? NULL_REPORTER, {
      throttle: new ProgressThrottle(undefined, undefined, this.now),
      log,
    });
    sink.start();

    try {
      const prefs = await this.deps.preferences.get(job.requester);

      await this.resolve(job, sink, signal, log);
      const filePath = await this.fetch(job, jobDir, sink, signal);

      const size = await getFileSizeBytes(filePath);
      if (size > this.config.maxFileSizeBytes && !prefs.splitLargeFiles) {
        throw new DeliverySizeExceededError(size, this.config.maxFileSizeBytes);
      }

      let parts = [filePath];
      if (size > this.config.splitSizeBytes && prefs.splitLargeFiles) {
        this.advance(job, 'SEGMENTING', sink, STATUS_TEXT.segmenting);
        parts = await this.deps.segmenter.split(filePath, this.config.splitSizeBytes, signal);
        this.ensureActive(job);
        if (parts.length === 0) {
          throw new ProcessingFailureError('Splitting', 'no parts were produced');
        }
      }

      this.advance(job, 'GENERATING_ASSETS', sink, STATUS_TEXT.assets);
      const assets = await this.generateAssets(job, filePath, prefs, sink, log);

      this.advance(job, 'DELIVERING', sink);
      await this.deliver(job, parts, assets, prefs, sink, log);

      this.advance(job, 'COMPLETED', sink, completedText(parts.length));
      log.info({ parts: parts.length }, 'Job completed');
    } catch (error) {
      this.settle(job, error, sink, log);
    } finally {
      await sink.close();
      await this.cleanup(jobDir, log);
    }
  }

  /**
   * Move a job that threw into its terminal state
   */
  private settle(job: Job, error: unknown, sink: StatusSink, log: Logger): void {
    if (job.machine.isTerminal()) return;

    if (job.controller.signal.aborted || error instanceof JobCancelledError) {
      job.machine.cancel();
      sink.stage(STATUS_TEXT.cancelled);
      log.info('Job cancelled');
      return;
    }

    const reason = error instanceof Error ? error.message : String(error);
    job.failureReason = reason;
    job.machine.fail(reason);
    sink.stage(failedText(reason));
    log.error({ err: error }, 'Job failed');
  }

  private ensureActive(job: Job): void {
    if (job.controller.signal.aborted) {
      throw new JobCancelledError(job.id);
    }
  }

  private advance(job: Job, state: JobState, sink: StatusSink, text?: string): void {
    this.ensureActive(job);
    job.machine.transitionTo(state);
    if (text) sink.stage(text);
  }

  /**
   * Confirm the source lists encodings. A job submitted without a choice
   * takes the implicit "best" entry, which yt-dlp resolves to the best
   * video plus best audio; the derived options are only logged.
   */
  private async resolve(job: Job, sink: StatusSink, signal: AbortSignal, log: Logger): Promise<void> {
    if (job.encoding !== null) {
      this.advance(job, 'RESOLVING', sink);
      return;
    }

    this.advance(job, 'RESOLVING', sink, STATUS_TEXT.resolving);
    const info = await this.deps.fetcher.getInfo(job.url, signal);
    this.ensureActive(job);

    if (!info.success) {
      throw new ResolutionFailureError(job.url, info.error);
    }

    const options = extractEncodingOptions(info.info);
    job.encoding = BEST_ENCODING;
    log.info({ offered: options.map((option) => option.id), chosen: job.encoding }, 'Encoding resolved');
  }

  private async fetch(job: Job, jobDir: string, sink: StatusSink, signal: AbortSignal): Promise<string> {
    this.advance(job, 'FETCHING', sink, STATUS_TEXT.preparing);

    const result = await this.deps.fetcher.fetch({
      url: job.url,
      format: job.encoding ?? BEST_ENCODING,
      outputDir: jobDir,
      signal,
      onEvent: (event) => {
        const snapshot = job.progress.apply(event);
        if (event.kind === 'progress') {
          sink.progress(STATUS_TEXT.fetching, snapshot);
        }
      },
    });
    this.ensureActive(job);

    if (!result.success) {
      throw new FetchFailureError(result.error, result.exitCode);
    }
    return result.filePath;
  }

  /**
   * Best effort: every outcome is logged, none fails the job
   */
  private async generateAssets(
    job: Job,
    filePath: string,
    prefs: UserPreferences,
    sink: StatusSink,
    log: Logger
  ): Promise<DerivedAssets> {
    const signal = job.controller.signal;
    const video = isVideoContainer(filePath);
    const assets: DerivedAssets = { thumbnail: null, screenshots: [], sample: null };

    if (prefs.thumbnailPath && (await fileExists(prefs.thumbnailPath))) {
      assets.thumbnail = prefs.thumbnailPath;
    } else if (video) {
      const outcome = await this.deps.assets.thumbnail(filePath, signal);
      if (outcome.status === 'ok') assets.thumbnail = outcome.value;
      else log.info({ outcome: outcome.status }, 'No thumbnail generated');
    }
    this.ensureActive(job);

    if (prefs.generateScreenshots && video) {
      sink.stage(STATUS_TEXT.screenshots);
      const outcome = await this.deps.assets.screenshots(filePath, this.config.screenshotCount, signal);
      if (outcome.status === 'ok') assets.screenshots = outcome.value;
      else log.info({ outcome: outcome.status }, 'No screenshots generated');
      this.ensureActive(job);
    }

    if (prefs.generateSample && video) {
      const outcome = await this.deps.assets.sample(filePath, this.config.sampleSeconds, signal);
      if (outcome.status === 'ok') assets.sample = outcome.value;
      else log.info({ outcome: outcome.status }, 'No sample generated');
      this.ensureActive(job);
    }

    return assets;
  }

  private async deliver(
    job: Job,
    parts: string[],
    assets: DerivedAssets,
    prefs: UserPreferences,
    sink: StatusSink,
    log: Logger
  ): Promise<void> {
    for (const [index, part] of parts.entries()) {
      const title = uploadingTitle(index + 1, parts.length);
      sink.stage(title);

      const startedAt = this.now();
      const item = await this.mediaItem(job, part, partCaption(prefs.caption, index + 1, parts.length), assets.thumbnail, prefs);
      item.onProgress = (transferred, total) => {
        sink.progress(title, uploadSnapshot(transferred, total, this.now() - startedAt, basename(part)));
      };

      await this.send(item, job, log);
    }

    for (const screenshot of assets.screenshots) {
      await this.send(
        { requester: job.requester, path: screenshot, kind: 'photo', caption: 'Screenshot', thumbnail: null },
        job,
        log
      );
    }

    if (assets.sample) {
      const item = await this.mediaItem(
        job,
        assets.sample,
        `Sample Video (${this.config.sampleSeconds} seconds)`,
        assets.thumbnail,
        prefs
      );
      await this.send(item, job, log);
    }
  }

  /**
   * Video when the requester wants it and the container allows it, document otherwise
   */
  private async mediaItem(
    job: Job,
    path: string,
    caption: string | null,
    thumbnail: string | null,
    prefs: UserPreferences
  ): Promise<DeliveryItem> {
    if (!prefs.uploadAsVideo || !isVideoContainer(path)) {
      return { requester: job.requester, path, kind: 'document', caption, thumbnail };
    }

    const [duration, resolution] = await Promise.all([
      this.deps.probe.getDuration(path),
      this.deps.probe.getResolution(path),
    ]);

    return {
      requester: job.requester,
      path,
      kind: 'video',
      caption,
      thumbnail,
      duration: duration === null ? undefined : Math.round(duration),
      width: resolution.width || undefined,
      height: resolution.height || undefined,
    };
  }

  /**
   * Send one item. Rate limits are waited out for as long as they last;
   * only a cancel ends the wait. Any other error is final.
   */
  private async send(item: DeliveryItem, job: Job, log: Logger): Promise<void> {
    const signal = job.controller.signal;
    this.ensureActive(job);

    await retry(() => this.deps.delivery.send(item, signal), {
      maxAttempts: Infinity,
      signal,
      retryIf: (error) => error instanceof DeliveryRateLimitedError && !signal.aborted,
      delayFor: (error) =>
        error instanceof DeliveryRateLimitedError ? error.retryAfterSeconds * 1000 : undefined,
      onRetry: (_error, attempt, delay) => {
        log.warn({ path: item.path, attempt, delay }, 'Delivery rate limited, waiting');
      },
    });
  }

  private async cleanup(jobDir: string, log: Logger): Promise<void> {
    try {
      await removePath(jobDir);
    } catch (error) {
      log.warn({ err: error, jobDir }, 'Cleanup failed');
    }
  }
}

/**
 * Requester caption, followed by "Part i/n" when there are several parts
 */
export function partCaption(caption: string | null, part: number, parts: number): string | null {
  if (parts <= 1) {
    return caption;
  }
  const label = `Part ${part}/${parts}`;
  return caption ? `${caption}\n\n${label}` : label;
}
