/**
 * Derived Assets
 *
 * Thumbnail, screenshot set and preview sample generated from a fetched
 * video. Every step is best effort: the caller gets an outcome instead of
 * an exception.
 */

import { join } from 'node:path';
import { FFProbe } from '@reelport/media';
import {
  createLogger,
  ensureDir,
  isNonEmptyFile,
  removePath,
  stripExtension,
  type Logger,
} from '@reelport/utils';
import { FFmpeg, type FrameSize } from './ffmpeg.js';

export type AssetOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'omitted'; reason: string }
  | { status: 'failed'; error: Error };

export const THUMBNAIL_SIZE: FrameSize = { width: 320, height: 180 };
export const SCREENSHOT_SIZE: FrameSize = { width: 640, height: 360 };

const THUMBNAIL_MAX_OFFSET = 10;
const SAMPLE_MAX_OFFSET = 30;
export const DEFAULT_SAMPLE_SECONDS = 20;

export function thumbnailPath(videoPath: string): string {
  return `${stripExtension(videoPath)}.jpg`;
}

export function screenshotsDir(videoPath: string): string {
  return `${stripExtension(videoPath)}_screenshots`;
}

export function samplePath(videoPath: string): string {
  return `${videoPath}.sample.mp4`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface AssetGeneratorOptions {
  ffmpeg?: FFmpeg;
  ffprobe?: FFProbe;
  log?: Logger;
}

export class AssetGenerator {
  private ffmpeg: FFmpeg;
  private ffprobe: FFProbe;
  private log: Logger;

  constructor(options: AssetGeneratorOptions = {}) {
    this.ffmpeg = options.ffmpeg ?? new FFmpeg();
    this.ffprobe = options.ffprobe ?? new FFProbe();
    this.log = options.log ?? createLogger('assets');
  }

  /**
   * Run one ffmpeg command and report whether it left a usable file behind
   */
  private async produce(args: string[], output: string, signal?: AbortSignal): Promise<boolean> {
    const result = await this.ffmpeg.execute(args, { signal });
    if (result.exitCode === 0 && (await isNonEmptyFile(output))) {
      return true;
    }
    await removePath(output);
    return false;
  }

  /**
   * Frame at 20% of the duration (at most 10s in), scaled to 320x180
   */
  async thumbnail(videoPath: string, signal?: AbortSignal): Promise<AssetOutcome<string>> {
    try {
      const duration = await this.ffprobe.getDuration(videoPath);
      if (duration === null) {
        return { status: 'omitted', reason: 'duration unknown' };
      }

      const output = thumbnailPath(videoPath);
      const position = Math.min(duration * 0.2, THUMBNAIL_MAX_OFFSET);
      const produced = await this.produce(
        this.ffmpeg.buildFrameCommand(videoPath, position, THUMBNAIL_SIZE, output),
        output,
        signal
      );

      return produced
        ? { status: 'ok', value: output }
        : { status: 'failed', error: new Error('ffmpeg produced no thumbnail') };
    } catch (error) {
      this.log.error({ err: error, videoPath }, 'Thumbnail generation failed');
      return { status: 'failed', error: toError(error) };
    }
  }

  /**
   * `count` frames spread evenly over the duration, scaled to 640x360.
   * Frames that fail are left out.
   */
  async screenshots(videoPath: string, count: number, signal?: AbortSignal): Promise<AssetOutcome<string[]>> {
    if (count <= 0) {
      return { status: 'omitted', reason: 'no screenshots requested' };
    }

    try {
      const duration = await this.ffprobe.getDuration(videoPath);
      if (duration === null) {
        return { status: 'omitted', reason: 'duration unknown' };
      }

      const dir = screenshotsDir(videoPath);
      await ensureDir(dir);

      const interval = duration / (count + 1);
      const shots: string[] = [];

      for (let i = 1; i <= count; i++) {
        if (signal?.aborted) break;

        const output = join(dir, `screenshot_${String(i).padStart(2, '0')}.jpg`);
        const produced = await this.produce(
          this.ffmpeg.buildFrameCommand(videoPath, interval * i, SCREENSHOT_SIZE, output),
          output,
          signal
        );

        if (produced) {
          shots.push(output);
        } else {
          this.log.debug({ output }, 'Screenshot skipped');
        }
      }

      return shots.length > 0
        ? { status: 'ok', value: shots }
        : { status: 'failed', error: new Error('ffmpeg produced no screenshots') };
    } catch (error) {
      this.log.error({ err: error, videoPath }, 'Screenshot generation failed');
      return { status: 'failed', error: toError(error) };
    }
  }

  /**
   * Re-encoded excerpt starting at 20% of the duration (at most 30s in)
   */
  async sample(
    videoPath: string,
    seconds: number = DEFAULT_SAMPLE_SECONDS,
    signal?: AbortSignal
  ): Promise<AssetOutcome<string>> {
    try {
      const duration = await this.ffprobe.getDuration(videoPath);
      if (duration === null) {
        return { status: 'omitted', reason: 'duration unknown' };
      }

      const output = samplePath(videoPath);
      const start = Math.min(duration * 0.2, SAMPLE_MAX_OFFSET);
      const produced = await this.produce(
        this.ffmpeg.buildSampleCommand(videoPath, start, seconds, output),
        output,
        signal
      );

      return produced
        ? { status: 'ok', value: output }
        : { status: 'failed', error: new Error('ffmpeg produced no sample') };
    } catch (error) {
      this.log.error({ err: error, videoPath }, 'Sample generation failed');
      return { status: 'failed', error: toError(error) };
    }
  }
}
