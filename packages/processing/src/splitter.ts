/**
 * Media Splitter
 *
 * Cuts a file that exceeds the delivery ceiling into numbered parts.
 * Seekable video with a known duration is remuxed into equal time ranges
 * with stream copy; anything else is sliced by bytes.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { extname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { FFProbe } from '@reelport/media';
import {
  createLogger,
  getExtension,
  getFileSizeBytes,
  isNonEmptyFile,
  removePath,
  stripExtension,
  type Logger,
} from '@reelport/utils';
import { FFmpeg, type FFmpegResult } from './ffmpeg.js';

export type SegmentStrategy = 'remux' | 'byte-slice';

export interface SegmentRange {
  /** Seconds for remux, bytes for byte-slice */
  start: number;
  length: number;
}

export interface SegmentPlan {
  strategy: SegmentStrategy;
  ranges: SegmentRange[];
}

export const VIDEO_EXTENSIONS: readonly string[] = ['mp4', 'mkv', 'avi', 'mov', 'flv', 'webm'];

export function isVideoContainer(filePath: string): boolean {
  return VIDEO_EXTENSIONS.includes(getExtension(filePath));
}

/**
 * Path of the n-th part (1-based): /a/clip.mp4 -> /a/clip.part001.mp4
 */
export function partPath(filePath: string, partNumber: number): string {
  return `${stripExtension(filePath)}.part${String(partNumber).padStart(3, '0')}${extname(filePath)}`;
}

/**
 * Decide how to cut a file. Returns null when it already fits the ceiling.
 */
export function planSegments(
  sizeBytes: number,
  ceilingBytes: number,
  durationSeconds: number | null,
  seekable: boolean
): SegmentPlan | null {
  if (ceilingBytes <= 0) {
    throw new RangeError(`Segment ceiling must be positive, got ${ceilingBytes}`);
  }
  if (sizeBytes <= ceilingBytes) {
    return null;
  }

  const parts = Math.ceil(sizeBytes / ceilingBytes);
  const ranges: SegmentRange[] = [];

  if (seekable && durationSeconds !== null && durationSeconds > 0) {
    const partDuration = durationSeconds / parts;
    for (let i = 0; i < parts; i++) {
      const start = i * partDuration;
      // Last range takes the rounding remainder
      const length = i === parts - 1 ? durationSeconds - start : partDuration;
      ranges.push({ start, length });
    }
    return { strategy: 'remux', ranges };
  }

  for (let i = 0; i < parts; i++) {
    const start = i * ceilingBytes;
    ranges.push({ start, length: Math.min(ceilingBytes, sizeBytes - start) });
  }
  return { strategy: 'byte-slice', ranges };
}

export interface MediaSplitterOptions {
  ffmpeg?: FFmpeg;
  ffprobe?: FFProbe;
  log?: Logger;
}

export class MediaSplitter {
  private ffmpeg: FFmpeg;
  private ffprobe: FFProbe;
  private log: Logger;

  constructor(options: MediaSplitterOptions = {}) {
    this.ffmpeg = options.ffmpeg ?? new FFmpeg();
    this.ffprobe = options.ffprobe ?? new FFProbe();
    this.log = options.log ?? createLogger('splitter');
  }

  /**
   * Split a file so that every part fits the ceiling.
   * Returns [filePath] when no split is needed. Parts that fail to
   * materialize are logged and left out.
   */
  async split(filePath: string, ceilingBytes: number, signal?: AbortSignal): Promise<string[]> {
    const size = await getFileSizeBytes(filePath);
    if (size <= ceilingBytes) {
      return [filePath];
    }

    const seekable = isVideoContainer(filePath);
    const duration = seekable ? await this.ffprobe.getDuration(filePath) : null;
    const plan = planSegments(size, ceilingBytes, duration, seekable);
    if (!plan) {
      return [filePath];
    }

    this.log.info(
      { filePath, size, ceilingBytes, strategy: plan.strategy, parts: plan.ranges.length },
      'Splitting file'
    );

    return plan.strategy === 'remux'
      ? this.remux(filePath, plan.ranges, signal)
      : this.slice(filePath, plan.ranges, signal);
  }

  private async remux(filePath: string, ranges: SegmentRange[], signal?: AbortSignal): Promise<string[]> {
    const parts: string[] = [];

    for (const [index, range] of ranges.entries()) {
      if (signal?.aborted) break;

      const output = partPath(filePath, index + 1);
      let result: FFmpegResult;
      try {
        result = await this.ffmpeg.execute(
          this.ffmpeg.buildSegmentCommand(filePath, range.start, range.length, output),
          { signal }
        );
      } catch (error) {
        this.log.warn({ err: error, output }, 'Could not run ffmpeg for segment, skipping');
        await removePath(output);
        continue;
      }

      if (result.exitCode === 0 && (await isNonEmptyFile(output))) {
        parts.push(output);
      } else {
        this.log.warn({ output, exitCode: result.exitCode }, 'Segment was not produced, skipping');
        await removePath(output);
      }
    }

    return parts;
  }

  private async slice(filePath: string, ranges: SegmentRange[], signal?: AbortSignal): Promise<string[]> {
    const parts: string[] = [];

    for (const [index, range] of ranges.entries()) {
      if (signal?.aborted) break;

      const output = partPath(filePath, index + 1);
      try {
        await pipeline(
          createReadStream(filePath, { start: range.start, end: range.start + range.length - 1 }),
          createWriteStream(output),
          { signal }
        );
      } catch (error) {
        this.log.warn({ err: error, output }, 'Slice failed, skipping');
        await removePath(output);
        continue;
      }

      if (await isNonEmptyFile(output)) {
        parts.push(output);
      } else {
        await removePath(output);
      }
    }

    return parts;
  }
}
