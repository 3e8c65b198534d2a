/**
 * FFmpeg Wrapper
 *
 * FFmpeg command execution and the argument lists used for segments,
 * still frames and samples. Every command executed is logged.
 */

import { createLogger, executeCommand, type Logger } from '@reelport/utils';

export interface FFmpegResult {
  exitCode: number;
  stderr: string;
  duration: number;
  aborted: boolean;
}

export interface FrameSize {
  width: number;
  height: number;
}

/**
 * Seconds as passed to -ss / -t
 */
export function formatSeconds(seconds: number): string {
  return Math.max(0, seconds).toFixed(3);
}

export class FFmpeg {
  private ffmpegPath: string;
  private log: Logger;

  constructor(ffmpegPath: string = 'ffmpeg', log?: Logger) {
    this.ffmpegPath = ffmpegPath;
    this.log = log ?? createLogger('ffmpeg');
  }

  /**
   * Execute an FFmpeg command. Output files are overwritten.
   */
  async execute(
    args: string[],
    options: { timeout?: number; signal?: AbortSignal } = {}
  ): Promise<FFmpegResult> {
    const fullArgs = ['-hide_banner', '-loglevel', 'error', '-y', ...args];
    this.log.debug({ command: `ffmpeg ${fullArgs.join(' ')}` }, 'Executing ffmpeg');

    const result = await executeCommand(this.ffmpegPath, fullArgs, {
      timeout: options.timeout ?? 3600000, // 1 hour default
      signal: options.signal,
    });

    if (result.exitCode !== 0 && !result.aborted) {
      this.log.warn({ exitCode: result.exitCode, stderr: result.stderr.slice(-1000) }, 'ffmpeg failed');
    }

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      duration: result.duration,
      aborted: result.aborted,
    };
  }

  /**
   * Stream-copy one time range of the input (no re-encode)
   */
  buildSegmentCommand(inputFile: string, start: number, length: number, outputFile: string): string[] {
    return [
      '-i', inputFile,
      '-ss', formatSeconds(start),
      '-t', formatSeconds(length),
      '-map', '0',
      '-c', 'copy',
      outputFile,
    ];
  }

  /**
   * Extract a single scaled frame
   */
  buildFrameCommand(inputFile: string, position: number, size: FrameSize, outputFile: string): string[] {
    return [
      '-i', inputFile,
      '-ss', formatSeconds(position),
      '-vframes', '1',
      '-vf', `scale=${size.width}:${size.height}`,
      outputFile,
    ];
  }

  /**
   * Re-encode a short excerpt for preview
   */
  buildSampleCommand(inputFile: string, start: number, length: number, outputFile: string): string[] {
    return [
      '-i', inputFile,
      '-ss', formatSeconds(start),
      '-t', formatSeconds(length),
      '-c:v', 'libx264',
      '-c:a', 'aac',
      '-b:v', '1M',
      '-b:a', '128k',
      '-movflags', '+faststart',
      outputFile,
    ];
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
