/**
 * FFProbe Wrapper
 *
 * Wrapper for ffprobe command execution.
 * Each query is one ffprobe invocation with JSON output.
 */

import { executeCommand, isArray, isObject, toFiniteNumber, type CommandResult } from '@reelport/utils';

export interface VideoResolution {
  width: number;
  height: number;
}

export class FFProbe {
  private ffprobePath: string;
  private timeoutMs: number;

  constructor(ffprobePath: string = 'ffprobe', timeoutMs: number = 60000) {
    this.ffprobePath = ffprobePath;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Run ffprobe and return its parsed JSON output, or null on any failure
   */
  private async query(args: string[]): Promise<Record<string, unknown> | null> {
    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, ['-v', 'error', ...args, '-of', 'json'], {
        timeout: this.timeoutMs,
      });
    } catch {
      // Spawn failure (missing binary, no process slots)
      return null;
    }

    if (result.exitCode !== 0) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(result.stdout);
      return isObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  /**
   * Container duration in seconds, or null when unknown
   */
  async getDuration(filePath: string): Promise<number | null> {
    const data = await this.query(['-show_entries', 'format=duration', filePath]);
    const format = data?.['format'];
    if (!isObject(format)) {
      return null;
    }

    const duration = toFiniteNumber(format['duration']);
    return duration !== null && duration > 0 ? duration : null;
  }

  /**
   * Size of the first video stream; 0x0 when there is none
   */
  async getResolution(filePath: string): Promise<VideoResolution> {
    const data = await this.query([
      '-select_streams', 'v:0',
      '-show_entries', 'stream=width,height',
      filePath,
    ]);

    const streams = data?.['streams'];
    const first: unknown = isArray(streams) ? streams[0] : undefined;
    if (!isObject(first)) {
      return { width: 0, height: 0 };
    }

    return {
      width: Math.trunc(toFiniteNumber(first['width']) ?? 0),
      height: Math.trunc(toFiniteNumber(first['height']) ?? 0),
    };
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
