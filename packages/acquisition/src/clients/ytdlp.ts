/**
 * yt-dlp Client
 *
 * Drives the yt-dlp CLI in its two modes:
 * - capability listing (`--dump-json`) for format selection
 * - fetch (`--newline`) with line-by-line progress events
 *
 * The process is owned by the caller through an AbortSignal.
 */

import { join, resolve } from 'node:path';
import {
  createLogger,
  ensureDir,
  executeCommand,
  fileExists,
  streamCommand,
  type Logger,
  type StreamCommandResult,
} from '@reelport/utils';
import { BEST_ENCODING, parseCapabilityDocument, type CapabilityDocument } from '../formats.js';
import { parseProgressLine, type FetchEvent } from '../progressParser.js';

export interface YtDlpConfig {
  binaryPath: string;
  cookiesFile?: string | null;
  /** yt-dlp output template, relative to the job directory */
  outputTemplate: string;
  infoTimeoutMs: number;
  fetchTimeoutMs: number;
}

export type InfoResult =
  | { success: true; info: CapabilityDocument }
  | { success: false; error: string };

export interface FetchRequest {
  url: string;
  /** Format id, or "best" */
  format: string;
  outputDir: string;
  signal?: AbortSignal;
  onEvent?: (event: FetchEvent) => void;
}

export type FetchResult =
  | { success: true; filePath: string; duration: number }
  | { success: false; error: string; exitCode: number; aborted: boolean };

const ERROR_TAIL_LINES = 20;

export class YtDlpClient {
  private config: YtDlpConfig;
  private log: Logger;

  constructor(config?: Partial<YtDlpConfig>, log?: Logger) {
    this.config = {
      binaryPath: config?.binaryPath ?? 'yt-dlp',
      cookiesFile: config?.cookiesFile ?? null,
      outputTemplate: config?.outputTemplate ?? '%(title).150B.%(ext)s',
      infoTimeoutMs: config?.infoTimeoutMs ?? 120000,
      fetchTimeoutMs: config?.fetchTimeoutMs ?? 6 * 3600000,
    };
    this.log = log ?? createLogger('yt-dlp');
  }

  /**
   * Arguments shared by both modes
   */
  private getBaseArgs(): string[] {
    const args = ['--no-playlist'];
    if (this.config.cookiesFile) {
      args.push('--cookies', this.config.cookiesFile);
    }
    return args;
  }

  /**
   * Selector passed to `-f`
   */
  static formatSelector(format: string): string {
    return format === BEST_ENCODING ? 'bv*+ba/b' : format;
  }

  /**
   * List the encodings available for a URL
   */
  async getInfo(url: string, signal?: AbortSignal): Promise<InfoResult> {
    const args = ['--dump-json', ...this.getBaseArgs(), url];
    this.log.debug({ args }, 'Listing capabilities');

    let stdout: string;
    try {
      const result = await executeCommand(this.config.binaryPath, args, {
        timeout: this.config.infoTimeoutMs,
        signal,
      });
      if (result.exitCode !== 0) {
        this.log.warn({ url, exitCode: result.exitCode, stderr: result.stderr.slice(-1000) }, 'Capability listing failed');
        return { success: false, error: lastErrorLine(result.stderr.split('\n')) ?? `yt-dlp exited with code ${result.exitCode}` };
      }
      stdout = result.stdout;
    } catch (error) {
      this.log.error({ err: error, url }, 'Could not run yt-dlp');
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }

    let data: unknown;
    try {
      data = JSON.parse(stdout);
    } catch {
      return { success: false, error: `Failed to parse yt-dlp output: ${stdout.substring(0, 200)}` };
    }

    const info = parseCapabilityDocument(data);
    if (!info) {
      return { success: false, error: 'yt-dlp returned no format list' };
    }
    return { success: true, info };
  }

  /**
   * Fetch one encoding into outputDir.
   * Success requires exit code 0 and a resolved file that exists.
   */
  async fetch(request: FetchRequest): Promise<FetchResult> {
    await ensureDir(request.outputDir);

    const args = [
      ...this.getBaseArgs(),
      '--newline',
      '-f', YtDlpClient.formatSelector(request.format),
      '-o', join(request.outputDir, this.config.outputTemplate),
      request.url,
    ];
    this.log.debug({ args }, 'Starting fetch');

    const output: { filePath: string | null } = { filePath: null };
    const tail: string[] = [];

    let result: StreamCommandResult;
    try {
      result = await streamCommand(this.config.binaryPath, args, {
        cwd: request.outputDir,
        timeout: this.config.fetchTimeoutMs,
        signal: request.signal,
        onLine: (line) => {
          tail.push(line);
          if (tail.length > ERROR_TAIL_LINES) tail.shift();

          const event = parseProgressLine(line);
          if (!event) return;
          if (event.kind === 'destination') {
            output.filePath = resolve(request.outputDir, event.filename);
          }
          request.onEvent?.(event);
        },
      });
    } catch (error) {
      this.log.error({ err: error, url: request.url }, 'Could not run yt-dlp');
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        exitCode: -1,
        aborted: false,
      };
    }

    if (result.aborted || result.timedOut || result.exitCode !== 0) {
      return {
        success: false,
        error: result.timedOut
          ? 'Download timed out'
          : lastErrorLine(tail) ?? `yt-dlp exited with code ${result.exitCode}`,
        exitCode: result.exitCode,
        aborted: result.aborted,
      };
    }

    const resolved = output.filePath;
    if (!resolved || !(await fileExists(resolved))) {
      this.log.error({ filename: resolved }, 'Downloaded file not found');
      return { success: false, error: 'Download failed - File not found', exitCode: 0, aborted: false };
    }

    return { success: true, filePath: resolved, duration: result.duration };
  }

  /**
   * Check if yt-dlp is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.config.binaryPath, ['--version'], {
        timeout: 10000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

function lastErrorLine(lines: string[]): string | null {
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i]?.trim();
    if (line?.startsWith('ERROR:')) {
      return line.replace(/^ERROR:\s*/, '');
    }
  }
  return null;
}
