/**
 * Command Execution Wrapper
 *
 * Wrappers for executing external commands with:
 * - Timeout handling
 * - Output capture or line streaming
 * - Abort signal forwarding
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export interface StreamCommandOptions extends Omit<CommandOptions, 'maxOutputSize'> {
  /** Called for every line written to stdout or stderr, in arrival order */
  onLine: (line: string, stream: 'stdout' | 'stderr') => void;
}

export interface StreamCommandResult {
  exitCode: number;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

const KILL_GRACE_MS = 5000;

/**
 * Send SIGTERM, then SIGKILL if the process is still around after the grace period
 */
function terminate(child: ChildProcess): void {
  child.kill('SIGTERM');
  const forceKill = setTimeout(() => {
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGKILL');
    }
  }, KILL_GRACE_MS);
  forceKill.unref();
}

/**
 * Wire timeout and abort handling onto a spawned child.
 * Returns a disposer that must be called once the child has exited.
 */
function supervise(
  child: ChildProcess,
  timeout: number,
  signal: AbortSignal | undefined,
  state: { timedOut: boolean; aborted: boolean }
): () => void {
  const timeoutId = setTimeout(() => {
    state.timedOut = true;
    terminate(child);
  }, timeout);

  const onAbort = (): void => {
    state.aborted = true;
    terminate(child);
  };

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return () => {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  };
}

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  return code ?? (signal ? 128 : 1);
}

/**
 * Execute an external command and capture its output
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  const state = { timedOut: false, aborted: false };

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);
    const dispose = supervise(child, timeout, signal, state);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      dispose();
      resolve({
        exitCode: exitCodeOf(code, exitSignal),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut: state.timedOut,
        aborted: state.aborted,
      });
    });

    // Spawn errors (binary missing, permission denied)
    child.on('error', (error) => {
      dispose();
      reject(error);
    });
  });
}

/**
 * Execute an external command and hand each output line to a callback
 * while it runs. Both streams are read; lines from one stream keep their order.
 */
export async function streamCommand(
  command: string,
  args: string[],
  options: StreamCommandOptions
): Promise<StreamCommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 6 * 3600000, // 6 hours for long fetches
    signal,
    onLine,
  } = options;

  const startTime = Date.now();
  const state = { timedOut: false, aborted: false };

  const child = spawn(command, args, {
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });
  const dispose = supervise(child, timeout, signal, state);

  const pump = async (stream: Readable | null, name: 'stdout' | 'stderr'): Promise<void> => {
    if (!stream) return;
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    for await (const line of lines) {
      onLine(line, name);
    }
  };

  const exited = new Promise<number>((resolve, reject) => {
    child.on('close', (code, exitSignal) => resolve(exitCodeOf(code, exitSignal)));
    child.on('error', reject);
  });

  try {
    const [exitCode] = await Promise.all([
      exited,
      pump(child.stdout, 'stdout'),
      pump(child.stderr, 'stderr'),
    ]);

    return {
      exitCode,
      duration: Date.now() - startTime,
      timedOut: state.timedOut,
      aborted: state.aborted,
    };
  } finally {
    dispose();
  }
}
