/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Line-by-line streaming of stdout/stderr
 * - Cancellation through AbortSignal
 */

import { spawn, type SpawnOptions } from 'node:child_process';

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
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

/**
 * Signature shared by executeCommand and the fakes used in tests
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Accumulates chunks and emits complete lines (\n or \r\n terminated).
 * ffmpeg redraws its stats line with a bare \r, which is treated as a break too.
 */
export class LineSplitter {
  private buffer = '';

  constructor(private readonly onLine: (line: string) => void) {}

  push(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split(/\r\n|\n|\r/);
    this.buffer = lines.pop() ?? '';
    for (const line of lines) {
      this.onLine(line);
    }
  }

  flush(): void {
    if (this.buffer.length > 0) {
      const rest = this.buffer;
      this.buffer = '';
      this.onLine(rest);
    }
  }
}

/**
 * Execute an external command safely
 *
 * Resolves for every exit code; rejects only when the process cannot be spawned.
 */
export const executeCommand: CommandRunner = async (
  command,
  args,
  options = {}
) => {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    onStdoutLine,
    onStderrLine,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  return new Promise<CommandResult>((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | null = null;

    const terminate = (): void => {
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };

    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    const stdoutLines = onStdoutLine ? new LineSplitter(onStdoutLine) : null;
    const stderrLines = onStderrLine ? new LineSplitter(onStderrLine) : null;

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stdoutLines?.push(chunk);
      if (stdoutSize < maxOutputSize) {
        stdout += chunk;
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stderrLines?.push(chunk);
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        stderrSize += data.length;
      }
    });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Handle process exit
    child.on('close', (code, exitSignal) => {
      cleanup();
      stdoutLines?.flush();
      stderrLines?.flush();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
};

/**
 * Render a command line for logging
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((arg) => (/\s/.test(arg) ? `"${arg}"` : arg))
    .join(' ');
}

/**
 * Pick the most useful error line out of a tool's stderr
 */
export function extractErrorText(stderr: string): string {
  const patterns = [
    /Error[:\s](.+?)(?:\n|$)/i,
    /Invalid[:\s](.+?)(?:\n|$)/i,
    /No such file or directory/,
    /Permission denied/,
    /Cannot open/,
    /Conversion failed/,
  ];

  for (const pattern of patterns) {
    const match = stderr.match(pattern);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }

  // Return last few lines if no specific error found
  const lines = stderr.trim().split('\n');
  return lines.slice(-3).join('\n');
}
