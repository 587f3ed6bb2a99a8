/**
 * FFmpeg Wrapper
 *
 * Safe FFmpeg command execution with the progress side channel enabled.
 */

import { getBinaryPath } from '@subburn/core';
import { executeCommand, type CommandResult, type CommandRunner } from '@subburn/utils';

export interface FFmpegExecuteOptions {
  timeout?: number;
  signal?: AbortSignal;
  /** Each line of the -progress stream (stdout) */
  onProgressLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

/**
 * Flags put in front of every command: overwrite, quiet banner, and
 * machine-readable progress on stdout instead of the stats line
 */
export const GLOBAL_ARGS = ['-y', '-hide_banner', '-nostats', '-progress', 'pipe:1'] as const;

export class FFmpeg {
  readonly ffmpegPath: string;
  private runner: CommandRunner;

  constructor(ffmpegPath: string = getBinaryPath('ffmpeg'), runner: CommandRunner = executeCommand) {
    this.ffmpegPath = ffmpegPath;
    this.runner = runner;
  }

  withGlobalArgs(args: string[]): string[] {
    return [...GLOBAL_ARGS, ...args];
  }

  /**
   * Execute an FFmpeg command
   */
  async execute(args: string[], options: FFmpegExecuteOptions = {}): Promise<CommandResult> {
    return this.runner(this.ffmpegPath, this.withGlobalArgs(args), {
      timeout: options.timeout,
      signal: options.signal,
      onStdoutLine: options.onProgressLine,
      onStderrLine: options.onStderrLine,
    });
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
