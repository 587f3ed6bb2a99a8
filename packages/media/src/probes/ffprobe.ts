/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Reads container and stream metadata in JSON format and validates its shape.
 */

import { z } from 'zod';
import { executeCommand, extractErrorText, type CommandResult, type CommandRunner } from '@subburn/utils';
import { ProbeError, getBinaryPath } from '@subburn/core';
import { isStreamKind, type MediaFile, type MediaStream, type StreamKind } from '../types.js';

const ffprobeStreamSchema = z.object({
  index: z.number().int(),
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  disposition: z.record(z.number()).optional(),
  tags: z.record(z.string()).optional(),
});

const ffprobeOutputSchema = z.object({
  format: z.object({
    filename: z.string().optional(),
    format_name: z.string().optional(),
    duration: z.string().optional(),
  }).optional(),
  streams: z.array(ffprobeStreamSchema).default([]),
  error: z.object({
    code: z.number(),
    string: z.string(),
  }).optional(),
});

export type FFProbeOutput = z.infer<typeof ffprobeOutputSchema>;

function parseDuration(value: string | undefined): number {
  if (value === undefined) return 0;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

/**
 * Turn validated ffprobe output into a MediaFile. Data and attachment
 * streams are dropped; indices are renumbered per kind.
 */
export function toMediaFile(filePath: string, output: FFProbeOutput): MediaFile {
  const counters: Record<StreamKind, number> = { video: 0, audio: 0, subtitle: 0 };
  const streams: MediaStream[] = [];

  for (const stream of output.streams) {
    const codecType = stream.codec_type;
    if (codecType === undefined || !isStreamKind(codecType)) continue;

    const title = stream.tags?.['title'];
    streams.push({
      index: counters[codecType]++,
      codecType,
      codecName: stream.codec_name ?? 'unknown',
      language: stream.tags?.['language'] ?? 'unknown',
      isDefault: stream.disposition?.['default'] === 1,
      ...(title !== undefined ? { title } : {}),
    });
  }

  return {
    path: filePath,
    duration: parseDuration(output.format?.duration),
    streams,
  };
}

export class FFProbe {
  private ffprobePath: string;
  private runner: CommandRunner;

  constructor(ffprobePath: string = getBinaryPath('ffprobe'), runner: CommandRunner = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.runner = runner;
  }

  /**
   * Probe a media file. Throws ProbeError when ffprobe cannot run, exits
   * non-zero, or prints something other than the expected JSON.
   */
  async probe(filePath: string): Promise<MediaFile> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_error',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
    } catch (error) {
      throw new ProbeError(filePath, `ffprobe could not be started: ${error instanceof Error ? error.message : String(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      if (result.exitCode !== 0) {
        throw new ProbeError(filePath, `ffprobe exited with code ${result.exitCode}: ${extractErrorText(result.stderr)}`);
      }
      throw new ProbeError(filePath, `Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(filePath, 'Unexpected ffprobe output shape', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    if (parsed.data.error) {
      throw new ProbeError(filePath, parsed.data.error.string, { code: parsed.data.error.code });
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `ffprobe exited with code ${result.exitCode}`);
    }

    return toMediaFile(filePath, parsed.data);
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
