/**
 * Batch Converter
 *
 * Runs one PipelineRunner per file with a concurrency limit. Each file gets
 * its own settings snapshot taken when it starts, so edits made while a batch
 * is running only affect files not yet started. One file's failure never
 * stops the others.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  InvalidInputError,
  toSubburnError,
  type ConversionSettings,
  type SubburnError,
} from '@subburn/core';
import {
  createLogger,
  defaultOutputPath,
  findFilesByExtension,
  getExtension,
  type Logger,
} from '@subburn/utils';
import { PipelineRunner } from './pipelineRunner.js';
import { ProgressChannel } from './progressChannel.js';
import type { PipelineReport, RunOutcome, TrackChooser } from './types.js';

export interface ExpandedInputs {
  files: string[];
  errors: InvalidInputError[];
}

/**
 * Resolve command-line paths to MKV files. Directories contribute their
 * .mkv files (not recursive); everything else must itself be an .mkv file.
 */
export async function expandInputs(paths: ReadonlyArray<string>): Promise<ExpandedInputs> {
  const files: string[] = [];
  const errors: InvalidInputError[] = [];

  for (const path of paths) {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch {
      errors.push(new InvalidInputError(path, 'no such file or directory'));
      continue;
    }

    if (isDirectory) {
      const found = await findFilesByExtension(path, ['.mkv']);
      if (found.length === 0) {
        errors.push(new InvalidInputError(path, 'directory contains no .mkv files'));
      }
      files.push(...found);
    } else if (getExtension(path) === 'mkv') {
      files.push(path);
    } else {
      errors.push(new InvalidInputError(path, 'not an .mkv file'));
    }
  }

  return { files: [...new Set(files)], errors };
}

export interface BatchConverterOptions {
  /** Called once per file, right before it starts */
  getSettings: () => Promise<ConversionSettings>;
  createRunner?: (settings: ConversionSettings, channel: ProgressChannel) => PipelineRunner;
  channel?: ProgressChannel;
  tempDir?: string;
  logger?: Logger;
}

export interface BatchRunOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Overrides the OUTPUT_DIR setting */
  outputDir?: string;
  subtitleIndex?: number;
  audioIndex?: number;
  deleteSource?: boolean;
  chooseTrack?: TrackChooser;
}

export type BatchSummary = Record<RunOutcome, number>;

export interface BatchResult {
  reports: PipelineReport[];
  summary: BatchSummary;
}

export function summarize(reports: ReadonlyArray<PipelineReport>): BatchSummary {
  const summary: BatchSummary = { success: 0, degraded: 0, failed: 0, skipped: 0, cancelled: 0 };
  for (const report of reports) {
    summary[report.outcome]++;
  }
  return summary;
}

export class BatchConverter {
  private readonly getSettings: () => Promise<ConversionSettings>;
  private readonly createRunner: (settings: ConversionSettings, channel: ProgressChannel) => PipelineRunner;
  private readonly channel: ProgressChannel;
  private readonly log: Logger;

  constructor(options: BatchConverterOptions) {
    this.getSettings = options.getSettings;
    this.channel = options.channel ?? new ProgressChannel();
    this.log = options.logger ?? createLogger({ component: 'batch' });
    const tempDir = options.tempDir;
    this.createRunner = options.createRunner
      ?? ((settings, channel) => new PipelineRunner({ settings, channel, tempDir }));
  }

  getChannel(): ProgressChannel {
    return this.channel;
  }

  /**
   * Convert files; reports come back in input order. Two files that would
   * write the same output are never both converted: the later one fails
   * with InvalidInputError.
   */
  async convert(files: ReadonlyArray<string>, options: BatchRunOptions = {}): Promise<BatchResult> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const reports: PipelineReport[] = new Array<PipelineReport>(files.length);
    const claims = claimOutputs(files, options.outputDir);
    let next = 0;

    this.log.info({ files: files.length, concurrency }, 'Starting batch');

    const worker = async (): Promise<void> => {
      while (next < files.length) {
        const index = next++;
        const file = files[index];
        if (file === undefined) continue;
        reports[index] = await this.convertOne(file, options, claims);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));

    const summary = summarize(reports);
    this.log.info({ ...summary }, 'Batch finished');
    return { reports, summary };
  }

  private async convertOne(
    inputPath: string,
    options: BatchRunOptions,
    claims: Map<string, string>
  ): Promise<PipelineReport> {
    if (options.signal?.aborted) {
      return notStartedReport(inputPath, 'batch cancelled before this file started');
    }

    let settings: ConversionSettings;
    try {
      settings = await this.getSettings();
    } catch (error) {
      const failure = toSubburnError(error);
      this.log.error({ input: inputPath, error: failure.message }, 'Could not load settings');
      return failedReport(inputPath, '', failure);
    }

    const outputDir = options.outputDir ?? settings.outputDir ?? undefined;
    const outputPath = defaultOutputPath(inputPath, outputDir);

    // OUTPUT_DIR is only known per file, so the claim is checked again here
    const owner = claims.get(resolve(outputPath));
    if (owner !== undefined && owner !== inputPath) {
      const failure = new InvalidInputError(inputPath, `output ${outputPath} is already written by ${owner}`);
      this.log.error({ input: inputPath, output: outputPath, owner }, 'Output path clash, skipping conversion');
      return failedReport(inputPath, outputPath, failure);
    }
    claims.set(resolve(outputPath), inputPath);

    const runner = this.createRunner(settings, this.channel);

    return runner.run({
      inputPath,
      outputPath,
      subtitleIndex: options.subtitleIndex,
      audioIndex: options.audioIndex,
      deleteSource: options.deleteSource,
      signal: options.signal,
      chooseTrack: options.chooseTrack,
    });
  }
}

/**
 * Output path → input that owns it, first file in input order winning.
 * Only paths known before any settings are read are claimed here.
 */
function claimOutputs(files: ReadonlyArray<string>, outputDir: string | undefined): Map<string, string> {
  const claims = new Map<string, string>();
  for (const file of files) {
    const key = resolve(defaultOutputPath(file, outputDir));
    if (!claims.has(key)) claims.set(key, file);
  }
  return claims;
}

function failedReport(inputPath: string, outputPath: string, error: SubburnError): PipelineReport {
  return {
    ...notStartedReport(inputPath, error.message),
    outputPath,
    outcome: 'failed',
    stage: 'FAILED',
    error,
  };
}

function notStartedReport(inputPath: string, reason: string): PipelineReport {
  return {
    runId: '',
    inputPath,
    outputPath: '',
    outcome: 'cancelled',
    stage: 'CANCELLED',
    reason,
    history: [],
    durationMs: 0,
  };
}
