/**
 * Encode Orchestrator
 *
 * Burns the subtitle file into the video and writes the MP4. Runs up to three
 * tiers in order, stopping at the first that produces an output:
 *
 * 1. subtitles           - escaped, quoted absolute path in the filter
 * 2. subtitles-alt-path  - the path as given, unescaped
 * 3. no-subtitles        - plain transcode, reported as degraded
 *
 * The subtitle file is always removed afterwards; a partial output is removed
 * when the encode fails or is cancelled.
 */

import {
  CancelledError,
  EncodeFailedError,
  runFallbackLadder,
  type Strategy,
  type StrategyOutcome,
} from '@subburn/core';
import {
  createLogger,
  ensureDir,
  extractErrorText,
  formatCommand,
  hasContent,
  removeIfExists,
  type Logger,
} from '@subburn/utils';
import { dirname } from 'node:path';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { FFmpeg } from './ffmpeg.js';
import { EncodeProgressTracker, type ProgressTrackerOptions } from './progressTracker.js';
import { getQualityArgs } from './quality.js';
import { subtitlesFilter, subtitlesFilterRaw } from './subtitleFilter.js';
import {
  ENCODE_TIERS,
  type EncodeJob,
  type EncodeOptions,
  type EncodeOutcome,
  type EncodeTier,
} from './types.js';

export interface EncodeOrchestratorConfig {
  ffmpeg?: FFmpeg;
  /** Per-tier timeout; none by default since encodes can take hours */
  timeout?: number;
  progress?: ProgressTrackerOptions;
  logger?: Logger;
}

/**
 * Build the arguments for one tier (without the global flags)
 */
export function buildEncodeArgs(job: EncodeJob, tier: EncodeTier): string[] {
  const builder = new FFmpegCommandBuilder().addInput(job.inputPath);

  if (tier === 'subtitles') {
    builder.addVideoFilter(subtitlesFilter(job.subtitlePath));
  } else if (tier === 'subtitles-alt-path') {
    builder.addVideoFilter(subtitlesFilterRaw(job.subtitlePath));
  }

  builder.mapVideo(0, 0);
  if (job.audioIndex !== null) {
    builder.mapAudio(0, job.audioIndex);
  }

  builder.setVideoCodec({
    codec: job.settings.encoder,
    pixFmt: job.settings.pixelFormat,
    extraArgs: getQualityArgs(job.settings.encoder, job.settings.quality),
  });

  if (job.audioIndex !== null) {
    builder.setAudioCodec({ codec: job.settings.audioCodec });
  } else {
    builder.disableAudio();
  }

  return builder.setOutput(job.outputPath).build();
}

export class EncodeOrchestrator {
  private ffmpeg: FFmpeg;
  private timeout: number | undefined;
  private progressOptions: ProgressTrackerOptions;
  private log: Logger;

  constructor(config: EncodeOrchestratorConfig = {}) {
    this.ffmpeg = config.ffmpeg ?? new FFmpeg();
    this.timeout = config.timeout;
    this.progressOptions = config.progress ?? {};
    this.log = config.logger ?? createLogger({ component: 'encode-orchestrator' });
  }

  async encode(job: EncodeJob, options: EncodeOptions = {}): Promise<EncodeOutcome> {
    const { signal, onProgress } = options;
    const tracker = new EncodeProgressTracker(job.durationSeconds, this.progressOptions);
    if (onProgress) {
      tracker.on('progress', onProgress);
    }

    await ensureDir(dirname(job.outputPath));

    const strategies: Strategy<EncodeTier>[] = ENCODE_TIERS.map(tier => ({
      name: tier,
      run: () => this.runTier(job, tier, tracker, signal),
    }));

    this.log.info(
      { input: job.inputPath, output: job.outputPath, encoder: job.settings.encoder, quality: job.settings.quality },
      'Starting encode'
    );

    tracker.start();
    try {
      const result = await runFallbackLadder(strategies, {
        signal,
        onFailure: (attempt, next) => {
          this.log.warn(
            { input: job.inputPath, tier: attempt.strategy, error: attempt.error, next },
            'Encode tier failed'
          );
        },
      });

      if (result.status === 'failure') {
        const error = new EncodeFailedError(job.inputPath, result.attempts);
        this.log.error({ input: job.inputPath, attempts: result.attempts }, 'All encode tiers failed');
        await this.cleanup(job, true);
        return { status: 'failed', error, attempts: result.attempts };
      }

      tracker.complete();
      await this.cleanup(job, false);

      if (result.status === 'degraded') {
        this.log.warn(
          { input: job.inputPath, output: job.outputPath, tier: result.strategy, reason: result.reason },
          'Encoded without burned-in subtitles'
        );
        return { status: 'degraded', tier: result.value, reason: result.reason, attempts: result.attempts };
      }

      this.log.info({ input: job.inputPath, output: job.outputPath, tier: result.value }, 'Encode complete');
      return { status: 'success', tier: result.value, attempts: result.attempts };
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        await this.cleanup(job, true);
        throw error;
      }
      this.log.info({ input: job.inputPath }, 'Encode cancelled');
      await this.cleanup(job, true);
      return { status: 'cancelled' };
    } finally {
      tracker.stop();
    }
  }

  private async runTier(
    job: EncodeJob,
    tier: EncodeTier,
    tracker: EncodeProgressTracker,
    signal: AbortSignal | undefined
  ): Promise<StrategyOutcome<EncodeTier>> {
    await removeIfExists(job.outputPath);

    const args = buildEncodeArgs(job, tier);
    this.log.debug({ tier, command: formatCommand(this.ffmpeg.ffmpegPath, this.ffmpeg.withGlobalArgs(args)) }, 'FFmpeg command');

    const result = await this.ffmpeg.execute(args, {
      timeout: this.timeout,
      signal,
      onProgressLine: line => tracker.handleLine(line),
      onStderrLine: line => tracker.handleLine(line),
    });

    if (result.aborted || signal?.aborted) {
      throw new CancelledError('ENCODING');
    }
    if (result.timedOut) {
      return { status: 'failure', error: `timed out after ${this.timeout ?? 0}ms` };
    }
    if (result.exitCode !== 0) {
      return { status: 'failure', error: extractErrorText(result.stderr) || `exit code ${result.exitCode}` };
    }
    if (!(await hasContent(job.outputPath))) {
      return { status: 'failure', error: 'output file is missing or empty' };
    }

    if (tier === 'no-subtitles') {
      return { status: 'degraded', value: tier, reason: 'subtitle filter failed, output has no subtitles' };
    }
    return { status: 'success', value: tier };
  }

  private async cleanup(job: EncodeJob, removeOutput: boolean): Promise<void> {
    await removeIfExists(job.subtitlePath);
    if (removeOutput) {
      await removeIfExists(job.outputPath);
    }
  }
}
