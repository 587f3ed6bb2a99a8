/**
 * Pipeline Runner
 *
 * Converts one MKV into an MP4 with burned-in subtitles:
 *
 * PROBING → EXTRACTING → STRIPPING → REFORMATTING → ENCODING → DONE
 *
 * Files without subtitles end in SKIPPED straight after probing. Any stage
 * can end in FAILED or CANCELLED; the temporary subtitle file is removed on
 * every path and a partial output on the failing ones.
 */

import { randomUUID } from 'node:crypto';
import {
  CancelledError,
  InvalidSelectionError,
  PipelineStateMachine,
  ProbeError,
  toSubburnError,
  type ConversionSettings,
  type SubburnError,
  type PipelineStage,
  type StageTransition,
} from '@subburn/core';
import { StreamProbe, describeStream, type MediaFile, type MediaStream } from '@subburn/media';
import { EncodeOrchestrator, type EncodeTier } from '@subburn/processing';
import { SubtitleExtractor, SubtitleTransformer, type ExtractionMethod } from '@subburn/subtitles';
import {
  createLogger,
  createTempPath,
  defaultOutputPath,
  getExtension,
  removeIfExists,
  type Logger,
} from '@subburn/utils';
import { ProgressChannel, overallProgress } from './progressChannel.js';
import type {
  EncodeService,
  ExtractService,
  PipelineReport,
  ProbeService,
  RunOutcome,
  RunRequest,
  SelectableKind,
  TrackChooser,
  TransformService,
} from './types.js';

export interface PipelineRunnerOptions {
  settings: ConversionSettings;
  channel?: ProgressChannel;
  /** Directory for temporary subtitle files; the OS temp dir by default */
  tempDir?: string;
  probe?: ProbeService;
  extractor?: ExtractService;
  transformer?: TransformService;
  encoder?: EncodeService;
  logger?: Logger;
}

interface RunContext {
  runId: string;
  request: RunRequest;
  machine: PipelineStateMachine;
  outputPath: string;
  subtitlePath: string;
  startedAt: number;
  /** Set once ENCODING starts */
  outputTouched: boolean;
}

interface RunResult {
  outcome: RunOutcome;
  reason?: string;
  tier?: EncodeTier;
  extractionMethod?: ExtractionMethod;
  sourceDeleted?: boolean;
}

export class PipelineRunner {
  private readonly settings: ConversionSettings;
  private readonly channel: ProgressChannel;
  private readonly tempDir: string | undefined;
  private readonly probe: ProbeService;
  private readonly extractor: ExtractService;
  private readonly transformer: TransformService;
  private readonly encoder: EncodeService;
  private readonly log: Logger;

  constructor(options: PipelineRunnerOptions) {
    this.settings = options.settings;
    this.channel = options.channel ?? new ProgressChannel();
    this.tempDir = options.tempDir;
    this.log = options.logger ?? createLogger({ component: 'pipeline' });
    this.probe = options.probe ?? new StreamProbe();
    this.extractor = options.extractor ?? new SubtitleExtractor();
    this.transformer = options.transformer ?? new SubtitleTransformer();
    this.encoder = options.encoder ?? new EncodeOrchestrator();
  }

  getChannel(): ProgressChannel {
    return this.channel;
  }

  /**
   * Run the whole pipeline for one file. Never throws: every ending is
   * described by the returned report.
   */
  async run(request: RunRequest): Promise<PipelineReport> {
    const runId = randomUUID();
    const ctx: RunContext = {
      runId,
      request,
      machine: new PipelineStateMachine(runId),
      outputPath: request.outputPath ?? defaultOutputPath(request.inputPath, this.settings.outputDir ?? undefined),
      subtitlePath: createTempPath('subtitle', 'srt', this.tempDir),
      startedAt: Date.now(),
      outputTouched: false,
    };

    this.log.info({ runId, input: request.inputPath, output: ctx.outputPath }, 'Starting conversion');
    this.publishProgress(ctx, 0);

    try {
      const result = await this.execute(ctx);
      return this.report(ctx, result);
    } catch (error) {
      const failure = toSubburnError(error);

      if (failure instanceof CancelledError) {
        this.log.info({ runId, input: request.inputPath, stage: ctx.machine.getState() }, 'Conversion cancelled');
        if (!ctx.machine.isTerminal()) {
          this.transition(ctx, 'CANCELLED', failure.message);
        }
        await this.removePartialOutput(ctx);
        return this.report(ctx, { outcome: 'cancelled' }, failure);
      }

      this.log.error(
        { runId, input: request.inputPath, stage: ctx.machine.getState(), code: failure.code, error: failure.message },
        'Conversion failed'
      );
      if (!ctx.machine.isTerminal()) {
        this.transition(ctx, 'FAILED', failure.message);
      }
      await this.removePartialOutput(ctx);
      return this.report(ctx, { outcome: 'failed' }, failure);
    } finally {
      await removeIfExists(ctx.subtitlePath);
    }
  }

  private async execute(ctx: RunContext): Promise<RunResult> {
    const { inputPath, signal } = ctx.request;

    // Probing
    this.checkCancelled(ctx);
    if (!(await this.probe.hasSubtitleStream(inputPath))) {
      return this.skip(ctx, 'no subtitle stream');
    }

    let file: MediaFile;
    try {
      file = await this.probe.probe(inputPath);
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;
      this.log.warn({ runId: ctx.runId, input: inputPath, error: error.message }, 'Probe failed, skipping file');
      return this.skip(ctx, error.message);
    }

    const subtitles = file.streams.filter(s => s.codecType === 'subtitle');
    const audio = file.streams.filter(s => s.codecType === 'audio');
    if (subtitles.length === 0) {
      return this.skip(ctx, 'no subtitle stream');
    }

    const subtitleIndex = await this.selectTrack(ctx, 'subtitle', subtitles, ctx.request.subtitleIndex);
    const audioIndex = audio.length > 0
      ? await this.selectTrack(ctx, 'audio', audio, ctx.request.audioIndex)
      : null;
    if (audioIndex === null) {
      if (ctx.request.audioIndex !== undefined) {
        throw new InvalidSelectionError('audio', ctx.request.audioIndex, 0);
      }
      this.log.warn({ runId: ctx.runId, input: inputPath }, 'No audio stream, output will be silent');
    }
    this.publishProgress(ctx, 1);

    // Extracting
    this.advance(ctx, 'EXTRACTING', { subtitleIndex, audioIndex });
    const extracted = await this.extractor.extract(inputPath, subtitleIndex, ctx.subtitlePath, {
      codecName: subtitles[subtitleIndex]?.codecName,
      signal,
    });
    this.publishProgress(ctx, 1);

    // Stripping
    this.advance(ctx, 'STRIPPING');
    await this.transformer.stripFile(ctx.subtitlePath);
    this.publishProgress(ctx, 1);

    // Reformatting
    this.advance(ctx, 'REFORMATTING');
    await this.transformer.reformatFile(ctx.subtitlePath, this.settings.font);
    this.publishProgress(ctx, 1);

    // Encoding
    this.advance(ctx, 'ENCODING');
    ctx.outputTouched = true;
    const outcome = await this.encoder.encode(
      {
        inputPath,
        subtitlePath: ctx.subtitlePath,
        audioIndex,
        outputPath: ctx.outputPath,
        durationSeconds: file.duration,
        settings: {
          encoder: this.settings.encoder,
          quality: this.settings.quality,
          pixelFormat: this.settings.pixelFormat,
          audioCodec: this.settings.audioCodec,
        },
      },
      {
        signal,
        onProgress: fraction => this.publishProgress(ctx, fraction),
      }
    );

    if (outcome.status === 'cancelled') {
      throw new CancelledError('ENCODING');
    }
    if (outcome.status === 'failed') {
      throw outcome.error;
    }

    this.transition(ctx, 'DONE', outcome.status === 'degraded' ? outcome.reason : undefined);
    this.channel.publishProgress({
      runId: ctx.runId,
      inputPath,
      stage: 'DONE',
      stageFraction: 1,
      overall: 1,
    });

    const sourceDeleted = await this.deleteSourceIfRequested(ctx);

    return {
      outcome: outcome.status,
      tier: outcome.tier,
      extractionMethod: extracted.method,
      reason: outcome.status === 'degraded' ? outcome.reason : undefined,
      sourceDeleted,
    };
  }

  /**
   * Per-kind index to use. A preselected index must exist; otherwise the
   * chooser decides when there is a real choice, else the default-flagged
   * track (or the first) wins.
   */
  private async selectTrack(
    ctx: RunContext,
    kind: SelectableKind,
    streams: MediaStream[],
    preselected: number | undefined
  ): Promise<number> {
    const validate = (index: number): number => {
      if (!Number.isInteger(index) || index < 0 || index >= streams.length) {
        throw new InvalidSelectionError(kind, index, streams.length);
      }
      return index;
    };

    if (preselected !== undefined) {
      return validate(preselected);
    }
    if (streams.length === 1) {
      return 0;
    }

    const chooser: TrackChooser | undefined = ctx.request.chooseTrack;
    if (chooser) {
      const tracks = streams.map(stream => ({
        kind,
        index: stream.index,
        language: stream.language,
        codecName: stream.codecName,
        isDefault: stream.isDefault,
        description: describeStream(stream),
      }));
      return validate(await chooser(kind, tracks, ctx.request.inputPath));
    }

    const preferred = streams.findIndex(stream => stream.isDefault);
    return preferred === -1 ? 0 : preferred;
  }

  private async deleteSourceIfRequested(ctx: RunContext): Promise<boolean> {
    const requested = ctx.request.deleteSource ?? this.settings.deleteSource;
    if (!requested) return false;

    const { inputPath } = ctx.request;
    if (getExtension(inputPath) !== 'mkv') {
      this.log.warn({ runId: ctx.runId, input: inputPath }, 'Not an .mkv file, keeping source');
      return false;
    }

    try {
      const removed = await removeIfExists(inputPath);
      if (removed) {
        this.log.info({ runId: ctx.runId, input: inputPath }, 'Deleted source file');
      }
      return removed;
    } catch (error) {
      this.log.warn(
        { runId: ctx.runId, input: inputPath, error: error instanceof Error ? error.message : String(error) },
        'Could not delete source file'
      );
      return false;
    }
  }

  /**
   * Remove the output only if this run got as far as writing it
   */
  private async removePartialOutput(ctx: RunContext): Promise<void> {
    if (!ctx.outputTouched) return;
    await removeIfExists(ctx.outputPath);
  }

  private skip(ctx: RunContext, reason: string): RunResult {
    this.transition(ctx, 'SKIPPED', reason);
    this.log.info({ runId: ctx.runId, input: ctx.request.inputPath, reason }, 'Skipping file');
    return { outcome: 'skipped', reason };
  }

  private checkCancelled(ctx: RunContext): void {
    if (ctx.request.signal?.aborted) {
      throw new CancelledError(ctx.machine.getState());
    }
  }

  /**
   * Move to the next working stage, unless cancellation was requested
   */
  private advance(ctx: RunContext, to: PipelineStage, metadata?: Record<string, unknown>): void {
    this.checkCancelled(ctx);
    this.transition(ctx, to, undefined, metadata);
    this.publishProgress(ctx, 0);
  }

  private transition(
    ctx: RunContext,
    to: PipelineStage,
    reason?: string,
    metadata?: Record<string, unknown>
  ): StageTransition {
    const transition = ctx.machine.transitionTo(to, reason, metadata);
    this.log.info(
      { runId: ctx.runId, input: ctx.request.inputPath, from: transition.from, to, reason },
      'Stage transition'
    );
    this.channel.publishStage({
      runId: ctx.runId,
      inputPath: ctx.request.inputPath,
      from: transition.from,
      to,
      reason,
    });
    return transition;
  }

  private publishProgress(ctx: RunContext, stageFraction: number): void {
    const stage = ctx.machine.getState();
    const overall = overallProgress(stage, stageFraction);
    if (overall === null) return;

    this.channel.publishProgress({
      runId: ctx.runId,
      inputPath: ctx.request.inputPath,
      stage,
      stageFraction,
      overall,
    });
  }

  private report(ctx: RunContext, result: RunResult, error?: SubburnError): PipelineReport {
    return {
      runId: ctx.runId,
      inputPath: ctx.request.inputPath,
      outputPath: ctx.outputPath,
      stage: ctx.machine.getState(),
      ...result,
      ...(error ? { error } : {}),
      history: ctx.machine.getHistory(),
      durationMs: Date.now() - ctx.startedAt,
    };
  }
}
