/**
 * Pipeline Types
 *
 * Collaborators are described by the narrow slice the runner uses, so tests
 * can hand in fakes.
 */

import type { PipelineStage, StageTransition, SubburnError } from '@subburn/core';
import type { MediaFile, StreamKind, TrackDescription } from '@subburn/media';
import type { EncodeJob, EncodeOptions, EncodeOutcome, EncodeTier } from '@subburn/processing';
import type { ExtractOptions, ExtractResult, ExtractionMethod, SubtitleFont } from '@subburn/subtitles';

export interface ProbeService {
  hasSubtitleStream(filePath: string): Promise<boolean>;
  probe(filePath: string): Promise<MediaFile>;
}

export interface ExtractService {
  extract(
    inputPath: string,
    subtitleIndex: number,
    outputPath: string,
    options?: ExtractOptions
  ): Promise<ExtractResult>;
}

export interface TransformService {
  stripFile(filePath: string): Promise<void>;
  reformatFile(filePath: string, font: SubtitleFont): Promise<void>;
}

export interface EncodeService {
  encode(job: EncodeJob, options?: EncodeOptions): Promise<EncodeOutcome>;
}

export type SelectableKind = Extract<StreamKind, 'audio' | 'subtitle'>;

/**
 * Asked when a file has several tracks of a kind and none was preselected.
 * Resolves to the chosen per-kind index.
 */
export type TrackChooser = (
  kind: SelectableKind,
  tracks: TrackDescription[],
  inputPath: string
) => Promise<number>;

export interface RunRequest {
  inputPath: string;
  outputPath?: string;
  subtitleIndex?: number;
  audioIndex?: number;
  /** Overrides the settings value when given */
  deleteSource?: boolean;
  signal?: AbortSignal;
  chooseTrack?: TrackChooser;
}

export type RunOutcome = 'success' | 'degraded' | 'failed' | 'skipped' | 'cancelled';

export interface PipelineReport {
  runId: string;
  inputPath: string;
  outputPath: string;
  outcome: RunOutcome;
  /** Stage the run ended in */
  stage: PipelineStage;
  error?: SubburnError;
  reason?: string;
  tier?: EncodeTier;
  extractionMethod?: ExtractionMethod;
  sourceDeleted?: boolean;
  history: ReadonlyArray<StageTransition>;
  durationMs: number;
}
