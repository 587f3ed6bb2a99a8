/**
 * Processing Types
 */

import type { EncodeFailedError, StrategyAttempt } from '@subburn/core';

export interface EncoderSettings {
  encoder: string;
  quality: string;
  pixelFormat: string;
  audioCodec: string;
}

export interface EncodeJob {
  inputPath: string;
  subtitlePath: string;
  /** Audio track among audio streams; null when the file has none */
  audioIndex: number | null;
  outputPath: string;
  durationSeconds: number;
  settings: EncoderSettings;
}

export const ENCODE_TIERS = ['subtitles', 'subtitles-alt-path', 'no-subtitles'] as const;

export type EncodeTier = typeof ENCODE_TIERS[number];

export type EncodeOutcome =
  | { status: 'success'; tier: EncodeTier; attempts: StrategyAttempt[] }
  | { status: 'degraded'; tier: EncodeTier; reason: string; attempts: StrategyAttempt[] }
  | { status: 'failed'; error: EncodeFailedError; attempts: StrategyAttempt[] }
  | { status: 'cancelled' };

export interface EncodeOptions {
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}
