/**
 * @subburn/processing
 *
 * Encoding layer.
 *
 * - Build the ffmpeg encode command (subtitle burn-in, quality per encoder)
 * - Track progress from the -progress side channel
 * - Fall back through the encode tiers
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export { FFmpeg, GLOBAL_ARGS, type FFmpegExecuteOptions } from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Encoder families
export { getEncoderFamily, getQualityArgs, type EncoderFamily } from './quality.js';

// Subtitle filter
export { escapeFilterPath, subtitlesFilter, subtitlesFilterRaw } from './subtitleFilter.js';

// Progress
export {
  EncodeProgressTracker,
  parseElapsedSeconds,
  RUNNING_CAP,
  type ProgressTrackerOptions,
} from './progressTracker.js';

// Orchestrator
export {
  EncodeOrchestrator,
  buildEncodeArgs,
  type EncodeOrchestratorConfig,
} from './encodeOrchestrator.js';

// Types
export {
  ENCODE_TIERS,
  type EncodeJob,
  type EncodeOptions,
  type EncodeOutcome,
  type EncodeTier,
  type EncoderSettings,
} from './types.js';
