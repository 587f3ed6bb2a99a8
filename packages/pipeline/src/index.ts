/**
 * @subburn/pipeline
 *
 * Per-file conversion pipeline and batch driver.
 */

export { PipelineRunner, type PipelineRunnerOptions } from './pipelineRunner.js';

export {
  BatchConverter,
  expandInputs,
  summarize,
  type BatchConverterOptions,
  type BatchRunOptions,
  type BatchResult,
  type BatchSummary,
  type ExpandedInputs,
} from './batchConverter.js';

export {
  ProgressChannel,
  overallProgress,
  type ProgressEvent,
  type StageEvent,
} from './progressChannel.js';

export type {
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
