/**
 * @subburn/media
 *
 * Media analysis layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe (structured JSON, validated)
 * - Scan `ffmpeg -i` output as a cheaper fallback
 * - Describe tracks for selection
 */

// Probing
export { FFProbe, toMediaFile, type FFProbeOutput } from './probes/ffprobe.js';
export {
  ContainerInspector,
  parseStreamListing,
  type InspectionResult,
} from './probes/containerInspector.js';

// Combined probe
export { StreamProbe, describeStream, type StreamProbeOptions } from './streamProbe.js';

// Types
export {
  STREAM_KINDS,
  isStreamKind,
  streamsOfKind,
  type StreamKind,
  type MediaStream,
  type MediaFile,
  type TrackDescription,
} from './types.js';
