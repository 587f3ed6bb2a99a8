/**
 * Media Types
 */

export type StreamKind = 'video' | 'audio' | 'subtitle';

export const STREAM_KINDS = ['video', 'audio', 'subtitle'] as const satisfies ReadonlyArray<StreamKind>;

export interface MediaStream {
  /** 0-based position among streams of the same kind */
  index: number;
  codecType: StreamKind;
  codecName: string;
  /** Language tag, or "unknown" */
  language: string;
  isDefault: boolean;
  title?: string;
}

export interface MediaFile {
  path: string;
  /** Seconds; 0 when the container reports none */
  duration: number;
  streams: ReadonlyArray<MediaStream>;
}

/**
 * One line in a track picker
 */
export interface TrackDescription {
  kind: StreamKind;
  index: number;
  language: string;
  codecName: string;
  isDefault: boolean;
  description: string;
}

export function isStreamKind(value: string): value is StreamKind {
  return STREAM_KINDS.some(kind => kind === value);
}

export function streamsOfKind(file: MediaFile, kind: StreamKind): MediaStream[] {
  return file.streams.filter(stream => stream.codecType === kind);
}
