/**
 * Subtitle Types
 */

export interface SubtitleFont {
  name: string;
  size: number;
}

export interface Cue {
  /** Number as written in the source, never renumbered */
  number: number;
  /** Milliseconds */
  start: number;
  end: number;
  lines: string[];
}

export interface ParseResult {
  cues: Cue[];
  warnings: string[];
}

export type ExtractionMethod = 'convert' | 'passthrough';

export interface ExtractResult {
  path: string;
  method: ExtractionMethod;
}
