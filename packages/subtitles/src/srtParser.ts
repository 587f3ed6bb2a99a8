/**
 * SRT Parser
 *
 * Line-level tokenizer shared by the transformer, plus a cue parser used to
 * validate extracted files before they are rewritten.
 */

import { parseTimecode } from '@subburn/utils';
import type { Cue, ParseResult } from './types.js';

/**
 * One physical line and the terminator that ended it ('' on the last line)
 */
export interface SourceLine {
  content: string;
  eol: string;
}

export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  const pattern = /\r\n|\n/g;
  let start = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    lines.push({ content: text.slice(start, match.index), eol: match[0] });
    start = match.index + match[0].length;
  }
  if (start < text.length) {
    lines.push({ content: text.slice(start), eol: '' });
  }

  return lines;
}

export function isCueNumber(line: string): boolean {
  return /^\d+$/.test(line.trim());
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

const TIMING_LINE = /^\s*(\d+:\d{1,2}:\d{1,2}(?:[.,]\d+)?)\s*-->\s*(\d+:\d{1,2}:\d{1,2}(?:[.,]\d+)?)/;

/**
 * Parse "00:00:01,000 --> 00:00:02,500" into milliseconds
 */
export function parseTimingLine(line: string): { start: number; end: number } | null {
  const match = TIMING_LINE.exec(line);
  if (!match?.[1] || !match[2]) return null;
  return { start: parseTimecode(match[1]), end: parseTimecode(match[2]) };
}

/**
 * Collect well-formed cues. Malformed cues and stray text produce warnings
 * and are left out of the result.
 */
export function parseCues(text: string): ParseResult {
  const lines = splitLines(text);
  const cues: Cue[] = [];
  const warnings: string[] = [];

  let i = 0;
  while (i < lines.length) {
    const line = lines[i]?.content ?? '';

    if (isBlank(line)) {
      i++;
      continue;
    }

    const timingLine = lines[i + 1]?.content;
    if (!isCueNumber(line) || timingLine === undefined) {
      warnings.push(`Line ${i + 1}: text outside a cue`);
      i++;
      continue;
    }

    const number = parseInt(line.trim(), 10);
    i += 2;

    const dialogue: string[] = [];
    while (i < lines.length && !isBlank(lines[i]?.content ?? '')) {
      dialogue.push(lines[i]?.content ?? '');
      i++;
    }

    const timing = parseTimingLine(timingLine);
    if (!timing) {
      warnings.push(`Cue ${number}: malformed timing line "${timingLine.trim()}"`);
    } else if (timing.end <= timing.start) {
      warnings.push(`Cue ${number}: end time is not after start time`);
    } else {
      cues.push({ number, start: timing.start, end: timing.end, lines: dialogue });
    }
  }

  return { cues, warnings };
}
