/**
 * Subtitle Transformer
 *
 * Two passes over extracted SRT text, always run in this order:
 * 1. stripMarkup removes every <font> tag the source carried
 * 2. reformat wraps each dialogue block in one <font> tag with the
 *    configured face and size
 *
 * Both passes change nothing but the tags, so
 * strip(reformat(strip(D))) === strip(D) for any input.
 */

import { TransformError } from '@subburn/core';
import { createLogger, safeReadFile, safeWriteFile, type Logger } from '@subburn/utils';
import { isBlank, isCueNumber, parseCues, splitLines } from './srtParser.js';
import type { SubtitleFont } from './types.js';

const FONT_TAG = /<font\b[^>]*>|<\/font>/g;

export function stripMarkup(text: string): string {
  return text.replace(FONT_TAG, '');
}

export function openingFontTag(font: SubtitleFont): string {
  return `<font size="${font.size}" face="${font.name}">`;
}

/**
 * Wrap every cue's dialogue in a single font span.
 *
 * A pure integer line followed by another line starts a cue; the next line is
 * its timing, and the non-blank lines after that are the dialogue. The blank
 * line ending a cue is written back as found. Anything outside a cue is
 * passed through untouched, and so are the original line terminators.
 */
export function reformat(text: string, font: SubtitleFont): string {
  const lines = splitLines(text);
  const open = openingFontTag(font);
  let out = '';

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const timing = lines[i + 1];
    if (!line) break;

    if (!isCueNumber(line.content) || !timing) {
      out += line.content + line.eol;
      i++;
      continue;
    }

    out += line.content + line.eol + timing.content + timing.eol;
    i += 2;

    const first = i;
    while (i < lines.length && !isBlank(lines[i]?.content ?? '')) {
      i++;
    }

    const dialogue = lines.slice(first, i);
    const last = dialogue[dialogue.length - 1];
    if (last) {
      const body = dialogue
        .map((l, n) => (n === dialogue.length - 1 ? l.content : l.content + l.eol))
        .join('');
      out += open + body + '</font>' + last.eol;
    }

    const separator = lines[i];
    if (separator) {
      out += separator.content + separator.eol;
      i++;
    }
  }

  return out;
}

/**
 * File-level wrapper: rewrites a subtitle file in place
 */
export class SubtitleTransformer {
  private log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger({ component: 'subtitle-transformer' });
  }

  async stripFile(filePath: string): Promise<void> {
    const text = await this.read(filePath);
    const stripped = stripMarkup(text);
    await safeWriteFile(filePath, stripped);
    this.log.debug({ filePath, removed: text.length - stripped.length }, 'Removed font markup');
  }

  /**
   * Throws TransformError when the file holds no usable cue
   */
  async reformatFile(filePath: string, font: SubtitleFont): Promise<void> {
    const text = await this.read(filePath);

    const { cues, warnings } = parseCues(text);
    for (const warning of warnings) {
      this.log.warn({ filePath }, `Malformed subtitle text passed through: ${warning}`);
    }
    if (cues.length === 0) {
      throw new TransformError(filePath, 'no subtitle cues found');
    }

    await safeWriteFile(filePath, reformat(text, font));
    this.log.debug({ filePath, cues: cues.length, font }, 'Reformatted subtitles');
  }

  private async read(filePath: string): Promise<string> {
    const text = await safeReadFile(filePath);
    if (text === null) {
      throw new TransformError(filePath, 'file not found');
    }
    return text;
  }
}
