import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TransformError } from '@subburn/core';
import { reformat, stripMarkup, SubtitleTransformer } from '../transformer.js';

const FONT = { name: 'Arial', size: 24 };

const SIMPLE = [
  '1',
  '00:00:01,000 --> 00:00:02,500',
  'Hello there.',
  '',
  '2',
  '00:00:03,000 --> 00:00:05,000',
  '<font color="#ffff00">General</font> Kenobi!',
  'You are a bold one.',
  '',
].join('\n');

const SAMPLES: Record<string, string> = {
  simple: SIMPLE,
  crlf: SIMPLE.replace(/\n/g, '\r\n'),
  noTrailingNewline: '1\n00:00:01,000 --> 00:00:02,000\nLast line',
  emptyDialogue: '1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\nText\n',
  strayText: 'WEBVTT junk\n\n1\n00:00:01,000 --> 00:00:02,000\nA\n\n\n\n7\n',
  nestedFonts: '3\n00:00:01,000 --> 00:00:02,000\n<font face="Serif"><font size="12">Deep</font></font>\n',
  alreadyFormatted: '1\n00:00:01,000 --> 00:00:02,000\n<font size="24" face="Arial">Hi</font>\n\n',
  bom: '﻿1\n00:00:01,000 --> 00:00:02,000\nBOM start\n',
  numberAtEnd: 'Intro\n12',
  empty: '',
};

describe('stripMarkup', () => {
  it('should remove opening and closing font tags whatever their attributes', () => {
    expect(stripMarkup('<font size="30" face="Comic Sans">a</font> <font>b</font><font color=red>c'))
      .toBe('a bc');
  });

  it('should leave text without font tags untouched', () => {
    const text = '1\n00:00:01,000 --> 00:00:02,000\n<i>italic</i> & <b>bold</b>\n';
    expect(stripMarkup(text)).toBe(text);
  });

  it('should keep other tags that merely start with the same letters', () => {
    expect(stripMarkup('<fontsize>x</fontsize>')).toBe('<fontsize>x</fontsize>');
  });
});

describe('reformat', () => {
  it('should wrap each dialogue block in one font span', () => {
    expect(reformat(stripMarkup(SIMPLE), FONT)).toBe([
      '1',
      '00:00:01,000 --> 00:00:02,500',
      '<font size="24" face="Arial">Hello there.</font>',
      '',
      '2',
      '00:00:03,000 --> 00:00:05,000',
      '<font size="24" face="Arial">General Kenobi!',
      'You are a bold one.</font>',
      '',
    ].join('\n'));
  });

  it('should keep CRLF line endings', () => {
    const output = reformat(SAMPLES['crlf'] ?? '', { name: 'Verdana', size: 30 });
    expect(output.startsWith('1\r\n00:00:01,000 --> 00:00:02,500\r\n<font size="30" face="Verdana">Hello there.</font>\r\n\r\n2\r\n'))
      .toBe(true);
    expect(output.replace(/\r\n/g, '')).not.toContain('\n');
  });

  it('should not add a separator after a cue at the end of input', () => {
    expect(reformat('1\n00:00:01,000 --> 00:00:02,000\nLast line', FONT))
      .toBe('1\n00:00:01,000 --> 00:00:02,000\n<font size="24" face="Arial">Last line</font>');
  });

  it('should not emit a font line for an empty dialogue block', () => {
    expect(reformat(SAMPLES['emptyDialogue'] ?? '', FONT)).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\n<font size="24" face="Arial">Text</font>\n'
    );
  });

  it('should pass through lines that do not start a cue', () => {
    expect(reformat('Intro\n12', FONT)).toBe('Intro\n12');
  });

  it('should preserve cue numbers and timing lines in order', () => {
    const output = reformat(stripMarkup(SIMPLE), FONT).split('\n');
    expect(output.filter(line => /^\d+$/.test(line))).toEqual(['1', '2']);
    expect(output.filter(line => line.includes('-->'))).toEqual([
      '00:00:01,000 --> 00:00:02,500',
      '00:00:03,000 --> 00:00:05,000',
    ]);
  });

  it.each(Object.entries(SAMPLES))('should round-trip markup removal for %s', (_name, document) => {
    const stripped = stripMarkup(document);
    expect(stripMarkup(reformat(stripped, FONT))).toBe(stripped);
  });
});

describe('SubtitleTransformer', () => {
  it('should strip then reformat a file in place', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'subburn-transform-'));
    const file = join(dir, 'subtitle-abc.srt');
    try {
      await writeFile(file, SIMPLE);
      const transformer = new SubtitleTransformer();

      await transformer.stripFile(file);
      await transformer.reformatFile(file, FONT);

      expect(await readFile(file, 'utf8')).toBe(reformat(stripMarkup(SIMPLE), FONT));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should throw TransformError when the file has no cues', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'subburn-transform-'));
    const file = join(dir, 'subtitle-empty.srt');
    try {
      await writeFile(file, 'not a subtitle file\n');
      await expect(new SubtitleTransformer().reformatFile(file, FONT)).rejects.toBeInstanceOf(TransformError);
      await expect(new SubtitleTransformer().stripFile(join(dir, 'missing.srt'))).rejects.toThrow('file not found');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
