import { describe, it, expect } from 'vitest';
import { parseCues, parseTimingLine, splitLines } from '../srtParser.js';

describe('splitLines', () => {
  it('should keep each line terminator', () => {
    expect(splitLines('a\r\nb\nc')).toEqual([
      { content: 'a', eol: '\r\n' },
      { content: 'b', eol: '\n' },
      { content: 'c', eol: '' },
    ]);
    expect(splitLines('a\n')).toEqual([{ content: 'a', eol: '\n' }]);
    expect(splitLines('')).toEqual([]);
  });
});

describe('parseTimingLine', () => {
  it('should parse comma and dot fractions', () => {
    expect(parseTimingLine('00:01:02,345 --> 00:01:04.000')).toEqual({ start: 62345, end: 64000 });
  });

  it('should return null for anything else', () => {
    expect(parseTimingLine('Hello')).toBeNull();
    expect(parseTimingLine('00:01 --> 00:02')).toBeNull();
  });
});

describe('parseCues', () => {
  it('should parse well-formed cues', () => {
    const result = parseCues('1\n00:00:01,000 --> 00:00:02,000\nLine one\nLine two\n\n2\n00:00:03,000 --> 00:00:04,000\nNext\n');

    expect(result.warnings).toEqual([]);
    expect(result.cues).toEqual([
      { number: 1, start: 1000, end: 2000, lines: ['Line one', 'Line two'] },
      { number: 2, start: 3000, end: 4000, lines: ['Next'] },
    ]);
  });

  it('should report malformed cues and keep the good ones', () => {
    const result = parseCues([
      '1',
      'soon --> later',
      'Bad timing',
      '',
      '2',
      '00:00:05,000 --> 00:00:04,000',
      'Backwards',
      '',
      'orphan text',
      '',
      '3',
      '00:00:06,000 --> 00:00:07,000',
      'Good',
    ].join('\n'));

    expect(result.cues.map(cue => cue.number)).toEqual([3]);
    expect(result.warnings).toEqual([
      'Cue 1: malformed timing line "soon --> later"',
      'Cue 2: end time is not after start time',
      'Line 9: text outside a cue',
    ]);
  });
});
