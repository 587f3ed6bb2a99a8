import { describe, it, expect } from 'vitest';
import { formatDuration, formatTimecode, parseTimecode } from '../time.js';

describe('time utilities', () => {
  describe('parseTimecode', () => {
    it('should parse HH:MM:SS with fractional seconds', () => {
      expect(parseTimecode('00:00:01.5')).toBe(1500);
      expect(parseTimecode('01:02:03.250000')).toBe(3723250);
    });

    it('should accept a comma as decimal separator', () => {
      expect(parseTimecode('00:01:00,120')).toBe(60120);
    });

    it('should parse timecodes without a fraction', () => {
      expect(parseTimecode('00:10:00')).toBe(600000);
    });

    it('should reject malformed input', () => {
      expect(() => parseTimecode('N/A')).toThrow('Invalid timecode format: N/A');
      expect(() => parseTimecode('12:34')).toThrow();
    });
  });

  describe('formatTimecode', () => {
    it('should pad every field', () => {
      expect(formatTimecode(3723250)).toBe('01:02:03.250');
      expect(formatTimecode(0)).toBe('00:00:00.000');
    });
  });

  describe('formatDuration', () => {
    it('should format short and long durations', () => {
      expect(formatDuration(250)).toBe('250ms');
      expect(formatDuration(45000)).toBe('45s');
      expect(formatDuration(125000)).toBe('2m 5s');
      expect(formatDuration(3725000)).toBe('1h 2m 5s');
    });
  });
});
