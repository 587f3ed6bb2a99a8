import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { createTempPath, defaultOutputPath, getBasename, getExtension } from '../path.js';

describe('path utilities', () => {
  it('should extract lowercase extensions and basenames', () => {
    expect(getExtension('/videos/Movie.MKV')).toBe('mkv');
    expect(getBasename('/videos/Movie.MKV')).toBe('Movie');
  });

  describe('createTempPath', () => {
    it('should build <prefix>-<12 hex>.<ext> inside the given directory', () => {
      const path = createTempPath('subtitle', 'srt', '/tmp/work');
      expect(path).toMatch(/^\/tmp\/work\/subtitle-[0-9a-f]{12}\.srt$/);
    });

    it('should strip a leading dot from the extension', () => {
      expect(createTempPath('subtitle', '.srt', '/tmp')).toMatch(/\.srt$/);
      expect(createTempPath('subtitle', '.srt', '/tmp')).not.toMatch(/\.\.srt$/);
    });

    it('should not repeat names across many calls', () => {
      const names = new Set(Array.from({ length: 500 }, () => createTempPath('subtitle', 'srt', '/tmp')));
      expect(names.size).toBe(500);
    });
  });

  describe('defaultOutputPath', () => {
    it('should place the mp4 beside the input by default', () => {
      expect(defaultOutputPath(join('/videos', 'show.mkv'))).toBe(join('/videos', 'show.mp4'));
    });

    it('should use the output directory when given', () => {
      expect(defaultOutputPath(join('/videos', 'show.mkv'), '/out')).toBe(join('/out', 'show.mp4'));
    });

    it('should ignore an empty output directory', () => {
      expect(defaultOutputPath(join('/videos', 'show.mkv'), '')).toBe(join('/videos', 'show.mp4'));
    });
  });
});
