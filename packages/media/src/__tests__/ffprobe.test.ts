import { describe, it, expect } from 'vitest';
import { ProbeError } from '@subburn/core';
import { createFakeRunner } from '@subburn/utils/testing';
import { FFProbe } from '../probes/ffprobe.js';

const PROBE_JSON = JSON.stringify({
  format: { filename: 'movie.mkv', format_name: 'matroska,webm', duration: '1320.480000' },
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'h264', disposition: { default: 1 } },
    { index: 1, codec_type: 'audio', codec_name: 'aac', tags: { language: 'jpn' }, disposition: { default: 1 } },
    { index: 2, codec_type: 'audio', codec_name: 'ac3', tags: { language: 'eng', title: 'Commentary' } },
    { index: 3, codec_type: 'attachment', codec_name: 'ttf' },
    { index: 4, codec_type: 'subtitle', codec_name: 'subrip', tags: { language: 'eng' } },
  ],
});

describe('FFProbe', () => {
  it('should map streams with per-kind indices', async () => {
    const fake = createFakeRunner(() => ({ stdout: PROBE_JSON }));
    const probe = new FFProbe('ffprobe', fake.run);

    const file = await probe.probe('/media/movie.mkv');

    expect(file.duration).toBeCloseTo(1320.48);
    expect(file.streams).toEqual([
      { index: 0, codecType: 'video', codecName: 'h264', language: 'unknown', isDefault: true },
      { index: 0, codecType: 'audio', codecName: 'aac', language: 'jpn', isDefault: true },
      { index: 1, codecType: 'audio', codecName: 'ac3', language: 'eng', isDefault: false, title: 'Commentary' },
      { index: 0, codecType: 'subtitle', codecName: 'subrip', language: 'eng', isDefault: false },
    ]);
    expect(fake.calls[0]?.args).toEqual([
      '-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', '-show_error', '/media/movie.mkv',
    ]);
  });

  it('should report zero duration when the container has none', async () => {
    const fake = createFakeRunner(() => ({
      stdout: JSON.stringify({ format: { duration: 'N/A' }, streams: [] }),
    }));

    const file = await new FFProbe('ffprobe', fake.run).probe('a.mkv');
    expect(file.duration).toBe(0);
  });

  it('should throw ProbeError on malformed JSON', async () => {
    const fake = createFakeRunner(() => ({ stdout: '{"streams": [' }));
    await expect(new FFProbe('ffprobe', fake.run).probe('a.mkv')).rejects.toBeInstanceOf(ProbeError);
  });

  it('should throw ProbeError when the JSON has the wrong shape', async () => {
    const fake = createFakeRunner(() => ({ stdout: JSON.stringify({ streams: [{ codec_type: 'video' }] }) }));
    await expect(new FFProbe('ffprobe', fake.run).probe('a.mkv')).rejects.toThrow('Unexpected ffprobe output shape');
  });

  it('should surface the error object ffprobe prints', async () => {
    const fake = createFakeRunner(() => ({
      exitCode: 1,
      stdout: JSON.stringify({ error: { code: -2, string: 'No such file or directory' } }),
    }));

    await expect(new FFProbe('ffprobe', fake.run).probe('missing.mkv'))
      .rejects.toThrow('Probe failed for missing.mkv: No such file or directory');
  });

  it('should throw ProbeError when ffprobe cannot be started', async () => {
    const fake = createFakeRunner(() => {
      throw new Error('spawn ffprobe ENOENT');
    });

    await expect(new FFProbe('ffprobe', fake.run).probe('a.mkv')).rejects.toBeInstanceOf(ProbeError);
    expect(await new FFProbe('ffprobe', fake.run).isAvailable()).toBe(false);
  });
});
