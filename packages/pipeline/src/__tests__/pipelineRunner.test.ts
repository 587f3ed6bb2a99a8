import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EncodeFailedError, InvalidSelectionError, ProbeError } from '@subburn/core';
import { PipelineRunner } from '../pipelineRunner.js';
import { ProgressChannel, type ProgressEvent } from '../progressChannel.js';
import type { TrackChooser } from '../types.js';
import { FakeEncoder, FakeExtractor, FakeProbe, FakeTransformer, SETTINGS, mediaFile, stream } from './fakes.js';

describe('PipelineRunner', () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'subburn-pipeline-'));
    input = join(dir, 'movie.mkv');
    output = join(dir, 'movie.mp4');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(overrides: {
    probe?: FakeProbe;
    encoder?: FakeEncoder;
  } = {}) {
    const probe = overrides.probe ?? new FakeProbe(path => mediaFile(path));
    const extractor = new FakeExtractor();
    const transformer = new FakeTransformer();
    const encoder = overrides.encoder ?? new FakeEncoder();
    const channel = new ProgressChannel();
    const runner = new PipelineRunner({
      settings: SETTINGS,
      channel,
      tempDir: dir,
      probe,
      extractor,
      transformer,
      encoder,
    });
    return { runner, extractor, transformer, encoder, channel };
  }

  it('should run every stage in order and clean up the subtitle file', async () => {
    const { runner, extractor, transformer, encoder, channel } = setup();
    const events: ProgressEvent[] = [];
    channel.onProgress(event => events.push(event));

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('success');
    expect(report.stage).toBe('DONE');
    expect(report.tier).toBe('subtitles');
    expect(report.extractionMethod).toBe('convert');
    expect(report.history.map(t => t.to)).toEqual(['EXTRACTING', 'STRIPPING', 'REFORMATTING', 'ENCODING', 'DONE']);

    const subtitlePath = extractor.calls[0]?.outputPath ?? '';
    expect(subtitlePath).toMatch(/subtitle-[0-9a-f]{12}\.srt$/);
    expect(transformer.calls).toEqual([`strip:${subtitlePath}`, `reformat:${subtitlePath}:Arial:24`]);
    expect(encoder.jobs[0]).toMatchObject({
      inputPath: input,
      subtitlePath,
      audioIndex: 0,
      outputPath: output,
      durationSeconds: 120,
      settings: { encoder: 'libx264', quality: '23', pixelFormat: 'yuv420p', audioCodec: 'aac' },
    });
    expect(existsSync(subtitlePath)).toBe(false);
    expect(existsSync(output)).toBe(true);

    const overall = events.map(e => e.overall);
    expect(overall[0]).toBe(0);
    expect(overall[overall.length - 1]).toBe(1);
    for (let i = 1; i < overall.length; i++) {
      expect(overall[i]).toBeGreaterThanOrEqual(overall[i - 1] ?? 0);
    }
  });

  it('should report encode progress as a share of the last fifth', async () => {
    const encoder = new FakeEncoder(async (job, options) => {
      options.onProgress?.(0.5);
      await writeFile(job.outputPath, 'mp4');
      return { status: 'success', tier: 'subtitles', attempts: [] };
    });
    const { runner, channel } = setup({ encoder });
    const events: ProgressEvent[] = [];
    channel.onProgress(event => events.push(event));

    await runner.run({ inputPath: input, outputPath: output });

    const encoding = events.find(e => e.stage === 'ENCODING' && e.stageFraction === 0.5);
    expect(encoding?.overall).toBeCloseTo(0.9);
  });

  it('should skip a file without subtitle streams', async () => {
    const probe = new FakeProbe(path => mediaFile(path), false);
    const { runner, extractor, encoder } = setup({ probe });

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('skipped');
    expect(report.history.map(t => `${t.from}->${t.to}`)).toEqual(['PROBING->SKIPPED']);
    expect(extractor.calls).toHaveLength(0);
    expect(encoder.jobs).toHaveLength(0);
  });

  it('should skip a file the prober cannot read', async () => {
    const probe = new FakeProbe(path => new ProbeError(path, 'Unexpected ffprobe output shape'));
    const { runner } = setup({ probe });

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('skipped');
    expect(report.reason).toBe(`Probe failed for ${input}: Unexpected ffprobe output shape`);
  });

  it('should clean up everything when cancelled during encoding', async () => {
    const controller = new AbortController();
    const encoder = new FakeEncoder(async job => {
      await writeFile(job.outputPath, 'partial');
      controller.abort();
      return { status: 'cancelled' };
    });
    const { runner, extractor } = setup({ encoder });

    const report = await runner.run({ inputPath: input, outputPath: output, signal: controller.signal });

    expect(report.outcome).toBe('cancelled');
    expect(report.stage).toBe('CANCELLED');
    expect(existsSync(output)).toBe(false);
    expect(existsSync(extractor.calls[0]?.outputPath ?? '')).toBe(false);
  });

  it('should stop between stages once cancellation is requested', async () => {
    const controller = new AbortController();
    controller.abort();
    const { runner, extractor } = setup();

    const report = await runner.run({ inputPath: input, outputPath: output, signal: controller.signal });

    expect(report.outcome).toBe('cancelled');
    expect(report.history.map(t => t.to)).toEqual(['CANCELLED']);
    expect(extractor.calls).toHaveLength(0);
  });

  it('should fail on a subtitle index that does not exist', async () => {
    const { runner, extractor } = setup();

    const report = await runner.run({ inputPath: input, outputPath: output, subtitleIndex: 3 });

    expect(report.outcome).toBe('failed');
    expect(report.error).toBeInstanceOf(InvalidSelectionError);
    expect(report.error?.message).toBe('No subtitle track 3: file has 1 subtitle track(s)');
    expect(extractor.calls).toHaveLength(0);
  });

  it('should fail and remove the partial output when extraction fails', async () => {
    const { runner, extractor, encoder } = setup();
    extractor.failFor.add(input);

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('failed');
    expect(report.error?.code).toBe('EXTRACT_ERROR');
    expect(report.history.map(t => t.to)).toEqual(['EXTRACTING', 'FAILED']);
    expect(encoder.jobs).toHaveLength(0);
  });

  it('should keep an existing output when extraction fails', async () => {
    await writeFile(output, 'earlier conversion');
    const { runner, extractor } = setup();
    extractor.failFor.add(input);

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('failed');
    expect(await readFile(output, 'utf8')).toBe('earlier conversion');
  });

  it('should keep an existing output when cancelled before encoding', async () => {
    await writeFile(output, 'earlier conversion');
    const controller = new AbortController();
    controller.abort();
    const { runner } = setup();

    const report = await runner.run({ inputPath: input, outputPath: output, signal: controller.signal });

    expect(report.outcome).toBe('cancelled');
    expect(await readFile(output, 'utf8')).toBe('earlier conversion');
  });

  it('should remove the output when encoding fails', async () => {
    const encoder = new FakeEncoder(async job => {
      await writeFile(job.outputPath, 'partial');
      return { status: 'failed', error: new EncodeFailedError(job.inputPath, []), attempts: [] };
    });
    const { runner } = setup({ encoder });

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('failed');
    expect(report.error?.code).toBe('ENCODE_FAILED');
    expect(existsSync(output)).toBe(false);
  });

  it('should report a degraded encode', async () => {
    const encoder = new FakeEncoder(async job => {
      await writeFile(job.outputPath, 'mp4');
      return { status: 'degraded', tier: 'no-subtitles', reason: 'subtitle filter failed', attempts: [] };
    });
    const { runner } = setup({ encoder });

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('degraded');
    expect(report.tier).toBe('no-subtitles');
    expect(report.reason).toBe('subtitle filter failed');
    expect(existsSync(output)).toBe(true);
  });

  it('should ask the chooser only when a kind has several tracks', async () => {
    const probe = new FakeProbe(path => mediaFile(path, [
      stream({ codecType: 'video', index: 0 }),
      stream({ codecType: 'audio', index: 0, codecName: 'aac' }),
      stream({ codecType: 'subtitle', index: 0, codecName: 'ass', language: 'eng' }),
      stream({ codecType: 'subtitle', index: 1, codecName: 'subrip', language: 'fre', isDefault: true }),
    ]));
    const { runner, extractor } = setup({ probe });
    const chooseTrack = vi.fn<TrackChooser>(async () => 0);

    await runner.run({ inputPath: input, outputPath: output, chooseTrack });

    expect(chooseTrack).toHaveBeenCalledTimes(1);
    expect(chooseTrack.mock.calls[0]?.[0]).toBe('subtitle');
    expect(chooseTrack.mock.calls[0]?.[1].map(t => t.description)).toEqual(['eng - ass', 'fre - subrip (default)']);
    expect(extractor.calls[0]?.subtitleIndex).toBe(0);
    expect(extractor.calls[0]?.options?.codecName).toBe('ass');
  });

  it('should prefer default-flagged tracks without a chooser', async () => {
    const probe = new FakeProbe(path => mediaFile(path, [
      stream({ codecType: 'video', index: 0 }),
      stream({ codecType: 'audio', index: 0 }),
      stream({ codecType: 'audio', index: 1, isDefault: true }),
      stream({ codecType: 'subtitle', index: 0 }),
    ]));
    const { runner, encoder } = setup({ probe });

    await runner.run({ inputPath: input, outputPath: output });

    expect(encoder.jobs[0]?.audioIndex).toBe(1);
  });

  it('should encode without audio when the file has none', async () => {
    const probe = new FakeProbe(path => mediaFile(path, [
      stream({ codecType: 'video', index: 0 }),
      stream({ codecType: 'subtitle', index: 0 }),
    ]));
    const { runner, encoder } = setup({ probe });

    const report = await runner.run({ inputPath: input, outputPath: output });

    expect(report.outcome).toBe('success');
    expect(encoder.jobs[0]?.audioIndex).toBeNull();
  });

  it('should delete the source only for .mkv inputs', async () => {
    await writeFile(input, 'mkv');
    const avi = join(dir, 'clip.avi');
    await writeFile(avi, 'avi');
    const { runner } = setup();

    const mkvReport = await runner.run({ inputPath: input, outputPath: output, deleteSource: true });
    const aviReport = await runner.run({ inputPath: avi, outputPath: join(dir, 'clip.mp4'), deleteSource: true });

    expect(mkvReport.sourceDeleted).toBe(true);
    expect(existsSync(input)).toBe(false);
    expect(aviReport.sourceDeleted).toBe(false);
    expect(existsSync(avi)).toBe(true);
  });

  it('should name the output after the input by default', async () => {
    const { runner } = setup();

    const report = await runner.run({ inputPath: input });

    expect(report.outputPath).toBe(join(dir, 'movie.mp4'));
  });
});
