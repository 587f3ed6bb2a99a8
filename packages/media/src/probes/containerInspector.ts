/**
 * Container Inspector
 *
 * Text scan of `ffmpeg -i` output. Cheaper than a full probe and tolerant of
 * files ffprobe chokes on, at the cost of less reliable metadata.
 */

import { executeCommand, type CommandRunner } from '@subburn/utils';
import { getBinaryPath } from '@subburn/core';
import type { StreamKind, TrackDescription } from '../types.js';

// Stream #0:2(eng): Subtitle: subrip (default)
// Stream #0:1[0x1100](jpn): Audio: aac (LC), 48000 Hz, stereo
const STREAM_LINE = /^\s*Stream #\d+:\d+(?:\[[^\]]*\])?(?:\(([^)]*)\))?[^:]*:\s*(Video|Audio|Subtitle):\s*(.*)$/;

const KIND_BY_LABEL: Record<string, StreamKind> = {
  Video: 'video',
  Audio: 'audio',
  Subtitle: 'subtitle',
};

export type InspectionResult =
  | { status: 'ok'; tracks: TrackDescription[] }
  | { status: 'unavailable'; reason: string };

/**
 * Parse the stream listing of `ffmpeg -i` stderr
 */
export function parseStreamListing(output: string): TrackDescription[] {
  const counters: Record<StreamKind, number> = { video: 0, audio: 0, subtitle: 0 };
  const tracks: TrackDescription[] = [];

  for (const line of output.split(/\r?\n/)) {
    const match = STREAM_LINE.exec(line);
    if (!match) continue;

    const [, lang, label = '', rest = ''] = match;
    const kind = KIND_BY_LABEL[label];
    if (!kind) continue;

    const details = rest.trim();
    tracks.push({
      kind,
      index: counters[kind]++,
      language: lang && lang.length > 0 ? lang : 'unknown',
      codecName: details.split(/[\s,]/, 1)[0] ?? 'unknown',
      isDefault: /\(default\)/.test(details),
      description: details,
    });
  }

  return tracks;
}

export class ContainerInspector {
  private ffmpegPath: string;
  private runner: CommandRunner;

  constructor(ffmpegPath: string = getBinaryPath('ffmpeg'), runner: CommandRunner = executeCommand) {
    this.ffmpegPath = ffmpegPath;
    this.runner = runner;
  }

  /**
   * List the tracks of a container. ffmpeg exits 1 when no output file is
   * given; that is the expected outcome here. The scan counts as failed when
   * ffmpeg cannot start or never printed an input header.
   */
  async inspect(filePath: string): Promise<InspectionResult> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-hide_banner', '-i', filePath], {
        timeout: 30000,
      });

      if (!result.stderr.includes('Input #')) {
        return { status: 'unavailable', reason: `ffmpeg could not open input (exit ${result.exitCode})` };
      }

      return { status: 'ok', tracks: parseStreamListing(result.stderr) };
    } catch (error) {
      return {
        status: 'unavailable',
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
