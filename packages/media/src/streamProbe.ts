/**
 * Stream Probe
 *
 * Answers the two questions the pipeline asks about an input: does it carry
 * any subtitle stream, and what exactly is inside it.
 */

import { ProbeError } from '@subburn/core';
import { createLogger, type Logger } from '@subburn/utils';
import { FFProbe } from './probes/ffprobe.js';
import { ContainerInspector } from './probes/containerInspector.js';
import type { MediaFile, MediaStream, StreamKind, TrackDescription } from './types.js';

export interface StreamProbeOptions {
  ffprobe?: FFProbe;
  inspector?: ContainerInspector;
  logger?: Logger;
}

/**
 * Human-readable label for a probed stream
 */
export function describeStream(stream: MediaStream): string {
  const parts = [stream.language, stream.codecName];
  if (stream.title) parts.push(stream.title);
  const label = parts.join(' - ');
  return stream.isDefault ? `${label} (default)` : label;
}

export class StreamProbe {
  private ffprobe: FFProbe;
  private inspector: ContainerInspector;
  private log: Logger;

  constructor(options: StreamProbeOptions = {}) {
    this.ffprobe = options.ffprobe ?? new FFProbe();
    this.inspector = options.inspector ?? new ContainerInspector();
    this.log = options.logger ?? createLogger({ component: 'stream-probe' });
  }

  /**
   * Full structured probe. Throws ProbeError.
   */
  async probe(filePath: string): Promise<MediaFile> {
    const file = await this.ffprobe.probe(filePath);
    this.log.debug(
      { filePath, duration: file.duration, streams: file.streams.length },
      'Probed media file'
    );
    return file;
  }

  /**
   * Cheap subtitle check. Never throws: when neither the container scan nor
   * the structured probe can read the file, the answer is false.
   */
  async hasSubtitleStream(filePath: string): Promise<boolean> {
    const inspection = await this.inspector.inspect(filePath);
    if (inspection.status === 'ok') {
      const found = inspection.tracks.some(track => track.kind === 'subtitle');
      this.log.debug({ filePath, found }, 'Container scan finished');
      return found;
    }

    this.log.debug({ filePath, reason: inspection.reason }, 'Container scan failed, trying structured probe');

    try {
      const file = await this.ffprobe.probe(filePath);
      return file.streams.some(stream => stream.codecType === 'subtitle');
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;
      this.log.warn({ filePath, error: error.message }, 'Could not inspect file for subtitles');
      return false;
    }
  }

  /**
   * Track list for a picker. Falls back to the container scan when the
   * structured probe fails; rethrows the probe error if that fails as well.
   */
  async describeTracks(filePath: string, kind: StreamKind): Promise<TrackDescription[]> {
    try {
      const file = await this.ffprobe.probe(filePath);
      return file.streams
        .filter(stream => stream.codecType === kind)
        .map(stream => ({
          kind,
          index: stream.index,
          language: stream.language,
          codecName: stream.codecName,
          isDefault: stream.isDefault,
          description: describeStream(stream),
        }));
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;

      const inspection = await this.inspector.inspect(filePath);
      if (inspection.status === 'unavailable') throw error;

      this.log.warn({ filePath, error: error.message }, 'Structured probe failed, using container scan');
      return inspection.tracks.filter(track => track.kind === kind);
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.ffprobe.isAvailable();
  }
}
