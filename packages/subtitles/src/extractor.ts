/**
 * Subtitle Extractor
 *
 * Pulls one subtitle stream out of a container as an SRT file. Tries an
 * explicit SRT conversion first, then a plain stream copy. Image-based
 * codecs are refused up front since no text can come out of them.
 */

import {
  CancelledError,
  ExtractError,
  UnsupportedSubtitleFormatError,
  getBinaryPath,
  runFallbackLadder,
  type Strategy,
  type StrategyOutcome,
} from '@subburn/core';
import {
  createLogger,
  executeCommand,
  extractErrorText,
  formatCommand,
  hasContent,
  removeIfExists,
  type CommandRunner,
  type Logger,
} from '@subburn/utils';
import type { ExtractionMethod, ExtractResult } from './types.js';

export const BITMAP_SUBTITLE_CODECS: ReadonlySet<string> = new Set([
  'hdmv_pgs_subtitle',
  'pgssub',
  'dvd_subtitle',
  'dvdsub',
  'dvb_subtitle',
  'xsub',
]);

export function isBitmapSubtitleCodec(codecName: string): boolean {
  return BITMAP_SUBTITLE_CODECS.has(codecName.toLowerCase());
}

export interface SubtitleExtractorConfig {
  ffmpegPath?: string;
  runner?: CommandRunner;
  timeout?: number;
  logger?: Logger;
}

export interface ExtractOptions {
  /** Probed codec of the selected stream */
  codecName?: string;
  signal?: AbortSignal;
}

export function buildExtractArgs(
  inputPath: string,
  subtitleIndex: number,
  outputPath: string,
  method: ExtractionMethod
): string[] {
  const args = [
    '-y',
    '-hide_banner',
    '-loglevel', 'error',
    '-i', inputPath,
    '-map', `0:s:${subtitleIndex}`,
  ];
  if (method === 'convert') {
    args.push('-c:s', 'srt');
  }
  args.push(outputPath);
  return args;
}

export class SubtitleExtractor {
  private config: Required<Omit<SubtitleExtractorConfig, 'logger'>>;
  private log: Logger;

  constructor(config: SubtitleExtractorConfig = {}) {
    this.config = {
      ffmpegPath: config.ffmpegPath ?? getBinaryPath('ffmpeg'),
      runner: config.runner ?? executeCommand,
      timeout: config.timeout ?? 600000, // 10 minutes
    };
    this.log = config.logger ?? createLogger({ component: 'subtitle-extractor' });
  }

  /**
   * Extract subtitle stream `subtitleIndex` (0-based among subtitle streams)
   * to `outputPath`.
   *
   * @throws UnsupportedSubtitleFormatError for bitmap codecs
   * @throws ExtractError when every method fails
   * @throws CancelledError when the signal aborts
   */
  async extract(
    inputPath: string,
    subtitleIndex: number,
    outputPath: string,
    options: ExtractOptions = {}
  ): Promise<ExtractResult> {
    if (options.codecName && isBitmapSubtitleCodec(options.codecName)) {
      this.log.warn(
        { inputPath, subtitleIndex, codec: options.codecName },
        'Bitmap subtitle track selected, pick a text-based track instead'
      );
      throw new UnsupportedSubtitleFormatError(inputPath, subtitleIndex, options.codecName);
    }

    const methods: ExtractionMethod[] = ['convert', 'passthrough'];
    const strategies: Strategy<ExtractionMethod>[] = methods.map(method => ({
      name: method,
      run: () => this.runMethod(inputPath, subtitleIndex, outputPath, method, options.signal),
    }));

    const result = await runFallbackLadder(strategies, {
      signal: options.signal,
      onFailure: (attempt, next) => {
        this.log.warn(
          { inputPath, subtitleIndex, method: attempt.strategy, error: attempt.error, next },
          'Subtitle extraction method failed'
        );
      },
    });

    if (result.status === 'failure') {
      await removeIfExists(outputPath);
      throw new ExtractError(inputPath, subtitleIndex, 'all extraction methods failed', {
        attempts: result.attempts,
      });
    }

    this.log.info({ inputPath, subtitleIndex, method: result.value, outputPath }, 'Subtitles extracted');
    return { path: outputPath, method: result.value };
  }

  private async runMethod(
    inputPath: string,
    subtitleIndex: number,
    outputPath: string,
    method: ExtractionMethod,
    signal: AbortSignal | undefined
  ): Promise<StrategyOutcome<ExtractionMethod>> {
    await removeIfExists(outputPath);

    const args = buildExtractArgs(inputPath, subtitleIndex, outputPath, method);
    this.log.debug({ command: formatCommand(this.config.ffmpegPath, args) }, 'FFmpeg command');

    const result = await this.config.runner(this.config.ffmpegPath, args, {
      timeout: this.config.timeout,
      signal,
    });

    if (result.aborted) {
      await removeIfExists(outputPath);
      throw new CancelledError('EXTRACTING');
    }
    if (result.timedOut) {
      return { status: 'failure', error: `timed out after ${this.config.timeout}ms` };
    }
    if (result.exitCode !== 0) {
      return { status: 'failure', error: extractErrorText(result.stderr) || `exit code ${result.exitCode}` };
    }
    if (!(await hasContent(outputPath))) {
      return { status: 'failure', error: 'output file is missing or empty' };
    }

    return { status: 'success', value: method };
  }
}
