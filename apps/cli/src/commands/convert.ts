/**
 * Convert Command
 *
 * Burns subtitles into every .mkv file named on the command line.
 */

import { basename } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { getBinaryPath, loadSettings, toConversionSettings } from '@subburn/core';
import { StreamProbe } from '@subburn/media';
import { FFmpeg } from '@subburn/processing';
import { BatchConverter, expandInputs, type ProgressEvent } from '@subburn/pipeline';
import { config } from '../config/index.js';
import { formatPercent, printError, printHeader, printReport, printWarning } from '../lib/output.js';
import { createTrackPrompt } from '../lib/prompt.js';

export interface ConvertOptions {
  delete?: boolean;
  outputDir?: string;
  subtitle?: number;
  audio?: number;
  jobs?: number;
  interactive?: boolean;
}

/**
 * Spinner text for the runs currently in flight
 */
export function renderProgress(events: ReadonlyMap<string, ProgressEvent>): string {
  return Array.from(events.values())
    .map(event => `${basename(event.inputPath)} ${chalk.gray(event.stage.toLowerCase())} ${formatPercent(event.overall)}`)
    .join('  ');
}

async function checkBinaries(): Promise<boolean> {
  const [hasFfmpeg, hasFfprobe] = await Promise.all([
    new FFmpeg().isAvailable(),
    new StreamProbe().isAvailable(),
  ]);

  if (!hasFfmpeg) {
    printError(`ffmpeg not found at "${getBinaryPath('ffmpeg')}". Install it or set FFMPEG_PATH.`);
  }
  if (!hasFfprobe) {
    printError(`ffprobe not found at "${getBinaryPath('ffprobe')}". Install it or set FFPROBE_PATH.`);
  }
  return hasFfmpeg && hasFfprobe;
}

export async function convertCommand(paths: string[], options: ConvertOptions): Promise<void> {
  if (!(await checkBinaries())) {
    process.exit(1);
  }

  const { files, errors } = await expandInputs(paths);
  for (const error of errors) {
    printError(error.message);
  }
  if (files.length === 0) {
    printError('No .mkv files to convert');
    process.exit(1);
  }

  const batch = new BatchConverter({
    getSettings: async () => toConversionSettings(await loadSettings(config.settingsFile)),
    tempDir: config.tempDir,
  });

  const spinner = ora(`Converting ${files.length} file(s)...`).start();
  const inFlight = new Map<string, ProgressEvent>();
  const channel = batch.getChannel();

  const unsubscribeProgress = channel.onProgress(event => {
    if (event.stage === 'DONE') return;
    inFlight.set(event.runId, event);
    spinner.text = renderProgress(inFlight);
  });
  const unsubscribeStage = channel.onStage(event => {
    if (event.to === 'DONE' || event.to === 'FAILED' || event.to === 'SKIPPED' || event.to === 'CANCELLED') {
      inFlight.delete(event.runId);
    }
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      // Second Ctrl-C: give up on cleanup
      process.exit(130);
    }
    spinner.text = 'Cancelling, cleaning up temporary files...';
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);

  const interactive = options.interactive !== false && process.stdin.isTTY === true;
  const chooseTrack = interactive
    ? createTrackPrompt({
      onPromptStart: () => spinner.stop(),
      onPromptEnd: () => {
        spinner.start();
      },
      onInterrupt,
      signal: controller.signal,
    })
    : undefined;

  try {
    const { reports, summary } = await batch.convert(files, {
      concurrency: options.jobs,
      signal: controller.signal,
      outputDir: options.outputDir,
      subtitleIndex: options.subtitle,
      audioIndex: options.audio,
      deleteSource: options.delete,
      chooseTrack,
    });

    spinner.stop();
    printHeader('Results');
    for (const report of reports) {
      printReport(report);
    }

    console.log();
    console.log(
      `${chalk.green(`${summary.success} converted`)}, ` +
      `${chalk.yellow(`${summary.degraded} without subtitles`)}, ` +
      `${chalk.gray(`${summary.skipped} skipped`)}, ` +
      `${chalk.red(`${summary.failed} failed`)}` +
      (summary.cancelled > 0 ? `, ${chalk.gray(`${summary.cancelled} cancelled`)}` : '')
    );

    if (controller.signal.aborted) {
      printWarning('Conversion cancelled');
    }
    if (summary.failed > 0 || errors.length > 0) {
      process.exitCode = 1;
    } else if (controller.signal.aborted) {
      process.exitCode = 130;
    }
  } finally {
    spinner.stop();
    unsubscribeProgress();
    unsubscribeStage();
    process.off('SIGINT', onInterrupt);
  }
}
