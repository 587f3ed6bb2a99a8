/**
 * Interactive track selection
 */

import { createInterface } from 'node:readline/promises';
import { basename } from 'node:path';
import chalk from 'chalk';
import { CancelledError } from '@subburn/core';
import type { TrackDescription } from '@subburn/media';
import type { SelectableKind, TrackChooser } from '@subburn/pipeline';

/**
 * Index for an answer to the track prompt; an empty answer takes the
 * fallback. Null when the answer is not one of the listed tracks.
 */
export function parseTrackAnswer(answer: string, count: number, fallback: number): number | null {
  const trimmed = answer.trim();
  if (trimmed === '') return fallback;
  if (!/^\d+$/.test(trimmed)) return null;
  const index = Number(trimmed);
  return index < count ? index : null;
}

export function defaultTrack(tracks: ReadonlyArray<TrackDescription>): number {
  const preferred = tracks.findIndex(track => track.isDefault);
  return preferred === -1 ? 0 : preferred;
}

export interface TrackPromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Called around each question, e.g. to pause a spinner */
  onPromptStart?: () => void;
  onPromptEnd?: () => void;
  /**
   * Ctrl-C while a question is open. The terminal is in raw mode then, so
   * the process never sees SIGINT itself.
   */
  onInterrupt?: () => void;
  /** Once aborted, pending and later questions reject with CancelledError */
  signal?: AbortSignal;
  /** Force terminal handling; detected from the output stream by default */
  terminal?: boolean;
}

/**
 * Chooser that asks on the terminal. Questions from concurrent runs are
 * asked one at a time.
 */
export function createTrackPrompt(options: TrackPromptOptions = {}): TrackChooser {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  let queue: Promise<unknown> = Promise.resolve();

  const ask = async (kind: SelectableKind, tracks: TrackDescription[], inputPath: string): Promise<number> => {
    if (options.signal?.aborted) {
      throw new CancelledError('PROBING');
    }

    const fallback = defaultTrack(tracks);
    const rl = createInterface({ input, output, terminal: options.terminal });
    const interrupted = new AbortController();
    const onAbort = (): void => interrupted.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    rl.on('SIGINT', () => {
      options.onInterrupt?.();
      interrupted.abort();
    });
    options.onPromptStart?.();

    try {
      output.write(`\n${chalk.bold(`Select ${kind} track for ${basename(inputPath)}:`)}\n`);
      tracks.forEach((track, i) => {
        output.write(`  ${chalk.cyan(`[${i}]`)} ${track.description}\n`);
      });

      for (;;) {
        let answer: string;
        try {
          answer = await rl.question(`${kind} track [${fallback}]: `, { signal: interrupted.signal });
        } catch (error) {
          if (interrupted.signal.aborted) throw new CancelledError('PROBING');
          throw error;
        }
        const index = parseTrackAnswer(answer, tracks.length, fallback);
        if (index !== null) return index;
        output.write(chalk.yellow(`Enter a number from 0 to ${tracks.length - 1}\n`));
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      rl.close();
      options.onPromptEnd?.();
    }
  };

  return (kind, tracks, inputPath) => {
    const next = queue.then(() => ask(kind, tracks, inputPath));
    queue = next.catch(() => undefined);
    return next;
  };
}
