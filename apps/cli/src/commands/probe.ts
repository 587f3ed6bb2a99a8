/**
 * Probe Command
 *
 * Shows the duration and tracks of a media file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { StreamProbe, streamsOfKind, describeStream, type StreamKind } from '@subburn/media';
import { formatTimecode } from '@subburn/utils';
import { printError, printHeader, printKeyValue } from '../lib/output.js';

const sections: Array<{ kind: StreamKind; title: string }> = [
  { kind: 'video', title: 'Video Tracks' },
  { kind: 'audio', title: 'Audio Tracks' },
  { kind: 'subtitle', title: 'Subtitle Tracks' },
];

export async function probeCommand(path: string): Promise<void> {
  const spinner = ora('Probing media file...').start();

  try {
    const file = await new StreamProbe().probe(path);
    spinner.stop();

    printHeader('Media Info');
    printKeyValue('File', path);
    printKeyValue('Duration', file.duration > 0 ? formatTimecode(file.duration * 1000) : 'unknown');
    console.log();

    for (const { kind, title } of sections) {
      const streams = streamsOfKind(file, kind);
      console.log(chalk.bold(`${title} (${streams.length}):`));
      for (const stream of streams) {
        console.log(`  ${chalk.cyan(`#${stream.index}`)} ${describeStream(stream)}`);
      }
      console.log();
    }
  } catch (error) {
    spinner.fail('Probe failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
