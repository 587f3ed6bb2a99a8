#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for subburn. Commands call the pipeline packages
 * directly; there is no server.
 */

// Environment first: the shared logger reads LOG_LEVEL when it loads
import './config/index.js';

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { convertCommand } from './commands/convert.js';
import { probeCommand } from './commands/probe.js';
import { configCommand } from './commands/config.js';
import { parseConcurrency, parseTrackIndex } from './lib/args.js';

const program = new Command();

program
  .name('subburn')
  .description('Convert MKV files to MP4 with burned-in, restyled subtitles')
  .version('1.0.0');

// ============================================
// CONVERSION COMMANDS
// ============================================

program
  .command('convert <paths...>')
  .description('Convert .mkv files (or every .mkv file in a directory)')
  .option('-r, --delete', 'Delete each source file after a successful conversion')
  .option('-o, --output-dir <dir>', 'Write outputs here instead of beside the inputs')
  .option('-s, --subtitle <n>', 'Subtitle track to burn in (per-kind index)', parseTrackIndex)
  .option('-a, --audio <n>', 'Audio track to keep (per-kind index)', parseTrackIndex)
  .option('-j, --jobs <n>', 'Files to convert at the same time', parseConcurrency, 1)
  .option('--no-interactive', 'Never prompt; use the default-flagged or first track')
  .action(convertCommand);

program
  .command('probe <path>')
  .description('Show the duration and tracks of a media file')
  .action(probeCommand);

// ============================================
// SETTINGS COMMANDS
// ============================================

program
  .command('config')
  .description('View or modify conversion settings')
  .option('--list', 'List all settings (default)')
  .option('--get <SECTION.KEY>', 'Print one setting')
  .option('--set <SECTION.KEY=value>', 'Change one setting')
  .option('--reset', 'Restore the default settings')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.exitCode === 0) {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('subburn --help'), 'for available commands');
  }
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
