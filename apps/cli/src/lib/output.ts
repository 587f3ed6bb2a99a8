/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { formatDuration } from '@subburn/utils';
import type { PipelineReport, RunOutcome } from '@subburn/pipeline';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function formatPercent(fraction: number): string {
  return `${Math.floor(Math.max(0, Math.min(1, fraction)) * 100)}%`;
}

const outcomeColors: Record<RunOutcome, (text: string) => string> = {
  success: chalk.green,
  degraded: chalk.yellow,
  skipped: chalk.gray,
  failed: chalk.red,
  cancelled: chalk.gray,
};

/**
 * One plain-text line per finished file
 */
export function describeReport(report: PipelineReport): string {
  switch (report.outcome) {
    case 'success':
      return `${report.inputPath} -> ${report.outputPath}`;
    case 'degraded':
      return `${report.inputPath} -> ${report.outputPath} (without subtitles: ${report.reason ?? 'unknown reason'})`;
    case 'skipped':
      return `${report.inputPath}: skipped (${report.reason ?? 'no reason given'})`;
    case 'cancelled':
      return `${report.inputPath}: cancelled`;
    case 'failed':
      return `${report.inputPath}: ${report.error?.message ?? 'failed'}`;
  }
}

export function printReport(report: PipelineReport): void {
  const color = outcomeColors[report.outcome];
  console.log(`${color(report.outcome.padEnd(9))} ${describeReport(report)} ${chalk.gray(formatDuration(report.durationMs))}`);
}
