/**
 * Option parsers shared by the commands
 */

import { InvalidArgumentError } from 'commander';

export function parseTrackIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Track index must be a non-negative integer.');
  }
  return Number(value);
}

export function parseConcurrency(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new InvalidArgumentError('Jobs must be a positive integer.');
  }
  return jobs;
}

export interface SettingKey {
  section: string;
  key: string;
}

export interface SettingAssignment extends SettingKey {
  value: string;
}

/**
 * "font.size" -> { section: 'FONT', key: 'SIZE' }
 */
export function parseSettingKey(value: string): SettingKey {
  const match = /^\s*([A-Za-z_]+)\.([A-Za-z_]+)\s*$/.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new InvalidArgumentError('Expected SECTION.KEY, e.g. FONT.SIZE');
  }
  return { section: match[1].toUpperCase(), key: match[2].toUpperCase() };
}

/**
 * "FFMPEG.CRF=20" -> { section: 'FFMPEG', key: 'CRF', value: '20' }
 */
export function parseSettingAssignment(value: string): SettingAssignment {
  const separator = value.indexOf('=');
  if (separator === -1) {
    throw new InvalidArgumentError('Expected SECTION.KEY=value, e.g. FONT.NAME=Verdana');
  }
  return {
    ...parseSettingKey(value.slice(0, separator)),
    value: value.slice(separator + 1).trim(),
  };
}
