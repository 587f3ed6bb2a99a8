/**
 * Config Command
 *
 * View and manage conversion settings.
 */

import chalk from 'chalk';
import {
  DEFAULT_SETTINGS,
  SETTINGS_SECTIONS,
  getSettingValue,
  loadSettings,
  resetSettings,
  updateSetting,
  type SettingsFile,
} from '@subburn/core';
import { config } from '../config/index.js';
import { parseSettingAssignment, parseSettingKey } from '../lib/args.js';
import { printError, printHeader, printSuccess } from '../lib/output.js';

export interface ConfigOptions {
  list?: boolean;
  get?: string;
  set?: string;
  reset?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    if (options.reset) {
      await resetSettings(config.settingsFile);
      printSuccess('Settings reset to defaults');
      return;
    }

    if (options.set !== undefined) {
      const { section, key, value } = parseSettingAssignment(options.set);
      await updateSetting(section, key, value, config.settingsFile);
      printSuccess(`Set ${section}.${key} = ${value}`);
      return;
    }

    const settings = await loadSettings(config.settingsFile);

    if (options.get !== undefined) {
      const { section, key } = parseSettingKey(options.get);
      const value = getSettingValue(settings, section, key);
      if (value === undefined) {
        printError(`Unknown setting ${section}.${key}`);
        process.exit(1);
      }
      console.log(value);
      return;
    }

    listSettings(settings);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}

export function formatSettings(settings: SettingsFile): string[] {
  const lines: string[] = [];
  for (const section of SETTINGS_SECTIONS) {
    lines.push(`[${section}]`);
    for (const [key, value] of Object.entries(settings[section])) {
      const fallback = getSettingValue(DEFAULT_SETTINGS, section, key);
      const suffix = value === fallback ? '' : ` (default: ${fallback ?? ''})`;
      lines.push(`${key} = ${value}${suffix}`);
    }
  }
  return lines;
}

function listSettings(settings: SettingsFile): void {
  printHeader(`Settings (${config.settingsFile})`);
  for (const line of formatSettings(settings)) {
    console.log(line.startsWith('[') ? chalk.cyan(line) : `  ${line}`);
  }
  console.log();
  console.log(chalk.gray('Use "subburn config --set SECTION.KEY=value" to change a value'));
}
