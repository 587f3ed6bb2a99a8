/**
 * Conversion Settings
 *
 * Sectioned key/value settings persisted as JSON. Section names and keys are
 * case-insensitive; they are stored upper-cased. Missing or invalid entries
 * fall back to defaults.
 *
 * Runs never read this file directly: they receive a frozen
 * ConversionSettings snapshot taken when the run starts.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger, isObject, safeReadFile, safeWriteFile } from '@subburn/utils';
import { ConfigError } from '../errors/index.js';

const log = createLogger({ component: 'settings' });

const numericString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, 'must be a number');

const settingsSchema = z.object({
  FFMPEG: z.object({
    ENCODER: z.string().trim().min(1).default('libx264'),
    CRF: numericString.default('23'),
    PIXEL_FORMAT: z.string().trim().min(1).default('yuv420p'),
  }).default({}),
  FONT: z.object({
    NAME: z.string().trim().min(1).default('Arial'),
    SIZE: numericString.default('24'),
  }).default({}),
  GENERAL: z.object({
    DELETE_AFTER: z.enum(['true', 'false']).default('false'),
    OUTPUT_DIR: z.string().trim().default(''),
  }).default({}),
});

export type SettingsFile = z.infer<typeof settingsSchema>;
export type SettingsSection = keyof SettingsFile;

export const SETTINGS_SECTIONS = ['FFMPEG', 'FONT', 'GENERAL'] as const satisfies ReadonlyArray<SettingsSection>;

export const DEFAULT_SETTINGS: SettingsFile = settingsSchema.parse({});

/**
 * Audio is always re-encoded to this codec
 */
export const AUDIO_CODEC = 'aac';

export interface SubtitleFontSettings {
  readonly name: string;
  readonly size: number;
}

/**
 * Immutable per-run view of the settings
 */
export interface ConversionSettings {
  readonly encoder: string;
  readonly quality: string;
  readonly pixelFormat: string;
  readonly audioCodec: string;
  readonly font: SubtitleFontSettings;
  readonly deleteSource: boolean;
  readonly outputDir: string | null;
}

/**
 * Settings file location: SUBBURN_CONFIG_FILE or ~/.subburn/config.json
 */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['SUBBURN_CONFIG_FILE'] ?? join(homedir(), '.subburn', 'config.json');
}

/**
 * Upper-case section names and keys, stringify scalar values, drop the rest
 */
function normalizeKeys(raw: unknown): Record<string, Record<string, string>> {
  const result: Record<string, Record<string, string>> = {};
  if (!isObject(raw)) return result;

  for (const [section, entries] of Object.entries(raw)) {
    if (!isObject(entries)) continue;
    const target: Record<string, string> = result[section.toUpperCase()] ?? {};
    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        target[key.toUpperCase()] = String(value);
      }
    }
    result[section.toUpperCase()] = target;
  }

  return result;
}

export interface NormalizeResult {
  settings: SettingsFile;
  warnings: string[];
}

/**
 * Validate raw settings, replacing each invalid entry with its default
 */
export function normalizeSettings(raw: unknown): NormalizeResult {
  const normalized = normalizeKeys(raw);
  const warnings: string[] = [];

  let parsed = settingsSchema.safeParse(normalized);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const [section, key] = issue.path;
      if (typeof section !== 'string') continue;
      warnings.push(`${[section, key].filter(p => p !== undefined).join('.')}: ${issue.message}`);
      if (typeof key === 'string') {
        delete normalized[section]?.[key];
      } else {
        delete normalized[section];
      }
    }
    parsed = settingsSchema.safeParse(normalized);
  }

  if (!parsed.success) {
    warnings.push('Settings could not be repaired, using defaults');
    return { settings: DEFAULT_SETTINGS, warnings };
  }

  return { settings: parsed.data, warnings };
}

/**
 * Load settings from disk. A missing file yields the defaults; an unreadable
 * one is logged and yields the defaults as well.
 */
export async function loadSettings(filePath: string = getSettingsPath()): Promise<SettingsFile> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    return DEFAULT_SETTINGS;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ filePath, error: message }, 'Settings file is not valid JSON, using defaults');
    return DEFAULT_SETTINGS;
  }

  const { settings, warnings } = normalizeSettings(raw);
  for (const warning of warnings) {
    log.warn({ filePath }, `Ignoring invalid setting ${warning}`);
  }
  return settings;
}

export async function saveSettings(
  settings: SettingsFile,
  filePath: string = getSettingsPath()
): Promise<void> {
  await safeWriteFile(filePath, JSON.stringify(settings, null, 2) + '\n');
}

/**
 * Case-insensitive lookup of a single value
 */
export function getSettingValue(
  settings: SettingsFile,
  section: string,
  key: string
): string | undefined {
  const entries: Record<string, string> | undefined = normalizeKeys(settings)[section.toUpperCase()];
  return entries?.[key.toUpperCase()];
}

/**
 * Change one value and persist the file
 */
export async function updateSetting(
  section: string,
  key: string,
  value: string,
  filePath: string = getSettingsPath()
): Promise<SettingsFile> {
  const current = await loadSettings(filePath);
  const sectionName = section.toUpperCase();
  const keyName = key.toUpperCase();

  const entries = normalizeKeys(current)[sectionName];
  if (!entries || !(keyName in entries)) {
    throw new ConfigError(`Unknown setting ${sectionName}.${keyName}`, { section: sectionName, key: keyName });
  }

  const candidate = normalizeKeys(current);
  candidate[sectionName] = { ...entries, [keyName]: value };

  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => issue.message).join(', ');
    throw new ConfigError(`Invalid value for ${sectionName}.${keyName}: ${message}`, {
      section: sectionName,
      key: keyName,
      value,
    });
  }

  await saveSettings(parsed.data, filePath);
  return parsed.data;
}

export async function resetSettings(filePath: string = getSettingsPath()): Promise<SettingsFile> {
  await saveSettings(DEFAULT_SETTINGS, filePath);
  return DEFAULT_SETTINGS;
}

/**
 * Freeze a snapshot for one run
 */
export function toConversionSettings(settings: SettingsFile): ConversionSettings {
  return Object.freeze({
    encoder: settings.FFMPEG.ENCODER,
    quality: settings.FFMPEG.CRF,
    pixelFormat: settings.FFMPEG.PIXEL_FORMAT,
    audioCodec: AUDIO_CODEC,
    font: Object.freeze({
      name: settings.FONT.NAME,
      size: Number(settings.FONT.SIZE),
    }),
    deleteSource: settings.GENERAL.DELETE_AFTER === 'true',
    outputDir: settings.GENERAL.OUTPUT_DIR.length > 0 ? settings.GENERAL.OUTPUT_DIR : null,
  });
}
