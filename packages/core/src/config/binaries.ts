/**
 * Binary Configuration
 *
 * Locations of the external tools the pipeline drives.
 *
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Project binary folder (binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - project root, two levels above packages/core/src/config
const BINARY_ROOT = resolve(__dirname, '../../../../binaries');

function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it; a missing tool surfaces at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Resolve every binary from the given environment
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}

let _binaries: BinariesConfig | null = null;

/**
 * Binary configurations for the current process (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

export function getBinaryPath(name: keyof BinariesConfig): string {
  return binaries()[name].resolvedPath;
}
