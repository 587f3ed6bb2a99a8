/**
 * Path Utilities
 */

import { randomBytes } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join, extname, basename, dirname } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Build a collision-free temp file path: <dir>/<prefix>-<12 hex>.<extension>
 */
export function createTempPath(
  prefix: string,
  extension: string,
  dir: string = tmpdir()
): string {
  const suffix = randomBytes(6).toString('hex');
  return join(dir, `${prefix}-${suffix}.${extension.replace(/^\./, '')}`);
}

/**
 * Where the MP4 for an input file goes when the caller gives no explicit path
 */
export function defaultOutputPath(inputFile: string, outputDir?: string): string {
  const dir = outputDir && outputDir.length > 0 ? outputDir : dirname(inputFile);
  return join(dir, `${getBasename(inputFile)}.mp4`);
}
