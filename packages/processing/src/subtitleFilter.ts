/**
 * subtitles= filter arguments.
 *
 * Inside a filter graph ':' separates options and '\' escapes, so paths need
 * rewriting before they can be handed to the filter.
 */

import { resolve } from 'node:path';

/**
 * Absolute path with forward slashes, colons escaped, and single quotes
 * closed-escaped-reopened so the whole value can sit in '...'
 */
export function escapeFilterPath(filePath: string): string {
  return resolve(filePath)
    .replace(/\\/g, '/')
    .replace(/:/g, '\\:')
    .replace(/'/g, `'\\''`);
}

/**
 * Primary form: quoted, escaped absolute path
 */
export function subtitlesFilter(filePath: string): string {
  return `subtitles='${escapeFilterPath(filePath)}'`;
}

/**
 * Alternate form: the path exactly as given
 */
export function subtitlesFilterRaw(filePath: string): string {
  return `subtitles=${filePath}`;
}
