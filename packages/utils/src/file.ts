/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  readdir,
  stat,
  rm,
} from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Delete a file if present. Resolves true when something was removed.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
  await rm(filePath, { force: true });
  return true;
}

/**
 * True when the file exists and is not empty
 */
export async function hasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * List the files of a directory (non-recursive) whose extension matches,
 * ignoring case. Extensions are given with their dot, e.g. '.mkv'.
 */
export async function findFilesByExtension(
  dirPath: string,
  extensions: string[]
): Promise<string[]> {
  const wanted = new Set(extensions.map(ext => ext.toLowerCase()));
  const entries = await readdir(dirPath, { withFileTypes: true });

  return entries
    .filter(entry => entry.isFile() && wanted.has(extname(entry.name).toLowerCase()))
    .map(entry => join(dirPath, entry.name))
    .sort((a, b) => a.localeCompare(b));
}
