/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  stat,
  rename,
  unlink,
  appendFile,
} from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, join } from 'node:path';

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
 * Write a file through a sibling temp file and a rename, so readers only
 * ever see the old or the new content.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  const dir = dirname(filePath);
  await ensureDir(dir);
  const tmpPath = join(dir, `.${basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);
  await writeFile(tmpPath, content, 'utf8');
  try {
    await rename(tmpPath, filePath);
  } catch (error) {
    await removeIfExists(tmpPath);
    throw error;
  }
}

/**
 * Append text to a file, creating it and its directory if needed
 */
export async function appendText(filePath: string, content: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await appendFile(filePath, content, 'utf8');
}

/**
 * Size in bytes, or null if the file does not exist
 */
export async function getFileSizeBytes(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.size;
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await getFileSizeBytes(filePath)) !== null;
}

/**
 * Delete a file; returns false if it was already gone
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}
