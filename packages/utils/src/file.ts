/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import { mkdir, writeFile, stat, rm, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';

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
  content: string | Uint8Array
): Promise<void> {
  await ensureDir(dirname(filePath));
  if (typeof content === 'string') {
    await writeFile(filePath, content, 'utf8');
  } else {
    await writeFile(filePath, content);
  }
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Check whether a readable file exists at the path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether a file exists and holds at least one byte
 */
export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

/**
 * Remove a file or directory tree. Missing paths are not an error.
 */
export async function removePath(targetPath: string): Promise<void> {
  await rm(targetPath, { recursive: true, force: true });
}
