/**
 * Path Utilities
 */

import { join, extname, basename, dirname } from 'node:path';

/**
 * Get the working directory for a job's files
 */
export function getJobDir(storageRoot: string, jobId: string): string {
  return join(storageRoot, jobId);
}

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
function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Full path without its extension: /a/b/clip.mp4 -> /a/b/clip
 */
export function stripExtension(filePath: string): string {
  return join(dirname(filePath), getBasename(filePath));
}
