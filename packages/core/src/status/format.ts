/**
 * Status Text
 *
 * Plain-text renderings of job progress for the status message and the
 * "Progress" alert.
 */

import { basename } from 'node:path';
import type { ProgressSnapshot } from '@reelport/acquisition';
import { formatClock } from '@reelport/utils';

export const STATUS_TEXT = {
  resolving: '[SCAN] Analyzing URL...',
  fetching: '[DL] Downloading...',
  preparing: '[DL] Downloading...\n\nPreparing download...',
  segmenting: '[PROC] Splitting file...',
  assets: '[PROC] Processing for upload...',
  screenshots: '[PROC] Generating screenshots...',
  uploading: '[UP] Uploading...',
  completed: '[OK] Upload complete!',
  cancelled: '[X] Download cancelled.',
} as const;

/**
 * Format file size
 */
export function formatBytes(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) {
    return `${(bytes / 1024 / 1024 / 1024).toFixed(2)} GB`;
  }
  if (bytes >= 1024 * 1024) {
    return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
  }
  return `${(bytes / 1024).toFixed(0)} KB`;
}

export function uploadingTitle(part: number, parts: number): string {
  return parts > 1 ? `[UP] Uploading part ${part}/${parts}...` : STATUS_TEXT.uploading;
}

export function completedText(parts: number): string {
  return parts > 1
    ? `${STATUS_TEXT.completed}\n\nAll ${parts} parts uploaded successfully.`
    : STATUS_TEXT.completed;
}

export function failedText(reason: string): string {
  return `[ERR] ${reason}`;
}

/**
 * Status message body while bytes are moving
 */
export function formatProgressText(title: string, snapshot: ProgressSnapshot): string {
  const lines = [title, '', `${Math.floor(snapshot.percent)}% complete`];

  if (snapshot.totalBytes !== null && snapshot.totalBytes > 0) {
    lines.push(`${formatBytes(snapshot.transferredBytes)} / ${formatBytes(snapshot.totalBytes)}`);
  }
  lines.push(`Speed: ${snapshot.rateText ?? 'Unknown'}`);
  lines.push(`ETA: ${snapshot.etaText ?? 'Unknown'}`);

  if (snapshot.filename) {
    lines.push('', `File: ${basename(snapshot.filename)}`);
  }
  return lines.join('\n');
}

/**
 * Short form for the "Progress" button alert
 */
export function formatProgressAlert(snapshot: ProgressSnapshot): string {
  return [
    `Progress: ${Math.floor(snapshot.percent)}%`,
    `Speed: ${snapshot.rateText ?? 'Unknown'}`,
    `ETA: ${snapshot.etaText ?? 'Unknown'}`,
  ].join('\n');
}

/**
 * Snapshot for an upload, where only transferred/total bytes are known
 */
export function uploadSnapshot(
  transferredBytes: number,
  totalBytes: number,
  elapsedMs: number,
  filename: string,
  now: Date = new Date()
): ProgressSnapshot {
  const percent = totalBytes > 0 ? Math.min(100, (transferredBytes * 100) / totalBytes) : 0;
  const rate = elapsedMs > 0 ? (transferredBytes * 1000) / elapsedMs : null;
  const etaSeconds = rate !== null && rate > 0 ? Math.max(0, (totalBytes - transferredBytes) / rate) : null;

  return {
    percent,
    transferredBytes,
    totalBytes,
    rateBytesPerSecond: rate,
    rateText: rate === null ? null : `${formatBytes(rate)}/s`,
    etaText: etaSeconds === null ? null : Math.round(etaSeconds) === 0 ? '0:00' : formatClock(Math.round(etaSeconds)),
    etaSeconds,
    filename,
    updatedAt: now,
  };
}
