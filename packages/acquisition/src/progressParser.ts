/**
 * Fetch Progress Parser
 *
 * Turns one line of yt-dlp's `--newline` output into a typed event.
 * The tool's human-readable output is the only progress source, so all
 * knowledge of its format is kept in this file.
 *
 * Recognised lines:
 *   [download] Destination: /data/job/clip.mp4
 *   [download]  42.5% of 10.00MiB at 512.00KiB/s ETA 00:08
 *   [download]  12.0% of ~  80.00MiB at  1.20MiB/s ETA 01:02 (frag 3/25)
 *   [download]   5.00MiB / 10.00MiB (50%)
 *   [Merger] Merging formats into "/data/job/clip.mkv"
 *   [download] /data/job/clip.mp4 has already been downloaded
 */

import { createLogger, parseClock } from '@reelport/utils';

const log = createLogger('fetch-parser');

export type DestinationSource = 'download' | 'merge' | 'existing';

export interface DestinationEvent {
  kind: 'destination';
  filename: string;
  /** `download` starts a new transfer phase; the others only rename the output */
  source: DestinationSource;
}

export interface ProgressEvent {
  kind: 'progress';
  percent: number;
  transferredBytes: number;
  totalBytes: number | null;
  rateBytesPerSecond: number | null;
  rateText: string | null;
  etaText: string | null;
  etaSeconds: number | null;
}

export type FetchEvent = DestinationEvent | ProgressEvent;

/** Binary magnitude ladder used by the fetch tool */
export const UNIT_MULTIPLIERS: Readonly<Record<string, number>> = {
  B: 1,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
};

const DESTINATION_PATTERN = /^\[download\]\s+Destination:\s*(.+)$/;
const MERGER_PATTERN = /^\[Merger\]\s+Merging formats into\s+"(.+)"$/;
const EXISTING_PATTERN = /^\[download\]\s+(.+?) has already been downloaded/;

const PERCENT_PATTERN = /(\d+(?:\.\d+)?)%/;
const RATE_PATTERN = /\bat\s+(\d+(?:\.\d+)?)\s*([A-Za-z]+)\/s/;
const SIZE_PATTERN = /(\d+(?:\.\d+)?)\s*([KMGTPE]?i?B)\b/g;
const ETA_PATTERN = /\bETA\s+((?:\d+:)?\d+:\d+)/;

/**
 * Multiplier for a size unit; unrecognised units count as bytes
 */
export function unitMultiplier(unit: string): number {
  return UNIT_MULTIPLIERS[unit] ?? 1;
}

function parseDestination(line: string): DestinationEvent | null {
  const destination = line.match(DESTINATION_PATTERN);
  if (destination?.[1]) {
    return { kind: 'destination', filename: destination[1].trim(), source: 'download' };
  }

  const merged = line.match(MERGER_PATTERN);
  if (merged?.[1]) {
    return { kind: 'destination', filename: merged[1].trim(), source: 'merge' };
  }

  const existing = line.match(EXISTING_PATTERN);
  if (existing?.[1]) {
    return { kind: 'destination', filename: existing[1].trim(), source: 'existing' };
  }

  return null;
}

function parseProgress(line: string): ProgressEvent | null {
  const percentMatch = line.match(PERCENT_PATTERN);
  if (!percentMatch?.[1]) return null;

  // Rate first, so its size token is not taken for a transfer size
  let rateBytesPerSecond: number | null = null;
  let rateText: string | null = null;
  let rest = line;
  const rateMatch = line.match(RATE_PATTERN);
  if (rateMatch?.[1] && rateMatch[2]) {
    rateBytesPerSecond = parseFloat(rateMatch[1]) * unitMultiplier(rateMatch[2]);
    rateText = `${rateMatch[1]} ${rateMatch[2]}/s`;
    rest = line.replace(rateMatch[0], ' ');
  }

  const sizes = Array.from(rest.matchAll(SIZE_PATTERN), (match) =>
    parseFloat(match[1] ?? '0') * unitMultiplier(match[2] ?? 'B')
  );

  if (!line.includes('[download]') && sizes.length < 2) {
    return null;
  }

  const percent = Math.min(100, Math.max(0, parseFloat(percentMatch[1])));

  let totalBytes: number | null = null;
  let transferredBytes = 0;
  const [first, second] = sizes;
  if (first !== undefined && second !== undefined) {
    totalBytes = second;
    transferredBytes = Math.min(first, second);
  } else if (first !== undefined) {
    totalBytes = first;
    transferredBytes = Math.round((percent / 100) * first);
  }

  const etaMatch = line.match(ETA_PATTERN);
  const etaText = etaMatch?.[1] ?? null;

  return {
    kind: 'progress',
    percent,
    transferredBytes,
    totalBytes,
    rateBytesPerSecond,
    rateText,
    etaText,
    etaSeconds: etaText === null ? null : parseClock(etaText),
  };
}

/**
 * Parse one output line. Returns null when the line carries no information.
 * Never throws.
 */
export function parseProgressLine(rawLine: string): FetchEvent | null {
  const line = rawLine.trim();
  if (!line) return null;

  try {
    return parseDestination(line) ?? parseProgress(line);
  } catch (error) {
    log.debug({ err: error, line }, 'Dropping unparsable fetch output line');
    return null;
  }
}
