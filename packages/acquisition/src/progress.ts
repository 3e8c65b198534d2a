/**
 * Progress Tracker
 *
 * Folds fetch events into the latest progress snapshot of a job.
 */

import type { FetchEvent } from './progressParser.js';

export interface ProgressSnapshot {
  /** 0-100, never decreases within one transfer phase */
  percent: number;
  transferredBytes: number;
  totalBytes: number | null;
  rateBytesPerSecond: number | null;
  rateText: string | null;
  etaText: string | null;
  etaSeconds: number | null;
  filename: string | null;
  updatedAt: Date | null;
}

export function emptySnapshot(): ProgressSnapshot {
  return {
    percent: 0,
    transferredBytes: 0,
    totalBytes: null,
    rateBytesPerSecond: null,
    rateText: null,
    etaText: null,
    etaSeconds: null,
    filename: null,
    updatedAt: null,
  };
}

export class ProgressTracker {
  private current: ProgressSnapshot = emptySnapshot();

  /**
   * Apply an event and return a copy of the resulting snapshot
   */
  apply(event: FetchEvent, now: Date = new Date()): ProgressSnapshot {
    if (event.kind === 'destination') {
      if (event.source === 'download' && this.current.filename !== null) {
        // A second transfer (e.g. the audio stream) starts from zero
        this.current = { ...emptySnapshot(), filename: event.filename, updatedAt: now };
      } else {
        this.current = { ...this.current, filename: event.filename, updatedAt: now };
      }
      return this.snapshot();
    }

    this.current = {
      ...this.current,
      percent: Math.max(this.current.percent, event.percent),
      transferredBytes: event.transferredBytes,
      totalBytes: event.totalBytes,
      rateBytesPerSecond: event.rateBytesPerSecond,
      rateText: event.rateText,
      etaText: event.etaText,
      etaSeconds: event.etaSeconds,
      updatedAt: now,
    };
    return this.snapshot();
  }

  snapshot(): ProgressSnapshot {
    return { ...this.current };
  }
}
