import { describe, expect, it } from 'vitest';

import { ProgressTracker } from './progress.js';
import type { ProgressEvent } from './progressParser.js';

const progress = (percent: number, totalBytes: number | null = 1000): ProgressEvent => ({
  kind: 'progress',
  percent,
  transferredBytes: totalBytes === null ? 0 : Math.round((percent / 100) * totalBytes),
  totalBytes,
  rateBytesPerSecond: null,
  rateText: null,
  etaText: null,
  etaSeconds: null,
});

describe('ProgressTracker', () => {
  it('keeps percent non-decreasing within a transfer', () => {
    const tracker = new ProgressTracker();
    tracker.apply({ kind: 'destination', filename: '/tmp/a.mp4', source: 'download' });
    tracker.apply(progress(40));
    const snapshot = tracker.apply(progress(30));

    expect(snapshot.percent).toBe(40);
    expect(snapshot.transferredBytes).toBe(300);
    expect(snapshot.filename).toBe('/tmp/a.mp4');
  });

  it('starts a new phase on a second download destination', () => {
    const tracker = new ProgressTracker();
    tracker.apply({ kind: 'destination', filename: '/tmp/a.f137.mp4', source: 'download' });
    tracker.apply(progress(100));
    const snapshot = tracker.apply({ kind: 'destination', filename: '/tmp/a.f140.m4a', source: 'download' });

    expect(snapshot.percent).toBe(0);
    expect(snapshot.totalBytes).toBeNull();
    expect(snapshot.filename).toBe('/tmp/a.f140.m4a');
  });

  it('renames the output on merge without resetting progress', () => {
    const tracker = new ProgressTracker();
    tracker.apply({ kind: 'destination', filename: '/tmp/a.f137.mp4', source: 'download' });
    tracker.apply(progress(100));
    const snapshot = tracker.apply({ kind: 'destination', filename: '/tmp/a.mkv', source: 'merge' });

    expect(snapshot.percent).toBe(100);
    expect(snapshot.filename).toBe('/tmp/a.mkv');
  });

  it('hands out copies', () => {
    const tracker = new ProgressTracker();
    const first = tracker.apply(progress(10, null));
    tracker.apply(progress(20, null));

    expect(first.percent).toBe(10);
    expect(tracker.snapshot().percent).toBe(20);
  });
});
