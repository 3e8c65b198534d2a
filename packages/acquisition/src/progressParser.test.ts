import { describe, expect, it } from 'vitest';

import { parseProgressLine, unitMultiplier } from './progressParser.js';

const MiB = 1024 * 1024;

describe('parseProgressLine', () => {
  it('parses a full progress frame', () => {
    const event = parseProgressLine('[download]  42.5% of 10.00MiB at 512.00KiB/s ETA 00:08');

    expect(event).toEqual({
      kind: 'progress',
      percent: 42.5,
      transferredBytes: 4456448,
      totalBytes: 10 * MiB,
      rateBytesPerSecond: 512 * 1024,
      rateText: '512.00 KiB/s',
      etaText: '00:08',
      etaSeconds: 8,
    });
  });

  it('takes the first of two size tokens as transferred and the second as total', () => {
    const event = parseProgressLine('[download]   5.00MiB / 10.00MiB (50%)');

    expect(event).toMatchObject({
      kind: 'progress',
      percent: 50,
      transferredBytes: 5 * MiB,
      totalBytes: 10 * MiB,
      rateText: null,
      etaText: null,
    });
  });

  it('reports rate and ETA as unknown when absent', () => {
    const event = parseProgressLine('[download]   0.3% of ~ 120.50MiB at  Unknown B/s ETA Unknown');

    expect(event).toMatchObject({
      kind: 'progress',
      totalBytes: 120.5 * MiB,
      rateBytesPerSecond: null,
      rateText: null,
      etaText: null,
      etaSeconds: null,
    });
  });

  it('carries a null total before the tool knows the size', () => {
    const event = parseProgressLine('[download]   1.0% at 1.00MiB/s ETA 00:10');

    expect(event).toMatchObject({
      kind: 'progress',
      percent: 1,
      transferredBytes: 0,
      totalBytes: null,
      rateBytesPerSecond: MiB,
      rateText: '1.00 MiB/s',
      etaSeconds: 10,
    });
  });

  it('parses hour-long ETAs', () => {
    const event = parseProgressLine('[download]   2.0% of 4.00GiB at 1.00MiB/s ETA 01:08:00');

    expect(event).toMatchObject({ etaText: '01:08:00', etaSeconds: 4080 });
  });

  it('falls back to a multiplier of 1 for units outside the ladder', () => {
    expect(unitMultiplier('PiB')).toBe(1);
    expect(parseProgressLine('[download]  50.0% of 2.00PiB')).toMatchObject({
      totalBytes: 2,
      transferredBytes: 1,
    });
  });

  it('accepts untagged lines that carry two sizes and a percentage', () => {
    expect(parseProgressLine('5.00KiB / 10.00KiB 50%')).toMatchObject({
      kind: 'progress',
      transferredBytes: 5 * 1024,
      totalBytes: 10 * 1024,
    });
  });

  it('never reports more transferred than total', () => {
    const event = parseProgressLine('[download] 12.00MiB / 10.00MiB (100%)');

    expect(event).toMatchObject({ transferredBytes: 10 * MiB, totalBytes: 10 * MiB });
  });

  it('keeps percent within one point of transferred/total for well-formed lines', () => {
    const samples: Array<[number, number]> = [[0.5, 10], [3.25, 7.5], [99, 100], [1, 3], [250, 1024]];

    for (const [done, total] of samples) {
      const percent = ((done / total) * 100).toFixed(1);
      const event = parseProgressLine(`[download] ${done.toFixed(2)}MiB / ${total.toFixed(2)}MiB (${percent}%)`);

      expect(event?.kind).toBe('progress');
      if (event?.kind !== 'progress' || event.totalBytes === null) continue;
      expect(event.transferredBytes).toBeLessThanOrEqual(event.totalBytes);
      expect(Math.abs(event.percent - (event.transferredBytes / event.totalBytes) * 100)).toBeLessThanOrEqual(1);
    }
  });

  describe('destination lines', () => {
    it('resolves the download destination', () => {
      expect(parseProgressLine('[download] Destination: /tmp/job/My Clip [abc].mp4')).toEqual({
        kind: 'destination',
        filename: '/tmp/job/My Clip [abc].mp4',
        source: 'download',
      });
    });

    it('resolves the merged output', () => {
      expect(parseProgressLine('[Merger] Merging formats into "/tmp/job/My Clip.mkv"')).toEqual({
        kind: 'destination',
        filename: '/tmp/job/My Clip.mkv',
        source: 'merge',
      });
    });

    it('resolves files that were already present', () => {
      expect(parseProgressLine('[download] /tmp/job/a.mp4 has already been downloaded')).toEqual({
        kind: 'destination',
        filename: '/tmp/job/a.mp4',
        source: 'existing',
      });
    });
  });

  it('returns null for lines without information', () => {
    expect(parseProgressLine('')).toBeNull();
    expect(parseProgressLine('[youtube] abc: Downloading webpage')).toBeNull();
    expect(parseProgressLine('[info] 50% of the playlist')).toBeNull();
    expect(parseProgressLine('%%% ??? \u0000 garbage')).toBeNull();
  });
});
