import { describe, expect, it } from 'vitest';

import { extractEncodingOptions, parseCapabilityDocument } from './formats.js';

const doc = {
  id: 'abc',
  title: 'Test clip',
  duration: 300,
  formats: [
    { format_id: '140', ext: 'm4a', vcodec: 'none', format: '140 - audio only (medium)', tbr: 129 },
    { format_id: 18, ext: 'mp4', height: 360, tbr: 500, filesize: 1000, format_note: '360p' },
    { format_id: '137', ext: 'mp4', height: 1080, tbr: 4000, format_note: 'DASH video', filesize_approx: 5000 },
    { format_id: '22', ext: 'mp4', height: 720, tbr: 2000, format_note: 'hd720' },
    { format_id: '136', ext: 'webm', height: 720, tbr: 2500, format_note: 'DASH video' },
    { format_id: '18', ext: 'mp4', height: 360, tbr: 400, format_note: '360p' },
  ],
};

describe('parseCapabilityDocument', () => {
  it('normalises the fields the pipeline needs', () => {
    const info = parseCapabilityDocument(doc);

    expect(info?.title).toBe('Test clip');
    expect(info?.durationSeconds).toBe(300);
    expect(info?.formats.map(f => f.format_id)).toEqual(['140', '18', '137', '22', '136', '18']);
  });

  it('rejects documents without a format list', () => {
    expect(parseCapabilityDocument({ title: 'no formats' })).toBeNull();
    expect(parseCapabilityDocument('not json')).toBeNull();
  });
});

describe('extractEncodingOptions', () => {
  it('sorts by height then bitrate, drops audio-only and duplicate entries, and appends best', () => {
    const info = parseCapabilityDocument(doc);
    if (!info) throw new Error('fixture did not parse');

    expect(extractEncodingOptions(info)).toEqual([
      { id: '137', label: '1080p DASH video', ext: 'mp4', sizeBytes: 5000 },
      { id: '136', label: '720p DASH video', ext: 'webm', sizeBytes: 0 },
      { id: '22', label: '720p hd720', ext: 'mp4', sizeBytes: 0 },
      { id: '18', label: '360p 360p', ext: 'mp4', sizeBytes: 1000 },
      { id: 'best', label: 'Best Quality', ext: '', sizeBytes: 0 },
    ]);
  });

  it('caps the list at six choices plus best', () => {
    const many = parseCapabilityDocument({
      formats: Array.from({ length: 9 }, (_, i) => ({ format_id: `f${i}`, height: 100 * (i + 1) })),
    });
    if (!many) throw new Error('fixture did not parse');

    const options = extractEncodingOptions(many);

    expect(options).toHaveLength(7);
    expect(options[0]?.id).toBe('f8');
    expect(options[5]?.id).toBe('f3');
    expect(options[6]?.id).toBe('best');
    expect(options[0]?.label).toBe('900p Unknown');
  });
});
