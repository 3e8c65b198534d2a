import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FFProbe } from '@reelport/media';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FFmpeg } from './ffmpeg.js';
import { MediaSplitter, partPath, planSegments } from './splitter.js';

describe('planSegments', () => {
  it('returns null when the file fits', () => {
    expect(planSegments(100, 100, 60, true)).toBeNull();
    expect(planSegments(10, 100, null, false)).toBeNull();
  });

  it('slices by bytes when the file is not seekable', () => {
    expect(planSegments(250, 100, null, false)).toEqual({
      strategy: 'byte-slice',
      ranges: [
        { start: 0, length: 100 },
        { start: 100, length: 100 },
        { start: 200, length: 50 },
      ],
    });
  });

  it('slices by bytes when the duration is unknown', () => {
    expect(planSegments(250, 100, null, true)?.strategy).toBe('byte-slice');
  });

  it('remuxes into contiguous equal ranges covering the duration', () => {
    const plan = planSegments(250, 100, 300, true);

    expect(plan?.strategy).toBe('remux');
    expect(plan?.ranges).toEqual([
      { start: 0, length: 100 },
      { start: 100, length: 100 },
      { start: 200, length: 100 },
    ]);
  });

  it('lets the last range absorb rounding', () => {
    const ranges = planSegments(250, 100, 100, true)?.ranges ?? [];

    expect(ranges).toHaveLength(3);
    const total = ranges.reduce((sum, range) => sum + range.length, 0);
    expect(total).toBeCloseTo(100, 9);
    const last = ranges[2];
    expect(last && last.start + last.length).toBe(100);
  });

  it('rejects a non-positive ceiling', () => {
    expect(() => planSegments(10, 0, null, false)).toThrow(RangeError);
  });
});

describe('partPath', () => {
  it('numbers parts with three digits before the extension', () => {
    expect(partPath('/data/job/clip.mp4', 1)).toBe('/data/job/clip.part001.mp4');
    expect(partPath('/data/job/archive.bin', 12)).toBe('/data/job/archive.part012.bin');
  });
});

describe('MediaSplitter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelport-split-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function script(name: string, body: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return path;
  }

  // ffmpeg stand-in: logs its arguments and writes a few bytes to the last one
  async function fakeFFmpeg(failOn?: string): Promise<FFmpeg> {
    const guard = failOn ? `case "$last" in *${failOn}*) exit 1;; esac\n` : '';
    const path = await script(
      'fake-ffmpeg',
      `for last; do :; done\necho "$*" >> "${join(dir, 'calls.log')}"\n${guard}printf 'part' > "$last"`
    );
    return new FFmpeg(path);
  }

  async function fakeFFProbe(duration: string | null): Promise<FFProbe> {
    const body = duration === null ? 'exit 1' : `echo '{"format":{"duration":"${duration}"}}'`;
    return new FFProbe(await script('fake-ffprobe', body));
  }

  async function calls(): Promise<string[]> {
    const log = await readFile(join(dir, 'calls.log'), 'utf8');
    return log.trim().split('\n');
  }

  it('returns the input unchanged when it fits', async () => {
    const input = join(dir, 'small.bin');
    await writeFile(input, Buffer.alloc(50, 1));

    const splitter = new MediaSplitter({ ffmpeg: await fakeFFmpeg(), ffprobe: await fakeFFProbe(null) });

    await expect(splitter.split(input, 100)).resolves.toEqual([input]);
  });

  it('slices a non-video file into ceiling-sized chunks', async () => {
    const input = join(dir, 'data.bin');
    const content = Buffer.from(Array.from({ length: 250 }, (_, i) => i % 256));
    await writeFile(input, content);

    const splitter = new MediaSplitter({ ffmpeg: await fakeFFmpeg(), ffprobe: await fakeFFProbe(null) });
    const parts = await splitter.split(input, 100);

    expect(parts).toEqual([
      join(dir, 'data.part001.bin'),
      join(dir, 'data.part002.bin'),
      join(dir, 'data.part003.bin'),
    ]);
    const sizes = await Promise.all(parts.map(async (part) => (await stat(part)).size));
    expect(sizes).toEqual([100, 100, 50]);

    const joined = Buffer.concat(await Promise.all(parts.map((part) => readFile(part))));
    expect(joined.equals(content)).toBe(true);
  });

  it('remuxes a video with a known duration', async () => {
    const input = join(dir, 'clip.mp4');
    await writeFile(input, Buffer.alloc(250, 7));

    const splitter = new MediaSplitter({ ffmpeg: await fakeFFmpeg(), ffprobe: await fakeFFProbe('300') });
    const parts = await splitter.split(input, 100);

    expect(parts).toEqual([
      join(dir, 'clip.part001.mp4'),
      join(dir, 'clip.part002.mp4'),
      join(dir, 'clip.part003.mp4'),
    ]);
    expect(await calls()).toEqual([
      `-hide_banner -loglevel error -y -i ${input} -ss 0.000 -t 100.000 -map 0 -c copy ${parts[0]}`,
      `-hide_banner -loglevel error -y -i ${input} -ss 100.000 -t 100.000 -map 0 -c copy ${parts[1]}`,
      `-hide_banner -loglevel error -y -i ${input} -ss 200.000 -t 100.000 -map 0 -c copy ${parts[2]}`,
    ]);
  });

  it('skips a segment that ffmpeg fails to produce', async () => {
    const input = join(dir, 'clip.mkv');
    await writeFile(input, Buffer.alloc(250, 7));

    const splitter = new MediaSplitter({
      ffmpeg: await fakeFFmpeg('part002'),
      ffprobe: await fakeFFProbe('90'),
    });

    await expect(splitter.split(input, 100)).resolves.toEqual([
      join(dir, 'clip.part001.mkv'),
      join(dir, 'clip.part003.mkv'),
    ]);
  });

  it('falls back to byte slicing when a video has no known duration', async () => {
    const input = join(dir, 'clip.webm');
    await writeFile(input, Buffer.alloc(150, 3));

    const splitter = new MediaSplitter({ ffmpeg: await fakeFFmpeg(), ffprobe: await fakeFFProbe(null) });
    const parts = await splitter.split(input, 100);

    expect(parts).toEqual([join(dir, 'clip.part001.webm'), join(dir, 'clip.part002.webm')]);
    expect((await stat(join(dir, 'clip.part002.webm'))).size).toBe(50);
  });

  it('byte slices a video when ffprobe cannot be started', async () => {
    const input = join(dir, 'clip.mp4');
    await writeFile(input, Buffer.alloc(250, 5));

    const splitter = new MediaSplitter({
      ffmpeg: await fakeFFmpeg(),
      ffprobe: new FFProbe(join(dir, 'no-such-ffprobe')),
    });
    const parts = await splitter.split(input, 100);

    expect(parts).toEqual([
      join(dir, 'clip.part001.mp4'),
      join(dir, 'clip.part002.mp4'),
      join(dir, 'clip.part003.mp4'),
    ]);
    expect((await stat(join(dir, 'clip.part003.mp4'))).size).toBe(50);
  });

  it('skips segments when ffmpeg cannot be started', async () => {
    const input = join(dir, 'clip.mkv');
    await writeFile(input, Buffer.alloc(250, 1));

    const splitter = new MediaSplitter({
      ffmpeg: new FFmpeg(join(dir, 'no-such-ffmpeg')),
      ffprobe: await fakeFFProbe('90'),
    });

    await expect(splitter.split(input, 100)).resolves.toEqual([]);
  });
});
