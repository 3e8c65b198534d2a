import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { FetchEvent } from '../progressParser.js';
import { YtDlpClient } from './ytdlp.js';

// Stand-in for yt-dlp: a shell script that prints what the real tool prints
async function fakeBinary(dir: string, body: string): Promise<string> {
  const path = join(dir, 'fake-yt-dlp');
  await writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return path;
}

const FETCH_SCRIPT = `
out=""
while [ $# -gt 0 ]; do
  case "$1" in
    -o) out="$2"; shift 2;;
    *) shift;;
  esac
done
file="$(dirname "$out")/clip.mp4"
echo "[youtube] abc: Downloading webpage"
echo "[download] Destination: $file"
echo "[download]  50.0% of 10.00KiB at 1.00KiB/s ETA 00:05"
printf 'data' > "$file"
echo "[download] 100% of 10.00KiB in 00:00:01 at 10.00KiB/s"
`;

describe('YtDlpClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reelport-ytdlp-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('maps the best sentinel to a merged selector', () => {
    expect(YtDlpClient.formatSelector('best')).toBe('bv*+ba/b');
    expect(YtDlpClient.formatSelector('137')).toBe('137');
  });

  it('streams progress events and resolves the fetched file', async () => {
    const client = new YtDlpClient({ binaryPath: await fakeBinary(dir, FETCH_SCRIPT) });
    const outputDir = join(dir, 'job');
    const events: FetchEvent[] = [];

    const result = await client.fetch({
      url: 'https://example.com/watch?v=abc',
      format: 'best',
      outputDir,
      onEvent: (event) => events.push(event),
    });

    expect(result).toMatchObject({ success: true, filePath: join(outputDir, 'clip.mp4') });
    expect(events.map(e => (e.kind === 'progress' ? e.percent : e.filename))).toEqual([
      join(outputDir, 'clip.mp4'),
      50,
      100,
    ]);
  });

  it('fails when the tool exits non-zero and reports its error line', async () => {
    const client = new YtDlpClient({
      binaryPath: await fakeBinary(dir, 'echo "ERROR: [generic] Unsupported URL: https://example.com" >&2\nexit 1'),
    });

    const result = await client.fetch({ url: 'https://example.com', format: '18', outputDir: join(dir, 'job') });

    expect(result).toEqual({
      success: false,
      error: '[generic] Unsupported URL: https://example.com',
      exitCode: 1,
      aborted: false,
    });
  });

  it('fails when the tool succeeds without naming an existing file', async () => {
    const client = new YtDlpClient({
      binaryPath: await fakeBinary(dir, 'echo "[download] Destination: /nonexistent/clip.mp4"'),
    });

    const result = await client.fetch({ url: 'https://example.com', format: '18', outputDir: join(dir, 'job') });

    expect(result).toMatchObject({ success: false, error: 'Download failed - File not found' });
  });

  it('parses the capability listing', async () => {
    const info = JSON.stringify({ title: 'Clip', duration: 12.5, formats: [{ format_id: '18', height: 360 }] });
    const client = new YtDlpClient({ binaryPath: await fakeBinary(dir, `echo '${info}'`) });

    const result = await client.getInfo('https://example.com');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.info.title).toBe('Clip');
      expect(result.info.durationSeconds).toBe(12.5);
    }
  });

  it('treats unparsable listings as failures', async () => {
    const client = new YtDlpClient({ binaryPath: await fakeBinary(dir, 'echo "not json"') });

    const result = await client.getInfo('https://example.com');

    expect(result).toEqual({ success: false, error: 'Failed to parse yt-dlp output: not json\n' });
  });
});
