/**
 * Tests for transcript and config file I/O
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readTextFile, writeTextFile } from '../src/lib/fs';
import { formatTranscript } from '../src/lib/formatter';

describe('transcript files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'capscribe-fs-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test('writes decoded caption text as UTF-8 bytes', async () => {
    const path = join(tempDir, 'transcript_dQw4w9WgXcQ.txt');
    const text = formatTranscript([{ start: 3, duration: 1, text: 'caf&eacute; &#x1F3B5;' }]);

    await writeTextFile(path, text);

    expect(text).toBe('[00:03] café 🎵');
    expect(await readFile(path)).toEqual(Buffer.from('[00:03] café 🎵', 'utf-8'));
  });

  test('replaces a previous transcript without keeping old lines', async () => {
    const path = join(tempDir, 'transcript_dQw4w9WgXcQ.txt');
    await writeTextFile(path, '[00:00] old first\n[00:05] old second\n[00:09] old third');

    await writeTextFile(path, '[00:00] new');

    expect(await readTextFile(path)).toBe('[00:00] new');
  });

  test('writes an empty string as an empty file', async () => {
    const path = join(tempDir, 'transcript_empty.txt');

    await writeTextFile(path, '');

    expect((await readFile(path)).length).toBe(0);
  });

  test('rejects when the output directory does not exist', async () => {
    const path = join(tempDir, 'missing', 'transcript_dQw4w9WgXcQ.txt');

    await expect(writeTextFile(path, '[00:00] x')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('reads a config file written with non-ASCII content', async () => {
    const path = join(tempDir, 'config.json');
    await writeTextFile(path, '{ "video_url": "https://youtu.be/dQw4w9WgXcQ", "note": "日本語" }');

    const content = await readTextFile(path);

    expect(JSON.parse(content)).toEqual({ video_url: 'https://youtu.be/dQw4w9WgXcQ', note: '日本語' });
  });

  test('rejects when reading a missing file', async () => {
    await expect(readTextFile(join(tempDir, 'config.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
