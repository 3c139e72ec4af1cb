/**
 * Text file I/O for configs and transcripts (always UTF-8)
 */

import { readFile, writeFile } from 'node:fs/promises';

export async function readTextFile(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/**
 * Write `content` to `path`, replacing any existing file.
 * The parent directory must already exist.
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}
