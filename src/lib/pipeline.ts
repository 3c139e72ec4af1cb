/**
 * End-to-end run: config -> video ID -> caption track -> transcript file
 */

import { join } from 'node:path';
import type { Config, RunOptions, TranscriptRunResult } from '../types';
import { TranscriptError } from './errors';
import { fetchTranscript } from './fetcher';
import { formatTranscript } from './formatter';
import { writeTextFile } from './fs';
import { requireVideoId } from './videoId';

export function transcriptFileName(videoId: string): string {
  return `transcript_${videoId}.txt`;
}

/**
 * Resolve the video ID from config. A non-empty `video_url` takes
 * precedence over `video_id`; a disagreement is reported through `onWarning`.
 */
export function resolveVideoId(config: Config, onWarning?: (message: string) => void): string {
  const url = config.video_url?.trim();
  const id = config.video_id?.trim();

  if (!url && !id) {
    throw new TranscriptError('InvalidConfig', 'config', 'Config must set "video_url" or "video_id"');
  }

  if (url) {
    const fromUrl = requireVideoId(url);
    if (id && id !== fromUrl) {
      onWarning?.(`video_id "${id}" does not match video_url; using ${fromUrl} from the URL`);
    }
    return fromUrl;
  }

  return requireVideoId(id ?? '');
}

/**
 * Run the whole pipeline once and write `transcript_<id>.txt`.
 * Every stage is attempted at most once; the first failure is thrown.
 */
export async function runTranscript(config: Config, options: RunOptions = {}): Promise<TranscriptRunResult> {
  const { outDir = process.cwd(), writeFile = writeTextFile, onStage, onWarning, ...fetchOptions } = options;

  const videoId = resolveVideoId(config, onWarning);
  onStage?.('resolve', `Video ID: ${videoId}`);

  const { items } = await fetchTranscript(videoId, { ...fetchOptions, onStage });

  onStage?.('format', 'Formatting transcript...');
  const text = formatTranscript(items);

  const path = join(outDir, transcriptFileName(videoId));
  try {
    await writeFile(path, text);
  } catch (error) {
    throw new TranscriptError('FileWriteError', 'write', `Failed to write ${path}`, { input: path, cause: error });
  }
  onStage?.('write', `Transcript saved to ${path}`);

  return { videoId, path, items, text };
}
