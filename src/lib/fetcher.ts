/**
 * Caption download: watch page -> caption track -> timed-text items
 */

import type { CaptionTrack, FetchOptions, Stage, TrackSelector, TranscriptItem } from '../types';
import { fetchText } from './http';
import { locateCaptionTrack } from './locator';
import { parseTimedText } from './parser';
import { requireVideoId } from './videoId';

export { extractVideoId } from './videoId';

export interface FetchTranscriptOptions extends FetchOptions {
  selectTrack?: TrackSelector;
  onStage?: (stage: Stage, detail: string) => void;
}

export interface FetchedTranscript {
  videoId: string;
  track: CaptionTrack;
  items: TranscriptItem[];
}

/**
 * Download a caption document and parse it
 */
export async function fetchCaptionDocument(trackUrl: string, options: FetchOptions = {}): Promise<TranscriptItem[]> {
  const xml = await fetchText(trackUrl, 'fetch', options);
  return parseTimedText(xml);
}

/**
 * Fetch the first available caption track for a video ID or URL
 */
export async function fetchTranscript(
  video: string,
  options: FetchTranscriptOptions = {}
): Promise<FetchedTranscript> {
  const { onStage, selectTrack, ...fetchOptions } = options;
  const videoId = requireVideoId(video);

  onStage?.('locate', 'Fetching video page...');
  const track = await locateCaptionTrack(videoId, { ...fetchOptions, selectTrack });

  onStage?.('fetch', `Downloading transcript${track.languageCode ? ` (${track.languageCode})` : ''}...`);
  const items = await fetchCaptionDocument(track.baseUrl, fetchOptions);

  onStage?.('parse', `Parsed ${items.length} lines`);
  return { videoId, track, items };
}
