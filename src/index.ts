/**
 * capscribe - save a video's captions as a timestamped transcript
 *
 * @example
 * ```typescript
 * import { runTranscript, fetchTranscript, formatTranscript } from 'capscribe';
 *
 * // Write transcript_<id>.txt to the working directory
 * const result = await runTranscript({ video_url: 'https://youtu.be/dQw4w9WgXcQ' });
 * console.log(result.path);
 *
 * // Or keep the items in memory
 * const { items } = await fetchTranscript('dQw4w9WgXcQ');
 * console.log(formatTranscript(items));
 * ```
 */

// Pipeline
export { runTranscript, resolveVideoId, transcriptFileName } from './lib/pipeline';

// Core fetcher
export { fetchTranscript, fetchCaptionDocument, extractVideoId } from './lib/fetcher';
export { requireVideoId, isVideoId } from './lib/videoId';
export {
  buildWatchUrl,
  extractPlayerResponse,
  extractCaptionTracks,
  listCaptionTracks,
  locateCaptionTrack,
  selectFirstTrack,
  selectByLanguage,
} from './lib/locator';
export { parseTimedText, stripTags } from './lib/parser';

// Output formatting
export { formatTranscript, formatTimestamp, decodeEntities } from './lib/formatter';
export { normalizeTranscript, parseTranscriptLine } from './lib/normalize';

// Config and errors
export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH } from './lib/config';
export { TranscriptError, isTranscriptError, describeError } from './lib/errors';

// Types
export type { ErrorKind } from './lib/errors';
export type { FetchTranscriptOptions, FetchedTranscript } from './lib/fetcher';
export type { PlayerResponse } from './lib/locator';
export type {
  CaptionTrack,
  Config,
  FetchFn,
  FetchOptions,
  RunOptions,
  Stage,
  TrackSelector,
  TranscriptItem,
  TranscriptRunResult,
} from './types';
