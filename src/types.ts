/**
 * Shared types for capscribe
 */

/** A single timed caption entry, in document order */
export interface TranscriptItem {
  /** Offset from the start of the video, in seconds */
  start: number;
  /** Duration in seconds (0 when the document omits it) */
  duration: number;
  /** Caption text with markup stripped; character entities still encoded */
  text: string;
}

/** A caption track advertised by the watch page's player response */
export interface CaptionTrack {
  baseUrl: string;
  languageCode?: string;
  /** "asr" for auto-generated tracks */
  kind?: string;
  name?: string;
}

/** Picks the track to download; `undefined` means none is acceptable */
export type TrackSelector = (tracks: CaptionTrack[]) => CaptionTrack | undefined;

export interface Config {
  video_url?: string;
  video_id?: string;
}

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  /** HTTP transport, defaults to the global fetch */
  fetchFn?: FetchFn;
  /** Request timeout in milliseconds (0 disables it) */
  timeoutMs?: number;
  userAgent?: string;
  /** Accept-Language header sent with every request */
  acceptLanguage?: string;
}

export type Stage = 'config' | 'resolve' | 'locate' | 'fetch' | 'parse' | 'format' | 'write';

export interface RunOptions extends FetchOptions {
  /** Directory the transcript file is written to (default: cwd) */
  outDir?: string;
  selectTrack?: TrackSelector;
  writeFile?: (path: string, content: string) => Promise<void>;
  onStage?: (stage: Stage, detail: string) => void;
  onWarning?: (message: string) => void;
}

export interface TranscriptRunResult {
  videoId: string;
  path: string;
  items: TranscriptItem[];
  text: string;
}
