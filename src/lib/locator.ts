/**
 * Caption track discovery from the watch page's embedded player response
 */

import { z } from 'zod';
import type { CaptionTrack, FetchOptions, TrackSelector } from '../types';
import { TranscriptError } from './errors';
import { fetchText } from './http';

const ORIGIN = 'https://www.youtube.com';
const PLAYER_RESPONSE_MARKER = /ytInitialPlayerResponse\s*=\s*/;

const textSchema = z.object({
  simpleText: z.string().optional(),
  runs: z.array(z.object({ text: z.string().optional() })).optional(),
});

const captionTrackSchema = z.object({
  baseUrl: z.string().optional(),
  languageCode: z.string().optional(),
  kind: z.string().optional(),
  name: textSchema.optional(),
});

// Only the captions branch is read; everything else in the payload is ignored
const playerResponseSchema = z.object({
  captions: z
    .object({
      playerCaptionsTracklistRenderer: z
        .object({
          captionTracks: z.array(captionTrackSchema).optional(),
        })
        .optional(),
    })
    .optional(),
});

export type PlayerResponse = z.infer<typeof playerResponseSchema>;

export function buildWatchUrl(videoId: string): string {
  return `${ORIGIN}/watch?v=${encodeURIComponent(videoId)}`;
}

/**
 * Cut the balanced JSON object starting at `start`, ignoring braces inside strings
 */
function sliceJsonObject(source: string, start: number): string | null {
  if (source[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < source.length; i++) {
    const ch = source[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }

  return null;
}

/**
 * Locate and decode `ytInitialPlayerResponse` embedded in watch-page markup.
 * Returns `null` if it is missing or does not decode.
 */
export function extractPlayerResponse(html: string): PlayerResponse | null {
  const match = PLAYER_RESPONSE_MARKER.exec(html);
  if (!match) return null;

  const json = sliceJsonObject(html, match.index + match[0].length);
  if (!json) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }

  const parsed = playerResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function trackName(name: z.infer<typeof textSchema> | undefined): string | undefined {
  if (!name) return undefined;
  if (name.simpleText) return name.simpleText;
  const joined = (name.runs ?? []).map((run) => run.text ?? '').join('');
  return joined || undefined;
}

/**
 * All caption tracks advertised by a watch page, in page order.
 * Throws `ParsingError` when the player response cannot be found.
 */
export function extractCaptionTracks(html: string): CaptionTrack[] {
  const player = extractPlayerResponse(html);
  if (!player) {
    throw new TranscriptError('ParsingError', 'locate', 'Cannot find player data in the video page');
  }

  const rawTracks = player.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? [];
  const tracks: CaptionTrack[] = [];

  for (const track of rawTracks) {
    if (!track.baseUrl) continue;
    tracks.push({
      baseUrl: new URL(track.baseUrl, ORIGIN).href,
      languageCode: track.languageCode,
      kind: track.kind,
      name: trackName(track.name),
    });
  }

  return tracks;
}

export const selectFirstTrack: TrackSelector = (tracks) => tracks[0];

/**
 * Prefer the first track matching one of `languages` (in preference order),
 * falling back to the first track
 */
export function selectByLanguage(languages: string[]): TrackSelector {
  return (tracks) => {
    for (const lang of languages) {
      const match = tracks.find((t) => t.languageCode === lang);
      if (match) return match;
    }
    return tracks[0];
  };
}

/**
 * Fetch the watch page for `videoId` and return its caption tracks
 */
export async function listCaptionTracks(videoId: string, options: FetchOptions = {}): Promise<CaptionTrack[]> {
  const html = await fetchText(buildWatchUrl(videoId), 'locate', options);
  return extractCaptionTracks(html);
}

/**
 * Fetch the watch page and pick the caption track to download
 */
export async function locateCaptionTrack(
  videoId: string,
  options: FetchOptions & { selectTrack?: TrackSelector } = {}
): Promise<CaptionTrack> {
  const { selectTrack = selectFirstTrack, ...fetchOptions } = options;
  const tracks = await listCaptionTracks(videoId, fetchOptions);

  const track = tracks.length ? selectTrack(tracks) : undefined;
  if (!track) {
    throw new TranscriptError('NoCaptionsAvailable', 'locate', `No captions available for video ${videoId}`, {
      input: videoId,
    });
  }

  return track;
}
