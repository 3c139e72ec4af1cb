/**
 * Video ID extraction from bare IDs and the common URL forms
 */

import { TranscriptError } from './errors';

// Platform IDs are 11 characters; some older/test IDs are 10
const VIDEO_ID = /^[A-Za-z0-9_-]{10,11}$/;

const WATCH_HOSTS = new Set([
  'youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtube-nocookie.com',
]);

const PATH_PREFIXES = new Set(['embed', 'shorts', 'live', 'v']);

export function isVideoId(value: string): boolean {
  return VIDEO_ID.test(value);
}

function parseUrl(input: string): URL | null {
  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`;
  try {
    return new URL(candidate);
  } catch {
    return null;
  }
}

function idFromUrl(url: URL): string | null {
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  const segments = url.pathname.split('/').filter(Boolean);

  if (host === 'youtu.be') {
    return segments[0] ?? null;
  }

  if (!WATCH_HOSTS.has(host)) {
    return null;
  }

  if (segments[0] === 'watch') {
    return url.searchParams.get('v');
  }

  if (segments.length >= 2 && PATH_PREFIXES.has(segments[0])) {
    return segments[1];
  }

  return null;
}

/**
 * Extract a video ID from a bare ID or a watch/short/embed URL.
 * Returns `null` when nothing usable is found.
 */
export function extractVideoId(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) return null;

  if (isVideoId(trimmed)) {
    return trimmed;
  }

  const url = parseUrl(trimmed);
  if (!url) return null;

  const id = idFromUrl(url);
  return id && isVideoId(id) ? id : null;
}

/**
 * Like {@link extractVideoId} but throws `InvalidIdentifier`
 */
export function requireVideoId(input: string): string {
  const id = extractVideoId(input);
  if (!id) {
    throw new TranscriptError('InvalidIdentifier', 'resolve', `Invalid video ID or URL: ${input}`, {
      input,
    });
  }
  return id;
}
