/**
 * Single-attempt HTTP GET used by the locator and the caption fetcher
 */

import type { FetchOptions, Stage } from '../types';
import { TranscriptError } from './errors';

export const DEFAULT_TIMEOUT_MS = 15_000;

const BROWSER_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/**
 * GET `url` and return the body as text.
 * Transport failures and non-2xx responses become `NetworkError`.
 */
export async function fetchText(url: string, stage: Stage, options: FetchOptions = {}): Promise<string> {
  const {
    fetchFn = globalThis.fetch,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    userAgent = BROWSER_UA,
    acceptLanguage = 'en-US,en;q=0.9',
  } = options;

  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: {
        'User-Agent': userAgent,
        'Accept-Language': acceptLanguage,
      },
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
    });
  } catch (error) {
    throw new TranscriptError('NetworkError', stage, `Request to ${url} failed`, {
      input: url,
      cause: error,
    });
  }

  if (!response.ok) {
    throw new TranscriptError('NetworkError', stage, `Request to ${url} returned HTTP ${response.status}`, {
      input: url,
      status: response.status,
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new TranscriptError('NetworkError', stage, `Failed to read response from ${url}`, {
      input: url,
      cause: error,
    });
  }
}
