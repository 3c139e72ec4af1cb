/**
 * Regroup an existing transcript into fixed-length time windows
 */

import { formatTimestamp } from './formatter';

export const DEFAULT_INTERVAL_SECONDS = 6;

export interface TimedLine {
  start: number;
  text: string;
}

const LINE = /^\[(\d+):(\d{1,2})\]\s*(.*)$/;

/**
 * Parse a `[M:SS] text` line. Returns `null` for anything else.
 */
export function parseTranscriptLine(line: string): TimedLine | null {
  const match = LINE.exec(line.trim());
  if (!match) return null;

  const minutes = Number.parseInt(match[1], 10);
  const seconds = Number.parseInt(match[2], 10);
  return { start: minutes * 60 + seconds, text: match[3].trim() };
}

/**
 * Merge lines into windows of `intervalSeconds`, one output line per
 * non-empty window, stamped with the window start
 */
export function normalizeTranscript(content: string, intervalSeconds = DEFAULT_INTERVAL_SECONDS): string {
  if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
    throw new RangeError(`Interval must be a positive integer, got ${intervalSeconds}`);
  }

  const entries: TimedLine[] = [];
  for (const line of content.split('\n')) {
    const parsed = parseTranscriptLine(line);
    if (parsed) entries.push(parsed);
  }
  entries.sort((a, b) => a.start - b.start);

  const windows = new Map<number, string[]>();
  for (const entry of entries) {
    if (!entry.text) continue;
    const windowStart = Math.floor(entry.start / intervalSeconds) * intervalSeconds;
    const texts = windows.get(windowStart) ?? [];
    texts.push(entry.text);
    windows.set(windowStart, texts);
  }

  return Array.from(windows, ([start, texts]) => `${formatTimestamp(start)} ${texts.join(' ')}`).join('\n');
}
