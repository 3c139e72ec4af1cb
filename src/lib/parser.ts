/**
 * Timed-text (XML) caption document parsing
 */

import type { TranscriptItem } from '../types';
import { TranscriptError } from './errors';

// <text ...>payload</text> or <text .../>
const TEXT_ELEMENT = /<text\b([^>]*?)(?:\/>|>([\s\S]*?)<\/text>)/g;
const ATTRIBUTE = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const TAG = /<[^>]*>/g;

function parseAttributes(source: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE)) {
    attrs.set(match[1], match[2] ?? match[3] ?? '');
  }
  return attrs;
}

function parseSeconds(value: string | undefined): number | null {
  if (value === undefined || !/^\d+(\.\d+)?$|^\.\d+$/.test(value.trim())) return null;
  return Number(value.trim());
}

/**
 * Remove nested markup tags, keeping readable text. Entities stay encoded.
 */
export function stripTags(text: string): string {
  return text.replace(TAG, '');
}

/**
 * Parse a timed-text document into items in document order.
 * Throws `ParsingError` when there are no `<text>` elements, every element is
 * blank, or a start time is malformed.
 */
export function parseTimedText(xml: string): TranscriptItem[] {
  const items: TranscriptItem[] = [];
  let elements = 0;

  for (const match of xml.matchAll(TEXT_ELEMENT)) {
    elements++;
    const attrs = parseAttributes(match[1]);

    const start = parseSeconds(attrs.get('start'));
    if (start === null) {
      throw new TranscriptError(
        'ParsingError',
        'parse',
        `Malformed start time in caption element #${elements}: ${JSON.stringify(attrs.get('start') ?? null)}`
      );
    }

    const text = stripTags(match[2] ?? '').trim();
    if (!text) continue;

    items.push({
      start,
      duration: parseSeconds(attrs.get('dur')) ?? 0,
      text,
    });
  }

  if (!elements) {
    throw new TranscriptError('ParsingError', 'parse', 'Unexpected caption document format: no timed text elements found');
  }

  if (!items.length) {
    throw new TranscriptError('ParsingError', 'parse', `No transcript lines found in ${elements} caption elements`);
  }

  return items;
}
