/**
 * Transcript text rendering
 */

import entities from '../data/entities.json';
import type { TranscriptItem } from '../types';

// HTML 4 named character references plus XML's &apos;
const NAMED_ENTITIES: Record<string, string> = entities;

const ENTITY = /&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([a-zA-Z]+));/g;

function fromCodePoint(code: number, original: string): string {
  return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : original;
}

/**
 * Decode HTML/XML character entities in a single pass.
 * Names outside the HTML 4 set (HTML5 additions such as `&NewLine;`) are
 * kept verbatim.
 */
export function decodeEntities(text: string): string {
  return text.replace(ENTITY, (entity: string, dec?: string, hex?: string, name?: string) => {
    if (dec) return fromCodePoint(Number.parseInt(dec, 10), entity);
    if (hex) return fromCodePoint(Number.parseInt(hex, 16), entity);
    if (name && Object.hasOwn(NAMED_ENTITIES, name)) return NAMED_ENTITIES[name];
    return entity;
  });
}

/**
 * Render an offset as `[MM:SS]`. Seconds are floored; minutes keep
 * counting past 59 (no hour field).
 */
export function formatTimestamp(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const mins = Math.floor(total / 60);
  const secs = total % 60;
  return `[${String(mins).padStart(2, '0')}:${String(secs).padStart(2, '0')}]`;
}

/**
 * Caption text as it should appear in the transcript
 */
export function renderText(text: string): string {
  return decodeEntities(text).replace(/\r?\n/g, ' ');
}

/**
 * Format items as `[MM:SS] text` lines, in input order
 */
export function formatTranscript(items: TranscriptItem[]): string {
  return items.map((item) => `${formatTimestamp(item.start)} ${renderText(item.text)}`).join('\n');
}
