/**
 * Tests for video ID extraction
 */

import { describe, test, expect } from 'vitest';
import { extractVideoId, isVideoId, requireVideoId } from '../src/lib/videoId';
import { TranscriptError } from '../src/lib/errors';

describe('extractVideoId', () => {
  test('returns bare IDs unchanged', () => {
    expect(extractVideoId('dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('jNQXAC9IVRw')).toBe('jNQXAC9IVRw');
    expect(extractVideoId('abc123XYZ9')).toBe('abc123XYZ9');
    expect(extractVideoId('a-b_c-d_e-f')).toBe('a-b_c-d_e-f');
  });

  test('trims surrounding whitespace', () => {
    expect(extractVideoId('  dQw4w9WgXcQ\n')).toBe('dQw4w9WgXcQ');
  });

  test('extracts from canonical watch URLs', () => {
    expect(extractVideoId('https://www.youtube.com/watch?v=abc123XYZ9')).toBe('abc123XYZ9');
    expect(extractVideoId('https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=42s')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://youtube.com/watch?feature=share&v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://m.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('http://music.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  test('accepts URLs without a scheme', () => {
    expect(extractVideoId('www.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('youtu.be/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  test('extracts from short links', () => {
    expect(extractVideoId('https://youtu.be/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://youtu.be/dQw4w9WgXcQ?si=share')).toBe('dQw4w9WgXcQ');
  });

  test('extracts from embed, shorts and live paths', () => {
    expect(extractVideoId('https://www.youtube.com/embed/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://www.youtube.com/shorts/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://www.youtube.com/live/dQw4w9WgXcQ?feature=share')).toBe('dQw4w9WgXcQ');
    expect(extractVideoId('https://www.youtube-nocookie.com/embed/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  test('returns null for malformed input', () => {
    expect(extractVideoId('')).toBeNull();
    expect(extractVideoId('abc')).toBeNull();
    expect(extractVideoId('dQw4w9WgXcQ!')).toBeNull();
    expect(extractVideoId('dQw4w9 WgXc')).toBeNull();
    expect(extractVideoId('not a url at all')).toBeNull();
  });

  test('returns null for unrelated or incomplete URLs', () => {
    expect(extractVideoId('https://example.com/watch?v=dQw4w9WgXcQ')).toBeNull();
    expect(extractVideoId('https://www.youtube.com/watch')).toBeNull();
    expect(extractVideoId('https://www.youtube.com/watch?v=short')).toBeNull();
    expect(extractVideoId('https://www.youtube.com/channel/UC1234567890')).toBeNull();
    expect(extractVideoId('https://youtu.be/')).toBeNull();
  });
});

describe('isVideoId', () => {
  test('checks length and character set', () => {
    expect(isVideoId('dQw4w9WgXcQ')).toBe(true);
    expect(isVideoId('dQw4w9WgXc')).toBe(true);
    expect(isVideoId('dQw4w9WgX')).toBe(false);
    expect(isVideoId('dQw4w9WgXcQQ')).toBe(false);
    expect(isVideoId('dQw4w9WgXc.')).toBe(false);
  });
});

describe('requireVideoId', () => {
  test('returns the extracted ID', () => {
    expect(requireVideoId('https://youtu.be/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
  });

  test('throws InvalidIdentifier with the offending input', () => {
    let caught: unknown;
    try {
      requireVideoId('https://example.com/video');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TranscriptError);
    expect(caught).toMatchObject({
      kind: 'InvalidIdentifier',
      stage: 'resolve',
      input: 'https://example.com/video',
    });
  });
});
