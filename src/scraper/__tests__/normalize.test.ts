import { describe, it, expect } from 'vitest';
import { clampScore, sanitizeUrl, toStoryInput } from '../normalize.js';

describe('sanitizeUrl', () => {
  it('keeps http and https urls', () => {
    expect(sanitizeUrl('https://example.com/post')).toBe('https://example.com/post');
    expect(sanitizeUrl(' http://example.com ')).toBe('http://example.com');
  });

  it('drops other schemes and unparsable values', () => {
    expect(sanitizeUrl('javascript:alert(1)')).toBeNull();
    expect(sanitizeUrl('ftp://example.com/file')).toBeNull();
    expect(sanitizeUrl('/relative/path')).toBeNull();
    expect(sanitizeUrl(undefined)).toBeNull();
  });
});

describe('clampScore', () => {
  it('clamps negative scores to zero', () => {
    expect(clampScore(-5)).toBe(0);
    expect(clampScore(12)).toBe(12);
    expect(clampScore(undefined)).toBe(0);
  });
});

describe('toStoryInput', () => {
  it('maps a story item', () => {
    const input = toStoryInput({
      id: 101,
      type: 'story',
      by: 'alice',
      time: 1_700_000_000,
      title: '  Show: a thing  ',
      url: 'https://example.com',
      score: -5,
      descendants: 12,
    });

    expect(input).toEqual({
      externalId: 101,
      title: 'Show: a thing',
      url: 'https://example.com',
      score: 0,
      author: 'alice',
      commentCount: 12,
      sourceCreatedAt: new Date(1_700_000_000_000),
    });
  });

  it('defaults the author and comment count', () => {
    const input = toStoryInput({ id: 5, type: 'story', time: 1_700_000_000, title: 'Ask: anything?' });

    expect(input?.author).toBe('unknown');
    expect(input?.commentCount).toBe(0);
    expect(input?.url).toBeNull();
  });

  it('rejects non-stories and incomplete stories', () => {
    expect(toStoryInput({ id: 1, type: 'comment', time: 1_700_000_000 })).toBeNull();
    expect(toStoryInput({ id: 2, type: 'story', time: 1_700_000_000 })).toBeNull();
    expect(toStoryInput({ id: 3, type: 'story', title: 'No time' })).toBeNull();
  });
});
